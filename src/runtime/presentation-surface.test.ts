import { afterEach, describe, expect, it, vi } from 'vitest';

import { CanvasResizer } from '@runtime/canvas-resizer';
import { PresentationSurface } from '@runtime/presentation-surface';

import { createFakeGpu } from '@test/support/fake-gpu';

function setup(getCurrentTexture: () => GPUTexture = () => {
    throw new Error('no texture');
}) {
    const { device } = createFakeGpu();
    const canvas = { clientWidth: 200, clientHeight: 100, width: 0, height: 0 };
    let dpr = 1;
    const context = { configure: vi.fn(), getCurrentTexture: vi.fn(getCurrentTexture) };

    const surface = new PresentationSurface(
        context,
        new CanvasResizer(canvas, () => dpr),
        device,
        'bgra8unorm',
    );

    return { surface, canvas, context, device, setDpr: (value: number) => { dpr = value; } };
}

afterEach(() => {
    vi.restoreAllMocks();
});

describe('PresentationSurface', () => {
    it('configures the context on construction', () => {
        const { context, device } = setup();

        expect(context.configure).toHaveBeenCalledWith({ device, format: 'bgra8unorm', alphaMode: 'opaque' });
    });

    it('reports one grid cell per physical pixel', () => {
        const { surface, canvas, setDpr } = setup();
        setDpr(2);

        expect(surface.resize()).toEqual({ grid: { width: 400, height: 200 }, changed: true });
        expect([canvas.width, canvas.height]).toEqual([400, 200]);
    });

    it('reconfigures and reports a change only when the grid size changes', () => {
        const { surface, canvas, context } = setup();

        surface.resize();
        expect(surface.resize()).toEqual({ grid: { width: 200, height: 100 }, changed: false });

        canvas.clientWidth = 300;
        expect(surface.resize()).toEqual({ grid: { width: 300, height: 100 }, changed: true });
        expect(context.configure).toHaveBeenCalledTimes(3);
    });

    it('keeps the grid when only the pixel ratio and client size trade off', () => {
        const { surface, canvas, context, setDpr } = setup();
        surface.resize();

        setDpr(2);
        canvas.clientWidth = 100;
        canvas.clientHeight = 50;

        expect(surface.resize()).toEqual({ grid: { width: 200, height: 100 }, changed: false });
        expect(context.configure).toHaveBeenCalledTimes(3);
    });

    it('returns the current texture view', () => {
        const view = { label: 'view' };
        const { surface } = setup(() => ({ createView: () => view }) as unknown as GPUTexture);

        expect(surface.acquireView()).toBe(view);
    });

    it('skips the frame when no texture is available', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const { surface } = setup();

        expect(surface.acquireView()).toBeNull();
        expect(warn).toHaveBeenCalledTimes(1);
    });
});
