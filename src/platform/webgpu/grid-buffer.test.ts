import { describe, expect, it } from 'vitest';

import { dimensions } from '@engine/dimensions';
import { SizeMismatchError } from '@platform/webgpu/errors';
import { F32, GridBuffer, VEC4U } from '@platform/webgpu/grid-buffer';

import { asEncoder, createFakeGpu } from '@test/support/fake-gpu';

describe('GridBuffer', () => {
    it('sizes storage as width × height × element size', () => {
        const { fake, device } = createFakeGpu();

        const cells = GridBuffer.create(device, 'cells', F32, dimensions(3, 2));
        const random = GridBuffer.create(device, 'random', VEC4U, dimensions(3, 2));

        expect(cells.byteSize).toBe(24);
        expect(random.byteSize).toBe(96);
        expect(fake.buffers.map((b) => b.size)).toEqual([24, 96]);
        expect(cells.supportedAccess).toEqual(['read-only', 'write-only']);
    });

    it('backs a zero-area grid with one element', () => {
        const { fake, device } = createFakeGpu();

        const empty = GridBuffer.create(device, 'empty', VEC4U, dimensions(0, 5));
        const initialized = GridBuffer.createInit(device, 'empty init', F32, dimensions(4, 0), []);

        expect(empty.byteSize).toBe(0);
        expect(initialized.byteSize).toBe(0);
        expect(fake.buffers.map((b) => b.size)).toEqual([16, 4]);
        expect(empty.layoutFor('read-only')).toEqual({
            buffer: { type: 'read-only-storage', minBindingSize: 16 },
        });
    });

    it('imports host data and reads it back', async () => {
        const { device } = createFakeGpu();
        const grid = GridBuffer.create(device, 'cells', F32, dimensions(3, 2));

        grid.importFrom(device.queue, [0, 0.5, 1, 1.5, 2, 2.5]);

        expect(Array.from(await grid.readBack(device))).toEqual([0, 0.5, 1, 1.5, 2, 2.5]);
    });

    it('expects four values per vec4 cell', async () => {
        const { device } = createFakeGpu();
        const grid = GridBuffer.createInit(device, 'random', VEC4U, dimensions(2, 1), [1, 2, 3, 4, 5, 6, 7, 8]);

        const data = await grid.readBack(device);

        expect(data).toBeInstanceOf(Uint32Array);
        expect(Array.from(data)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
        expect(() => grid.importFrom(device.queue, [1, 2])).toThrow(SizeMismatchError);
    });

    it('rejects a size mismatch before touching the queue', () => {
        const { fake, device } = createFakeGpu();
        const grid = GridBuffer.create(device, 'cells', F32, dimensions(2, 2));

        expect(() => grid.importFrom(device.queue, [1, 2, 3])).toThrow(
            "GridBuffer 'cells': expected 4 values for 2x2 f32 grid, got 3"
        );
        expect(fake.writes).toBe(0);
    });

    it('copies between grids of equal dimensions', async () => {
        const { fake, device } = createFakeGpu();
        const src = GridBuffer.createInit(device, 'src', F32, dimensions(2, 2), [4, 3, 2, 1]);
        const dst = GridBuffer.create(device, 'dst', F32, dimensions(2, 2));

        const encoder = fake.createCommandEncoder({ label: 'copy' });
        dst.copyFrom(asEncoder(encoder), src);
        fake.queue.submit([encoder.finish()]);

        expect(Array.from(await dst.readBack(device))).toEqual([4, 3, 2, 1]);
    });

    it('refuses to copy between different dimensions', () => {
        const { fake, device } = createFakeGpu();
        const src = GridBuffer.create(device, 'src', F32, dimensions(2, 2));
        const dst = GridBuffer.create(device, 'dst', F32, dimensions(4, 1));

        expect(() => dst.copyFrom(asEncoder(fake.createCommandEncoder()), src)).toThrow(SizeMismatchError);
    });

    it('releases the read-back staging buffer', async () => {
        const { fake, device } = createFakeGpu();
        const grid = GridBuffer.create(device, 'cells', F32, dimensions(2, 2));

        await grid.readBack(device);

        const staging = fake.buffers.filter((b) => b.label === 'cells read-back');
        expect(staging).toHaveLength(1);
        expect(staging[0].destroyed).toBe(true);
        expect(staging[0].usage).toBe(GPUBufferUsage.MAP_READ | GPUBufferUsage.COPY_DST);
    });

    it('reads back an empty grid without a GPU round trip', async () => {
        const { fake, device } = createFakeGpu();
        const grid = GridBuffer.create(device, 'empty', F32, dimensions(0, 0));

        expect(Array.from(await grid.readBack(device))).toEqual([]);
        expect(fake.submits).toBe(0);
    });
});
