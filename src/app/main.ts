// Bootstrap entry: one Life cell per physical canvas pixel

import { LifeConfig } from '@app/config';

import { type Dimensions, area } from '@engine/dimensions';
import { type LifeParams, createLifeParams } from '@engine/life/life-params';
import { type LifeBindings, LifeSimulation } from '@engine/life/life-simulation';
import { SeededRandom, randomFloatArray } from '@engine/random';
import { PresentPass } from '@engine/render/present-pass';

import type { GpuError } from '@platform/webgpu/errors';
import { type WebGPUContext, initWebGPU } from '@platform/webgpu/init';
import { ShaderLoader } from '@platform/webgpu/shader-loader';
import { StorageImage } from '@platform/webgpu/texture';

import { CanvasResizer } from '@runtime/canvas-resizer';
import { PresentationSurface } from '@runtime/presentation-surface';
import { type FrameContext, startRenderLoop } from '@runtime/render-loop';

/**
 * Host-owned resources shared by the simulation and the present pass.
 * Rebuilt on every resize.
 */
type Surface = LifeBindings & {
    readonly params: LifeParams;
    readonly image: StorageImage;
    destroy(): void;
};

function createSurface(device: GPUDevice, grid: Dimensions): Surface {
    const params = createLifeParams(device, grid, LifeConfig.threshold);
    const image = new StorageImage(device, 'Life image', grid, LifeConfig.imageFormat);
    return {
        params,
        image,
        destroy() {
            params.destroy();
            image.destroy();
        },
    };
}

export async function bootstrap(): Promise<void> {
    const canvas = document.getElementById('canvas');
    if (!(canvas instanceof HTMLCanvasElement)) {
        throw new Error('Canvas element `#canvas` not found');
    }

    let stop: (() => void) | null = null;

    function fatal(err: GpuError): void {
        console.error(`Fatal GPU error [${err.code}]:`, err);
        stop?.();
        stop = null;
    }

    // --- WebGPU ---

    const gpu: WebGPUContext = await initWebGPU(canvas, fatal, {
        powerPreference: LifeConfig.powerPreference,
    });

    const presentation = new PresentationSurface(
        gpu.context,
        new CanvasResizer(canvas),
        gpu.device,
        gpu.format,
    );

    // --- Shader library (long-lived, global) ---

    const shaderLoader = new ShaderLoader(gpu.device);

    // --- Initial state ---

    let { grid } = presentation.resize();
    let surface = createSurface(gpu.device, grid);
    const random = new SeededRandom(LifeConfig.seed);

    const [sim, present] = await Promise.all([
        LifeSimulation.create(gpu.device, shaderLoader, {
            dimensions: grid,
            random,
            params: surface.params,
            image: surface.image,
        }),
        PresentPass.create(gpu.device, shaderLoader, gpu.format),
    ]);

    sim.import(randomFloatArray(random, area(grid)));

    const warmup = gpu.device.createCommandEncoder({ label: 'warm-up' });
    for (let i = 0; i < LifeConfig.warmupSteps; i++) {
        sim.step(warmup);
    }
    gpu.device.queue.submit([warmup.finish()]);

    present.bind(surface.params, surface.image);

    // --- Render loop ---

    function makeFrameContext(encoder: GPUCommandEncoder, dt: number): FrameContext {
        return {
            encoder,
            dt,
            acquireView: () => presentation.acquireView(),
        };
    }

    function frame(ctx: FrameContext): void {
        sim.step(ctx.encoder);

        const view = ctx.acquireView();
        if (view) {
            present.encode(ctx.encoder, view);
        }
    }

    stop = startRenderLoop(gpu.device, makeFrameContext, frame);

    // --- Resize handling ---

    window.addEventListener('resize', () => {
        if (!stop) return;

        const next = presentation.resize();
        if (!next.changed) return;

        const previous = surface;
        grid = next.grid;
        surface = createSurface(gpu.device, grid);

        sim.resize(grid, surface, random);
        present.bind(surface.params, surface.image);

        previous.destroy();
    });
}

bootstrap().catch((err) => {
    console.error('Fatal initialization error:', err);
});
