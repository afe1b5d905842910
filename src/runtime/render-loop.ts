/**
 * Render loop infrastructure.
 *
 * Responsibilities:
 * - Drives the RAF-based frame lifecycle
 * - Issues exactly one GPUCommandEncoder per frame
 * - Submits command buffers to the device queue
 * - Provides a per-frame context object via dependency injection
 *
 * Design notes:
 * - The render loop is intentionally unaware of canvas, swap chain,
 *   or framebuffer concepts.
 * - Framebuffer acquisition is delegated to FrameContext.acquireView();
 *   a frame may be skipped by returning `null` from it.
 *
 * Timing:
 * - `dt` is expressed in seconds; 0 on the first frame.
 *
 * Invariants:
 * - Nothing is submitted after stop() returns.
 * - Submitting an empty command buffer is valid and expected.
 */

export interface FrameContext {
    readonly encoder: GPUCommandEncoder;
    readonly dt: number;

    /** Framebuffer acquisition */
    acquireView(): GPUTextureView | null;
}

export type FrameContextFactory = (
    encoder: GPUCommandEncoder,
    dt: number
) => FrameContext;

export type FrameScheduler = {
    request(callback: (now: number) => void): number;
    cancel(handle: number): void;
};

const animationFrames: FrameScheduler = {
    request: (callback) => requestAnimationFrame(callback),
    cancel: (handle) => cancelAnimationFrame(handle),
};

export function startRenderLoop(
    device: GPUDevice,
    makeContext: FrameContextFactory,
    frame: (ctx: FrameContext) => void,
    scheduler: FrameScheduler = animationFrames,
): () => void {
    let lastTime: number | null = null;
    let isActive = true;
    let handle = scheduler.request(tick);

    function tick(now: number): void {
        if (!isActive) return;

        const dt = lastTime === null ? 0 : (now - lastTime) / 1000;
        lastTime = now;

        const encoder = device.createCommandEncoder({ label: 'frame' });
        frame(makeContext(encoder, dt));
        device.queue.submit([encoder.finish()]);

        handle = scheduler.request(tick);
    }

    return () => {
        isActive = false;
        scheduler.cancel(handle);
    };
}
