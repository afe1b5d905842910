import { DeviceLostError, GpuError, GpuValidationError } from '@platform/webgpu/errors';

export interface WebGPUContext {
    adapter: GPUAdapter;
    device: GPUDevice;
    context: GPUCanvasContext;
    format: GPUTextureFormat;
}

export type FatalErrorHandler = (error: GpuError) => void;

export type WebGPUOptions = {
    powerPreference?: GPUPowerPreference;
    /** Defaults to navigator.gpu */
    gpu?: GPU;
};

/**
 * Acquire adapter, device and canvas context.
 *
 * Device loss and uncaptured device errors are fatal: both are routed to
 * `onFatal` and nothing is retried here.
 */
export async function initWebGPU(
    canvas: HTMLCanvasElement,
    onFatal: FatalErrorHandler,
    options: WebGPUOptions = {},
): Promise<WebGPUContext> {
    const gpu = options.gpu ?? navigator.gpu;
    if (!gpu) {
        throw new GpuError('WebGPU is not supported in this browser', 'WEBGPU_NOT_SUPPORTED');
    }

    const adapter = await gpu.requestAdapter({
        powerPreference: options.powerPreference ?? 'high-performance',
    });
    if (!adapter) {
        throw new GpuError('No suitable GPU adapter found', 'NO_ADAPTER');
    }

    const device = await adapter.requestDevice();

    void device.lost.then(
        (info) => onFatal(new DeviceLostError(`WebGPU device lost: ${info.message}`, info.reason)),
        (err: unknown) => console.error('WebGPU device.lost rejected:', err),
    );

    device.addEventListener('uncapturederror', (event) => {
        onFatal(new GpuValidationError(`Uncaptured WebGPU error: ${event.error.message}`));
    });

    const context = canvas.getContext('webgpu');
    if (!context) {
        throw new GpuError('Failed to acquire WebGPU canvas context', 'NO_CONTEXT');
    }

    const format = gpu.getPreferredCanvasFormat();

    console.info(`WebGPU initialized (canvas format ${format})`);

    return { adapter, device, context, format };
}
