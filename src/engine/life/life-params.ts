import type { Dimensions } from '@engine/dimensions';
import type { AccessMode, BindingLayout, BufferAccess, BufferCapability } from '@platform/webgpu/bindable';
import { LinearBuffer } from '@platform/webgpu/buffer';
import { LifeParamsLayout } from '@platform/webgpu/layouts';

/**
 * CPU-side writer for the Params uniform shared by the life kernel and the
 * present pass. Owns the full layout.
 */
export class LifeParamsWriter {
    private readonly staging: ArrayBuffer;
    private readonly view: DataView;

    constructor() {
        this.staging = new ArrayBuffer(LifeParamsLayout.SIZE);
        this.view = new DataView(this.staging);
    }

    /**
     * Intended for init-time or resize-time updates.
     */
    write(dimensions: Dimensions, threshold: number): ArrayBuffer {
        this.view.setUint32(LifeParamsLayout.offsets.width, dimensions.width, true);
        this.view.setUint32(LifeParamsLayout.offsets.height, dimensions.height, true);
        this.view.setFloat32(LifeParamsLayout.offsets.threshold, threshold, true);
        return this.staging;
    }
}

/**
 * The uploaded Params uniform, remembering the grid it describes so the
 * simulation can reject it for a grid of another size.
 */
export class LifeParams implements BufferCapability {
    readonly kind = 'buffer';

    constructor(
        readonly buffer: LinearBuffer,
        readonly dimensions: Dimensions,
        readonly threshold: number,
    ) {}

    get label(): string {
        return this.buffer.label;
    }

    get supportedAccess(): readonly BufferAccess[] {
        return this.buffer.supportedAccess;
    }

    bindingResource(): GPUBindingResource {
        return this.buffer.bindingResource();
    }

    layoutFor(access: AccessMode): BindingLayout {
        return this.buffer.layoutFor(access);
    }

    destroy(): void {
        this.buffer.destroy();
    }
}

export function createLifeParams(
    device: GPUDevice,
    dimensions: Dimensions,
    threshold: number,
): LifeParams {
    const contents = new LifeParamsWriter().write(dimensions, threshold);
    const buffer = LinearBuffer.createInit(device, 'Life parameters', 'uniform', contents);
    return new LifeParams(buffer, dimensions, threshold);
}
