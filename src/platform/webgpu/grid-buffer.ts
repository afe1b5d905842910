import type { AccessMode, BindingLayout, BufferAccess, BufferCapability } from '@platform/webgpu/bindable';
import { LinearBuffer } from '@platform/webgpu/buffer';
import { SizeMismatchError } from '@platform/webgpu/errors';
import { type Dimensions, area, formatDimensions, sameDimensions } from '@engine/dimensions';

export type ElementKind = 'f32' | 'u32' | 'vec4u';

export type HostArray<K extends ElementKind> = K extends 'f32' ? Float32Array : Uint32Array;

/**
 * Host-side description of a grid element and its WGSL counterpart.
 */
export interface ElementType<K extends ElementKind> {
    readonly kind: K;
    readonly wgsl: string;
    readonly byteSize: number;
    /** Scalars per element in the flat host representation. */
    readonly components: number;
    fromBytes(bytes: ArrayBuffer): HostArray<K>;
    fill(staging: ArrayBuffer, data: ArrayLike<number>): void;
}

export const F32: ElementType<'f32'> = {
    kind: 'f32',
    wgsl: 'f32',
    byteSize: 4,
    components: 1,
    fromBytes: (bytes) => new Float32Array(bytes),
    fill: (staging, data) => new Float32Array(staging).set(data),
};

export const U32: ElementType<'u32'> = {
    kind: 'u32',
    wgsl: 'u32',
    byteSize: 4,
    components: 1,
    fromBytes: (bytes) => new Uint32Array(bytes),
    fill: (staging, data) => new Uint32Array(staging).set(data),
};

export const VEC4U: ElementType<'vec4u'> = {
    kind: 'vec4u',
    wgsl: 'vec4<u32>',
    byteSize: 16,
    components: 4,
    fromBytes: (bytes) => new Uint32Array(bytes),
    fill: (staging, data) => new Uint32Array(staging).set(data),
};

/**
 * A linear storage buffer viewed as a width × height array of one element type.
 *
 * Invariants:
 * - byteSize === width * height * element.byteSize
 * - dimensions never change; a resize constructs a new GridBuffer
 *
 * A zero-area grid still allocates one element of backing storage, since
 * WebGPU rejects zero-sized bindings. `byteSize` stays the logical size.
 */
export class GridBuffer<K extends ElementKind> implements BufferCapability {
    readonly kind = 'buffer';
    readonly byteSize: number;

    private constructor(
        private readonly storage: LinearBuffer,
        readonly element: ElementType<K>,
        readonly dimensions: Dimensions,
    ) {
        this.byteSize = area(dimensions) * element.byteSize;
    }

    static create<K extends ElementKind>(
        device: GPUDevice,
        label: string,
        element: ElementType<K>,
        dimensions: Dimensions,
    ): GridBuffer<K> {
        const size = Math.max(area(dimensions) * element.byteSize, element.byteSize);
        return new GridBuffer(
            LinearBuffer.create(device, label, 'storage', size),
            element,
            dimensions,
        );
    }

    static createInit<K extends ElementKind>(
        device: GPUDevice,
        label: string,
        element: ElementType<K>,
        dimensions: Dimensions,
        data: ArrayLike<number>,
    ): GridBuffer<K> {
        const staging = stage(element, dimensions, data, label);
        const padded = staging.byteLength > 0 ? staging : new ArrayBuffer(element.byteSize);
        return new GridBuffer(
            LinearBuffer.createInit(device, label, 'storage', padded),
            element,
            dimensions,
        );
    }

    get label(): string {
        return this.storage.label;
    }

    get supportedAccess(): readonly BufferAccess[] {
        return this.storage.supportedAccess;
    }

    get gpuBuffer(): GPUBuffer {
        return this.storage.gpuBuffer;
    }

    bindingResource(): GPUBindingResource {
        return this.storage.bindingResource();
    }

    layoutFor(access: AccessMode): BindingLayout {
        return this.storage.layoutFor(access);
    }

    /**
     * Upload host data covering the whole grid, `components` scalars per cell.
     * Throws before touching the queue if the length does not match.
     */
    importFrom(queue: GPUQueue, data: ArrayLike<number>): void {
        const staging = stage(this.element, this.dimensions, data, this.label);
        if (staging.byteLength === 0) return;
        this.storage.write(queue, staging);
    }

    /**
     * Record a same-size GPU copy from `src` into this grid.
     */
    copyFrom(encoder: GPUCommandEncoder, src: GridBuffer<K>): void {
        if (!sameDimensions(src.dimensions, this.dimensions)) {
            throw new SizeMismatchError(
                `GridBuffer '${this.label}': cannot copy from '${src.label}' `
                + `(${formatDimensions(src.dimensions)} into ${formatDimensions(this.dimensions)})`
            );
        }
        if (this.byteSize === 0) return;

        encoder.copyBufferToBuffer(src.gpuBuffer, 0, this.gpuBuffer, 0, this.byteSize);
    }

    /**
     * Diagnostic read-back. Resolves only after every previously submitted
     * command has completed, so it serializes host and device: never call it
     * from the per-frame path.
     */
    async readBack(device: GPUDevice): Promise<HostArray<K>> {
        if (this.byteSize === 0) {
            return this.element.fromBytes(new ArrayBuffer(0));
        }

        const staging = device.createBuffer({
            label: `${this.label} read-back`,
            size: this.byteSize,
            usage: GPUBufferUsage.MAP_READ | GPUBufferUsage.COPY_DST,
        });

        try {
            const encoder = device.createCommandEncoder({ label: `reading ${this.label}` });
            encoder.copyBufferToBuffer(this.gpuBuffer, 0, staging, 0, this.byteSize);
            device.queue.submit([encoder.finish()]);

            await staging.mapAsync(GPUMapMode.READ);
            const bytes = staging.getMappedRange().slice(0);
            staging.unmap();

            return this.element.fromBytes(bytes);
        } finally {
            staging.destroy();
        }
    }

    destroy(): void {
        this.storage.destroy();
    }
}

function stage<K extends ElementKind>(
    element: ElementType<K>,
    dimensions: Dimensions,
    data: ArrayLike<number>,
    label: string,
): ArrayBuffer {
    const expected = area(dimensions) * element.components;
    if (data.length !== expected) {
        throw new SizeMismatchError(
            `GridBuffer '${label}': expected ${expected} values for ${formatDimensions(dimensions)} `
            + `${element.kind} grid, got ${data.length}`
        );
    }

    const staging = new ArrayBuffer(area(dimensions) * element.byteSize);
    element.fill(staging, data);
    return staging;
}
