import {
    type AccessMode,
    type BindingLayout,
    type BufferAccess,
    type BufferCapability,
    assertSupportedAccess,
} from '@platform/webgpu/bindable';

export type BufferUsageKind = 'uniform' | 'storage';

const UNIFORM_ACCESS: readonly BufferAccess[] = ['read-only'];
const STORAGE_ACCESS: readonly BufferAccess[] = ['read-only', 'write-only'];

// mappedAtCreation requires a size that is a multiple of 4
function alignTo4(n: number): number {
    return (n + 3) & ~3;
}

function usageFlags(usage: BufferUsageKind): GPUBufferUsageFlags {
    const kind = usage === 'uniform' ? GPUBufferUsage.UNIFORM : GPUBufferUsage.STORAGE;
    return kind | GPUBufferUsage.COPY_SRC | GPUBufferUsage.COPY_DST;
}

/**
 * Fixed-size linear GPU memory tagged with its usage kind.
 *
 * Size and usage are immutable; contents change only through write() or
 * GPU-side copies. A uniform buffer can only be bound read-only.
 */
export class LinearBuffer implements BufferCapability {
    readonly kind = 'buffer';
    readonly supportedAccess: readonly BufferAccess[];

    private constructor(
        readonly gpuBuffer: GPUBuffer,
        readonly label: string,
        readonly usage: BufferUsageKind,
        readonly size: number,
    ) {
        this.supportedAccess = usage === 'uniform' ? UNIFORM_ACCESS : STORAGE_ACCESS;
    }

    static create(
        device: GPUDevice,
        label: string,
        usage: BufferUsageKind,
        size: number,
    ): LinearBuffer {
        const gpuBuffer = device.createBuffer({
            label,
            size,
            usage: usageFlags(usage),
        });
        return new LinearBuffer(gpuBuffer, label, usage, size);
    }

    static createInit(
        device: GPUDevice,
        label: string,
        usage: BufferUsageKind,
        contents: ArrayBuffer,
    ): LinearBuffer {
        const size = alignTo4(contents.byteLength);
        const gpuBuffer = device.createBuffer({
            label,
            size,
            usage: usageFlags(usage),
            mappedAtCreation: true,
        });

        new Uint8Array(gpuBuffer.getMappedRange()).set(new Uint8Array(contents));
        gpuBuffer.unmap();

        return new LinearBuffer(gpuBuffer, label, usage, size);
    }

    bindingResource(): GPUBindingResource {
        return { buffer: this.gpuBuffer };
    }

    layoutFor(access: AccessMode): BindingLayout {
        assertSupportedAccess(this, access);

        if (this.usage === 'uniform') {
            return { buffer: { type: 'uniform', minBindingSize: this.size } };
        }

        return {
            buffer: {
                type: access === 'read-only' ? 'read-only-storage' : 'storage',
                minBindingSize: this.size,
            },
        };
    }

    /**
     * Upload host data at `offset`. Enqueued on the device queue; does not block.
     */
    write(queue: GPUQueue, data: ArrayBuffer, offset = 0): void {
        queue.writeBuffer(this.gpuBuffer, offset, data);
    }

    destroy(): void {
        this.gpuBuffer.destroy();
    }
}
