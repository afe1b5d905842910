import type { Dimensions } from '@engine/dimensions';
import { type ElementKind, type ElementType, GridBuffer, type HostArray } from '@platform/webgpu/grid-buffer';

/**
 * Diagnostic snapshot of a grid.
 *
 * enqueueCopyIn() only records a copy: the snapshot shows nothing useful
 * until that encoder has been submitted. read()/dump() wait for the GPU.
 */
export class DebugGrid<K extends ElementKind> {
    private readonly snapshot: GridBuffer<K>;

    constructor(device: GPUDevice, element: ElementType<K>, dimensions: Dimensions) {
        this.snapshot = GridBuffer.create(device, 'debug buffer', element, dimensions);
    }

    get dimensions(): Dimensions {
        return this.snapshot.dimensions;
    }

    enqueueCopyIn(encoder: GPUCommandEncoder, grid: GridBuffer<K>): void {
        this.snapshot.copyFrom(encoder, grid);
    }

    read(device: GPUDevice): Promise<HostArray<K>> {
        return this.snapshot.readBack(device);
    }

    /**
     * Record, submit and read back in one go.
     */
    async copyInAndRead(device: GPUDevice, grid: GridBuffer<K>): Promise<HostArray<K>> {
        const encoder = device.createCommandEncoder({ label: 'debug copy-in' });
        this.enqueueCopyIn(encoder, grid);
        device.queue.submit([encoder.finish()]);
        return this.read(device);
    }

    /**
     * Log the snapshot one grid row per line.
     */
    async dump(device: GPUDevice, title: string): Promise<void> {
        const data = await this.read(device);
        const rowLength = this.dimensions.width * this.snapshot.element.components;

        console.debug(title);
        for (let y = 0; y < this.dimensions.height; y++) {
            const row = Array.from(data.subarray(y * rowLength, (y + 1) * rowLength));
            console.debug(row.join(' '));
        }
    }

    destroy(): void {
        this.snapshot.destroy();
    }
}
