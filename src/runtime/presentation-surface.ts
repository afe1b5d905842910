import { type Dimensions, dimensions, sameDimensions } from '@engine/dimensions';
import type { CanvasResizer } from '@runtime/canvas-resizer';

export type SurfaceContext = Pick<GPUCanvasContext, 'configure' | 'getCurrentTexture'>;

export type GridResize = {
    readonly grid: Dimensions;
    /** False when the grid kept its size, even if the canvas was touched. */
    readonly changed: boolean;
};

/**
 * The canvas seen as a Life grid: one cell per physical pixel.
 * Owns the context configuration and per-frame view acquisition.
 */
export class PresentationSurface {
    private grid: Dimensions | null = null;

    constructor(
        private readonly context: SurfaceContext,
        private readonly resizer: CanvasResizer,
        private readonly device: GPUDevice,
        private readonly format: GPUTextureFormat,
        private readonly alphaMode: GPUCanvasAlphaMode = 'opaque',
    ) {
        this.configure();
    }

    /**
     * Match the backing store to the canvas and report the grid it holds.
     * The context is reconfigured whenever the backing store changed.
     */
    resize(): GridResize {
        const { size, changed } = this.resizer.resize();
        if (changed) {
            this.configure();
        }

        const grid = dimensions(size.width, size.height);
        const previous = this.grid;
        this.grid = grid;

        return { grid, changed: previous === null || !sameDimensions(previous, grid) };
    }

    /** Null skips the frame. */
    acquireView(): GPUTextureView | null {
        try {
            return this.context.getCurrentTexture().createView();
        } catch (err) {
            console.warn('PresentationSurface: no current texture, skipping frame', err);
            return null;
        }
    }

    private configure(): void {
        this.context.configure({
            device: this.device,
            format: this.format,
            alphaMode: this.alphaMode,
        });
    }
}
