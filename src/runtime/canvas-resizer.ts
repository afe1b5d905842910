export type CanvasSize = {
    width: number;
    height: number;
    dpr: number;
}

export type ResizeResult = {
    size: CanvasSize;
    changed: boolean;
};

/**
 * The subset of HTMLCanvasElement the resizer touches.
 */
export type ResizableCanvas = {
    readonly clientWidth: number;
    readonly clientHeight: number;
    width: number;
    height: number;
};

/**
 * Keeps the canvas backing store at client size × device pixel ratio,
 * never smaller than 1×1 (a zero-sized texture is invalid).
 */
export class CanvasResizer {
    private last: CanvasSize | null = null;

    constructor(
        private readonly canvas: ResizableCanvas,
        private readonly devicePixelRatio: () => number = () => window.devicePixelRatio || 1,
    ) {}

    resize(): ResizeResult {
        const dpr = this.devicePixelRatio();
        const width = Math.max(1, Math.floor(this.canvas.clientWidth * dpr));
        const height = Math.max(1, Math.floor(this.canvas.clientHeight * dpr));

        const last = this.last;
        if (last && width === last.width && height === last.height && dpr === last.dpr) {
            return { size: last, changed: false };
        }

        this.canvas.width = width;
        this.canvas.height = height;

        const size = { width, height, dpr };
        this.last = size;
        return { size, changed: true };
    }
}
