/**
 * Width × height of a cell grid, in cells.
 */
export type Dimensions = {
    readonly width: number;
    readonly height: number;
};

export function dimensions(width: number, height: number): Dimensions {
    if (!Number.isInteger(width) || width < 0 || !Number.isInteger(height) || height < 0) {
        throw new RangeError(`Invalid grid dimensions ${width}x${height}`);
    }
    return { width, height };
}

export function area(dim: Dimensions): number {
    return dim.width * dim.height;
}

export function sameDimensions(a: Dimensions, b: Dimensions): boolean {
    return a.width === b.width && a.height === b.height;
}

export function formatDimensions(dim: Dimensions): string {
    return `${dim.width}x${dim.height}`;
}
