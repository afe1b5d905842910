import type { Dimensions } from '@engine/dimensions';
import { ResizeCopyParamsLayout } from '@platform/webgpu/layouts';

/**
 * Parameters of a centered resize copy between two grids.
 *
 * The overlap is min(old, new) on each axis. Whichever side is larger is
 * offset by half the difference (truncated), so the overlap is centered in
 * both grids.
 */
export type ResizeCopyParams = {
    readonly oldOffsetX: number;
    readonly oldOffsetY: number;
    readonly newOffsetX: number;
    readonly newOffsetY: number;
    readonly oldWidth: number;
    readonly newWidth: number;
    readonly overlapWidth: number;
    readonly overlapHeight: number;
};

export function computeResizeCopyParams(
    oldDim: Dimensions,
    newDim: Dimensions,
): ResizeCopyParams {
    const { width: ow, height: oh } = oldDim;
    const { width: nw, height: nh } = newDim;

    return {
        oldOffsetX: ow > nw ? Math.trunc((ow - nw) / 2) : 0,
        oldOffsetY: oh > nh ? Math.trunc((oh - nh) / 2) : 0,
        newOffsetX: nw > ow ? Math.trunc((nw - ow) / 2) : 0,
        newOffsetY: nh > oh ? Math.trunc((nh - oh) / 2) : 0,
        oldWidth: ow,
        newWidth: nw,
        overlapWidth: Math.min(ow, nw),
        overlapHeight: Math.min(oh, nh),
    };
}

export function isEmptyOverlap(params: ResizeCopyParams): boolean {
    return params.overlapWidth === 0 || params.overlapHeight === 0;
}

/**
 * Pack params into the uniform record read by buffer-copy.wgsl.
 */
export function encodeResizeCopyParams(params: ResizeCopyParams): ArrayBuffer {
    const staging = new ArrayBuffer(ResizeCopyParamsLayout.SIZE);
    const view = new DataView(staging);
    const { offsets } = ResizeCopyParamsLayout;

    view.setUint32(offsets.oldOffsetX, params.oldOffsetX, true);
    view.setUint32(offsets.oldOffsetY, params.oldOffsetY, true);
    view.setUint32(offsets.newOffsetX, params.newOffsetX, true);
    view.setUint32(offsets.newOffsetY, params.newOffsetY, true);
    view.setUint32(offsets.oldWidth, params.oldWidth, true);
    view.setUint32(offsets.newWidth, params.newWidth, true);
    view.setUint32(offsets.overlapWidth, params.overlapWidth, true);
    view.setUint32(offsets.overlapHeight, params.overlapHeight, true);

    return staging;
}
