import copyShaderTemplate from '../../assets/shaders/buffer-copy.wgsl?raw';

import { formatDimensions } from '@engine/dimensions';
import {
    type ResizeCopyParams,
    computeResizeCopyParams,
    encodeResizeCopyParams,
    isEmptyOverlap,
} from '@engine/grid/resize-copy';
import { readOnly, writeOnly } from '@platform/webgpu/bindable';
import { Binder } from '@platform/webgpu/binder';
import { LinearBuffer } from '@platform/webgpu/buffer';
import { type ElementKind, type ElementType, F32, GridBuffer, U32, VEC4U } from '@platform/webgpu/grid-buffer';
import type { ShaderLoader } from '@platform/webgpu/shader-loader';

export const COPY_WORKGROUP_SIZE = { x: 8, y: 8 } as const; // must match WGSL @workgroup_size

/**
 * An element pair the resize copy kernel can translate between.
 * `manip` assigns `new_value` from `old_value`; plain assignment when omitted.
 */
export type CopyPair<S extends ElementKind, D extends ElementKind> = {
    readonly source: ElementType<S>;
    readonly destination: ElementType<D>;
    readonly manip?: string;
};

export const F32_COPY: CopyPair<'f32', 'f32'> = { source: F32, destination: F32 };

export const VEC4U_COPY: CopyPair<'vec4u', 'vec4u'> = { source: VEC4U, destination: VEC4U };

// Normalizes raw u32 values into [0, 1)
export const U32_TO_F32_COPY: CopyPair<'u32', 'f32'> = {
    source: U32,
    destination: F32,
    manip: 'new_value = f32(old_value) / 4294967296.0',
};

export function copyShaderKey(pair: CopyPair<ElementKind, ElementKind>): string {
    return `buffer copy ${pair.source.kind} -> ${pair.destination.kind}`;
}

export function copyShaderSource(pair: CopyPair<ElementKind, ElementKind>): string {
    return copyShaderTemplate
        .replaceAll('{src_type}', pair.source.wgsl)
        .replaceAll('{dst_type}', pair.destination.wgsl)
        .replaceAll('{manip}', pair.manip ?? 'new_value = old_value');
}

/**
 * GPU copy of a grid into a differently sized grid, centering the overlap.
 *
 * Destination cells outside the overlap are left as they are (zero for a
 * freshly created buffer). An empty overlap dispatches nothing.
 */
export class ResizingCopier<S extends ElementKind, D extends ElementKind> {
    private readonly binder: Binder;

    private constructor(
        private readonly device: GPUDevice,
        private readonly shader: GPUShaderModule,
        readonly pair: CopyPair<S, D>,
    ) {
        this.binder = new Binder(device);
    }

    static async create<S extends ElementKind, D extends ElementKind>(
        device: GPUDevice,
        shaders: ShaderLoader,
        pair: CopyPair<S, D>,
    ): Promise<ResizingCopier<S, D>> {
        const shader = await shaders.load(copyShaderKey(pair), copyShaderSource(pair));
        return new ResizingCopier(device, shader, pair);
    }

    /**
     * Submits its own command buffer. Returns the parameters used.
     */
    copy(src: GridBuffer<S>, dst: GridBuffer<D>): ResizeCopyParams {
        const params = computeResizeCopyParams(src.dimensions, dst.dimensions);
        console.info(
            `ResizingCopier: '${src.label}' ${formatDimensions(src.dimensions)} -> `
            + `'${dst.label}' ${formatDimensions(dst.dimensions)}`,
            params,
        );

        if (isEmptyOverlap(params)) {
            return params;
        }

        const paramBuffer = LinearBuffer.createInit(
            this.device,
            'copy data parameters',
            'uniform',
            encodeResizeCopyParams(params),
        );

        try {
            const { pipeline, bindGroup } = this.binder.bindStatic(this.shader, 'copy', [
                readOnly(paramBuffer),
                readOnly(src),
                writeOnly(dst),
            ]);

            const encoder = this.device.createCommandEncoder({
                label: `resize copy into ${dst.label}`,
            });

            const pass = encoder.beginComputePass({ label: 'Resize copy' });
            pass.setPipeline(pipeline);
            pass.setBindGroup(0, bindGroup);
            pass.dispatchWorkgroups(
                Math.ceil(params.overlapWidth / COPY_WORKGROUP_SIZE.x),
                Math.ceil(params.overlapHeight / COPY_WORKGROUP_SIZE.y),
            );
            pass.end();

            this.device.queue.submit([encoder.finish()]);
        } finally {
            paramBuffer.destroy();
        }

        return params;
    }
}
