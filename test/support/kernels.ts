import { COPY_WORKGROUP_SIZE, copyShaderKey, F32_COPY, U32_TO_F32_COPY, VEC4U_COPY } from '@engine/grid/resizing-copier';
import { LIFE_WORKGROUP_SIZE } from '@engine/life/life-simulation';
import { LifeParamsLayout, ResizeCopyParamsLayout } from '@platform/webgpu/layouts';

import type { FakeGpuDevice, Kernel, KernelContext } from '@test/support/fake-gpu';

/**
 * CPU emulations of the WGSL kernels, one invocation per global id, with the
 * same bounds guards as the shaders.
 */

function forEachInvocation(
    ctx: KernelContext,
    workgroupSize: { readonly x: number; readonly y: number },
    visit: (x: number, y: number) => void,
): void {
    const [wx, wy] = ctx.workgroups;
    for (let y = 0; y < wy * workgroupSize.y; y++) {
        for (let x = 0; x < wx * workgroupSize.x; x++) {
            visit(x, y);
        }
    }
}

function readCopyParams(ctx: KernelContext) {
    const view = new DataView(ctx.buffer(0).data);
    const { offsets } = ResizeCopyParamsLayout;
    return {
        odx: view.getUint32(offsets.oldOffsetX, true),
        ody: view.getUint32(offsets.oldOffsetY, true),
        ndx: view.getUint32(offsets.newOffsetX, true),
        ndy: view.getUint32(offsets.newOffsetY, true),
        owidth: view.getUint32(offsets.oldWidth, true),
        nwidth: view.getUint32(offsets.newWidth, true),
        width: view.getUint32(offsets.overlapWidth, true),
        height: view.getUint32(offsets.overlapHeight, true),
    };
}

/** buffer-copy.wgsl with plain assignment, for elements of `elementBytes`. */
export function resizeCopyKernel(elementBytes: number): Kernel {
    return (ctx) => {
        const p = readCopyParams(ctx);
        const src = new Uint8Array(ctx.buffer(1).data);
        const dst = new Uint8Array(ctx.buffer(2).data);

        forEachInvocation(ctx, COPY_WORKGROUP_SIZE, (x, y) => {
            if (x >= p.width || y >= p.height) return;
            const from = ((y + p.ody) * p.owidth + x + p.odx) * elementBytes;
            const to = ((y + p.ndy) * p.nwidth + x + p.ndx) * elementBytes;
            dst.set(src.subarray(from, from + elementBytes), to);
        });
    };
}

/** buffer-copy.wgsl instantiated for u32 -> f32 normalization. */
export const u32ToF32CopyKernel: Kernel = (ctx) => {
    const p = readCopyParams(ctx);
    const src = new Uint32Array(ctx.buffer(1).data);
    const dst = new Float32Array(ctx.buffer(2).data);

    forEachInvocation(ctx, COPY_WORKGROUP_SIZE, (x, y) => {
        if (x >= p.width || y >= p.height) return;
        const oldValue = src[(y + p.ody) * p.owidth + x + p.odx] ?? 0;
        dst[(y + p.ndy) * p.nwidth + x + p.ndx] = oldValue / 4294967296;
    });
};

function readLifeParams(ctx: KernelContext) {
    const view = new DataView(ctx.buffer(0).data);
    const { offsets } = LifeParamsLayout;
    return {
        width: view.getUint32(offsets.width, true),
        height: view.getUint32(offsets.height, true),
        threshold: view.getFloat32(offsets.threshold, true),
    };
}

/** Copies source to destination and image unchanged. */
export const identityLifeKernel: Kernel = (ctx) => {
    const { width, height } = readLifeParams(ctx);
    const src = new Float32Array(ctx.buffer(1).data);
    const dst = new Float32Array(ctx.buffer(2).data);
    const image = ctx.texture(4);

    forEachInvocation(ctx, LIFE_WORKGROUP_SIZE, (x, y) => {
        if (x >= width || y >= height) return;
        const idx = y * width + x;
        const value = src[idx] ?? 0;
        dst[idx] = value;
        image.texels[idx] = value;
    });
};

/** life.wgsl: threshold Life on a torus with per-cell xorshift128 state. */
export const thresholdLifeKernel: Kernel = (ctx) => {
    const { width, height, threshold } = readLifeParams(ctx);
    const src = new Float32Array(ctx.buffer(1).data);
    const dst = new Float32Array(ctx.buffer(2).data);
    const rand = new Uint32Array(ctx.buffer(3).data);
    const image = ctx.texture(4);

    const wrap = (v: number, n: number) => ((v % n) + n) % n;
    const alive = (x: number, y: number) =>
        (src[wrap(y, height) * width + wrap(x, width)] ?? 0) >= threshold ? 1 : 0;

    const nextRandom = (idx: number): number => {
        const base = idx * 4;
        const [sx = 0, sy = 0, sz = 0, sw = 0] = rand.subarray(base, base + 4);
        const t = (sx ^ (sx << 11)) >>> 0;
        const w = (sw ^ (sw >>> 19) ^ t ^ (t >>> 8)) >>> 0;
        rand.set([sy, sz, sw, w], base);
        return w;
    };

    forEachInvocation(ctx, LIFE_WORKGROUP_SIZE, (x, y) => {
        if (x >= width || y >= height) return;

        let neighbors = 0;
        for (let dy = -1; dy <= 1; dy++) {
            for (let dx = -1; dx <= 1; dx++) {
                if (dx !== 0 || dy !== 0) neighbors += alive(x + dx, y + dy);
            }
        }

        const idx = y * width + x;
        const wasAlive = (src[idx] ?? 0) >= threshold;
        const value = neighbors === 3 || (wasAlive && neighbors === 2)
            ? 1.0
            : nextRandom(idx) / 4294967296 * threshold;

        dst[idx] = value;
        image.texels[idx] = value;
    });
};

/** Register the copy kernels plus `life` as the life kernel. */
export function registerKernels(device: FakeGpuDevice, life: Kernel = identityLifeKernel): FakeGpuDevice {
    return device
        .registerKernel(copyShaderKey(F32_COPY), resizeCopyKernel(F32_COPY.source.byteSize))
        .registerKernel(copyShaderKey(VEC4U_COPY), resizeCopyKernel(VEC4U_COPY.source.byteSize))
        .registerKernel(copyShaderKey(U32_TO_F32_COPY), u32ToF32CopyKernel)
        .registerKernel('life', life);
}
