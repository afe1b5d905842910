import { describe, expect, it } from 'vitest';

import { dimensions } from '@engine/dimensions';
import { createLifeParams } from '@engine/life/life-params';
import { PresentPass } from '@engine/render/present-pass';
import { InvalidStateError } from '@platform/webgpu/errors';
import { ShaderLoader } from '@platform/webgpu/shader-loader';
import { StorageImage } from '@platform/webgpu/texture';

import { FakeTexture, asEncoder, createFakeGpu } from '@test/support/fake-gpu';

async function setup() {
    const { fake, device } = createFakeGpu();
    const present = await PresentPass.create(device, new ShaderLoader(device), 'bgra8unorm');
    const target = new FakeTexture('swap chain', 4, 4, 'bgra8unorm', GPUTextureUsage.RENDER_ATTACHMENT).createView();
    return { fake, device, present, target, view: target as unknown as GPUTextureView };
}

describe('PresentPass', () => {
    it('refuses to encode before bind()', async () => {
        const { fake, present, view } = await setup();

        expect(present.isBound).toBe(false);
        expect(() => present.encode(asEncoder(fake.createCommandEncoder()), view)).toThrow(InvalidStateError);
    });

    it('samples the image with a non-filtering sampler', async () => {
        const { fake, device, present } = await setup();
        const grid = dimensions(4, 4);

        present.bind(createLifeParams(device, grid, 0.7), new StorageImage(device, 'Life image', grid, 'r32float'));

        const layout = fake.bindGroupLayouts.find((l) => l.label === 'present bind group layout');
        expect(layout?.entries).toEqual([
            {
                binding: 0,
                visibility: GPUShaderStage.FRAGMENT,
                buffer: { type: 'uniform', minBindingSize: 16 },
            },
            {
                binding: 1,
                visibility: GPUShaderStage.FRAGMENT,
                texture: { sampleType: 'unfilterable-float', viewDimension: '2d', multisampled: false },
            },
            {
                binding: 2,
                visibility: GPUShaderStage.FRAGMENT,
                sampler: { type: 'non-filtering' },
            },
        ]);
    });

    it('draws a fullscreen triangle into the target view', async () => {
        const { fake, device, present, target, view } = await setup();
        const grid = dimensions(4, 4);
        present.bind(createLifeParams(device, grid, 0.7), new StorageImage(device, 'Life image', grid, 'r32float'));

        const encoder = fake.createCommandEncoder();
        present.encode(asEncoder(encoder), view);
        fake.queue.submit([encoder.finish()]);

        expect(present.isBound).toBe(true);
        expect(fake.draws).toEqual([{
            pass: 'Present Pass',
            pipeline: 'Present Pipeline',
            bindGroup: 'present bind group',
            vertexCount: 3,
            target,
        }]);
    });

    it('rebinds against replaced resources', async () => {
        const { fake, device, present } = await setup();

        for (const size of [4, 8]) {
            const grid = dimensions(size, size);
            present.bind(createLifeParams(device, grid, 0.7), new StorageImage(device, 'Life image', grid, 'r32float'));
        }

        expect(fake.bindGroups.filter((g) => g.label === 'present bind group')).toHaveLength(2);
    });
});
