import presentShaderSource from '../../assets/shaders/present.wgsl?raw';

import { type BufferCapability, type TextureCapability, readOnly, sampled } from '@platform/webgpu/bindable';
import { Binder, type StaticBinding } from '@platform/webgpu/binder';
import { InvalidStateError } from '@platform/webgpu/errors';
import type { ShaderLoader } from '@platform/webgpu/shader-loader';
import { Sampler } from '@platform/webgpu/texture';

/**
 * Draws the simulation output image to the canvas view.
 *
 * bind() must be called again whenever the simulation's image or params are
 * replaced (every resize); the bind group references them directly.
 */
export class PresentPass {
    private readonly binder: Binder;
    private readonly sampler: Sampler;
    private binding: StaticBinding<GPURenderPipeline> | null = null;

    private constructor(
        device: GPUDevice,
        private readonly shader: GPUShaderModule,
        private readonly format: GPUTextureFormat,
    ) {
        this.binder = new Binder(device);
        // r32float is unfilterable: nearest sampling only
        this.sampler = new Sampler(device, 'Present Sampler', 'clamp-to-edge', 'nearest');
    }

    static async create(
        device: GPUDevice,
        shaders: ShaderLoader,
        format: GPUTextureFormat,
    ): Promise<PresentPass> {
        const shader = await shaders.load('present', presentShaderSource);
        return new PresentPass(device, shader, format);
    }

    get isBound(): boolean {
        return this.binding !== null;
    }

    bind(params: BufferCapability, image: TextureCapability): void {
        this.binding = this.binder.bindRender(
            'present',
            [
                readOnly(params),
                sampled(image),
                sampled(this.sampler),
            ],
            (layout) => ({
                label: 'Present Pipeline',
                layout,
                vertex: {
                    module: this.shader,
                    entryPoint: 'vs_main',
                },
                fragment: {
                    module: this.shader,
                    entryPoint: 'fs_main',
                    targets: [{ format: this.format }],
                },
                primitive: { topology: 'triangle-list' },
            }),
        );
    }

    encode(encoder: GPUCommandEncoder, view: GPUTextureView): void {
        if (!this.binding) {
            throw new InvalidStateError('PresentPass: bind() must be called before encode()');
        }

        const pass = encoder.beginRenderPass({
            label: 'Present Pass',
            colorAttachments: [{
                view,
                loadOp: 'clear',
                storeOp: 'store',
                clearValue: { r: 0, g: 0, b: 0, a: 1 },
            }],
        });

        pass.setPipeline(this.binding.pipeline);
        pass.setBindGroup(0, this.binding.bindGroup);
        pass.draw(3); // fullscreen triangle
        pass.end();
    }
}
