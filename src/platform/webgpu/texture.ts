import {
    type AccessMode,
    type BindingLayout,
    type SamplerCapability,
    type TextureCapability,
    assertSupportedAccess,
} from '@platform/webgpu/bindable';
import type { Dimensions } from '@engine/dimensions';

const ALL_ACCESS: readonly AccessMode[] = ['read-only', 'read-sampled', 'write-only'];

/**
 * Sample type a sampled binding of `format` must declare.
 * 32-bit float formats are not filterable without an optional feature.
 */
export function sampleTypeFor(format: GPUTextureFormat): GPUTextureSampleType {
    if (format.startsWith('depth')) return 'depth';
    if (format.endsWith('uint')) return 'uint';
    if (format.endsWith('sint')) return 'sint';
    if (format.startsWith('r32float') || format.startsWith('rg32float') || format.startsWith('rgba32float')) {
        return 'unfilterable-float';
    }
    return 'float';
}

/**
 * 2D texture usable both as a storage image (compute read/write) and as a
 * sampled texture (render pass).
 */
export class StorageImage implements TextureCapability {
    readonly kind = 'texture';
    readonly supportedAccess = ALL_ACCESS;

    private readonly texture: GPUTexture;
    private readonly view: GPUTextureView;

    constructor(
        device: GPUDevice,
        readonly label: string,
        readonly dimensions: Dimensions,
        readonly format: GPUTextureFormat,
    ) {
        this.texture = device.createTexture({
            label,
            size: { width: dimensions.width, height: dimensions.height, depthOrArrayLayers: 1 },
            format,
            usage: GPUTextureUsage.TEXTURE_BINDING | GPUTextureUsage.STORAGE_BINDING,
        });
        this.view = this.texture.createView({ label: `${label} view` });
    }

    bindingResource(): GPUBindingResource {
        return this.view;
    }

    layoutFor(access: AccessMode): BindingLayout {
        assertSupportedAccess(this, access);

        switch (access) {
            case 'read-only':
                return {
                    storageTexture: { access: 'read-only', format: this.format, viewDimension: '2d' },
                };
            case 'write-only':
                return {
                    storageTexture: { access: 'write-only', format: this.format, viewDimension: '2d' },
                };
            case 'read-sampled':
                return {
                    texture: {
                        sampleType: sampleTypeFor(this.format),
                        viewDimension: '2d',
                        multisampled: false,
                    },
                };
        }
    }

    destroy(): void {
        this.texture.destroy();
    }
}

/**
 * Sampler binding. Its layout depends only on the filter mode; the access
 * mode is accepted for uniformity with the other resource kinds.
 */
export class Sampler implements SamplerCapability {
    readonly kind = 'sampler';
    readonly supportedAccess = ALL_ACCESS;

    private readonly sampler: GPUSampler;

    constructor(
        device: GPUDevice,
        readonly label: string,
        addressMode: GPUAddressMode,
        readonly filterMode: GPUFilterMode,
    ) {
        this.sampler = device.createSampler({
            label,
            addressModeU: addressMode,
            addressModeV: addressMode,
            addressModeW: addressMode,
            magFilter: filterMode,
            minFilter: filterMode,
        });
    }

    bindingResource(): GPUBindingResource {
        return this.sampler;
    }

    layoutFor(access: AccessMode): BindingLayout {
        assertSupportedAccess(this, access);
        return { sampler: { type: this.filterMode === 'linear' ? 'filtering' : 'non-filtering' } };
    }
}
