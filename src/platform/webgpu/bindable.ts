import { UnsupportedAccessError } from '@platform/webgpu/errors';

/**
 * Resource capability layer.
 *
 * Every GPU resource that can be wired to a pipeline argument slot presents
 * itself through a Capability: a binding target plus a mapping from the
 * intended access mode to the binding-type part of a layout entry.
 *
 * The set of resource kinds is closed: buffers (linear and 2D grid),
 * textures and samplers. Each kind declares the subset of access modes it
 * can legally be bound with; anything else is rejected, never remapped.
 */

export type AccessMode = 'read-only' | 'read-sampled' | 'write-only';

/** Linear memory cannot be sampled. */
export type BufferAccess = Exclude<AccessMode, 'read-sampled'>;

export type ResourceKind = 'buffer' | 'texture' | 'sampler';

/**
 * Binding-type portion of a GPUBindGroupLayoutEntry.
 * Slot index and shader-stage visibility are filled in by the Binder.
 */
export type BindingLayout = Omit<GPUBindGroupLayoutEntry, 'binding' | 'visibility'>;

export interface Capability<Kind extends ResourceKind, Access extends AccessMode> {
    readonly kind: Kind;
    readonly label: string;
    readonly supportedAccess: readonly Access[];

    bindingResource(): GPUBindingResource;

    /**
     * Throws UnsupportedAccessError for a mode outside `supportedAccess`.
     */
    layoutFor(access: AccessMode): BindingLayout;
}

export type BufferCapability = Capability<'buffer', BufferAccess>;
export type TextureCapability = Capability<'texture', AccessMode>;
export type SamplerCapability = Capability<'sampler', AccessMode>;

export type Bindable = BufferCapability | TextureCapability | SamplerCapability;

/**
 * One entry of a binding set. Sampled access is only expressible for
 * textures and samplers.
 */
export type BindingArg =
    | { readonly access: BufferAccess; readonly resource: BufferCapability }
    | { readonly access: AccessMode; readonly resource: TextureCapability | SamplerCapability };

function withAccess(resource: Bindable, access: BufferAccess): BindingArg {
    switch (resource.kind) {
        case 'buffer':
            return { access, resource };
        case 'texture':
        case 'sampler':
            return { access, resource };
    }
}

export function readOnly(resource: Bindable): BindingArg {
    return withAccess(resource, 'read-only');
}

export function writeOnly(resource: Bindable): BindingArg {
    return withAccess(resource, 'write-only');
}

export function sampled(resource: TextureCapability | SamplerCapability): BindingArg {
    return { access: 'read-sampled', resource };
}

export function supportsAccess(resource: Bindable, access: AccessMode): boolean {
    return resource.supportedAccess.some((mode) => mode === access);
}

export function assertSupportedAccess(resource: Bindable, access: AccessMode): void {
    if (!supportsAccess(resource, access)) {
        throw new UnsupportedAccessError(
            `${resource.kind} '${resource.label}' cannot be bound with '${access}' access `
            + `(supported: ${resource.supportedAccess.join(', ')})`
        );
    }
}
