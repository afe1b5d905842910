import { type BindingArg, assertSupportedAccess } from '@platform/webgpu/bindable';
import { BindingMismatchError } from '@platform/webgpu/errors';
import { type Phase, type PhaseTable, buildPhaseTable } from '@engine/phase';

/**
 * Pipeline binder.
 *
 * Responsibilities:
 * - Derive a bind group layout from an ordered argument list
 *   (slot index === list position)
 * - Create the matching bind group(s)
 * - Compile a pipeline against that single layout
 *
 * Non-responsibilities:
 * - Does NOT check argument order against the shader; the list must follow
 *   the shader's @binding declarations
 * - Does NOT cache pipelines; callers rebind whenever a member resource changes
 */

export type StaticBinding<P> = {
    readonly pipeline: P;
    readonly layout: GPUBindGroupLayout;
    readonly entries: readonly GPUBindGroupLayoutEntry[];
    readonly bindGroup: GPUBindGroup;
};

export type PhasedBinding = {
    readonly pipeline: GPUComputePipeline;
    readonly layout: GPUBindGroupLayout;
    readonly entries: readonly GPUBindGroupLayoutEntry[];
    readonly bindGroups: PhaseTable<GPUBindGroup>;
};

/**
 * Layout entries for `args`, validating every access mode.
 */
export function describeBindings(
    args: readonly BindingArg[],
    visibility: GPUShaderStageFlags,
): GPUBindGroupLayoutEntry[] {
    return args.map((arg, binding) => {
        assertSupportedAccess(arg.resource, arg.access);
        return {
            binding,
            visibility,
            ...arg.resource.layoutFor(arg.access),
        };
    });
}

function bindGroupEntries(args: readonly BindingArg[]): GPUBindGroupEntry[] {
    return args.map((arg, binding) => ({
        binding,
        resource: arg.resource.bindingResource(),
    }));
}

function sameEntries(
    a: readonly GPUBindGroupLayoutEntry[],
    b: readonly GPUBindGroupLayoutEntry[],
): boolean {
    return a.length === b.length
        && a.every((entry, i) => JSON.stringify(entry) === JSON.stringify(b[i]));
}

export class Binder {
    constructor(private readonly device: GPUDevice) {}

    bindStatic(
        shader: GPUShaderModule,
        entryPoint: string,
        args: readonly BindingArg[],
    ): StaticBinding<GPUComputePipeline> {
        const entries = describeBindings(args, GPUShaderStage.COMPUTE);
        const layout = this.createLayout(entryPoint, entries);

        const bindGroup = this.device.createBindGroup({
            label: `${entryPoint} bind group`,
            layout,
            entries: bindGroupEntries(args),
        });

        return {
            pipeline: this.createComputePipeline(shader, entryPoint, layout),
            layout,
            entries,
            bindGroup,
        };
    }

    /**
     * One pipeline, one bind group per phase.
     * `argsFor` is evaluated exactly twice, here; the lists must describe the
     * same layout (typically only src/dst swap places).
     */
    bindPhased(
        shader: GPUShaderModule,
        entryPoint: string,
        argsFor: (phase: Phase) => readonly BindingArg[],
    ): PhasedBinding {
        const args = buildPhaseTable(argsFor);

        const entries = describeBindings(args.forward, GPUShaderStage.COMPUTE);
        const backwardEntries = describeBindings(args.backward, GPUShaderStage.COMPUTE);
        if (!sameEntries(entries, backwardEntries)) {
            throw new BindingMismatchError(
                `Binder: '${entryPoint}' forward and backward arguments describe different layouts`
            );
        }

        const layout = this.createLayout(entryPoint, entries);

        const bindGroups = buildPhaseTable((phase) => this.device.createBindGroup({
            label: `${entryPoint} bind group (${phase})`,
            layout,
            entries: bindGroupEntries(args[phase]),
        }));

        return {
            pipeline: this.createComputePipeline(shader, entryPoint, layout),
            layout,
            entries,
            bindGroups,
        };
    }

    /**
     * Fragment-visible bindings for a render pipeline. `describe` receives
     * the pipeline layout and supplies the remaining pipeline state.
     */
    bindRender(
        label: string,
        args: readonly BindingArg[],
        describe: (layout: GPUPipelineLayout) => GPURenderPipelineDescriptor,
    ): StaticBinding<GPURenderPipeline> {
        const entries = describeBindings(args, GPUShaderStage.FRAGMENT);
        const layout = this.createLayout(label, entries);

        const bindGroup = this.device.createBindGroup({
            label: `${label} bind group`,
            layout,
            entries: bindGroupEntries(args),
        });

        const pipelineLayout = this.device.createPipelineLayout({
            label: `${label} pipeline layout`,
            bindGroupLayouts: [layout],
        });

        return {
            pipeline: this.device.createRenderPipeline(describe(pipelineLayout)),
            layout,
            entries,
            bindGroup,
        };
    }

    private createLayout(
        label: string,
        entries: readonly GPUBindGroupLayoutEntry[],
    ): GPUBindGroupLayout {
        return this.device.createBindGroupLayout({
            label: `${label} bind group layout`,
            entries,
        });
    }

    private createComputePipeline(
        shader: GPUShaderModule,
        entryPoint: string,
        layout: GPUBindGroupLayout,
    ): GPUComputePipeline {
        const pipelineLayout = this.device.createPipelineLayout({
            label: `${entryPoint} pipeline layout`,
            bindGroupLayouts: [layout],
        });

        return this.device.createComputePipeline({
            label: `${entryPoint} compute pipeline`,
            layout: pipelineLayout,
            compute: {
                module: shader,
                entryPoint,
            },
        });
    }
}
