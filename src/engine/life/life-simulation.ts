import lifeShaderSource from '../../assets/shaders/life.wgsl?raw';

import { type Dimensions, area, formatDimensions, sameDimensions } from '@engine/dimensions';
import { DebugGrid } from '@engine/grid/debug-grid';
import { F32_COPY, ResizingCopier, VEC4U_COPY } from '@engine/grid/resizing-copier';
import { type Phase, PhasePair, type PhaseTable, phaseOf } from '@engine/phase';
import type { LifeParams } from '@engine/life/life-params';
import { type RandomSource, randomU32Array } from '@engine/random';
import { type TextureCapability, readOnly, writeOnly } from '@platform/webgpu/bindable';
import { Binder } from '@platform/webgpu/binder';
import { InvalidStateError, SizeMismatchError } from '@platform/webgpu/errors';
import { F32, GridBuffer, VEC4U } from '@platform/webgpu/grid-buffer';
import { ResourceScope } from '@platform/webgpu/resource-scope';
import type { ShaderLoader } from '@platform/webgpu/shader-loader';

export const LIFE_WORKGROUP_SIZE = { x: 8, y: 8 } as const; // must match WGSL @workgroup_size

/**
 * Resources owned by the host and shared with the presentation pass.
 * Slot 0 and slot 4 of the life kernel. Both must describe the grid they
 * are bound with.
 */
export type LifeBindings = {
    readonly params: LifeParams;
    readonly image: TextureCapability & { readonly dimensions: Dimensions };
};

function assertBindingsMatch(dimensions: Dimensions, bindings: LifeBindings): void {
    for (const resource of [bindings.params, bindings.image]) {
        if (!sameDimensions(resource.dimensions, dimensions)) {
            throw new SizeMismatchError(
                `LifeSimulation: ${resource.kind} '${resource.label}' describes a `
                + `${formatDimensions(resource.dimensions)} grid, expected ${formatDimensions(dimensions)}`
            );
        }
    }
}

export type LifeSimulationOptions = LifeBindings & {
    readonly dimensions: Dimensions;
    readonly random: RandomSource;
    /** Snapshot the source grid before every step (see dumpDebug). */
    readonly debug?: boolean;
};

/**
 * Everything allocated for one grid dimension. Replaced as a unit on resize.
 */
type Generation = {
    readonly dimensions: Dimensions;
    readonly scope: ResourceScope;
    readonly cells: PhasePair<GridBuffer<'f32'>>;
    readonly random: GridBuffer<'vec4u'>;
    readonly pipeline: GPUComputePipeline;
    readonly bindGroups: PhaseTable<GPUBindGroup>;
    readonly debug: DebugGrid<'f32'> | null;
};

/**
 * Double-buffered Life grid.
 *
 * State machine:
 * - steps: number of step() calls so far; phase = steps mod 2
 * - step(): source = cells.src(phase), destination = cells.dst(phase);
 *   nothing is copied, the roles flip on the next call
 * - resize(): builds a new generation, migrates the centered overlap with the
 *   resizing copy kernel, rebinds, then swaps and releases the old one
 *
 * step() only records into the caller's encoder. resize() submits its own
 * copies, so an encoder holding a step must be submitted before resizing.
 */
export class LifeSimulation {
    private generation: Generation;
    private stepCount = 0;
    private importable = true;
    private destroyed = false;

    private constructor(
        private readonly device: GPUDevice,
        private readonly binder: Binder,
        private readonly shader: GPUShaderModule,
        private readonly cellCopier: ResizingCopier<'f32', 'f32'>,
        private readonly randomCopier: ResizingCopier<'vec4u', 'vec4u'>,
        private readonly debug: boolean,
        bindings: LifeBindings,
        dimensions: Dimensions,
        random: RandomSource,
    ) {
        this.generation = this.buildGeneration(dimensions, bindings, random, 0);
    }

    static async create(
        device: GPUDevice,
        shaders: ShaderLoader,
        options: LifeSimulationOptions,
    ): Promise<LifeSimulation> {
        const [shader, cellCopier, randomCopier] = await Promise.all([
            shaders.load('life', lifeShaderSource),
            ResizingCopier.create(device, shaders, F32_COPY),
            ResizingCopier.create(device, shaders, VEC4U_COPY),
        ]);

        return new LifeSimulation(
            device,
            new Binder(device),
            shader,
            cellCopier,
            randomCopier,
            options.debug ?? false,
            { params: options.params, image: options.image },
            options.dimensions,
            options.random,
        );
    }

    get phase(): Phase {
        return phaseOf(this.stepCount);
    }

    get steps(): number {
        return this.stepCount;
    }

    get dimensions(): Dimensions {
        return this.generation.dimensions;
    }

    /** Holds the last completed state. */
    sourceBuffer(): GridBuffer<'f32'> {
        return this.generation.cells.src(this.phase);
    }

    /** Receives the next state. */
    destinationBuffer(): GridBuffer<'f32'> {
        return this.generation.cells.dst(this.phase);
    }

    randomBuffer(): GridBuffer<'vec4u'> {
        return this.generation.random;
    }

    /**
     * Record one simulation step. Does not block.
     */
    step(encoder: GPUCommandEncoder): void {
        this.assertAlive();
        const { dimensions, pipeline, bindGroups, debug } = this.generation;

        if (debug) {
            debug.enqueueCopyIn(encoder, this.sourceBuffer());
        }

        const pass = encoder.beginComputePass({ label: 'Life grid step' });
        pass.setPipeline(pipeline);
        pass.setBindGroup(0, bindGroups[this.phase]);
        pass.dispatchWorkgroups(
            Math.ceil(dimensions.width / LIFE_WORKGROUP_SIZE.x),
            Math.ceil(dimensions.height / LIFE_WORKGROUP_SIZE.y),
        );
        pass.end();

        this.stepCount += 1;
        this.importable = false;
    }

    /**
     * Replace the grid with one of `dimensions`, keeping the centered overlap
     * of both phase buffers and of the per-cell random state. Cells outside
     * the overlap start at 0 with fresh random state drawn from `random`.
     */
    resize(dimensions: Dimensions, bindings: LifeBindings, random: RandomSource): void {
        this.assertAlive();
        const previous = this.generation;
        console.info(
            `LifeSimulation: resizing ${formatDimensions(previous.dimensions)} -> ${formatDimensions(dimensions)}`
        );

        const next = this.buildGeneration(dimensions, bindings, random, this.stepCount);

        previous.cells.forEach((oldCells, phase) => {
            this.cellCopier.copy(oldCells, next.cells.src(phase));
        });
        this.randomCopier.copy(previous.random, next.random);

        this.generation = next;
        this.importable = true;

        previous.scope.destroyAll();
    }

    /**
     * Write host data into the current source buffer.
     * Only valid before the first step() or right after resize().
     */
    import(cells: ArrayLike<number>): void {
        this.assertAlive();
        if (!this.importable) {
            throw new InvalidStateError(
                `LifeSimulation: import is only valid before stepping or right after a resize (step ${this.stepCount})`
            );
        }
        this.sourceBuffer().importFrom(this.device.queue, cells);
    }

    /**
     * Diagnostic read-back of the current source. Waits for the GPU.
     */
    readSource(): Promise<Float32Array> {
        this.assertAlive();
        return this.sourceBuffer().readBack(this.device);
    }

    /**
     * Log the snapshot taken by the last step(). Requires `debug: true`.
     */
    async dumpDebug(): Promise<void> {
        this.assertAlive();
        const { debug } = this.generation;
        if (!debug) {
            throw new InvalidStateError('LifeSimulation: created without debug capture');
        }
        if (this.stepCount === 0) {
            throw new InvalidStateError('LifeSimulation: nothing captured before the first step');
        }
        await debug.dump(this.device, `Life data entering step ${this.stepCount - 1}:`);
    }

    destroy(): void {
        if (this.destroyed) return;
        this.generation.scope.destroyAll();
        this.destroyed = true;
    }

    private assertAlive(): void {
        if (this.destroyed) {
            throw new InvalidStateError('LifeSimulation has been destroyed');
        }
    }

    private buildGeneration(
        dimensions: Dimensions,
        bindings: LifeBindings,
        random: RandomSource,
        step: number,
    ): Generation {
        assertBindingsMatch(dimensions, bindings);
        const scope = new ResourceScope(`life ${formatDimensions(dimensions)} @ step ${step}`);

        const cells = PhasePair.create((phase) => scope.track(
            GridBuffer.create(this.device, `Source for ${phase}`, F32, dimensions)
        ));

        // Four u32 of xorshift state per cell
        const randomCells = scope.track(GridBuffer.createInit(
            this.device,
            'random data',
            VEC4U,
            dimensions,
            randomU32Array(random, area(dimensions) * VEC4U.components),
        ));

        const { pipeline, bindGroups } = this.binder.bindPhased(
            this.shader,
            'life',
            (phase) => [
                readOnly(bindings.params),
                readOnly(cells.src(phase)),
                writeOnly(cells.dst(phase)),
                writeOnly(randomCells),
                writeOnly(bindings.image),
            ],
        );

        const debug = this.debug
            ? scope.track(new DebugGrid(this.device, F32, dimensions))
            : null;

        return {
            dimensions,
            scope,
            cells,
            random: randomCells,
            pipeline,
            bindGroups,
            debug,
        };
    }
}
