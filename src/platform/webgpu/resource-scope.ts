import { InvalidStateError } from '@platform/webgpu/errors';

/**
 * Ownership scope for GPU resources that need explicit destruction.
 *
 * One scope per generation: everything allocated for a grid dimension is
 * tracked here and released together once the next generation has taken over.
 */

export type DestroyableResource = {
    destroy(): void;
};

export class ResourceScope {
    private readonly destroyables: DestroyableResource[] = [];
    private destroyed = false;

    constructor(readonly label: string) {}

    /** Internal invariants */
    private assertAlive(): void {
        if (this.destroyed) {
            throw new InvalidStateError(
                `ResourceScope '${this.label}': cannot track resources after destroyAll()`
            );
        }
    }

    /**
     * Track a resource that requires explicit .destroy().
     * Typical examples: LinearBuffer, GridBuffer, StorageImage.
     */
    track<T extends DestroyableResource>(resource: T): T {
        this.assertAlive();
        this.destroyables.push(resource);
        return resource;
    }

    get size(): number {
        return this.destroyables.length;
    }

    isDestroyed(): boolean {
        return this.destroyed;
    }

    /**
     * End of ownership scope.
     * GPU work already submitted that references these resources still
     * completes; WebGPU defers the actual release.
     */
    destroyAll(): void {
        if (this.destroyed) return;

        for (const r of this.destroyables) {
            r.destroy();
        }

        this.destroyables.length = 0;
        this.destroyed = true;
    }
}
