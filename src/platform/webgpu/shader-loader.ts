import { InvalidStateError, ShaderCompilationError } from '@platform/webgpu/errors';

/**
 * Centralized WGSL compiler and cache.
 *
 * Responsibilities:
 * - Compile GPUShaderModule from WGSL source
 * - Cache by semantic key
 * - Fail fast on compilation errors
 *
 * Non-responsibilities:
 * - Pipeline creation
 * - Binding layout
 */

export class ShaderLoader {
    private readonly device: GPUDevice;

    /** Compiled shader modules (final, reusable) */
    private readonly modules = new Map<string, GPUShaderModule>();

    /** In-flight compilations to guarantee idempotency */
    private readonly pending = new Map<string, Promise<GPUShaderModule>>();

    constructor(device: GPUDevice) {
        this.device = device;
    }

    /**
     * Compile a WGSL shader.
     * Safe to call multiple times with the same key; the first source wins.
     */
    async load(key: string, code: string): Promise<GPUShaderModule> {
        const cached = this.modules.get(key);
        if (cached) {
            return cached;
        }

        const inFlight = this.pending.get(key);
        if (inFlight) {
            return inFlight;
        }

        const promise = this.compile(key, code);
        this.pending.set(key, promise);

        try {
            const module = await promise;
            this.modules.set(key, module);
            return module;
        } finally {
            this.pending.delete(key);
        }
    }

    /**
     * Retrieve a compiled shader module.
     * Throws if missing.
     */
    get(key: string): GPUShaderModule {
        const module = this.modules.get(key);
        if (!module) {
            throw new InvalidStateError(`ShaderLoader: shader "${key}" was not loaded`);
        }
        return module;
    }

    has(key: string): boolean {
        return this.modules.has(key);
    }

    destroy(): void {
        this.modules.clear();
        this.pending.clear();
    }

    private async compile(key: string, code: string): Promise<GPUShaderModule> {
        if (!code.trim()) {
            throw new ShaderCompilationError(`ShaderLoader: shader "${key}" is empty`);
        }

        const module = this.device.createShaderModule({
            label: key,
            code,
        });

        const info = await module.getCompilationInfo();
        const errors = info.messages.filter(m => m.type === 'error');
        if (errors.length > 0) {
            const details = errors
                .map(m => `${m.lineNum}:${m.linePos} ${m.message}`)
                .join('\n');

            throw new ShaderCompilationError(
                `WGSL compilation failed for "${key}":\n${details}`
            );
        }

        return module;
    }
}
