/**
 * Error taxonomy for the WebGPU platform layer.
 *
 * - Programmer / modeling errors (size mismatches, unsupported access,
 *   inconsistent phased bindings, invalid state) are thrown synchronously
 *   before any GPU call is issued.
 * - Device errors (lost device, uncaptured validation or out-of-memory errors)
 *   are fatal: they are delivered to the host's fatal handler and never retried.
 */

export type GpuErrorCode =
    | 'WEBGPU_NOT_SUPPORTED'
    | 'NO_ADAPTER'
    | 'NO_CONTEXT'
    | 'SIZE_MISMATCH'
    | 'UNSUPPORTED_ACCESS'
    | 'BINDING_MISMATCH'
    | 'INVALID_STATE'
    | 'SHADER_COMPILATION'
    | 'DEVICE_LOST'
    | 'DEVICE_ERROR';

export class GpuError extends Error {
    constructor(message: string, public readonly code: GpuErrorCode) {
        super(message);
        this.name = 'GpuError';
    }
}

export class SizeMismatchError extends GpuError {
    constructor(message: string) {
        super(message, 'SIZE_MISMATCH');
        this.name = 'SizeMismatchError';
    }
}

export class UnsupportedAccessError extends GpuError {
    constructor(message: string) {
        super(message, 'UNSUPPORTED_ACCESS');
        this.name = 'UnsupportedAccessError';
    }
}

export class BindingMismatchError extends GpuError {
    constructor(message: string) {
        super(message, 'BINDING_MISMATCH');
        this.name = 'BindingMismatchError';
    }
}

export class InvalidStateError extends GpuError {
    constructor(message: string) {
        super(message, 'INVALID_STATE');
        this.name = 'InvalidStateError';
    }
}

export class ShaderCompilationError extends GpuError {
    constructor(message: string) {
        super(message, 'SHADER_COMPILATION');
        this.name = 'ShaderCompilationError';
    }
}

export class DeviceLostError extends GpuError {
    constructor(message: string, public readonly reason: GPUDeviceLostReason) {
        super(message, 'DEVICE_LOST');
        this.name = 'DeviceLostError';
    }
}

/** Uncaptured device error (validation, out-of-memory, internal). */
export class GpuValidationError extends GpuError {
    constructor(message: string) {
        super(message, 'DEVICE_ERROR');
        this.name = 'GpuValidationError';
    }
}
