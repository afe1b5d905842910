/**
 * Canonical CPU ↔ GPU memory layout contracts.
 * This file is the ONLY place allowed to define uniform sizes and offsets.
 *
 * WGSL structs MUST mirror these layouts exactly.
 *
 * Alignment rules (WGSL uniform address space):
 * - f32 / u32: 4
 * - struct alignment = max field alignment
 * - uniform struct size = padded to 16
 */

// buffer-copy.wgsl :: CopyParams
export const ResizeCopyParamsLayout = {
    ALIGN: 16,
    SIZE: 32,
    offsets: {
        oldOffsetX: 0,     // u32
        oldOffsetY: 4,     // u32
        newOffsetX: 8,     // u32
        newOffsetY: 12,    // u32
        oldWidth: 16,      // u32
        newWidth: 20,      // u32
        overlapWidth: 24,  // u32
        overlapHeight: 28, // u32
    },
} as const;

// life.wgsl / present.wgsl :: Params
export const LifeParamsLayout = {
    ALIGN: 16,
    SIZE: 16,
    offsets: {
        width: 0,      // u32
        height: 4,     // u32
        threshold: 8,  // f32
        _pad0: 12,     // u32 (explicit padding to 16 bytes)
    },
} as const;
