/**
 * Program tunables.
 */
export const LifeConfig = {
    /** Cells at or above this value count as alive. */
    threshold: 0.7,
    seed: 42,
    /** Steps run before the first frame is presented. */
    warmupSteps: 100,
    imageFormat: 'r32float',
    powerPreference: 'high-performance',
} as const satisfies {
    threshold: number;
    seed: number;
    warmupSteps: number;
    imageFormat: GPUTextureFormat;
    powerPreference: GPUPowerPreference;
};
