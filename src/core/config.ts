/**
 * Engine configuration
 * Defaults apply unless overridden at runtime or from localStorage (dev toggling)
 */

export interface EngineConfig {
    /** Smallest accepted window width (exclusive) */
    windowEpsilon: number;
    /** Pixels of vertical drag per slice when scrubbing */
    scrubPixelsPerSlice: number;
    /** Scrub speed multiplier when Shift is held */
    scrubShiftMultiplier: number;
    /** Slices skipped by a Shift+arrow jump */
    sliceJumpStep: number;
    /** Drag pixels needed to sweep the full intensity range once */
    windowDragPixelsPerRange: number;
    /** Voxels sampled when computing an automatic window */
    autoWindowSamples: number;
}

const STORAGE_KEY = 'mpr-config';

const CONFIG_KEYS: ReadonlyArray<keyof EngineConfig> = [
    'windowEpsilon',
    'scrubPixelsPerSlice',
    'scrubShiftMultiplier',
    'sliceJumpStep',
    'windowDragPixelsPerRange',
    'autoWindowSamples',
];

const defaults: EngineConfig = {
    windowEpsilon: 1e-6,
    scrubPixelsPerSlice: 8,
    scrubShiftMultiplier: 5,
    sliceJumpStep: 10,
    windowDragPixelsPerRange: 512,
    autoWindowSamples: 65536,
};

function loadConfig(): EngineConfig {
    if (typeof window === 'undefined') return { ...defaults };

    try {
        const stored = window.localStorage.getItem(STORAGE_KEY);
        if (stored) {
            return mergeNumeric(defaults, JSON.parse(stored));
        }
    } catch (e) {
        console.warn('Failed to load engine config', e);
    }
    return { ...defaults };
}

// Only known keys with finite numeric values survive
function mergeNumeric(base: EngineConfig, overrides: unknown): EngineConfig {
    const merged = { ...base };
    if (typeof overrides !== 'object' || overrides === null) return merged;

    for (const key of CONFIG_KEYS) {
        const value: unknown = Reflect.get(overrides, key);
        if (typeof value === 'number' && Number.isFinite(value)) {
            merged[key] = value;
        }
    }
    return merged;
}

let config = loadConfig();

export function getConfig<K extends keyof EngineConfig>(key: K): EngineConfig[K] {
    return config[key];
}

export function setConfig<K extends keyof EngineConfig>(key: K, value: EngineConfig[K]): void {
    config = { ...config, [key]: value };
    if (typeof window === 'undefined') return;
    try {
        window.localStorage.setItem(STORAGE_KEY, JSON.stringify(config));
    } catch (e) {
        console.warn('Failed to persist engine config', e);
    }
}

export function getAllConfig(): EngineConfig {
    return { ...config };
}

/** Resolve a full config from partial overrides on top of the current values */
export function resolveConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
    return mergeNumeric(config, overrides);
}

export function resetConfig(): void {
    config = { ...defaults };
    if (typeof window === 'undefined') return;
    try {
        window.localStorage.removeItem(STORAGE_KEY);
    } catch (e) {
        console.warn('Failed to clear engine config', e);
    }
}
