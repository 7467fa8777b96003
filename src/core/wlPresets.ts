/**
 * Window/Level Presets
 * MR intensities carry no absolute units, so presets are fractions of the
 * volume's intensity range rather than fixed values.
 */

import type { IntensityRange, WindowSettings } from './types';

export interface WlPreset {
    /** Unique preset ID */
    id: string;
    /** Display name */
    name: string;
    /** Short label for HUD */
    label: string;
    /** Level as a fraction of the range, 0 = min, 1 = max */
    levelFraction: number;
    /** Width as a fraction of the range */
    widthFraction: number;
    /** Keyboard shortcut (for display) */
    shortcut?: string;
}

export const WL_PRESETS: Record<string, WlPreset> = {
    full: {
        id: 'full',
        name: 'Full Range',
        label: 'Full',
        levelFraction: 0.5,
        widthFraction: 1,
        shortcut: 'F1',
    },
    soft: {
        id: 'soft',
        name: 'Soft Contrast',
        label: 'Soft',
        levelFraction: 0.4,
        widthFraction: 0.6,
        shortcut: 'F2',
    },
    high_contrast: {
        id: 'high_contrast',
        name: 'High Contrast',
        label: 'Hi-C',
        levelFraction: 0.5,
        widthFraction: 0.25,
        shortcut: 'F3',
    },
    bright: {
        id: 'bright',
        name: 'Bright',
        label: 'Bright',
        levelFraction: 0.3,
        widthFraction: 0.5,
        shortcut: 'F4',
    },
    dark: {
        id: 'dark',
        name: 'Dark',
        label: 'Dark',
        levelFraction: 0.7,
        widthFraction: 0.5,
        shortcut: 'F5',
    },
};

/** Ordered list of presets for UI */
export const PRESET_LIST: WlPreset[] = [
    WL_PRESETS.full,
    WL_PRESETS.soft,
    WL_PRESETS.high_contrast,
    WL_PRESETS.bright,
    WL_PRESETS.dark,
];

export function getPresetById(id: string): WlPreset | null {
    return WL_PRESETS[id] ?? null;
}

/** 1-based position, as bound to F1..F5 */
export function getPresetBySlot(slot: number): WlPreset | null {
    return PRESET_LIST[slot - 1] ?? null;
}

export function resolvePreset(preset: WlPreset, range: IntensityRange): WindowSettings {
    const span = range.max - range.min;
    if (span <= 0) {
        return { level: range.min, width: 1 };
    }
    return {
        level: range.min + preset.levelFraction * span,
        width: preset.widthFraction * span,
    };
}

/**
 * Check if the current window matches a preset for this range
 */
export function findMatchingPreset(
    settings: WindowSettings,
    range: IntensityRange,
    tolerance = 1e-6
): WlPreset | null {
    for (const preset of PRESET_LIST) {
        const resolved = resolvePreset(preset, range);
        if (
            Math.abs(resolved.level - settings.level) <= tolerance &&
            Math.abs(resolved.width - settings.width) <= tolerance
        ) {
            return preset;
        }
    }
    return null;
}
