/**
 * Window/Level transform
 * Maps raw intensities to normalized display values in [0, 1]
 */

import { InvalidWindowError } from './errors';
import type { IntensityPlane, IntensityRange, NormalizedPlane, WindowSettings } from './types';

/**
 * Linear ramp centered at level with half-width width/2.
 * Width must already be validated; see validateWindow.
 */
export function applyWindow(rawValue: number, level: number, width: number): number {
    if (!Number.isFinite(rawValue)) return 0;

    const halfWidth = width / 2;
    const minVal = level - halfWidth;
    const maxVal = level + halfWidth;

    if (rawValue <= minVal) return 0;
    if (rawValue >= maxVal) return 1;

    const output = (rawValue - minVal) / width;
    return Math.max(0, Math.min(1, output));
}

export function isValidWindow(level: number, width: number, epsilon: number): boolean {
    return Number.isFinite(level) && Number.isFinite(width) && width > epsilon;
}

export function validateWindow(level: number, width: number, epsilon: number): WindowSettings {
    if (!isValidWindow(level, width, epsilon)) {
        throw new InvalidWindowError({ level, width }, epsilon);
    }
    return { level, width };
}

/**
 * Window a whole plane in one pass
 */
export function windowPlane(plane: IntensityPlane, settings: WindowSettings): NormalizedPlane {
    const { level, width } = settings;
    const source = plane.data;
    const output = new Float32Array(source.length);

    for (let n = 0; n < source.length; n++) {
        output[n] = applyWindow(source[n], level, width);
    }

    return { rows: plane.rows, columns: plane.columns, data: output };
}

/**
 * Full-range window, the default on load
 */
export function defaultWindowForRange(range: IntensityRange): WindowSettings {
    const width = range.max - range.min;
    if (width > 0) {
        return { level: range.min + width / 2, width };
    }
    // Flat volume
    return { level: range.min, width: 1 };
}

/**
 * Brightness/contrast slider pair (each -100..100) to a window.
 * Brightness shifts the lower bound by a fraction of the range, contrast
 * scales the upper bound. Neutral sliders give the full-range window.
 */
export function windowFromBrightnessContrast(
    range: IntensityRange,
    brightness: number,
    contrast: number,
    epsilon: number
): WindowSettings {
    const span = range.max - range.min;
    if (span <= 0) {
        return defaultWindowForRange(range);
    }

    const low = range.min + (brightness / 100) * span;
    const high = range.min + ((contrast + 100) / 100) * span;

    return validateWindow((low + high) / 2, high - low, epsilon);
}

export function computePercentileWindow(
    samples: number[],
    lowerPercent = 1,
    upperPercent = 99
): { level: number; width: number; low: number; high: number } {
    if (samples.length === 0) {
        return { level: 0.5, width: 1, low: 0, high: 1 };
    }

    const sorted = [...samples].sort((a, b) => a - b);
    const low = percentile(sorted, lowerPercent);
    const high = percentile(sorted, upperPercent);
    const width = high > low ? high - low : 1;

    return {
        level: low + width / 2,
        width,
        low,
        high,
    };
}

function percentile(sorted: number[], percent: number): number {
    if (sorted.length === 1) return sorted[0];
    const clamped = Math.max(0, Math.min(100, percent));
    const idx = Math.floor((clamped / 100) * (sorted.length - 1));
    return sorted[idx] ?? sorted[0];
}

/**
 * Convert a window drag (pixels) into level/width deltas.
 * Vertical drag moves the level, horizontal drag changes width twice as fast.
 * Deltas scale with the intensity range so MR and CT feel the same.
 */
export function calculateWindowDragDelta(
    dx: number,
    dy: number,
    range: IntensityRange,
    pixelsPerRange: number
): { levelDelta: number; widthDelta: number } {
    const span = range.max - range.min;
    const perPixel = span > 0 ? span / pixelsPerRange : 1;
    return {
        levelDelta: dy * perPixel,
        widthDelta: dx * 2 * perPixel,
    };
}

export function windowsEqual(a: WindowSettings, b: WindowSettings): boolean {
    return a.level === b.level && a.width === b.width;
}

export function formatWindow(settings: WindowSettings): string {
    return `L: ${Math.round(settings.level)} / W: ${Math.round(settings.width)}`;
}
