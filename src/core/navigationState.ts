/**
 * Navigation State
 * Single source of truth for the shared 3D cursor and the global window.
 * Slice indices are never stored; every view derives its own from the cursor.
 */

import { axisLayout, coordComponent, coordsEqual, projectToPlane, withComponent } from './axis';
import { createLogger } from './logger';
import { clampSlice } from './stackScrub';
import type { SliceExtractor } from './sliceExtractor';
import type { Axis, Dimension, ViewState, VoxelCoord, WindowSettings } from './types';
import type { VolumeModel } from './volume';
import { defaultWindowForRange, validateWindow, windowPlane, windowsEqual } from './windowTransform';

const log = createLogger('Navigation');

export type NavigationEvent =
    | { type: 'cursor'; previous: VoxelCoord; current: VoxelCoord }
    | { type: 'window'; previous: WindowSettings; current: WindowSettings };

export type NavigationListener = (event: NavigationEvent) => void;

/** Stable read of the mutable state */
export interface NavigationSnapshot {
    cursor: VoxelCoord;
    window: WindowSettings;
}

export interface NavigationOptions {
    windowEpsilon: number;
    initialCursor?: VoxelCoord;
    initialWindow?: WindowSettings;
}

export class NavigationState {
    private cursor: VoxelCoord;
    private window: WindowSettings;
    private listeners = new Set<NavigationListener>();
    private readonly epsilon: number;

    constructor(
        readonly volume: VolumeModel,
        private readonly extractor: SliceExtractor,
        options: NavigationOptions
    ) {
        if (extractor.volume !== volume) {
            throw new Error('Slice extractor is bound to a different volume');
        }
        this.epsilon = options.windowEpsilon;
        this.cursor = this.clampCursor(options.initialCursor ?? volume.center(), volume.center());

        const initialWindow = options.initialWindow ?? defaultWindowForRange(volume.intensityRange());
        this.window = validateWindow(initialWindow.level, initialWindow.width, this.epsilon);
    }

    subscribe(listener: NavigationListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    snapshot(): NavigationSnapshot {
        return { cursor: { ...this.cursor }, window: { ...this.window } };
    }

    getCursor(): VoxelCoord {
        return { ...this.cursor };
    }

    getWindow(): WindowSettings {
        return { ...this.window };
    }

    sliceIndex(axis: Axis): number {
        return coordComponent(this.cursor, axisLayout(axis).fixed);
    }

    /**
     * Move the cursor. Out-of-range components stick to the nearest edge,
     * non-finite ones keep their current value.
     * @returns whether the cursor moved
     */
    setCursor(i: number, j: number, k: number): boolean {
        const next = this.clampCursor({ i, j, k }, this.cursor);
        if (coordsEqual(next, this.cursor)) return false;

        const previous = this.cursor;
        this.cursor = next;
        this.emit({ type: 'cursor', previous: { ...previous }, current: { ...next } });
        return true;
    }

    /** Move along one axis only */
    setAxisSlice(axis: Axis, index: number): boolean {
        const moved = withComponent(this.cursor, axisLayout(axis).fixed, index);
        return this.setCursor(moved.i, moved.j, moved.k);
    }

    /**
     * Replace the window. Throws InvalidWindowError and keeps the prior
     * window when width <= epsilon.
     * @returns whether the window changed
     */
    setWindow(level: number, width: number): boolean {
        const next = validateWindow(level, width, this.epsilon);
        if (windowsEqual(next, this.window)) return false;

        const previous = this.window;
        this.window = next;
        this.emit({ type: 'window', previous: { ...previous }, current: { ...next } });
        return true;
    }

    currentViewState(axis: Axis): ViewState {
        return this.viewStateFrom(this.snapshot(), axis);
    }

    /**
     * The single derivation path every view reads from
     */
    viewStateFrom(snapshot: NavigationSnapshot, axis: Axis): ViewState {
        const { fixed, row, column } = axisLayout(axis);
        const sliceIndex = coordComponent(snapshot.cursor, fixed);
        const raw = this.extractor.extract(axis, sliceIndex);

        return {
            axis,
            sliceIndex,
            sliceCount: this.volume.extent(axis),
            plane: windowPlane(raw, snapshot.window),
            crosshair: projectToPlane(snapshot.cursor, axis),
            window: { ...snapshot.window },
            cursor: { ...snapshot.cursor },
            cursorWorld: this.volume.voxelToWorld(snapshot.cursor),
            pixelSpacing: {
                row: this.volume.voxelSpacing[row],
                column: this.volume.voxelSpacing[column],
            },
        };
    }

    private clampCursor(requested: VoxelCoord, fallback: VoxelCoord): VoxelCoord {
        return {
            i: this.clampComponent(requested.i, fallback.i, 0),
            j: this.clampComponent(requested.j, fallback.j, 1),
            k: this.clampComponent(requested.k, fallback.k, 2),
        };
    }

    private clampComponent(value: number, fallback: number, dim: Dimension): number {
        if (!Number.isFinite(value)) return fallback;
        return clampSlice(Math.round(value), this.volume.dimensionExtent(dim));
    }

    // Every listener hears about a committed change, even after one fails
    private emit(event: NavigationEvent): void {
        const failures: unknown[] = [];
        for (const listener of [...this.listeners]) {
            try {
                listener(event);
            } catch (e) {
                log.error(`Listener failed on ${event.type} change`, e);
                failures.push(e);
            }
        }
        if (failures.length > 0) {
            throw failures[0];
        }
    }
}
