/**
 * Gesture state machines
 * One small machine per gesture source instead of ad-hoc pressed flags.
 */

import type { Axis } from './types';

// ============================================================================
// Crosshair pointer: hover previews vs committed drags
// ============================================================================

export type CrosshairGesture = { kind: 'idle' } | { kind: 'dragging'; axis: Axis };

export type CrosshairGestureEvent = { type: 'press'; axis: Axis } | { type: 'release' };

export const IDLE_CROSSHAIR: CrosshairGesture = { kind: 'idle' };

export function nextCrosshairGesture(
    state: CrosshairGesture,
    event: CrosshairGestureEvent
): CrosshairGesture {
    switch (event.type) {
        case 'press':
            return { kind: 'dragging', axis: event.axis };
        case 'release':
            return state.kind === 'idle' ? state : IDLE_CROSSHAIR;
    }
}

/** Pointer movement on this axis commits the cursor only while dragging on it */
export function commitsCursor(state: CrosshairGesture, axis: Axis): boolean {
    return state.kind === 'dragging' && state.axis === axis;
}

// ============================================================================
// Stack scrub: drag up/down to step slices
// ============================================================================

export type ScrubGesture =
    | { kind: 'idle' }
    | { kind: 'scrubbing'; axis: Axis; startSlice: number; startY: number };

export type ScrubGestureEvent =
    | { type: 'start'; axis: Axis; startSlice: number; startY: number }
    | { type: 'end' };

export const IDLE_SCRUB: ScrubGesture = { kind: 'idle' };

export function nextScrubGesture(state: ScrubGesture, event: ScrubGestureEvent): ScrubGesture {
    switch (event.type) {
        case 'start':
            return {
                kind: 'scrubbing',
                axis: event.axis,
                startSlice: event.startSlice,
                startY: event.startY,
            };
        case 'end':
            return state.kind === 'idle' ? state : IDLE_SCRUB;
    }
}
