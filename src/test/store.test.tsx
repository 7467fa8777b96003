/**
 * MPR store tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { act, renderHook } from '@testing-library/react';
import type { ReactNode } from 'react';
import {
    MprProvider,
    initialMprState,
    reducer,
    toAppError,
    useMprActions,
    useMprState,
    useViewState,
    type MprState,
} from '../state/store';
import { ViewSyncCoordinator } from '../core/viewSync';
import { VolumeUnavailableError } from '../core/errors';
import type { AppError } from '../core/types';
import { createCodedVolume } from './volumeFactory';

function createError(id: string): AppError {
    return { id, code: 'INVALID_WINDOW', message: 'bad window', timestamp: 0 };
}

describe('Store Reducer', () => {
    let state: MprState;

    beforeEach(() => {
        state = { ...initialMprState };
    });

    it('tracks the hover guideline of one axis', () => {
        const hovered = reducer(state, { type: 'HOVER_CHANGED', axis: 'axial', position: { x: 1, y: 2 } });
        expect(hovered.hover).toEqual({ axis: 'axial', position: { x: 1, y: 2 } });

        const otherCleared = reducer(hovered, { type: 'HOVER_CHANGED', axis: 'coronal', position: null });
        expect(otherCleared).toBe(hovered);

        const cleared = reducer(hovered, { type: 'HOVER_CHANGED', axis: 'axial', position: null });
        expect(cleared.hover).toBeNull();
    });

    it('adds and dismisses errors', () => {
        const withErrors = reducer(
            reducer(state, { type: 'ADD_ERROR', error: createError('a') }),
            { type: 'ADD_ERROR', error: createError('b') }
        );
        expect(withErrors.errors.map((e) => e.id)).toEqual(['a', 'b']);

        const dismissed = reducer(withErrors, { type: 'DISMISS_ERROR', id: 'a' });
        expect(dismissed.errors.map((e) => e.id)).toEqual(['b']);

        expect(reducer(dismissed, { type: 'CLEAR_ERRORS' }).errors).toEqual([]);
    });
});

describe('toAppError', () => {
    it('converts engine errors', () => {
        const appError = toAppError(new VolumeUnavailableError('scroll'));
        expect(appError?.code).toBe('VOLUME_UNAVAILABLE');
        expect(appError?.message).toBe('No volume loaded (scroll)');
    });

    it('ignores foreign errors', () => {
        expect(toAppError(new Error('boom'))).toBeNull();
    });
});

describe('MprProvider', () => {
    let coordinator: ViewSyncCoordinator;

    function wrapper({ children }: { children: ReactNode }) {
        return <MprProvider coordinator={coordinator}>{children}</MprProvider>;
    }

    beforeEach(() => {
        coordinator = new ViewSyncCoordinator();
    });

    it('starts empty without a volume', () => {
        const { result } = renderHook(() => useViewState('axial'), { wrapper });
        expect(result.current).toBeNull();
    });

    it('mirrors published views', () => {
        coordinator.loadVolume(createCodedVolume());
        const { result } = renderHook(() => useViewState('sagittal'), { wrapper });
        expect(result.current?.sliceIndex).toBe(5);

        act(() => {
            coordinator.scroll('sagittal', -2);
        });
        expect(result.current?.sliceIndex).toBe(3);
        expect(result.current?.cursor).toEqual({ i: 3, j: 5, k: 5 });
    });

    it('picks up a volume loaded after mount', () => {
        const { result } = renderHook(() => useMprState(), { wrapper });
        act(() => {
            coordinator.loadVolume(createCodedVolume([4, 4, 4]));
        });
        expect(result.current.views?.axial.sliceIndex).toBe(2);
    });

    it('records an invalid window as an error and keeps the views', () => {
        coordinator.loadVolume(createCodedVolume());
        const { result } = renderHook(() => ({ state: useMprState(), actions: useMprActions() }), {
            wrapper,
        });
        const before = result.current.state.views;

        act(() => {
            result.current.actions.setWindow(100, 0);
        });

        expect(result.current.state.errors).toHaveLength(1);
        expect(result.current.state.errors[0].code).toBe('INVALID_WINDOW');
        expect(result.current.state.views).toBe(before);
        expect(coordinator.navigation.getWindow()).toEqual({ level: 45454.5, width: 90909 });

        act(() => {
            result.current.actions.dismissError(result.current.state.errors[0].id);
        });
        expect(result.current.state.errors).toEqual([]);
    });

    it('routes slice and crosshair actions to the coordinator', () => {
        coordinator.loadVolume(createCodedVolume());
        const { result } = renderHook(() => ({ state: useMprState(), actions: useMprActions() }), {
            wrapper,
        });

        act(() => {
            result.current.actions.crosshairMove('axial', { x: 1, y: 8 }, true);
        });
        expect(result.current.state.views?.coronal.cursor).toEqual({ i: 8, j: 1, k: 5 });

        act(() => {
            result.current.actions.crosshairMove('axial', { x: 3, y: 3 }, false);
        });
        expect(result.current.state.hover).toEqual({ axis: 'axial', position: { x: 3, y: 3 } });

        let accepted = true;
        act(() => {
            accepted = result.current.actions.setSliceFromText('axial', 'x');
        });
        expect(accepted).toBe(false);
    });

    it('lets non-engine errors propagate', () => {
        coordinator.loadVolume(createCodedVolume());
        const { result } = renderHook(() => useMprActions(), { wrapper });
        coordinator.attachView('axial', {
            update: (view) => {
                if (view.sliceIndex === 6) throw new Error('render failed');
            },
        });
        vi.spyOn(console, 'error').mockImplementation(() => {});
        act(() => {
            expect(() => result.current.scroll('axial', 1)).toThrow('render failed');
        });
        vi.restoreAllMocks();
    });

    it('requires the provider', () => {
        expect(() => renderHook(() => useMprState())).toThrow('useMpr* hooks must be used within MprProvider');
    });
});
