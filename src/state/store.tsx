/**
 * MPR view store using React Context + Reducer
 * Mirrors the coordinator's published snapshots for rendering components.
 */

import {
    createContext,
    useContext,
    useEffect,
    useMemo,
    useReducer,
    type Dispatch,
    type ReactNode,
} from 'react';
import { isMprError } from '../core/errors';
import type { Axis, AppError, PixelPosition, ViewState, ViewStates } from '../core/types';
import type { ViewSyncCoordinator } from '../core/viewSync';

// State shape
export interface MprState {
    /** Latest consistent set of views; null until a volume is loaded */
    views: ViewStates | null;
    /** Hover guideline, shown on one view at most */
    hover: { axis: Axis; position: PixelPosition } | null;
    /** Rejected interactions (e.g. invalid window) */
    errors: AppError[];
}

export const initialMprState: MprState = {
    views: null,
    hover: null,
    errors: [],
};

// Actions
export type MprAction =
    | { type: 'VIEWS_PUBLISHED'; views: ViewStates }
    | { type: 'HOVER_CHANGED'; axis: Axis; position: PixelPosition | null }
    | { type: 'ADD_ERROR'; error: AppError }
    | { type: 'DISMISS_ERROR'; id: string }
    | { type: 'CLEAR_ERRORS' };

export function reducer(state: MprState, action: MprAction): MprState {
    switch (action.type) {
        case 'VIEWS_PUBLISHED':
            return { ...state, views: action.views };
        case 'HOVER_CHANGED':
            if (action.position) {
                return { ...state, hover: { axis: action.axis, position: action.position } };
            }
            // A clear for another axis must not hide the current guideline
            if (state.hover && state.hover.axis !== action.axis) return state;
            return { ...state, hover: null };
        case 'ADD_ERROR':
            return { ...state, errors: [...state.errors, action.error] };
        case 'DISMISS_ERROR':
            return { ...state, errors: state.errors.filter((e) => e.id !== action.id) };
        case 'CLEAR_ERRORS':
            return { ...state, errors: [] };
    }
}

let errorCounter = 0;

export function toAppError(error: unknown): AppError | null {
    if (!isMprError(error)) return null;
    errorCounter += 1;
    return {
        id: `mpr-error-${errorCounter}`,
        code: error.code,
        message: error.message,
        timestamp: Date.now(),
    };
}

// Context
interface MprContextValue {
    state: MprState;
    dispatch: Dispatch<MprAction>;
    coordinator: ViewSyncCoordinator;
}

const MprContext = createContext<MprContextValue | null>(null);

export function MprProvider({
    coordinator,
    children,
}: {
    coordinator: ViewSyncCoordinator;
    children: ReactNode;
}) {
    const [state, dispatch] = useReducer(
        reducer,
        coordinator,
        (c): MprState => ({ ...initialMprState, views: c.hasVolume ? c.getViewStates() : null })
    );

    useEffect(() => {
        const offViews = coordinator.subscribe((views) => dispatch({ type: 'VIEWS_PUBLISHED', views }));
        const offHover = coordinator.subscribeHover((axis, position) =>
            dispatch({ type: 'HOVER_CHANGED', axis, position })
        );
        // Catch up on anything published between first render and subscription
        if (coordinator.hasVolume) {
            dispatch({ type: 'VIEWS_PUBLISHED', views: coordinator.getViewStates() });
        }
        return () => {
            offViews();
            offHover();
        };
    }, [coordinator]);

    const value = useMemo(() => ({ state, dispatch, coordinator }), [state, coordinator]);

    return <MprContext.Provider value={value}>{children}</MprContext.Provider>;
}

function useMprContext(): MprContextValue {
    const context = useContext(MprContext);
    if (!context) {
        throw new Error('useMpr* hooks must be used within MprProvider');
    }
    return context;
}

export function useMprState(): MprState {
    return useMprContext().state;
}

export function useViewState(axis: Axis): ViewState | null {
    const { views } = useMprContext().state;
    return views ? views[axis] : null;
}

export interface MprActions {
    scroll(axis: Axis, delta: number): void;
    setSlice(axis: Axis, index: number): void;
    setSliceFromText(axis: Axis, text: string): boolean;
    crosshairMove(axis: Axis, position: PixelPosition, committed: boolean): void;
    windowAdjust(levelDelta: number, widthDelta: number): void;
    setWindow(level: number, width: number): void;
    applyBrightnessContrast(brightness: number, contrast: number): void;
    dismissError(id: string): void;
}

/**
 * Interaction handlers for components. Engine errors (an invalid window,
 * a missing volume) are recorded in the store; anything else propagates.
 */
export function useMprActions(): MprActions {
    const { dispatch, coordinator } = useMprContext();

    return useMemo<MprActions>(() => {
        function guarded<T>(run: () => T, fallback: T): T {
            try {
                return run();
            } catch (e) {
                const appError = toAppError(e);
                if (!appError) throw e;
                dispatch({ type: 'ADD_ERROR', error: appError });
                return fallback;
            }
        }

        return {
            scroll: (axis, delta) => guarded(() => coordinator.scroll(axis, delta), undefined),
            setSlice: (axis, index) => guarded(() => coordinator.setSliceNumeric(axis, index), undefined),
            setSliceFromText: (axis, text) => guarded(() => coordinator.setSliceFromText(axis, text), false),
            crosshairMove: (axis, position, committed) =>
                guarded(() => coordinator.crosshairMove(axis, position, committed), undefined),
            windowAdjust: (levelDelta, widthDelta) =>
                guarded(() => coordinator.windowAdjust(levelDelta, widthDelta), undefined),
            setWindow: (level, width) => guarded(() => coordinator.setWindow(level, width), undefined),
            applyBrightnessContrast: (brightness, contrast) =>
                guarded(() => coordinator.applyBrightnessContrast(brightness, contrast), undefined),
            dismissError: (id) => dispatch({ type: 'DISMISS_ERROR', id }),
        };
    }, [dispatch, coordinator]);
}
