export * from './core/types';
export * from './core/errors';
export * from './core/axis';
export { VolumeModel, affineFromRows, affineFromSpacing } from './core/volume';
export * from './core/windowTransform';
export * from './core/wlPresets';
export { SliceExtractor, extractSlice } from './core/sliceExtractor';
export * from './core/stackScrub';
export * from './core/gestures';
export {
    NavigationState,
    type NavigationEvent,
    type NavigationListener,
    type NavigationOptions,
    type NavigationSnapshot,
} from './core/navigationState';
export {
    ViewSyncCoordinator,
    type HoverListener,
    type ViewConsumer,
    type ViewsListener,
} from './core/viewSync';
export * from './core/shortcuts';
export * from './core/config';
export { createLogger, setLogLevel, type Logger, type LogLevel } from './core/logger';
export {
    MprProvider,
    reducer as mprReducer,
    initialMprState,
    toAppError,
    useMprActions,
    useMprState,
    useViewState,
    type MprAction,
    type MprActions,
    type MprState,
} from './state/store';
