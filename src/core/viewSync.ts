/**
 * View Sync Coordinator
 * The only component aware that three views exist. Translates interactions
 * on one view into NavigationState updates and republishes all three views
 * from one stable snapshot.
 */

import { axisLayout, unprojectFromPlane } from './axis';
import { resolveConfig, type EngineConfig } from './config';
import { InvalidWindowError, VolumeUnavailableError } from './errors';
import {
    IDLE_CROSSHAIR,
    IDLE_SCRUB,
    commitsCursor,
    nextCrosshairGesture,
    nextScrubGesture,
    type CrosshairGesture,
    type ScrubGesture,
} from './gestures';
import { createLogger } from './logger';
import { NavigationState, type NavigationEvent, type NavigationSnapshot } from './navigationState';
import type { ShortcutAction } from './shortcuts';
import { SliceExtractor } from './sliceExtractor';
import { calculateScrubSliceIndex } from './stackScrub';
import { AXES, type Axis, type PixelPosition, type ViewState, type ViewStates } from './types';
import type { VolumeModel } from './volume';
import {
    calculateWindowDragDelta,
    computePercentileWindow,
    defaultWindowForRange,
    formatWindow,
    windowFromBrightnessContrast,
} from './windowTransform';
import { getPresetById, getPresetBySlot, resolvePreset, type WlPreset } from './wlPresets';

const log = createLogger('ViewSync');

/** External view for one axis */
export interface ViewConsumer {
    update(view: ViewState): void;
    /** Transient hover guideline; null hides it */
    hover?(position: PixelPosition | null): void;
}

export type ViewsListener = (views: ViewStates) => void;
export type HoverListener = (axis: Axis, position: PixelPosition | null) => void;

interface Session {
    volume: VolumeModel;
    navigation: NavigationState;
    unsubscribe: () => void;
}

const SLICE_TEXT_PATTERN = /^[+-]?\d+$/;

export class ViewSyncCoordinator {
    readonly config: EngineConfig;

    private session: Session | null = null;
    private consumers = new Map<Axis, Set<ViewConsumer>>();
    private viewsListeners = new Set<ViewsListener>();
    private hoverListeners = new Set<HoverListener>();

    private crosshairGesture: CrosshairGesture = IDLE_CROSSHAIR;
    private scrubGesture: ScrubGesture = IDLE_SCRUB;
    private hoverAxis: Axis | null = null;

    private publishing = false;
    private publishPending = false;

    constructor(config: Partial<EngineConfig> = {}) {
        this.config = resolveConfig(config);
    }

    // ========================================================================
    // Lifecycle
    // ========================================================================

    /**
     * Start a session on a new volume: cursor at the center, full-range window
     */
    loadVolume(volume: VolumeModel): void {
        // A volume that cannot start a session leaves the current one in place
        const navigation = new NavigationState(volume, new SliceExtractor(volume), {
            windowEpsilon: this.config.windowEpsilon,
        });
        this.unloadVolume();

        const unsubscribe = navigation.subscribe((event) => this.handleNavigationEvent(event));
        this.session = { volume, navigation, unsubscribe };

        const [ni, nj, nk] = volume.dimensions;
        log.info(`Loaded volume ${ni}x${nj}x${nk}, window ${formatWindow(navigation.getWindow())}`);
        this.publish();
    }

    unloadVolume(): void {
        if (!this.session) return;
        this.session.unsubscribe();
        this.session = null;
        this.crosshairGesture = IDLE_CROSSHAIR;
        this.scrubGesture = IDLE_SCRUB;
        this.clearHover();
        log.debug('Volume unloaded');
    }

    get hasVolume(): boolean {
        return this.session !== null;
    }

    get navigation(): NavigationState {
        return this.requireSession('navigation').navigation;
    }

    get volume(): VolumeModel {
        return this.requireSession('volume').volume;
    }

    // ========================================================================
    // Outbound
    // ========================================================================

    /**
     * Register the view for one axis. It receives the current state right
     * away when a volume is loaded.
     */
    attachView(axis: Axis, consumer: ViewConsumer): () => void {
        let set = this.consumers.get(axis);
        if (!set) {
            set = new Set();
            this.consumers.set(axis, set);
        }
        set.add(consumer);

        if (this.session) {
            consumer.update(this.session.navigation.currentViewState(axis));
        }

        return () => {
            this.consumers.get(axis)?.delete(consumer);
        };
    }

    /** Receive all three views of each published snapshot together */
    subscribe(listener: ViewsListener): () => void {
        this.viewsListeners.add(listener);
        return () => {
            this.viewsListeners.delete(listener);
        };
    }

    subscribeHover(listener: HoverListener): () => void {
        this.hoverListeners.add(listener);
        return () => {
            this.hoverListeners.delete(listener);
        };
    }

    getViewStates(): ViewStates {
        const { navigation } = this.requireSession('getViewStates');
        return this.deriveAll(navigation, navigation.snapshot());
    }

    get gesture(): CrosshairGesture {
        return this.crosshairGesture;
    }

    get scrub(): ScrubGesture {
        return this.scrubGesture;
    }

    // ========================================================================
    // Slice navigation
    // ========================================================================

    scroll(axis: Axis, delta: number): void {
        const navigation = this.navigation;
        navigation.setAxisSlice(axis, navigation.sliceIndex(axis) + Math.round(delta));
    }

    /** Direct numeric entry; clamps like any other slice change */
    setSliceNumeric(axis: Axis, index: number): void {
        this.navigation.setAxisSlice(axis, index);
    }

    /**
     * Numeric entry from a text field
     * @returns false when the text is not an integer; state is left as is
     */
    setSliceFromText(axis: Axis, text: string): boolean {
        const navigation = this.navigation;
        const trimmed = text.trim();
        if (!SLICE_TEXT_PATTERN.test(trimmed)) {
            log.debug(`Ignoring slice entry "${text}" for ${axis}`);
            return false;
        }
        navigation.setAxisSlice(axis, parseInt(trimmed, 10));
        return true;
    }

    centerCursor(): void {
        const { volume, navigation } = this.requireSession('centerCursor');
        const center = volume.center();
        navigation.setCursor(center.i, center.j, center.k);
    }

    // ========================================================================
    // Crosshair
    // ========================================================================

    /**
     * Pointer at an in-plane pixel. Committed moves set the cursor from the
     * pixel plus this view's current slice; uncommitted ones only move the
     * hover guideline on the originating view.
     */
    crosshairMove(axis: Axis, position: PixelPosition, committed: boolean): void {
        const navigation = this.navigation;
        const pixel = { x: Math.floor(position.x), y: Math.floor(position.y) };

        if (!committed) {
            this.setHover(axis, this.clampToPlane(axis, pixel));
            return;
        }

        const coord = unprojectFromPlane(pixel, axis, navigation.sliceIndex(axis));
        navigation.setCursor(coord.i, coord.j, coord.k);
    }

    pointerDown(axis: Axis, position: PixelPosition): void {
        this.requireSession('pointerDown');
        this.crosshairGesture = nextCrosshairGesture(this.crosshairGesture, { type: 'press', axis });
        this.crosshairMove(axis, position, true);
    }

    pointerMove(axis: Axis, position: PixelPosition): void {
        this.crosshairMove(axis, position, commitsCursor(this.crosshairGesture, axis));
    }

    pointerUp(): void {
        this.crosshairGesture = nextCrosshairGesture(this.crosshairGesture, { type: 'release' });
    }

    pointerLeave(axis: Axis): void {
        if (this.hoverAxis === axis) {
            this.clearHover();
        }
    }

    // ========================================================================
    // Stack scrub
    // ========================================================================

    scrubStart(axis: Axis, startY: number): void {
        const startSlice = this.navigation.sliceIndex(axis);
        this.scrubGesture = nextScrubGesture(this.scrubGesture, { type: 'start', axis, startSlice, startY });
    }

    scrubMove(currentY: number, shiftHeld: boolean): void {
        const scrub = this.scrubGesture;
        if (scrub.kind === 'idle') return;

        const { volume, navigation } = this.requireSession('scrubMove');
        const index = calculateScrubSliceIndex(
            scrub.startSlice,
            scrub.startY,
            currentY,
            volume.extent(scrub.axis),
            shiftHeld,
            this.config.scrubPixelsPerSlice,
            this.config.scrubShiftMultiplier
        );
        navigation.setAxisSlice(scrub.axis, index);
    }

    scrubEnd(): void {
        this.scrubGesture = nextScrubGesture(this.scrubGesture, { type: 'end' });
    }

    // ========================================================================
    // Window (global across all three views)
    // ========================================================================

    /** Throws InvalidWindowError and keeps the prior window on bad width */
    setWindow(level: number, width: number): void {
        const navigation = this.navigation;
        try {
            navigation.setWindow(level, width);
        } catch (e) {
            if (e instanceof InvalidWindowError) {
                log.warn(`Rejected window: ${e.message}`);
            }
            throw e;
        }
    }

    windowAdjust(levelDelta: number, widthDelta: number): void {
        const current = this.navigation.getWindow();
        this.setWindow(current.level + levelDelta, current.width + widthDelta);
    }

    /** Incremental drag since the previous pointer event */
    windowDrag(dx: number, dy: number): void {
        const { levelDelta, widthDelta } = calculateWindowDragDelta(
            dx,
            dy,
            this.volume.intensityRange(),
            this.config.windowDragPixelsPerRange
        );
        this.windowAdjust(levelDelta, widthDelta);
    }

    applyBrightnessContrast(brightness: number, contrast: number): void {
        const range = this.volume.intensityRange();
        const settings = windowFromBrightnessContrast(range, brightness, contrast, this.config.windowEpsilon);
        this.setWindow(settings.level, settings.width);
    }

    applyPreset(id: string): WlPreset {
        const preset = getPresetById(id);
        if (!preset) {
            throw new Error(`Unknown window preset: ${id}`);
        }
        this.applyResolvedPreset(preset);
        return preset;
    }

    resetWindow(): void {
        const settings = defaultWindowForRange(this.volume.intensityRange());
        this.setWindow(settings.level, settings.width);
    }

    autoWindow(): void {
        const samples = this.volume.sampleValues(this.config.autoWindowSamples);
        const { level, width } = computePercentileWindow(samples);
        this.setWindow(level, width);
    }

    // ========================================================================
    // Keyboard
    // ========================================================================

    /**
     * Apply a mapped shortcut to the view under focus
     * @returns whether the action was handled here
     */
    handleShortcut(axis: Axis, action: ShortcutAction): boolean {
        switch (action) {
            case 'PREV_SLICE':
                this.scroll(axis, -1);
                return true;
            case 'NEXT_SLICE':
                this.scroll(axis, 1);
                return true;
            case 'JUMP_BACK':
                this.scroll(axis, -this.config.sliceJumpStep);
                return true;
            case 'JUMP_FWD':
                this.scroll(axis, this.config.sliceJumpStep);
                return true;
            case 'FIRST_SLICE':
                this.setSliceNumeric(axis, 0);
                return true;
            case 'LAST_SLICE':
                this.setSliceNumeric(axis, this.volume.extent(axis) - 1);
                return true;
            case 'CENTER_CURSOR':
                this.centerCursor();
                return true;
            case 'RESET_WINDOW':
                this.resetWindow();
                return true;
            case 'AUTO_WINDOW':
                this.autoWindow();
                return true;
            case 'WL_PRESET_1':
            case 'WL_PRESET_2':
            case 'WL_PRESET_3':
            case 'WL_PRESET_4':
            case 'WL_PRESET_5': {
                const preset = getPresetBySlot(Number(action.slice(-1)));
                if (!preset) return false;
                this.applyResolvedPreset(preset);
                return true;
            }
            case 'TOGGLE_HELP':
            case null:
                return false;
        }
    }

    // ========================================================================
    // Internals
    // ========================================================================

    private applyResolvedPreset(preset: WlPreset): void {
        const settings = resolvePreset(preset, this.volume.intensityRange());
        this.setWindow(settings.level, settings.width);
    }

    private requireSession(operation: string): Session {
        if (!this.session) {
            throw new VolumeUnavailableError(operation);
        }
        return this.session;
    }

    private handleNavigationEvent(event: NavigationEvent): void {
        log.debug(`Navigation ${event.type} changed`);
        this.publish();
    }

    private deriveAll(navigation: NavigationState, snapshot: NavigationSnapshot): ViewStates {
        return {
            axial: navigation.viewStateFrom(snapshot, 'axial'),
            sagittal: navigation.viewStateFrom(snapshot, 'sagittal'),
            coronal: navigation.viewStateFrom(snapshot, 'coronal'),
        };
    }

    /**
     * All three views come from one snapshot and are computed before any
     * consumer runs. Changes made from inside a consumer are published in
     * a follow-up round. A failing consumer does not stop delivery to the
     * others; the first failure is rethrown once every view is up to date.
     */
    private publish(): void {
        if (this.publishing) {
            this.publishPending = true;
            return;
        }

        const failures: unknown[] = [];
        this.publishing = true;
        try {
            do {
                this.publishPending = false;
                const session = this.session;
                if (!session) break;

                const views = this.deriveAll(session.navigation, session.navigation.snapshot());
                for (const axis of AXES) {
                    for (const consumer of [...(this.consumers.get(axis) ?? [])]) {
                        this.deliver(failures, `${axis} view`, () => consumer.update(views[axis]));
                    }
                }
                for (const listener of [...this.viewsListeners]) {
                    this.deliver(failures, 'views listener', () => listener(views));
                }
            } while (this.publishPending);
        } finally {
            this.publishing = false;
            this.publishPending = false;
        }

        if (failures.length > 0) {
            throw failures[0];
        }
    }

    private deliver(failures: unknown[], target: string, run: () => void): void {
        try {
            run();
        } catch (e) {
            log.error(`Update failed for ${target}`, e);
            failures.push(e);
        }
    }

    private clampToPlane(axis: Axis, pixel: PixelPosition): PixelPosition {
        const volume = this.volume;
        const { row, column } = axisLayout(axis);
        const rows = volume.dimensionExtent(row);
        const columns = volume.dimensionExtent(column);
        return {
            x: Number.isFinite(pixel.x) ? Math.max(0, Math.min(pixel.x, columns - 1)) : 0,
            y: Number.isFinite(pixel.y) ? Math.max(0, Math.min(pixel.y, rows - 1)) : 0,
        };
    }

    /** Only one view shows a hover guideline at a time */
    private setHover(axis: Axis, position: PixelPosition): void {
        if (this.hoverAxis !== null && this.hoverAxis !== axis) {
            this.notifyHover(this.hoverAxis, null);
        }
        this.hoverAxis = axis;
        this.notifyHover(axis, position);
    }

    private clearHover(): void {
        if (this.hoverAxis === null) return;
        const axis = this.hoverAxis;
        this.hoverAxis = null;
        this.notifyHover(axis, null);
    }

    private notifyHover(axis: Axis, position: PixelPosition | null): void {
        for (const consumer of [...(this.consumers.get(axis) ?? [])]) {
            consumer.hover?.(position);
        }
        for (const listener of [...this.hoverListeners]) {
            listener(axis, position);
        }
    }
}
