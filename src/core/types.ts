/**
 * Core types for the tri-planar slicing engine
 */

// ============================================================================
// Axes and coordinates
// ============================================================================

/** The three orthogonal view orientations */
export const AXES = ['axial', 'sagittal', 'coronal'] as const;

export type Axis = (typeof AXES)[number];

/** Voxel dimension index: 0 = i, 1 = j, 2 = k */
export type Dimension = 0 | 1 | 2;

/** Integer voxel coordinate shared by all three views */
export interface VoxelCoord {
    i: number;
    j: number;
    k: number;
}

/** In-plane pixel position: x = column, y = row */
export interface PixelPosition {
    x: number;
    y: number;
}

export type Vec3Tuple = [number, number, number];

// ============================================================================
// Volume data
// ============================================================================

/** Typed arrays accepted as decoded intensity data */
export type VolumeData =
    | Int8Array
    | Uint8Array
    | Int16Array
    | Uint16Array
    | Int32Array
    | Uint32Array
    | Float32Array
    | Float64Array;

/** Decoded volume as handed over by an external loader */
export interface VolumeInit {
    /** Extents [I, J, K] */
    dimensions: Vec3Tuple;
    /** Flat samples, i fastest: index = i + I * (j + J * k) */
    data: VolumeData;
    /** Voxel spacing per dimension (mm) */
    spacing: Vec3Tuple;
    /** Row-major 4x4 voxel-to-world matrix; defaults to a diagonal from spacing */
    affine?: ReadonlyArray<ReadonlyArray<number>>;
}

export interface IntensityRange {
    min: number;
    max: number;
}

// ============================================================================
// Windowing
// ============================================================================

export interface WindowSettings {
    level: number;
    width: number;
}

// ============================================================================
// Planes and views
// ============================================================================

/** Raw 2D slice, row-major */
export interface IntensityPlane {
    rows: number;
    columns: number;
    data: Float64Array;
}

/** Windowed 2D slice with values in [0, 1], row-major */
export interface NormalizedPlane {
    rows: number;
    columns: number;
    data: Float32Array;
}

/** Everything one view needs to draw itself */
export interface ViewState {
    axis: Axis;
    sliceIndex: number;
    /** Number of slices along this axis */
    sliceCount: number;
    plane: NormalizedPlane;
    crosshair: PixelPosition;
    window: WindowSettings;
    /** Shared cursor this view was derived from */
    cursor: VoxelCoord;
    cursorWorld: Vec3Tuple;
    /** Physical size of one pixel (mm), for aspect-correct display */
    pixelSpacing: { row: number; column: number };
}

export type ViewStates = Record<Axis, ViewState>;

// ============================================================================
// App-level errors
// ============================================================================

export interface AppError {
    id: string;
    code: string;
    message: string;
    timestamp: number;
}
