/**
 * Axis geometry
 *
 * Sagittal fixes i, coronal fixes j, axial fixes k. The two free dimensions
 * keep canonical order: row = lower dimension, column = higher dimension.
 *
 * | axis     | fixed | row | column |
 * |----------|-------|-----|--------|
 * | axial    | k     | i   | j      |
 * | sagittal | i     | j   | k      |
 * | coronal  | j     | i   | k      |
 */

import type { Axis, Dimension, PixelPosition, VoxelCoord } from './types';

export interface AxisLayout {
    fixed: Dimension;
    row: Dimension;
    column: Dimension;
}

function assertNever(value: never): never {
    throw new Error(`Unhandled axis: ${String(value)}`);
}

export function axisLayout(axis: Axis): AxisLayout {
    switch (axis) {
        case 'axial':
            return { fixed: 2, row: 0, column: 1 };
        case 'sagittal':
            return { fixed: 0, row: 1, column: 2 };
        case 'coronal':
            return { fixed: 1, row: 0, column: 2 };
        default:
            return assertNever(axis);
    }
}

export function axisLabel(axis: Axis): string {
    switch (axis) {
        case 'axial':
            return 'Axial';
        case 'sagittal':
            return 'Sagittal';
        case 'coronal':
            return 'Coronal';
        default:
            return assertNever(axis);
    }
}

export function coordComponent(coord: VoxelCoord, dim: Dimension): number {
    switch (dim) {
        case 0:
            return coord.i;
        case 1:
            return coord.j;
        case 2:
            return coord.k;
    }
}

export function withComponent(coord: VoxelCoord, dim: Dimension, value: number): VoxelCoord {
    switch (dim) {
        case 0:
            return { ...coord, i: value };
        case 1:
            return { ...coord, j: value };
        case 2:
            return { ...coord, k: value };
    }
}

/** Slice index a view shows, derived from the shared cursor */
export function sliceIndexOf(coord: VoxelCoord, axis: Axis): number {
    return coordComponent(coord, axisLayout(axis).fixed);
}

/** Project the cursor onto a view's plane */
export function projectToPlane(coord: VoxelCoord, axis: Axis): PixelPosition {
    const { row, column } = axisLayout(axis);
    return { x: coordComponent(coord, column), y: coordComponent(coord, row) };
}

/** Inverse of projectToPlane: the slice index comes from the cursor, not the pixel */
export function unprojectFromPlane(pixel: PixelPosition, axis: Axis, sliceIndex: number): VoxelCoord {
    const { fixed, row, column } = axisLayout(axis);
    let coord: VoxelCoord = { i: 0, j: 0, k: 0 };
    coord = withComponent(coord, fixed, sliceIndex);
    coord = withComponent(coord, row, pixel.y);
    coord = withComponent(coord, column, pixel.x);
    return coord;
}

export function coordsEqual(a: VoxelCoord, b: VoxelCoord): boolean {
    return a.i === b.i && a.j === b.j && a.k === b.k;
}

export function formatCoord(coord: VoxelCoord): string {
    return `(${coord.i}, ${coord.j}, ${coord.k})`;
}
