/**
 * Volume Model
 * Immutable decoded intensity volume with bounds queries and voxel-to-world mapping
 */

import { mat4, vec3 } from 'gl-matrix';
import { axisLayout } from './axis';
import { InvalidVolumeError, OutOfBoundsError } from './errors';
import type { Axis, Dimension, IntensityRange, Vec3Tuple, VolumeData, VolumeInit, VoxelCoord } from './types';

const DIM_NAMES = ['i', 'j', 'k'] as const;

/**
 * Build a column-major gl-matrix affine from a row-major 4x4 matrix
 * (the layout NIfTI headers and most loaders hand out).
 */
export function affineFromRows(rows: ReadonlyArray<ReadonlyArray<number>>): mat4 {
    if (rows.length !== 4 || rows.some(r => r.length !== 4 || r.some(v => !Number.isFinite(v)))) {
        throw new InvalidVolumeError('Affine must be a 4x4 matrix of finite numbers');
    }
    const [r0, r1, r2, r3] = rows;
    return mat4.fromValues(
        r0[0], r1[0], r2[0], r3[0],
        r0[1], r1[1], r2[1], r3[1],
        r0[2], r1[2], r2[2], r3[2],
        r0[3], r1[3], r2[3], r3[3]
    );
}

export function affineFromSpacing(spacing: Readonly<Vec3Tuple>): mat4 {
    return mat4.fromScaling(mat4.create(), vec3.fromValues(spacing[0], spacing[1], spacing[2]));
}

function computeRange(data: VolumeData): IntensityRange {
    let min = Infinity;
    let max = -Infinity;
    for (let n = 0; n < data.length; n++) {
        const v = data[n];
        if (!Number.isFinite(v)) continue;
        if (v < min) min = v;
        if (v > max) max = v;
    }
    // No finite samples
    if (min > max) return { min: 0, max: 0 };
    return { min, max };
}

export class VolumeModel {
    readonly dimensions: Readonly<Vec3Tuple>;
    readonly voxelSpacing: Readonly<Vec3Tuple>;
    private readonly data: VolumeData;
    private readonly affine: mat4;
    private readonly range: IntensityRange;

    constructor(init: VolumeInit) {
        const { dimensions, spacing, data } = init;

        dimensions.forEach((extent, d) => {
            if (!Number.isInteger(extent) || extent < 1) {
                throw new InvalidVolumeError(`Extent along ${DIM_NAMES[d]} must be an integer >= 1, got ${extent}`);
            }
        });
        spacing.forEach((s, d) => {
            if (!Number.isFinite(s) || s <= 0) {
                throw new InvalidVolumeError(`Spacing along ${DIM_NAMES[d]} must be positive, got ${s}`);
            }
        });

        const expected = dimensions[0] * dimensions[1] * dimensions[2];
        if (data.length !== expected) {
            throw new InvalidVolumeError(`Expected ${expected} samples, got ${data.length}`);
        }

        this.dimensions = [dimensions[0], dimensions[1], dimensions[2]];
        this.voxelSpacing = [spacing[0], spacing[1], spacing[2]];
        // Owned copy; the loader keeps its buffer
        this.data = data.slice();
        this.affine = init.affine ? affineFromRows(init.affine) : affineFromSpacing(spacing);
        this.range = computeRange(data);
    }

    /** Extent along a voxel dimension */
    dimensionExtent(dim: Dimension): number {
        return this.dimensions[dim];
    }

    /** Number of slices a view along this axis can show */
    extent(axis: Axis): number {
        return this.dimensions[axisLayout(axis).fixed];
    }

    /** Spacing between slices along this axis */
    spacing(axis: Axis): number {
        return this.voxelSpacing[axisLayout(axis).fixed];
    }

    get voxelCount(): number {
        return this.data.length;
    }

    /** Finite samples only, computed once at construction */
    intensityRange(): IntensityRange {
        return { ...this.range };
    }

    /** Flat offset of a voxel; callers must have checked bounds */
    offset(i: number, j: number, k: number): number {
        const [ni, nj] = this.dimensions;
        return i + ni * (j + nj * k);
    }

    sample(i: number, j: number, k: number): number {
        this.checkIndex(i, 0);
        this.checkIndex(j, 1);
        this.checkIndex(k, 2);
        return this.data[this.offset(i, j, k)];
    }

    /** Read without bounds checks; for hot loops over already-validated ranges */
    sampleUnchecked(offset: number): number {
        return this.data[offset];
    }

    contains(coord: VoxelCoord): boolean {
        return (
            this.inDimension(coord.i, 0) &&
            this.inDimension(coord.j, 1) &&
            this.inDimension(coord.k, 2)
        );
    }

    /** Geometric center, floor(extent / 2) per dimension */
    center(): VoxelCoord {
        const [ni, nj, nk] = this.dimensions;
        return { i: Math.floor(ni / 2), j: Math.floor(nj / 2), k: Math.floor(nk / 2) };
    }

    voxelToWorld(coord: VoxelCoord): Vec3Tuple {
        const out = vec3.transformMat4(vec3.create(), vec3.fromValues(coord.i, coord.j, coord.k), this.affine);
        return [out[0], out[1], out[2]];
    }

    /**
     * Evenly strided sample of the intensity data
     * Used for automatic windowing on volumes too large to sort whole
     */
    sampleValues(maxSamples: number): number[] {
        const count = Math.max(1, Math.min(Math.floor(maxSamples), this.data.length));
        const stride = this.data.length / count;
        const values: number[] = [];
        for (let n = 0; n < count; n++) {
            const v = this.data[Math.floor(n * stride)];
            if (Number.isFinite(v)) values.push(v);
        }
        return values;
    }

    private inDimension(index: number, dim: Dimension): boolean {
        return Number.isInteger(index) && index >= 0 && index < this.dimensions[dim];
    }

    private checkIndex(index: number, dim: Dimension): void {
        if (!this.inDimension(index, dim)) {
            throw new OutOfBoundsError(index, this.dimensions[dim], `voxel ${DIM_NAMES[dim]}`);
        }
    }
}
