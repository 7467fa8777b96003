/**
 * Slice Extraction
 * Cuts a 2D plane out of the volume with the canonical in-plane ordering
 * from ./axis (row = lower free dimension, column = higher).
 */

import { axisLayout } from './axis';
import { OutOfBoundsError } from './errors';
import type { VolumeModel } from './volume';
import type { Axis, IntensityPlane } from './types';

export function extractSlice(volume: VolumeModel, axis: Axis, sliceIndex: number): IntensityPlane {
    const extent = volume.extent(axis);
    if (!Number.isInteger(sliceIndex) || sliceIndex < 0 || sliceIndex >= extent) {
        throw OutOfBoundsError.forSlice(axis, sliceIndex, extent);
    }

    const { fixed, row, column } = axisLayout(axis);
    const rows = volume.dimensionExtent(row);
    const columns = volume.dimensionExtent(column);
    const data = new Float64Array(rows * columns);

    // Flat-offset step for +1 along each voxel dimension
    const [ni, nj] = volume.dimensions;
    const strides = [1, ni, ni * nj];
    const base = sliceIndex * strides[fixed];
    const rowStride = strides[row];
    const colStride = strides[column];

    for (let r = 0; r < rows; r++) {
        const rowBase = base + r * rowStride;
        const outBase = r * columns;
        for (let c = 0; c < columns; c++) {
            data[outBase + c] = volume.sampleUnchecked(rowBase + c * colStride);
        }
    }

    return { rows, columns, data };
}

interface MemoEntry {
    index: number;
    plane: IntensityPlane;
}

/**
 * Extractor that remembers the most recent plane per axis.
 * Repeated hover/redraw requests for the same slice skip the copy.
 * Bound to one volume; build a new extractor when the volume changes.
 */
export class SliceExtractor {
    private memo = new Map<Axis, MemoEntry>();
    private hits = 0;
    private misses = 0;

    constructor(readonly volume: VolumeModel) {}

    extract(axis: Axis, sliceIndex: number): IntensityPlane {
        const cached = this.memo.get(axis);
        if (cached && cached.index === sliceIndex) {
            this.hits++;
            return cached.plane;
        }

        const plane = extractSlice(this.volume, axis, sliceIndex);
        this.memo.set(axis, { index: sliceIndex, plane });
        this.misses++;
        return plane;
    }

    clear(): void {
        this.memo.clear();
    }

    stats(): { hits: number; misses: number; entries: number } {
        return { hits: this.hits, misses: this.misses, entries: this.memo.size };
    }
}
