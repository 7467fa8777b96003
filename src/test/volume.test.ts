/**
 * Volume model tests
 */

import { describe, it, expect } from 'vitest';
import { VolumeModel, affineFromRows } from '../core/volume';
import { InvalidVolumeError, OutOfBoundsError } from '../core/errors';
import { createCodedVolume, encodeVoxel } from './volumeFactory';

describe('VolumeModel', () => {
    describe('bounds queries', () => {
        const volume = createCodedVolume([4, 5, 6], [1, 2, 3]);

        it('reports extents per axis by the fixed dimension', () => {
            expect(volume.extent('sagittal')).toBe(4);
            expect(volume.extent('coronal')).toBe(5);
            expect(volume.extent('axial')).toBe(6);
        });

        it('reports spacing per axis', () => {
            expect(volume.spacing('sagittal')).toBe(1);
            expect(volume.spacing('coronal')).toBe(2);
            expect(volume.spacing('axial')).toBe(3);
        });

        it('samples voxels in i-fastest order', () => {
            expect(volume.sample(0, 0, 0)).toBe(0);
            expect(volume.sample(3, 4, 5)).toBe(encodeVoxel(3, 4, 5));
            expect(volume.sample(1, 2, 3)).toBe(30201);
        });

        it('throws OutOfBounds for indices outside the extent', () => {
            expect(() => volume.sample(4, 0, 0)).toThrow(OutOfBoundsError);
            expect(() => volume.sample(0, -1, 0)).toThrow(OutOfBoundsError);
            expect(() => volume.sample(0, 0, 6)).toThrow(OutOfBoundsError);
            expect(() => volume.sample(1.5, 0, 0)).toThrow(OutOfBoundsError);
        });

        it('computes the intensity range once', () => {
            expect(volume.intensityRange()).toEqual({ min: 0, max: 50403 });
        });

        it('checks containment', () => {
            expect(volume.contains({ i: 3, j: 4, k: 5 })).toBe(true);
            expect(volume.contains({ i: 3, j: 5, k: 5 })).toBe(false);
        });
    });

    describe('center', () => {
        it('uses floor(extent / 2)', () => {
            expect(createCodedVolume([10, 10, 10]).center()).toEqual({ i: 5, j: 5, k: 5 });
            expect(createCodedVolume([4, 5, 6]).center()).toEqual({ i: 2, j: 2, k: 3 });
            expect(createCodedVolume([1, 1, 1]).center()).toEqual({ i: 0, j: 0, k: 0 });
        });
    });

    describe('construction', () => {
        it('rejects empty extents', () => {
            expect(
                () => new VolumeModel({ dimensions: [0, 1, 1], data: new Float32Array(0), spacing: [1, 1, 1] })
            ).toThrow(InvalidVolumeError);
        });

        it('rejects non-positive spacing', () => {
            expect(
                () => new VolumeModel({ dimensions: [1, 1, 1], data: new Float32Array(1), spacing: [1, 0, 1] })
            ).toThrow(InvalidVolumeError);
        });

        it('rejects a data length that does not match the extents', () => {
            expect(
                () => new VolumeModel({ dimensions: [2, 2, 2], data: new Int16Array(7), spacing: [1, 1, 1] })
            ).toThrow('Expected 8 samples, got 7');
        });

        it('accepts integer data types', () => {
            const volume = new VolumeModel({
                dimensions: [2, 1, 1],
                data: new Int16Array([-1024, 3071]),
                spacing: [1, 1, 1],
            });
            expect(volume.intensityRange()).toEqual({ min: -1024, max: 3071 });
        });

        it('leaves non-finite samples out of the intensity range', () => {
            const volume = new VolumeModel({
                dimensions: [2, 2, 2],
                data: new Float32Array([0, 1, 2, Infinity, -Infinity, NaN, 5, 7]),
                spacing: [1, 1, 1],
            });
            expect(volume.intensityRange()).toEqual({ min: 0, max: 7 });
        });

        it('falls back to a zero range without finite samples', () => {
            const volume = new VolumeModel({
                dimensions: [2, 1, 1],
                data: new Float64Array([NaN, Infinity]),
                spacing: [1, 1, 1],
            });
            expect(volume.intensityRange()).toEqual({ min: 0, max: 0 });
        });

        it('is not affected by later writes to the source buffer', () => {
            const data = new Float32Array([0, 1, 2, 3, 4, 5, 6, 7]);
            const volume = new VolumeModel({ dimensions: [2, 2, 2], data, spacing: [1, 1, 1] });

            data[0] = 1000;

            expect(volume.sample(0, 0, 0)).toBe(0);
            expect(volume.intensityRange()).toEqual({ min: 0, max: 7 });
        });
    });

    describe('voxelToWorld', () => {
        it('defaults to a diagonal affine from spacing', () => {
            const volume = createCodedVolume([4, 5, 6], [1, 2, 3]);
            expect(volume.voxelToWorld({ i: 1, j: 1, k: 1 })).toEqual([1, 2, 3]);
        });

        it('applies a row-major affine with translation', () => {
            const volume = new VolumeModel({
                dimensions: [1, 1, 1],
                data: new Float32Array(1),
                spacing: [1, 1, 1],
                affine: [
                    [-1, 0, 0, 90],
                    [0, 1, 0, -126],
                    [0, 0, 1, -72],
                    [0, 0, 0, 1],
                ],
            });
            expect(volume.voxelToWorld({ i: 10, j: 20, k: 30 })).toEqual([80, -106, -42]);
        });

        it('rejects malformed affines', () => {
            expect(() => affineFromRows([[1, 0, 0]])).toThrow(InvalidVolumeError);
        });
    });

    describe('sampleValues', () => {
        it('takes evenly strided samples', () => {
            const volume = createCodedVolume([10, 10, 10]);
            expect(volume.sampleValues(4)).toEqual([0, 20500, 50000, 70500]);
        });

        it('caps the sample count at the voxel count', () => {
            const volume = createCodedVolume([2, 1, 1]);
            expect(volume.sampleValues(100)).toEqual([0, 1]);
        });
    });
});
