/**
 * Error taxonomy for the slicing engine
 */

import type { Axis, WindowSettings } from './types';

export type MprErrorCode =
    | 'OUT_OF_BOUNDS'
    | 'INVALID_WINDOW'
    | 'VOLUME_UNAVAILABLE'
    | 'INVALID_VOLUME';

export abstract class MprError extends Error {
    abstract readonly code: MprErrorCode;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Index outside the volume extent. Public setters clamp, so this means misuse. */
export class OutOfBoundsError extends MprError {
    readonly code = 'OUT_OF_BOUNDS';

    constructor(
        readonly index: number,
        readonly extent: number,
        readonly where: string
    ) {
        super(`${where}: index ${index} outside [0, ${extent - 1}]`);
    }

    static forSlice(axis: Axis, index: number, extent: number): OutOfBoundsError {
        return new OutOfBoundsError(index, extent, `${axis} slice`);
    }
}

/** Width at or below epsilon, or a non-finite level/width */
export class InvalidWindowError extends MprError {
    readonly code = 'INVALID_WINDOW';

    constructor(
        readonly requested: WindowSettings,
        readonly epsilon: number
    ) {
        super(
            `Invalid window: level=${requested.level}, width=${requested.width} (width must exceed ${epsilon})`
        );
    }
}

/** Engine used before a volume was loaded */
export class VolumeUnavailableError extends MprError {
    readonly code = 'VOLUME_UNAVAILABLE';

    constructor(operation: string) {
        super(`No volume loaded (${operation})`);
    }
}

/** Decoded volume violates extent, spacing or layout requirements */
export class InvalidVolumeError extends MprError {
    readonly code = 'INVALID_VOLUME';
}

export function isMprError(value: unknown): value is MprError {
    return value instanceof MprError;
}
