/**
 * Stack Scrub Utilities
 * Helpers for drag-to-scroll and keyboard slice stepping
 */

/**
 * Calculate slice delta from pixel movement
 * @param startY - Starting Y position (pixels)
 * @param currentY - Current Y position (pixels)
 * @param shiftHeld - Whether Shift key is held for speed boost
 * @returns Slice delta (positive = forward, negative = backward)
 */
export function calculateScrubDelta(
    startY: number,
    currentY: number,
    shiftHeld: boolean,
    pixelsPerSlice: number,
    shiftMultiplier: number
): number {
    const pixelDelta = startY - currentY; // Up = positive (forward)
    const rawDelta = Math.round(pixelDelta / pixelsPerSlice);
    return shiftHeld ? rawDelta * shiftMultiplier : rawDelta;
}

/**
 * Calculate new slice index from a scrub gesture, clamped to [0, sliceCount - 1]
 */
export function calculateScrubSliceIndex(
    startSlice: number,
    startY: number,
    currentY: number,
    sliceCount: number,
    shiftHeld: boolean,
    pixelsPerSlice: number,
    shiftMultiplier: number
): number {
    const delta = calculateScrubDelta(startY, currentY, shiftHeld, pixelsPerSlice, shiftMultiplier);
    return clampSlice(startSlice + delta, sliceCount);
}

export function clampSlice(index: number, sliceCount: number): number {
    if (sliceCount <= 0) return 0;
    return Math.max(0, Math.min(sliceCount - 1, index));
}
