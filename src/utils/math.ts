export type RoundFn = (value: number) => number;

/** Integer division rounding toward negative infinity. */
export const floorDiv = (a: number, b: number): number => {
    if (b === 0) {
        throw new RangeError('Division by zero');
    }
    return Math.floor(a / b);
};

/**
 * Snap `num` to a multiple of `multiple`, choosing the neighbour with `roundFn`
 * (`Math.floor` for the lower multiple, `Math.ceil` for the upper one).
 */
export const snapNum = (num: number, multiple: number, roundFn: RoundFn = Math.round): number => {
    if (multiple === 0) {
        throw new RangeError('Cannot snap to a multiple of zero');
    }
    return multiple * roundFn(num / multiple);
};

/** Inclusive arithmetic sequence from `start` to `end` by `step` (step > 0). */
export const rangeInclusive = (start: number, end: number, step: number): number[] => {
    const values: number[] = [];
    for (let value = start; value <= end; value += step) {
        values.push(value);
    }
    return values;
};
