import { rangeInclusive, snapNum, type RoundFn } from '@/utils/math';

import { Coord2f, Coord2i, type Coord2iOperand, type CoordTuple } from './coord';
import { Rect, type RectTuple, type ResizeOptions } from './rect';

export interface GridOptions {
    /** Interval between stepped coordinates; `0` means the grid has no steps. */
    step?: number;
    /** Point the steps are counted outward from. */
    origin?: Coord2i | CoordTuple;
}

/**
 * How {@link Grid.map} treats the origin: recompute it proportionally
 * (`undefined`), leave it untouched (`'keep'`), or replace it.
 */
export type GridOriginMode = Coord2i | CoordTuple | 'keep' | undefined;

const ORIGIN_ZERO = new Coord2i(0, 0);

/**
 * Offset of `value` within `[start, end]` as a fraction of the span. A
 * zero-length span has every value at offset 0.
 */
const relativeOffset = (value: number, start: number, end: number): number =>
    end === start ? 0 : (value - start) / (end - start);

/** Multiply before dividing so exact ratios stay exact before truncation. */
const scaleSpan = (offset: number, span: number, targetSpan: number): number =>
    span === 0 ? 0 : (offset * targetSpan) / span;

/**
 * Every multiple of `step` relative to `origin` that falls inside
 * `[lower, upper]`, enumerated outward from the origin on both sides so an
 * in-range origin is always part of the result.
 */
const axisSteps = (lower: number, upper: number, step: number, origin: number): number[] => {
    if (step <= 0) {
        return [];
    }
    const first = origin + snapNum(lower - origin, step, Math.ceil);
    const last = origin + snapNum(upper - origin, step, Math.floor);
    if (first > last) {
        return [];
    }
    const below = rangeInclusive(first, Math.min(origin, last), step);
    const above = rangeInclusive(Math.max(origin, first), last, step);
    // the origin (or the first in-range point) is produced by both halves when they meet
    if (below.length > 0 && above.length > 0 && below[below.length - 1] === above[0]) {
        above.shift();
    }
    return [...below, ...above];
};

/**
 * A {@link Rect} with a step interval and an origin. The stepped coordinates
 * serve both as tile positions (step = tile size) and as overlay
 * intersections (step = block interval).
 */
export class Grid {
    readonly rect: Rect;
    readonly step: number;
    readonly origin: Coord2i;

    constructor(rect: Rect | RectTuple, options: GridOptions = {}) {
        const step = options.step ?? 0;
        if (!Number.isInteger(step) || step < 0) {
            throw new RangeError(`Grid step must be a non-negative integer: ${step}`);
        }
        this.rect = Rect.from(rect);
        this.step = step;
        this.origin = options.origin ? Coord2i.from(options.origin) : ORIGIN_ZERO;
    }

    /** A grid bounding every coordinate in `coords`. */
    static fromSteps(coords: Iterable<Coord2i | CoordTuple>, step = 0): Grid {
        let bounds: [number, number, number, number] | null = null;
        for (const value of coords) {
            const coord = Coord2i.from(value);
            if (!bounds) {
                bounds = [coord.x, coord.y, coord.x, coord.y];
                continue;
            }
            bounds = [
                Math.min(bounds[0], coord.x),
                Math.min(bounds[1], coord.y),
                Math.max(bounds[2], coord.x),
                Math.max(bounds[3], coord.y),
            ];
        }
        if (!bounds) {
            throw new RangeError('Cannot create a Grid from an empty sequence of steps');
        }
        return new Grid(bounds, { step });
    }

    get stepsX(): number[] {
        return axisSteps(this.rect.x1, this.rect.x2, this.step, this.origin.x);
    }

    get stepsY(): number[] {
        return axisSteps(this.rect.y1, this.rect.y2, this.step, this.origin.y);
    }

    get stepsCount(): number {
        return this.stepsX.length * this.stepsY.length;
    }

    /** Cartesian product of the stepped coordinates, all `y` for each `x`. */
    *iterSteps(): Generator<Coord2i> {
        const ys = this.stepsY;
        for (const x of this.stepsX) {
            for (const y of ys) {
                yield new Coord2i(x, y);
            }
        }
    }

    copy(overrides: { step?: number; origin?: Coord2i | CoordTuple } = {}): Grid {
        return new Grid(this.rect, {
            step: overrides.step ?? this.step,
            origin: overrides.origin ?? this.origin,
        });
    }

    /**
     * Applies `fn` to the rect's scalar fields. By default the origin keeps
     * its relative position inside the rect, which is what converting a
     * tile-index grid into a pixel grid needs.
     */
    map(fn: (value: number) => number, origin?: GridOriginMode): Grid {
        const rect = this.rect.map(fn);
        let nextOrigin: Coord2i;
        if (origin === 'keep') {
            nextOrigin = this.origin;
        } else if (origin) {
            nextOrigin = Coord2i.from(origin);
        } else {
            const factorX = relativeOffset(this.origin.x, this.rect.x1, this.rect.x2);
            const factorY = relativeOffset(this.origin.y, this.rect.y1, this.rect.y2);
            nextOrigin = new Coord2i(
                Math.round(rect.width * factorX + rect.x1),
                Math.round(rect.height * factorY + rect.y1),
            );
        }
        return new Grid(rect, { step: this.step, origin: nextOrigin });
    }

    resize(xy: Coord2iOperand = 0, options: ResizeOptions = {}): Grid {
        return new Grid(this.rect.resize(xy, options), { step: this.step, origin: this.origin });
    }

    translateBy(xy: Coord2iOperand = 0): Grid {
        return new Grid(this.rect.translateBy(xy), { step: this.step, origin: this.origin.add(xy) });
    }

    translateTo(xy: Coord2i | CoordTuple): Grid {
        return this.translateBy(Coord2i.from(xy).sub(this.rect.topLeft));
    }

    /** Nearest step multiple for each component of `coord`. */
    snapCoord(coord: Coord2i | CoordTuple, roundFn: RoundFn = Math.round): Coord2i {
        if (this.step === 0) {
            return Coord2i.from(coord);
        }
        return Coord2i.from(coord).map((value) => snapNum(value, this.step, roundFn));
    }

    /**
     * The point on `other` at the same relative position within its rect as
     * `coord` has within this grid's rect, truncated to integers.
     */
    project(coord: Coord2i | CoordTuple, other: Grid): Coord2i {
        const point = Coord2i.from(coord);
        const source = this.rect;
        const target = other.rect;
        return new Coord2f(
            scaleSpan(point.x - source.x1, source.width, target.width),
            scaleSpan(point.y - source.y1, source.height, target.height),
        )
            .add(target.topLeft)
            .toInt();
    }

    toString(): string {
        return `Grid(${this.rect.toString()}, step=${this.step}, origin=${this.origin.toString()})`;
    }
}
