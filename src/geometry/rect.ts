import { floorDiv } from '@/utils/math';

import { Coord2f, Coord2i, type Coord2iOperand, type CoordTuple } from './coord';

export type RectTuple = readonly [number, number, number, number];

export interface ResizeOptions {
    /** Split the size change evenly between both sides instead of moving only the far corner. */
    fromCenter?: boolean;
}

const toCoord = (xy: Coord2iOperand): Coord2i =>
    typeof xy === 'number' ? new Coord2i(xy, xy) : Coord2i.from(xy);

/**
 * Axis-aligned integer rectangle from the top-left `(x1, y1)` to the
 * bottom-right `(x2, y2)`. Ordering of the corners is not enforced, so
 * zero-area rects are legal and callers check {@link Rect.isDegenerate}
 * before using one as a pixel size.
 */
export class Rect {
    readonly x1: number;
    readonly y1: number;
    readonly x2: number;
    readonly y2: number;

    constructor(x1: number, y1: number, x2: number, y2: number) {
        this.x1 = x1;
        this.y1 = y1;
        this.x2 = x2;
        this.y2 = y2;
    }

    static from(value: Rect | RectTuple): Rect {
        if (value instanceof Rect) {
            return value;
        }
        return new Rect(value[0], value[1], value[2], value[3]);
    }

    static fromCorners(topLeft: Coord2i | CoordTuple, bottomRight: Coord2i | CoordTuple): Rect {
        const tl = Coord2i.from(topLeft);
        const br = Coord2i.from(bottomRight);
        return new Rect(tl.x, tl.y, br.x, br.y);
    }

    /** A rect extending `radius` in each direction from `center`. */
    static fromRadius(radius: number | Coord2i | CoordTuple, center: Coord2i | CoordTuple = [0, 0]): Rect {
        const r = toCoord(radius);
        if (r.x <= 0 || r.y <= 0) {
            throw new RangeError(`Rect radius must be greater than zero in both directions: ${r.toString()}`);
        }
        const c = Coord2i.from(center);
        return new Rect(c.x - r.x, c.y - r.y, c.x + r.x, c.y + r.y);
    }

    /**
     * A `width` x `height` rect, centered on `center` when given (odd sizes put
     * the extra unit on the far side), otherwise anchored at `(0, 0)`.
     */
    static fromSize(width: number, height: number, center?: Coord2i | CoordTuple): Rect {
        if (!center) {
            return new Rect(0, 0, width, height);
        }
        const c = Coord2i.from(center);
        const halfW = floorDiv(width, 2);
        const halfH = floorDiv(height, 2);
        return new Rect(c.x - halfW, c.y - halfH, c.x + halfW + (width % 2), c.y + halfH + (height % 2));
    }

    get width(): number {
        return this.x2 - this.x1;
    }

    get height(): number {
        return this.y2 - this.y1;
    }

    get size(): [number, number] {
        return [this.width, this.height];
    }

    get center(): Coord2i {
        return new Coord2i(this.x1 + floorDiv(this.width, 2), this.y1 + floorDiv(this.height, 2));
    }

    get topLeft(): Coord2i {
        return new Coord2i(this.x1, this.y1);
    }

    get bottomRight(): Coord2i {
        return new Coord2i(this.x2, this.y2);
    }

    /** (top-left, top-right, bottom-left, bottom-right) */
    get corners(): [Coord2i, Coord2i, Coord2i, Coord2i] {
        return [
            new Coord2i(this.x1, this.y1),
            new Coord2i(this.x2, this.y1),
            new Coord2i(this.x1, this.y2),
            new Coord2i(this.x2, this.y2),
        ];
    }

    get isDegenerate(): boolean {
        return this.width === 0 || this.height === 0;
    }

    asTuple(): [number, number, number, number] {
        return [this.x1, this.y1, this.x2, this.y2];
    }

    copy(): Rect {
        return new Rect(this.x1, this.y1, this.x2, this.y2);
    }

    equals(other: Rect | RectTuple): boolean {
        const o = Rect.from(other);
        return this.x1 === o.x1 && this.y1 === o.y1 && this.x2 === o.x2 && this.y2 === o.y2;
    }

    /** Inclusive of the far edges. */
    inBounds(coord: Coord2i | Coord2f | CoordTuple): boolean {
        const point = coord instanceof Coord2i || coord instanceof Coord2f ? coord : Coord2f.from(coord);
        return point.x >= this.x1 && point.x <= this.x2 && point.y >= this.y1 && point.y <= this.y2;
    }

    /**
     * Applies `fn` to each of the four scalar fields. This is not the same as
     * mapping the size: floor division of negative corners does not commute
     * with dividing width and height.
     */
    map(fn: (value: number) => number): Rect {
        return new Rect(fn(this.x1), fn(this.y1), fn(this.x2), fn(this.y2));
    }

    resize(xy: Coord2iOperand = 0, options: ResizeOptions = {}): Rect {
        const delta = toCoord(xy);
        if (options.fromCenter) {
            const half = delta.floorDiv(2);
            return new Rect(this.x1 - half.x, this.y1 - half.y, this.x2 + half.x, this.y2 + half.y);
        }
        return new Rect(this.x1, this.y1, this.x2 + delta.x, this.y2 + delta.y);
    }

    translateBy(xy: Coord2iOperand = 0): Rect {
        const delta = toCoord(xy);
        return new Rect(this.x1 + delta.x, this.y1 + delta.y, this.x2 + delta.x, this.y2 + delta.y);
    }

    /** Shift so the top-left corner lands on `xy`. */
    translateTo(xy: Coord2i | CoordTuple): Rect {
        return this.translateBy(Coord2i.from(xy).sub(this.topLeft));
    }

    /** Overlap of two rects, or `null` when they do not share any area. */
    intersect(other: Rect): Rect | null {
        const x1 = Math.max(this.x1, other.x1);
        const y1 = Math.max(this.y1, other.y1);
        const x2 = Math.min(this.x2, other.x2);
        const y2 = Math.min(this.y2, other.y2);
        if (x2 <= x1 || y2 <= y1) {
            return null;
        }
        return new Rect(x1, y1, x2, y2);
    }

    toString(): string {
        return `Rect(${this.x1}, ${this.y1}, ${this.x2}, ${this.y2})`;
    }
}
