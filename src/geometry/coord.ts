import { floorDiv, type RoundFn } from '@/utils/math';

import type { Rect } from './rect';

export type CoordTuple = readonly [number, number];
export type Coord2iOperand = number | Coord2i | CoordTuple;
export type Coord2fOperand = number | Coord2f | Coord2i | CoordTuple;

type BinaryOp = (a: number, b: number) => number;

const add: BinaryOp = (a, b) => a + b;
const sub: BinaryOp = (a, b) => a - b;
const mul: BinaryOp = (a, b) => a * b;
const pow: BinaryOp = (a, b) => a ** b;
const div: BinaryOp = (a, b) => a / b;
const flooredDiv: BinaryOp = (a, b) => Math.floor(a / b);

const operandPair = (other: Coord2iOperand | Coord2fOperand): CoordTuple => {
    if (typeof other === 'number') {
        return [other, other];
    }
    if (other instanceof Coord2i || other instanceof Coord2f) {
        return [other.x, other.y];
    }
    return other;
};

// -0 would survive floor division of negative values; keep keys and equality stable
const normalizeZero = (value: number): number => (value === 0 ? 0 : value);

const assertWhole = (axis: 'x' | 'y', value: number): number => {
    if (!Number.isInteger(value)) {
        throw new RangeError(`Coord2i.${axis} must be a whole number: ${value}`);
    }
    return normalizeZero(value);
};

/**
 * Immutable integer 2D point. Construction rejects non-whole values; convert
 * floats explicitly through {@link Coord2f.toInt}.
 */
export class Coord2i {
    readonly x: number;
    readonly y: number;

    constructor(x: number, y: number) {
        this.x = assertWhole('x', x);
        this.y = assertWhole('y', y);
    }

    static from(value: Coord2i | CoordTuple): Coord2i {
        if (value instanceof Coord2i) {
            return value;
        }
        return new Coord2i(value[0], value[1]);
    }

    add(other: Coord2iOperand): Coord2i {
        return this.apply(add, other);
    }

    sub(other: Coord2iOperand): Coord2i {
        return this.apply(sub, other);
    }

    mul(other: Coord2iOperand): Coord2i {
        return this.apply(mul, other);
    }

    floorDiv(other: Coord2iOperand): Coord2i {
        const [ox, oy] = operandPair(other);
        return new Coord2i(floorDiv(this.x, ox), floorDiv(this.y, oy));
    }

    pow(other: Coord2iOperand): Coord2i {
        return this.apply(pow, other);
    }

    map(fn: (value: number) => number): Coord2i {
        return new Coord2i(fn(this.x), fn(this.y));
    }

    equals(other: Coord2i | CoordTuple): boolean {
        const [ox, oy] = operandPair(other);
        return this.x === ox && this.y === oy;
    }

    /** Inclusive of the rect's far edges. */
    inBounds(rect: Rect): boolean {
        return this.x >= rect.x1 && this.x <= rect.x2 && this.y >= rect.y1 && this.y <= rect.y2;
    }

    /** Stable string form for use as a `Map` key. */
    key(): string {
        return `${this.x},${this.y}`;
    }

    asTuple(): [number, number] {
        return [this.x, this.y];
    }

    toString(): string {
        return `(${this.x}, ${this.y})`;
    }

    private apply(op: BinaryOp, other: Coord2iOperand): Coord2i {
        const [ox, oy] = operandPair(other);
        return new Coord2i(op(this.x, ox), op(this.y, oy));
    }
}

/** Floating-point point used for ratio math between grids. */
export class Coord2f {
    readonly x: number;
    readonly y: number;

    constructor(x: number, y: number) {
        this.x = x;
        this.y = y;
    }

    static from(value: Coord2f | Coord2i | CoordTuple): Coord2f {
        const [x, y] = operandPair(value);
        return new Coord2f(x, y);
    }

    add(other: Coord2fOperand): Coord2f {
        return this.apply(add, other);
    }

    sub(other: Coord2fOperand): Coord2f {
        return this.apply(sub, other);
    }

    mul(other: Coord2fOperand): Coord2f {
        return this.apply(mul, other);
    }

    div(other: Coord2fOperand): Coord2f {
        return this.apply(div, other);
    }

    floorDiv(other: Coord2fOperand): Coord2f {
        return this.apply(flooredDiv, other);
    }

    pow(other: Coord2fOperand): Coord2f {
        return this.apply(pow, other);
    }

    map(fn: (value: number) => number): Coord2f {
        return new Coord2f(fn(this.x), fn(this.y));
    }

    equals(other: Coord2fOperand): boolean {
        const [ox, oy] = operandPair(other);
        return this.x === ox && this.y === oy;
    }

    /** Round both components with `roundFn` (truncation by default). */
    toInt(roundFn: RoundFn = Math.trunc): Coord2i {
        return new Coord2i(roundFn(this.x), roundFn(this.y));
    }

    asTuple(): [number, number] {
        return [this.x, this.y];
    }

    toString(): string {
        return `(${this.x}, ${this.y})`;
    }

    private apply(op: BinaryOp, other: Coord2fOperand): Coord2f {
        const [ox, oy] = operandPair(other);
        return new Coord2f(op(this.x, ox), op(this.y, oy));
    }
}
