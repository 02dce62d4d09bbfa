export type RgbaTuple = [number, number, number, number];

export const CHANNEL_MAX = 255;

const HEXCODE_REGEX = /^(?:[0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i;

export const NAMED_COLORS = {
    clear: '00000000',
    transparent: '00000000',
    white: 'ffffffff',
    black: '000000ff',
    red: 'ff0000ff',
    green: '00ff00ff',
    blue: '0000ffff',
    yellow: 'ffff00ff',
    magenta: 'ff00ffff',
    cyan: '00ffffff',
    gray: '808080ff',
} as const satisfies Record<string, string>;

export type ColorName = keyof typeof NAMED_COLORS;

const isColorName = (value: string): value is ColorName => Object.hasOwn(NAMED_COLORS, value);

const assertChannel = (name: string, value: number): number => {
    if (!Number.isInteger(value) || value < 0 || value > CHANNEL_MAX) {
        throw new RangeError(`Color channel ${name} must be an integer between 0 and ${CHANNEL_MAX}: ${value}`);
    }
    return value;
};

const toHexByte = (value: number): string => value.toString(16).padStart(2, '0');

/**
 * 8-bit-per-channel RGBA color. Values are always stored as full RGBA; a
 * missing alpha means opaque.
 */
export class Color {
    readonly red: number;
    readonly green: number;
    readonly blue: number;
    readonly alpha: number;

    constructor(red: number, green: number, blue: number, alpha: number = CHANNEL_MAX) {
        this.red = assertChannel('red', red);
        this.green = assertChannel('green', green);
        this.blue = assertChannel('blue', blue);
        this.alpha = assertChannel('alpha', alpha);
    }

    /**
     * Normalizes a 3, 6 or 8 digit hexcode (with or without `#`) to 8 lowercase
     * digits, or returns `null` if the string is not a hexcode.
     */
    static ensureHexFormat(hexcode: string): string | null {
        let digits = hexcode.trim().replace(/^#/, '').toLowerCase();
        if (!HEXCODE_REGEX.test(digits)) {
            return null;
        }
        if (digits.length === 3) {
            digits = [...digits].map((ch) => ch + ch).join('');
        }
        if (digits.length === 6) {
            digits += 'ff';
        }
        return digits;
    }

    static fromHex(hexcode: string): Color {
        const digits = Color.ensureHexFormat(hexcode);
        if (!digits) {
            throw new RangeError(`Invalid hexcode "${hexcode}"; must be 3, 6, or 8 hex digits`);
        }
        const channel = (index: number) => Number.parseInt(digits.slice(index * 2, index * 2 + 2), 16);
        return new Color(channel(0), channel(1), channel(2), channel(3));
    }

    /** A color from {@link NAMED_COLORS}; `alpha` overrides the table's alpha. */
    static fromName(name: string, alpha?: number): Color {
        const key = name.trim().toLowerCase();
        if (!isColorName(key)) {
            throw new RangeError(`Unknown color name "${name}"`);
        }
        const base = Color.fromHex(NAMED_COLORS[key]);
        return alpha === undefined ? base : base.withAlpha(alpha);
    }

    /** Hexcode first, then color name. */
    static parse(value: string): Color {
        return Color.ensureHexFormat(value) ? Color.fromHex(value) : Color.fromName(value);
    }

    static fromRgba(channels: readonly number[]): Color {
        if (channels.length !== 3 && channels.length !== 4) {
            throw new RangeError(`Expected 3 or 4 color channels, got ${channels.length}`);
        }
        const [red = 0, green = 0, blue = 0, alpha = CHANNEL_MAX] = channels;
        return new Color(red, green, blue, alpha);
    }

    get isTransparent(): boolean {
        return this.alpha === 0;
    }

    withAlpha(alpha: number): Color {
        return new Color(this.red, this.green, this.blue, alpha);
    }

    toRgba(): RgbaTuple {
        return [this.red, this.green, this.blue, this.alpha];
    }

    /** 8 lowercase hex digits, without `#`. */
    toHex(): string {
        return this.toRgba().map(toHexByte).join('');
    }

    /** `rgba(...)` form for SVG and CSS consumers. */
    toCss(): string {
        const alpha = Number((this.alpha / CHANNEL_MAX).toFixed(4));
        return `rgba(${this.red}, ${this.green}, ${this.blue}, ${alpha})`;
    }

    equals(other: Color): boolean {
        return (
            this.red === other.red &&
            this.green === other.green &&
            this.blue === other.blue &&
            this.alpha === other.alpha
        );
    }

    toString(): string {
        return `#${this.toHex()}`;
    }
}
