import { readFile } from 'node:fs/promises';

import { DEFAULT_COMBINER_STYLE } from '@/constants/style';
import type { CombinerStyle } from '@/types';
import { Color } from '@/utils/color';

import { ConfigurationError } from './errors';

type ColorKey = 'background' | 'gridLineColor' | 'gridTextColor' | 'gridTextStrokeColor';
type NumberKey = 'gridLineWidth' | 'gridTextStrokeWidth' | 'gridTextSize';
type StringKey = 'gridTextFont' | 'gridCoordsFormat';

const COLOR_KEYS: readonly ColorKey[] = ['background', 'gridLineColor', 'gridTextColor', 'gridTextStrokeColor'];
const NUMBER_KEYS: readonly NumberKey[] = ['gridLineWidth', 'gridTextStrokeWidth', 'gridTextSize'];
const STRING_KEYS: readonly StringKey[] = ['gridTextFont', 'gridCoordsFormat'];

export type SerializedColor = string;

export type SerializedCombinerStyle = Record<ColorKey, SerializedColor> &
    Record<NumberKey, number> &
    Record<StringKey, string>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const isNonNegativeInt = (value: unknown): value is number =>
    typeof value === 'number' && Number.isInteger(value) && value >= 0;

const isNumberArray = (value: unknown): value is number[] =>
    Array.isArray(value) && value.every((item) => typeof item === 'number');

/** Hexcode, color name or `[r, g, b, a?]`; `null` when the value is none of them. */
export const parseColorValue = (value: unknown): Color | null => {
    try {
        if (typeof value === 'string') {
            return Color.parse(value);
        }
        if (isNumberArray(value)) {
            return Color.fromRgba(value);
        }
    } catch (error) {
        if (error instanceof RangeError) {
            return null;
        }
        throw error;
    }
    return null;
};

/**
 * Validates a JSON style payload. Missing keys take their default and unknown
 * keys are ignored; every invalid field is listed in the thrown error.
 */
export const parseCombinerStyle = (payload: unknown): CombinerStyle => {
    if (!isRecord(payload)) {
        throw new ConfigurationError('invalid-style', 'Style configuration must be a JSON object');
    }
    const style: CombinerStyle = { ...DEFAULT_COMBINER_STYLE };
    const problems: string[] = [];

    for (const key of COLOR_KEYS) {
        const raw = payload[key];
        if (raw === undefined) {
            continue;
        }
        const color = parseColorValue(raw);
        if (color) {
            style[key] = color;
        } else {
            problems.push(`${key}: expected a hexcode, color name or [r, g, b, a?] array`);
        }
    }
    for (const key of NUMBER_KEYS) {
        const raw = payload[key];
        if (raw === undefined) {
            continue;
        }
        if (isNonNegativeInt(raw)) {
            style[key] = raw;
        } else {
            problems.push(`${key}: expected a non-negative integer`);
        }
    }
    for (const key of STRING_KEYS) {
        const raw = payload[key];
        if (raw === undefined) {
            continue;
        }
        if (typeof raw === 'string') {
            style[key] = raw;
        } else {
            problems.push(`${key}: expected a string`);
        }
    }

    if (problems.length > 0) {
        throw new ConfigurationError('invalid-style', `Invalid style configuration:\n  ${problems.join('\n  ')}`);
    }
    return style;
};

export const serializeCombinerStyle = (style: CombinerStyle): SerializedCombinerStyle => ({
    background: style.background.toString(),
    gridLineColor: style.gridLineColor.toString(),
    gridLineWidth: style.gridLineWidth,
    gridTextColor: style.gridTextColor.toString(),
    gridTextStrokeColor: style.gridTextStrokeColor.toString(),
    gridTextStrokeWidth: style.gridTextStrokeWidth,
    gridTextFont: style.gridTextFont,
    gridTextSize: style.gridTextSize,
    gridCoordsFormat: style.gridCoordsFormat,
});

export const loadCombinerStyle = async (path: string): Promise<CombinerStyle> => {
    const text = await readFile(path, 'utf8');
    let payload: unknown;
    try {
        payload = JSON.parse(text);
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError('invalid-style', `Style file ${path} is not valid JSON: ${detail}`);
    }
    return parseCombinerStyle(payload);
};
