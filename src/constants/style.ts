import type { CombinerStyle } from '@/types';
import { Color } from '@/utils/color';

export const DEFAULT_COORDS_FORMAT = '({x}, {y})';

export const DEFAULT_COMBINER_STYLE: CombinerStyle = {
    background: Color.fromName('clear'),
    gridLineColor: Color.fromName('black'),
    gridLineWidth: 1,
    gridTextColor: Color.fromName('black'),
    gridTextStrokeColor: Color.fromName('clear'),
    gridTextStrokeWidth: 0,
    gridTextFont: 'sans-serif',
    gridTextSize: 12,
    gridCoordsFormat: DEFAULT_COORDS_FORMAT,
};

/** Fills every field `overrides` leaves unset (or `undefined`) from the defaults. */
export const resolveCombinerStyle = (overrides: Partial<CombinerStyle> = {}): CombinerStyle => {
    const pick = <K extends keyof CombinerStyle>(key: K): CombinerStyle[K] =>
        overrides[key] ?? DEFAULT_COMBINER_STYLE[key];
    return {
        background: pick('background'),
        gridLineColor: pick('gridLineColor'),
        gridLineWidth: pick('gridLineWidth'),
        gridTextColor: pick('gridTextColor'),
        gridTextStrokeColor: pick('gridTextStrokeColor'),
        gridTextStrokeWidth: pick('gridTextStrokeWidth'),
        gridTextFont: pick('gridTextFont'),
        gridTextSize: pick('gridTextSize'),
        gridCoordsFormat: pick('gridCoordsFormat'),
    };
};
