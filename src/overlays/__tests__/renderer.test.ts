/**
 * Tests for the grid overlay renderer and label SVG.
 */
import { describe, expect, it } from 'vitest';

import { asCanvas, asWorld } from '@/coords';
import { Color } from '@/utils/color';
import { createRaster, getPixel } from '@/utils/raster';

import { lineBand, renderGridLines, renderLabels } from '../renderer';
import { buildLabelSvg, escapeXml } from '../svg';
import type { GridLineOverlay, LabelOverlay } from '../types';

const RED = Color.fromName('red');

const line = (
    orientation: GridLineOverlay['orientation'],
    position: number,
    width: number,
): GridLineOverlay => ({ type: 'line', orientation, position, width, color: RED });

const label = (overrides: Partial<LabelOverlay['style']> = {}): LabelOverlay => ({
    type: 'label',
    position: asCanvas(3, 4),
    world: asWorld(0, 0),
    text: 'a<b & "c"',
    style: {
        color: Color.fromName('black'),
        strokeColor: Color.fromName('clear'),
        strokeWidth: 0,
        font: 'sans-serif',
        size: 12,
        ...overrides,
    },
});

describe('lineBand', () => {
    it('centers the band on the position', () => {
        expect(lineBand(2, 3)).toEqual([1, 4]);
        expect(lineBand(0, 2)).toEqual([-1, 1]);
        expect(lineBand(5, 1)).toEqual([5, 6]);
    });
});

describe('renderGridLines', () => {
    it('draws vertical bands across the full height', async () => {
        const raster = await renderGridLines(createRaster(5, 5), [line('vertical', 2, 3)]);

        expect(getPixel(raster, 1, 0)).toEqual([255, 0, 0, 255]);
        expect(getPixel(raster, 3, 4)).toEqual([255, 0, 0, 255]);
        expect(getPixel(raster, 0, 2)).toEqual([0, 0, 0, 0]);
        expect(getPixel(raster, 4, 2)).toEqual([0, 0, 0, 0]);
    });

    it('clips horizontal lines at the raster edge', async () => {
        const raster = await renderGridLines(createRaster(3, 3), [line('horizontal', 0, 2)]);

        expect(getPixel(raster, 2, 0)).toEqual([255, 0, 0, 255]);
        expect(getPixel(raster, 2, 1)).toEqual([0, 0, 0, 0]);
    });

    it('draws nothing for a zero-width line', async () => {
        const raster = createRaster(3, 3);

        await expect(renderGridLines(raster, [line('vertical', 1, 0)])).resolves.toBe(raster);
    });
});

describe('label SVG', () => {
    it('escapes markup characters', () => {
        expect(escapeXml(`<'&">`)).toBe('&lt;&apos;&amp;&quot;&gt;');
    });

    it('builds one text element per label', () => {
        expect(buildLabelSvg(10, 20, [label()])).toBe(
            '<svg xmlns="http://www.w3.org/2000/svg" width="10" height="20">' +
                '<text x="3" y="4" font-family="sans-serif" font-size="12" fill="rgba(0, 0, 0, 1)" ' +
                'dominant-baseline="hanging">a&lt;b &amp; &quot;c&quot;</text></svg>',
        );
    });

    it('adds a stroke only when it is visible', () => {
        const svg = buildLabelSvg(10, 20, [label({ strokeColor: Color.fromName('white'), strokeWidth: 2 })]);

        expect(svg).toContain(
            'dominant-baseline="hanging" stroke="rgba(255, 255, 255, 1)" stroke-width="2" paint-order="stroke">',
        );
    });

    it('returns the raster untouched when there are no labels', async () => {
        const raster = createRaster(2, 2);

        await expect(renderLabels(raster, [])).resolves.toBe(raster);
    });
});
