import { Rect } from '@/geometry';
import { compositeSvg } from '@/services/imageCodec';
import { fillRects, type Raster, type RectFill } from '@/utils/raster';

import { buildLabelSvg } from './svg';
import type { GridLineOverlay, LabelOverlay } from './types';

/** Pixel band covered by a line of `width` centered on `position`. */
export const lineBand = (position: number, width: number): [number, number] => {
    const start = position - Math.floor(width / 2);
    return [start, start + width];
};

/** Draws `lines` over `raster`, blending with what is already there; resolves to a new raster. */
export const renderGridLines = async (raster: Raster, lines: readonly GridLineOverlay[]): Promise<Raster> => {
    const fills: RectFill[] = lines
        .filter((line) => line.width > 0 && !line.color.isTransparent)
        .map((line) => {
            const [start, end] = lineBand(line.position, line.width);
            const rect =
                line.orientation === 'vertical'
                    ? new Rect(start, 0, end, raster.height)
                    : new Rect(0, start, raster.width, end);
            return { rect, color: line.color };
        });
    return fillRects(raster, fills);
};

/** Rasterizes `labels` over `raster`; resolves to a new raster. */
export const renderLabels = async (raster: Raster, labels: readonly LabelOverlay[]): Promise<Raster> => {
    if (labels.length === 0) {
        return raster;
    }
    return compositeSvg(raster, buildLabelSvg(raster.width, raster.height, labels));
};
