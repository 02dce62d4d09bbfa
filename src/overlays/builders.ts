import { asCanvas, asWorld, type WorldCoord } from '@/coords';
import type { Grid } from '@/geometry';
import { CombineCancelledError } from '@/services/errors';
import type { CombinerStyle } from '@/types';

import type { GridLineOverlay, GridOverlays, LabelOverlay, LabelStyle } from './types';

export interface GridOverlayParams {
    /** Grid in world blocks whose steps are the intersections to mark. */
    worldGrid: Grid;
    /** Same extent as `worldGrid`, in canvas pixels. */
    canvasGrid: Grid;
    style: CombinerStyle;
    /** `false` leaves out labels while still producing lines. */
    includeLabels?: boolean;
    signal?: AbortSignal;
    /**
     * Called after each labelled intersection with the number done and the
     * total. Without labels it is called once, with both equal.
     */
    onPoint?: (done: number, total: number) => void;
}

const PLACEHOLDER_REGEX = /\{(x|y)\}/g;

/** Substitutes `{x}` and `{y}` in `format`; other text passes through unchanged. */
export const formatCoordinateLabel = (format: string, coord: { x: number; y: number }): string =>
    format.replace(PLACEHOLDER_REGEX, (_match, axis: string) => String(axis === 'x' ? coord.x : coord.y));

const labelStyleFrom = (style: CombinerStyle): LabelStyle => ({
    color: style.gridTextColor,
    strokeColor: style.gridTextStrokeColor,
    strokeWidth: style.gridTextStrokeWidth,
    font: style.gridTextFont,
    size: style.gridTextSize,
});

const distinctSorted = (values: readonly number[]): number[] => [...new Set(values)].sort((a, b) => a - b);

const abortedError = () => new CombineCancelledError('Combine aborted while building the grid overlay');

/**
 * Projects the world grid onto the canvas. Lines come out once per distinct
 * projected column and row; labels once per intersection.
 */
export const buildGridOverlays = ({
    worldGrid,
    canvasGrid,
    style,
    includeLabels = true,
    signal,
    onPoint,
}: GridOverlayParams): GridOverlays => {
    if (signal?.aborted) {
        throw abortedError();
    }
    const total = worldGrid.stepsCount;
    const lines: GridLineOverlay[] = [];
    if (style.gridLineWidth > 0 && !style.gridLineColor.isTransparent) {
        const { x1, y1 } = worldGrid.rect;
        const line = (orientation: GridLineOverlay['orientation'], position: number): GridLineOverlay => ({
            type: 'line',
            orientation,
            position,
            width: style.gridLineWidth,
            color: style.gridLineColor,
        });
        const columns = worldGrid.stepsX.map((x) => worldGrid.project([x, y1], canvasGrid).x);
        const rows = worldGrid.stepsY.map((y) => worldGrid.project([x1, y], canvasGrid).y);
        lines.push(...distinctSorted(columns).map((x) => line('vertical', x)));
        lines.push(...distinctSorted(rows).map((y) => line('horizontal', y)));
    }

    const labels: LabelOverlay[] = [];
    if (!includeLabels || style.gridCoordsFormat === '') {
        onPoint?.(total, total);
        return { lines, labels };
    }
    const labelStyle = labelStyleFrom(style);
    let done = 0;
    for (const point of worldGrid.iterSteps()) {
        if (signal?.aborted) {
            throw abortedError();
        }
        const pixel = worldGrid.project(point, canvasGrid);
        const world: WorldCoord = asWorld(point.x, point.y);
        labels.push({
            type: 'label',
            position: asCanvas(pixel.x, pixel.y),
            world,
            text: formatCoordinateLabel(style.gridCoordsFormat, world),
            style: labelStyle,
        });
        done += 1;
        onPoint?.(done, total);
    }
    return { lines, labels };
};
