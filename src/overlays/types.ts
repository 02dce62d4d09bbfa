/**
 * Declarative overlay descriptors for the grid drawn over a combined map.
 *
 * Positions are canvas pixels of the uncropped map image; the renderer draws
 * them without further projection.
 */
import type { CanvasCoord, WorldCoord } from '@/coords';
import type { Color } from '@/utils/color';

export type LineOrientation = 'vertical' | 'horizontal';

/** A full-length line across the canvas at one column or row. */
export interface GridLineOverlay {
    type: 'line';
    orientation: LineOrientation;
    /** Canvas column (vertical) or row (horizontal) the line is centered on. */
    position: number;
    /** Pixels; 0 draws nothing. */
    width: number;
    color: Color;
}

export interface LabelStyle {
    color: Color;
    strokeColor: Color;
    strokeWidth: number;
    font: string;
    size: number;
}

/** Coordinate text anchored by its top-left corner at a grid intersection. */
export interface LabelOverlay {
    type: 'label';
    position: CanvasCoord;
    /** World block coordinate the label names. */
    world: WorldCoord;
    text: string;
    style: LabelStyle;
}

export type Overlay = GridLineOverlay | LabelOverlay;

export interface GridOverlays {
    lines: GridLineOverlay[];
    labels: LabelOverlay[];
}
