/**
 * Grid overlay for combined maps: descriptors, builders and a raster renderer.
 */

// Types
export type {
    GridLineOverlay,
    GridOverlays,
    LabelOverlay,
    LabelStyle,
    LineOrientation,
    Overlay,
} from './types';

// Builders
export { buildGridOverlays, formatCoordinateLabel } from './builders';

export type { GridOverlayParams } from './builders';

// Renderer
export { lineBand, renderGridLines, renderLabels } from './renderer';

export { buildLabelSvg, escapeXml } from './svg';
