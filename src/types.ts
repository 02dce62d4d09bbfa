import type { CanvasCoord } from '@/coords';
import type { ZoomLevel } from '@/constants/map';
import type { Rect } from '@/geometry';
import type { Color } from '@/utils/color';
import type { Raster } from '@/utils/raster';

export interface CombinerStyle {
    /** Composited under the finished map; transparent leaves empty areas clear. */
    background: Color;
    /** Fully transparent disables grid lines. */
    gridLineColor: Color;
    gridLineWidth: number;
    gridTextColor: Color;
    gridTextStrokeColor: Color;
    gridTextStrokeWidth: number;
    /** Font family name handed to the text rasterizer. */
    gridTextFont: string;
    gridTextSize: number;
    /** `{x}` and `{y}` are replaced with world coordinates; empty disables labels. */
    gridCoordsFormat: string;
}

/** Asked before expensive work; `false` declines. */
export type ConfirmFn = (message: string) => boolean | Promise<boolean>;

export type ProgressPhase = 'tiles' | 'overlay';

export interface ProgressEvent {
    phase: ProgressPhase;
    /** 0 to 1 */
    fraction: number;
    message?: string;
}

export type ProgressReporter = (event: ProgressEvent) => void;

/** Fixed `[width, height]` centered on the image, or trim to visible content. */
export type CropOption = readonly [number, number] | 'auto';

export interface CombineOptions {
    /** Directory name under the tiles root, or an absolute path. */
    world: string;
    zoom: ZoomLevel;
    /** Area in world block coordinates to restrict the map to. */
    area?: Rect | null;
    crop?: CropOption | null;
    /** Tile file extension without the dot; `'*'` accepts any. */
    tileExt?: string;
    signal?: AbortSignal;
}

/** Keyed by {@link Coord2i.key} of the tile index. */
export type TileMap = Map<string, TileFile>;

export interface TileFile {
    col: number;
    row: number;
    path: string;
}

/** The stitched map plus what is needed to relate its pixels to world blocks. */
export interface MapImage extends Raster {
    /** Pixel at which world block (0, 0) lies; may be outside the image. */
    worldOrigin: CanvasCoord;
    blocksPerPixel: number;
    tileSize: number;
}
