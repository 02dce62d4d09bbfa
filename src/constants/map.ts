/** Pixel width and height of a tile image. Zoom changes the blocks a tile covers, not its pixel size. */
export const TILE_SIZE_PX = 512;

/** In-world blocks per pixel for each zoom level (0 = coarsest, 3 = finest). */
export const ZOOM_BLOCKS_PER_PIXEL = {
    0: 8,
    1: 4,
    2: 2,
    3: 1,
} as const;

export type ZoomLevel = keyof typeof ZOOM_BLOCKS_PER_PIXEL;

export const ZOOM_LEVELS: readonly ZoomLevel[] = [0, 1, 2, 3];

export const isZoomLevel = (value: unknown): value is ZoomLevel =>
    typeof value === 'number' && ZOOM_LEVELS.some((level) => level === value);

/** Tile file stems are `{col}_{row}` with signed integer indices. */
export const TILE_NAME_REGEX = /^(-?\d+)_(-?\d+)$/;

// either canvas side above this logs a warning and asks for confirmation
export const LARGE_IMAGE_WARN_PX = 20_000;

export const OVERLAY_PROGRESS_THRESHOLD = 5_000;
export const OVERLAY_CONFIRM_THRESHOLD = 50_000;

export const DEFAULT_PROGRESS_INTERVAL_MS = 1_000;
export const DEFAULT_TILE_CONCURRENCY = 8;
