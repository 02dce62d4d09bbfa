import { statSync } from 'node:fs';
import { stat } from 'node:fs/promises';
import path from 'node:path';

import {
    DEFAULT_TILE_CONCURRENCY,
    isZoomLevel,
    LARGE_IMAGE_WARN_PX,
    OVERLAY_CONFIRM_THRESHOLD,
    OVERLAY_PROGRESS_THRESHOLD,
    TILE_SIZE_PX,
    ZOOM_BLOCKS_PER_PIXEL,
} from '@/constants/map';
import { resolveCombinerStyle } from '@/constants/style';
import { asCanvas, createTransformer, type CanvasCoord } from '@/coords';
import { Coord2i, Grid, Rect } from '@/geometry';
import { buildGridOverlays, renderGridLines, renderLabels } from '@/overlays';
import type {
    CombineOptions,
    CombinerStyle,
    ConfirmFn,
    CropOption,
    MapImage,
    ProgressEvent,
    ProgressReporter,
    TileFile,
    TileMap,
} from '@/types';
import {
    compositeRasters,
    createRaster,
    cropRaster,
    flattenRaster,
    getBoundingBox,
    rasterRect,
    type Raster,
    type RasterLayer,
} from '@/utils/raster';

import { CombineCancelledError, ConfigurationError, InternalError, NoTilesFoundError, throwIfAborted } from './errors';
import { decodeImage } from './imageCodec';
import { createLogger, type Logger } from './logger';
import { ThrottledProgress } from './progress';
import { listWorlds, scanTiles } from './tileScanner';

export interface CombinerOptions {
    /** Interval in blocks for grid lines and coordinate labels; 0 or null disables the overlay. */
    gridStep?: number | null;
    style?: Partial<CombinerStyle>;
    /** Asked before expensive work. Defaults to always continuing. */
    confirm?: ConfirmFn;
    /** Log progress when no `onProgress` reporter is given. */
    showProgress?: boolean;
    onProgress?: ProgressReporter;
    progressIntervalMs?: number;
    tileConcurrency?: number;
    /** Pixel size of one tile image. */
    tileSize?: number;
    logger?: Logger;
}

interface PlacedTile {
    tile: TileFile;
    canvas: Coord2i;
}

const isPositiveInt = (value: number): boolean => Number.isInteger(value) && value > 0;

const alwaysContinue: ConfirmFn = () => true;

/**
 * Stitches the tile images of one world and zoom level into a single map
 * image, with an optional block grid overlay.
 */
export class Combiner {
    readonly tilesDir: string;
    readonly gridStep: number;
    readonly style: CombinerStyle;
    readonly tileSize: number;
    private readonly confirm: ConfirmFn;
    private readonly tileConcurrency: number;
    private readonly logger: Logger;
    private readonly reporter: ProgressReporter | null;
    private readonly progressIntervalMs: number | undefined;

    constructor(tilesDir: string, options: CombinerOptions = {}) {
        if (!isDirectorySync(tilesDir)) {
            throw new ConfigurationError('not-a-directory', `Tiles path is not a directory: ${tilesDir}`);
        }
        const gridStep = options.gridStep ?? 0;
        if (!Number.isInteger(gridStep) || gridStep < 0) {
            throw new ConfigurationError('invalid-grid-step', `Grid step must be a non-negative integer: ${gridStep}`);
        }
        const tileSize = options.tileSize ?? TILE_SIZE_PX;
        if (!isPositiveInt(tileSize)) {
            throw new ConfigurationError('invalid-tile-size', `Tile size must be a positive integer: ${tileSize}`);
        }
        const tileConcurrency = options.tileConcurrency ?? DEFAULT_TILE_CONCURRENCY;
        if (!isPositiveInt(tileConcurrency)) {
            throw new ConfigurationError(
                'invalid-concurrency',
                `Tile concurrency must be a positive integer: ${tileConcurrency}`,
            );
        }

        this.tilesDir = tilesDir;
        this.gridStep = gridStep;
        this.style = resolveCombinerStyle(options.style);
        this.tileSize = tileSize;
        this.confirm = options.confirm ?? alwaysContinue;
        this.tileConcurrency = tileConcurrency;
        this.logger = options.logger ?? createLogger('Combiner');
        this.progressIntervalMs = options.progressIntervalMs;
        this.reporter =
            options.onProgress ??
            (options.showProgress ? (event: ProgressEvent) => this.logProgress(event) : null);
    }

    /** World directories available under the tiles directory. */
    listWorlds(): Promise<string[]> {
        return listWorlds(this.tilesDir);
    }

    async combine(options: CombineOptions): Promise<MapImage> {
        const { world, zoom, area = null, crop = null, tileExt = '*', signal } = options;
        if (!isZoomLevel(zoom)) {
            throw new ConfigurationError('invalid-zoom', `Zoom level must be 0, 1, 2 or 3: ${String(zoom)}`);
        }
        if (area && (area.width <= 0 || area.height <= 0)) {
            throw new ConfigurationError(
                'invalid-area',
                `Area must have a positive width and height: ${area.toString()}`,
            );
        }
        validateCrop(crop);

        const worldDir = path.isAbsolute(world) ? world : path.join(this.tilesDir, world);
        if (!(await isDirectory(worldDir))) {
            throw new ConfigurationError('unknown-world', `World directory does not exist: ${worldDir}`);
        }
        throwIfAborted(signal);

        const blocksPerPixel = ZOOM_BLOCKS_PER_PIXEL[zoom];
        const tileBlocks = this.tileSize * blocksPerPixel;
        const progress = this.reporter ? new ThrottledProgress(this.reporter, this.progressIntervalMs) : null;

        this.logger.info('Finding tiles...', { world: worldDir, zoom });
        const zoomDir = path.join(worldDir, String(zoom));
        const tiles = await scanTiles(zoomDir, tileExt, this.logger);
        if (tiles.size === 0) {
            throw new NoTilesFoundError(zoomDir, tileExt);
        }
        this.logger.info(`Found ${tiles.size} tile images`);

        const tileRect = tileBoundsFor(tiles, area, tileBlocks);
        const tileGrid = new Grid(tileRect, { step: 1 });
        const canvasGrid = tileGrid
            .translateTo([0, 0])
            .map((n) => n * this.tileSize)
            .copy({ step: this.tileSize });
        const worldGrid = new Grid(
            tileRect.map((n) => n * tileBlocks),
            { step: this.gridStep },
        );

        const { width, height } = canvasGrid.rect;
        if (width > LARGE_IMAGE_WARN_PX || height > LARGE_IMAGE_WARN_PX) {
            this.logger.warning(`Estimated image size is very large: ${width}x${height} px`);
            const proceed = await this.confirm(
                `Estimated image size (${width}x${height} px) is very large and may take a long time or run out of memory. Continue?`,
            );
            if (!proceed) {
                throw new CombineCancelledError('Combine cancelled; estimated image size too large');
            }
        }
        throwIfAborted(signal);

        let worldOrigin: CanvasCoord = asCanvas(-tileRect.x1 * this.tileSize, -tileRect.y1 * this.tileSize);

        const placed = placeTiles(tiles, tileGrid, canvasGrid);
        let image = await this.compositeTiles(createRaster(width, height), placed, progress, signal);

        // content box is taken before the overlay so 'auto' trims to tiles, not grid lines
        let contentBox = crop === 'auto' ? getBoundingBox(image) : null;

        if (this.gridStep > 0) {
            image = await this.drawOverlay(image, worldGrid, canvasGrid.copy({ step: 0 }), progress, signal);
        }

        if (area) {
            const transformer = createTransformer({ worldOrigin, blocksPerPixel, tileSize: this.tileSize });
            const cropRect = Rect.fromCorners(
                transformer.toCanvasSpace(area.topLeft),
                transformer.toCanvasSpace(area.bottomRight),
            );
            this.logger.info(`Cropping to area ${area.toString()}`, { pixels: cropRect.toString() });
            ({ image, worldOrigin, contentBox } = await applyCrop(image, cropRect, worldOrigin, contentBox));
        }

        if (crop === 'auto') {
            if (contentBox) {
                this.logger.info(`Cropping to visible content ${contentBox.toString()}`);
                ({ image, worldOrigin, contentBox } = await applyCrop(image, contentBox, worldOrigin, contentBox));
            } else {
                this.logger.warning('Image has no visible content; skipping automatic crop');
            }
        } else if (crop) {
            const [cropWidth, cropHeight] = crop;
            const cropRect = Rect.fromSize(cropWidth, cropHeight, rasterRect(image).center);
            this.logger.info(`Cropping to ${cropWidth}x${cropHeight}`, { pixels: cropRect.toString() });
            ({ image, worldOrigin, contentBox } = await applyCrop(image, cropRect, worldOrigin, contentBox));
        }

        if (!this.style.background.isTransparent) {
            image = await flattenRaster(image, this.style.background);
        }

        this.logger.info(`Map image complete: ${image.width}x${image.height} px`);
        return {
            width: image.width,
            height: image.height,
            data: image.data,
            worldOrigin,
            blocksPerPixel,
            tileSize: this.tileSize,
        };
    }

    private logProgress(event: ProgressEvent): void {
        const percent = Math.round(event.fraction * 100);
        this.logger.info(`${event.phase}: ${percent}%${event.message ? ` (${event.message})` : ''}`);
    }

    private async compositeTiles(
        canvas: Raster,
        placed: readonly PlacedTile[],
        progress: ThrottledProgress | null,
        signal: AbortSignal | undefined,
    ): Promise<Raster> {
        this.logger.info(`Combining ${placed.length} tiles...`);
        const layers: RasterLayer[] = [];
        for (let start = 0; start < placed.length; start += this.tileConcurrency) {
            throwIfAborted(signal);
            const batch = placed.slice(start, start + this.tileConcurrency);
            const decoded = await Promise.all(batch.map(({ tile }) => decodeImage(tile.path)));
            batch.forEach(({ tile, canvas: position }, index) => {
                const raster = decoded[index];
                if (!raster) {
                    throw new InternalError(`Missing decoded tile for ${tile.path}.`);
                }
                if (raster.width !== this.tileSize || raster.height !== this.tileSize) {
                    this.logger.warning(
                        `Tile ${tile.path} is ${raster.width}x${raster.height} px, expected ${this.tileSize} px`,
                    );
                }
                layers.push({ raster, left: position.x, top: position.y });
                progress?.step('tiles', layers.length, placed.length, `${tile.col}_${tile.row}`);
            });
        }
        throwIfAborted(signal);
        return compositeRasters(canvas, layers);
    }

    private async drawOverlay(
        image: Raster,
        worldGrid: Grid,
        canvasGrid: Grid,
        progress: ThrottledProgress | null,
        signal: AbortSignal | undefined,
    ): Promise<Raster> {
        const total = worldGrid.stepsCount;
        let includeLabels = this.style.gridCoordsFormat !== '';
        if (includeLabels && total > OVERLAY_CONFIRM_THRESHOLD) {
            this.logger.warning(`Grid overlay has ${total} intersections; drawing labels may be slow`);
            includeLabels = await this.confirm(
                `The grid overlay has ${total} coordinate labels to draw, which may take a long time. Draw labels?`,
            );
            if (!includeLabels) {
                this.logger.info('Skipping coordinate labels');
            }
        }

        const reportOverlay = progress && total > OVERLAY_PROGRESS_THRESHOLD ? progress : null;
        this.logger.info(`Drawing grid overlay (${total} intersections)...`);
        const overlays = buildGridOverlays({
            worldGrid,
            canvasGrid,
            style: this.style,
            includeLabels,
            signal,
            onPoint: reportOverlay ? (done, count) => reportOverlay.step('overlay', done, count) : undefined,
        });
        const lined = await renderGridLines(image, overlays.lines);
        throwIfAborted(signal);
        return renderLabels(lined, overlays.labels);
    }
}

const isMissingPath = (error: unknown): boolean =>
    error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');

const isDirectorySync = (dir: string): boolean => {
    try {
        return statSync(dir).isDirectory();
    } catch (error) {
        if (isMissingPath(error)) {
            return false;
        }
        throw error;
    }
};

const isDirectory = async (dir: string): Promise<boolean> => {
    try {
        return (await stat(dir)).isDirectory();
    } catch (error) {
        if (isMissingPath(error)) {
            return false;
        }
        throw error;
    }
};

const validateCrop = (crop: CropOption | null): void => {
    if (crop === null || crop === 'auto') {
        return;
    }
    const [width, height] = crop;
    if (!isPositiveInt(width) || !isPositiveInt(height)) {
        throw new ConfigurationError('invalid-crop', `Crop size must be positive integers: ${width}x${height}`);
    }
};

/**
 * Tile index bounds to render, with an exclusive far corner. Without an area
 * every found tile is covered; with one, every tile the area touches.
 */
const tileBoundsFor = (tiles: TileMap, area: Rect | null, tileBlocks: number): Rect => {
    let rect: Rect;
    if (area) {
        rect = new Rect(
            Math.floor(area.x1 / tileBlocks),
            Math.floor(area.y1 / tileBlocks),
            Math.ceil(area.x2 / tileBlocks),
            Math.ceil(area.y2 / tileBlocks),
        );
    } else {
        const bounds = Grid.fromSteps([...tiles.values()].map((tile) => new Coord2i(tile.col, tile.row))).rect;
        rect = bounds.resize(1);
    }
    if (rect.width <= 0 || rect.height <= 0) {
        rect = new Rect(rect.x1, rect.y1, Math.max(rect.x2, rect.x1 + 1), Math.max(rect.y2, rect.y1 + 1));
    }
    return rect;
};

/** Pairs each tile position with its canvas pixel by walking both grids in step. */
const placeTiles = (tiles: TileMap, tileGrid: Grid, canvasGrid: Grid): PlacedTile[] => {
    const tileSteps = [...tileGrid.resize(-1).iterSteps()];
    const canvasSteps = [...canvasGrid.resize(-canvasGrid.step).iterSteps()];
    if (tileSteps.length !== canvasSteps.length) {
        throw new InternalError(
            `Tile grid and canvas grid disagree on step count (${tileSteps.length} vs ${canvasSteps.length}).`,
        );
    }
    const placed: PlacedTile[] = [];
    tileSteps.forEach((index, i) => {
        const tile = tiles.get(index.key());
        const canvas = canvasSteps[i];
        if (tile && canvas) {
            placed.push({ tile, canvas });
        }
    });
    return placed;
};

interface CropResult {
    image: Raster;
    worldOrigin: CanvasCoord;
    contentBox: Rect | null;
}

const applyCrop = async (
    image: Raster,
    rect: Rect,
    worldOrigin: CanvasCoord,
    contentBox: Rect | null,
): Promise<CropResult> => {
    const cropped = await cropRaster(image, rect);
    const shift = rect.topLeft;
    const origin = worldOrigin.sub(shift);
    return {
        image: cropped,
        worldOrigin: asCanvas(origin.x, origin.y),
        contentBox: contentBox ? contentBox.translateBy(shift.mul(-1)).intersect(rasterRect(cropped)) : null,
    };
};
