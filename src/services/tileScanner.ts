import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import path from 'node:path';

import { TILE_NAME_REGEX, ZOOM_LEVELS, type ZoomLevel } from '@/constants/map';
import { Coord2i } from '@/geometry';
import type { TileFile, TileMap } from '@/types';

import { createLogger, type Logger } from './logger';

const defaultLogger = createLogger('TileScanner');

/** Tile index from a file name such as `-3_12.png`, or null when it is not a tile. */
export const parseTileName = (fileName: string): Coord2i | null => {
    const extIndex = fileName.lastIndexOf('.');
    const stem = extIndex > 0 ? fileName.slice(0, extIndex) : fileName;
    const match = TILE_NAME_REGEX.exec(stem);
    if (!match) {
        return null;
    }
    const col = Number.parseInt(match[1] ?? '', 10);
    const row = Number.parseInt(match[2] ?? '', 10);
    if (!Number.isSafeInteger(col) || !Number.isSafeInteger(row)) {
        return null;
    }
    return new Coord2i(col, row);
};

const matchesExtension = (fileName: string, tileExt: string): boolean => {
    if (tileExt === '*') {
        return fileName.lastIndexOf('.') > 0;
    }
    const wanted = tileExt.replace(/^\./, '').toLowerCase();
    return path.extname(fileName).slice(1).toLowerCase() === wanted;
};

const isMissing = (error: unknown): boolean =>
    error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');

/**
 * Collects the tile images of one zoom level directory. A missing directory
 * yields an empty map; other I/O errors propagate.
 */
export const scanTiles = async (
    zoomDir: string,
    tileExt = '*',
    logger: Logger = defaultLogger,
): Promise<TileMap> => {
    const tiles: TileMap = new Map();
    const entries = await readdir(zoomDir, { withFileTypes: true }).catch((error: unknown): Dirent[] => {
        if (isMissing(error)) {
            logger.debug(`Zoom directory does not exist: ${zoomDir}`);
            return [];
        }
        throw error;
    });

    const names = entries
        .filter((entry) => entry.isFile() && matchesExtension(entry.name, tileExt))
        .map((entry) => entry.name)
        .sort();

    for (const name of names) {
        const index = parseTileName(name);
        if (!index) {
            logger.debug(`Skipping file that is not a tile: ${name}`);
            continue;
        }
        const existing = tiles.get(index.key());
        if (existing) {
            logger.warning(`Tile ${index.toString()} has more than one image; using ${existing.path}`);
            continue;
        }
        const tile: TileFile = { col: index.x, row: index.y, path: path.join(zoomDir, name) };
        tiles.set(index.key(), tile);
    }
    return tiles;
};

const hasZoomDirectory = async (worldDir: string): Promise<boolean> => {
    const entries = await readdir(worldDir, { withFileTypes: true });
    const zoomNames = new Set(ZOOM_LEVELS.map((level: ZoomLevel) => String(level)));
    return entries.some((entry) => entry.isDirectory() && zoomNames.has(entry.name));
};

/** Subdirectories of `tilesDir` that hold at least one zoom level directory, sorted by name. */
export const listWorlds = async (tilesDir: string): Promise<string[]> => {
    const entries = await readdir(tilesDir, { withFileTypes: true });
    const worlds: string[] = [];
    for (const entry of entries) {
        if (entry.isDirectory() && (await hasZoomDirectory(path.join(tilesDir, entry.name)))) {
            worlds.push(entry.name);
        }
    }
    return worlds.sort();
};
