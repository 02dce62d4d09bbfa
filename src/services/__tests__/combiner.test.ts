import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import sharp from 'sharp';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';

import { Rect } from '@/geometry';
import type { ProgressEvent } from '@/types';
import { Color } from '@/utils/color';
import { getBoundingBox, getPixel, type Raster } from '@/utils/raster';

import { Combiner, type CombinerOptions } from '../combiner';
import { CombineCancelledError, ConfigurationError, NoTilesFoundError, TileReadError } from '../errors';
import { configureLogging, createMemoryLogSink, type LoggingConfig, type MemoryLogSink } from '../logger';

vi.mock('@/utils/raster', async (importOriginal) => {
    const actual = await importOriginal<typeof import('@/utils/raster')>();
    return { ...actual, getBoundingBox: vi.fn(actual.getBoundingBox) };
});

type Rgba = [number, number, number, number];

const RED: Rgba = [255, 0, 0, 255];
const GREEN: Rgba = [0, 255, 0, 255];
const BLUE: Rgba = [0, 0, 255, 255];
const YELLOW: Rgba = [255, 255, 0, 255];
const CLEAR: Rgba = [0, 0, 0, 0];

const SMALL_TILE = 4;

const writeTile = async (dir: string, col: number, row: number, color: Rgba, size = SMALL_TILE) => {
    await mkdir(dir, { recursive: true });
    const [r, g, b, alpha] = color;
    await sharp({ create: { width: size, height: size, channels: 4, background: { r, g, b, alpha: alpha / 255 } } })
        .png()
        .toFile(path.join(dir, `${col}_${row}.png`));
};

/** Quadrants around world (0, 0): red top-left, green top-right, blue bottom-left, yellow bottom-right. */
const writeQuadrants = async (dir: string, size = SMALL_TILE) => {
    await writeTile(dir, -1, -1, RED, size);
    await writeTile(dir, 0, -1, GREEN, size);
    await writeTile(dir, -1, 0, BLUE, size);
    await writeTile(dir, 0, 0, YELLOW, size);
};

describe('Combiner', () => {
    let tilesDir: string;

    const createCombiner = (options: CombinerOptions = {}) =>
        new Combiner(tilesDir, { tileSize: SMALL_TILE, ...options });

    beforeAll(async () => {
        tilesDir = await mkdtemp(path.join(os.tmpdir(), 'tile-map-combine-'));
        await writeQuadrants(path.join(tilesDir, 'minecraft_overworld', '3'));
        await writeTile(path.join(tilesDir, 'minecraft_overworld', '0'), 0, 0, RED);
        await writeTile(path.join(tilesDir, 'sparse', '3'), 0, 0, RED);
        await writeTile(path.join(tilesDir, 'sparse', '3'), 1, 1, BLUE);
        await writeTile(path.join(tilesDir, 'blank', '3'), 0, 0, CLEAR);
        await mkdir(path.join(tilesDir, 'broken', '3'), { recursive: true });
        await writeFile(path.join(tilesDir, 'broken', '3', '0_0.png'), 'not an image');
        await writeQuadrants(path.join(tilesDir, 'full', '3'), 512);
    });

    afterAll(async () => {
        await rm(tilesDir, { recursive: true, force: true });
    });

    describe('stitching', () => {
        it('places every tile by its index', async () => {
            const image = await createCombiner().combine({ world: 'minecraft_overworld', zoom: 3 });

            expect([image.width, image.height]).toEqual([8, 8]);
            expect(getPixel(image, 0, 0)).toEqual(RED);
            expect(getPixel(image, 4, 0)).toEqual(GREEN);
            expect(getPixel(image, 0, 4)).toEqual(BLUE);
            expect(getPixel(image, 7, 7)).toEqual(YELLOW);
            expect(image.worldOrigin.asTuple()).toEqual([4, 4]);
            expect(image.blocksPerPixel).toBe(1);
            expect(image.tileSize).toBe(SMALL_TILE);
        });

        it('decodes in small batches without changing the result', async () => {
            const image = await createCombiner({ tileConcurrency: 1 }).combine({
                world: 'minecraft_overworld',
                zoom: 3,
            });

            expect(getPixel(image, 4, 4)).toEqual(YELLOW);
        });

        it('leaves missing tiles transparent', async () => {
            const image = await createCombiner().combine({ world: 'sparse', zoom: 3 });

            expect([image.width, image.height]).toEqual([8, 8]);
            expect(getPixel(image, 5, 1)).toEqual(CLEAR);
            expect(getPixel(image, 5, 5)).toEqual(BLUE);
        });

        it('fills empty space with the background color', async () => {
            const image = await createCombiner({ style: { background: Color.fromName('white') } }).combine({
                world: 'sparse',
                zoom: 3,
            });

            expect(getPixel(image, 5, 1)).toEqual([255, 255, 255, 255]);
            expect(getPixel(image, 1, 1)).toEqual(RED);
        });

        it('accepts an absolute world path', async () => {
            const image = await createCombiner().combine({ world: path.join(tilesDir, 'sparse'), zoom: 3 });

            expect(getPixel(image, 0, 0)).toEqual(RED);
        });

        it('stitches full-size tiles and crops to a world area', async () => {
            const combiner = new Combiner(tilesDir);

            const whole = await combiner.combine({ world: 'full', zoom: 3 });
            expect([whole.width, whole.height]).toEqual([1024, 1024]);

            const image = await combiner.combine({ world: 'full', zoom: 3, area: new Rect(-256, -256, 256, 256) });
            expect([image.width, image.height]).toEqual([512, 512]);
            expect(image.worldOrigin.asTuple()).toEqual([256, 256]);
            expect(getPixel(image, 0, 0)).toEqual(RED);
            expect(getPixel(image, 511, 511)).toEqual(YELLOW);
        });

        it('lists the available worlds', async () => {
            expect(await createCombiner().listWorlds()).toEqual([
                'blank',
                'broken',
                'full',
                'minecraft_overworld',
                'sparse',
            ]);
        });
    });

    describe('area and crop', () => {
        it('crops to the pixels of a world area', async () => {
            const image = await createCombiner().combine({
                world: 'minecraft_overworld',
                zoom: 3,
                area: new Rect(-2, -2, 2, 2),
            });

            expect([image.width, image.height]).toEqual([4, 4]);
            expect(getPixel(image, 0, 0)).toEqual(RED);
            expect(getPixel(image, 3, 3)).toEqual(YELLOW);
            expect(image.worldOrigin.asTuple()).toEqual([2, 2]);
        });

        it('only renders tiles the area touches', async () => {
            const image = await createCombiner().combine({
                world: 'minecraft_overworld',
                zoom: 3,
                area: new Rect(0, 0, 4, 4),
            });

            expect([image.width, image.height]).toEqual([4, 4]);
            expect(getPixel(image, 0, 0)).toEqual(YELLOW);
            expect(image.worldOrigin.asTuple()).toEqual([0, 0]);
        });

        it('trims empty space with auto crop', async () => {
            const image = await createCombiner().combine({
                world: 'minecraft_overworld',
                zoom: 3,
                area: new Rect(-8, -8, 12, 12),
                crop: 'auto',
            });

            expect([image.width, image.height]).toEqual([8, 8]);
            expect(getPixel(image, 0, 0)).toEqual(RED);
            expect(image.worldOrigin.asTuple()).toEqual([4, 4]);
        });

        it('scans for visible content only when auto crop is requested', async () => {
            const scan = vi.mocked(getBoundingBox);
            scan.mockClear();

            await createCombiner().combine({ world: 'minecraft_overworld', zoom: 3, crop: [4, 2] });
            await createCombiner().combine({ world: 'minecraft_overworld', zoom: 3 });
            expect(scan).not.toHaveBeenCalled();

            await createCombiner().combine({ world: 'minecraft_overworld', zoom: 3, crop: 'auto' });
            expect(scan).toHaveBeenCalledTimes(1);
        });

        it('centers a fixed crop on the image', async () => {
            const image = await createCombiner().combine({ world: 'minecraft_overworld', zoom: 3, crop: [4, 2] });

            expect([image.width, image.height]).toEqual([4, 2]);
            expect(getPixel(image, 0, 0)).toEqual(RED);
            expect(getPixel(image, 3, 1)).toEqual(YELLOW);
            expect(image.worldOrigin.asTuple()).toEqual([2, 1]);
        });

        it('pads a fixed crop larger than the image with transparency', async () => {
            const image = await createCombiner().combine({ world: 'minecraft_overworld', zoom: 3, crop: [10, 10] });

            expect([image.width, image.height]).toEqual([10, 10]);
            expect(getPixel(image, 0, 0)).toEqual(CLEAR);
            expect(getPixel(image, 1, 1)).toEqual(RED);
            expect(image.worldOrigin.asTuple()).toEqual([5, 5]);
        });
    });

    describe('grid overlay', () => {
        it('draws grid lines at every step without labels', async () => {
            const image = await createCombiner({ gridStep: 4, style: { gridCoordsFormat: '' } }).combine({
                world: 'minecraft_overworld',
                zoom: 3,
            });

            expect(getPixel(image, 4, 1)).toEqual([0, 0, 0, 255]);
            expect(getPixel(image, 1, 4)).toEqual([0, 0, 0, 255]);
            expect(getPixel(image, 0, 2)).toEqual([0, 0, 0, 255]);
            expect(getPixel(image, 1, 1)).toEqual(RED);
            expect(getPixel(image, 6, 6)).toEqual(YELLOW);
        });

        it('draws coordinate labels at the projected intersections', async () => {
            const visibleIn = (image: Raster, area: Rect) => {
                let count = 0;
                for (let y = area.y1; y < area.y2; y += 1) {
                    for (let x = area.x1; x < area.x2; x += 1) {
                        if (getPixel(image, x, y)[3] > 0) {
                            count += 1;
                        }
                    }
                }
                return count;
            };
            const style = {
                gridLineColor: Color.fromName('clear'),
                gridTextColor: Color.fromName('black'),
                gridTextStrokeColor: Color.fromName('white'),
                gridTextStrokeWidth: 2,
                gridTextSize: 8,
                gridCoordsFormat: '{x}{y}',
            };
            // world (4, 0) projects to pixel (4, 0), the corner of the missing tile 1_0
            const emptyTile = new Rect(4, 0, 8, 4);

            const plain = await createCombiner({ gridStep: 4, style: { ...style, gridCoordsFormat: '' } }).combine({
                world: 'sparse',
                zoom: 3,
            });
            const labelled = await createCombiner({ gridStep: 4, style }).combine({ world: 'sparse', zoom: 3 });

            expect(visibleIn(plain, emptyTile)).toBe(0);
            expect(visibleIn(labelled, emptyTile)).toBeGreaterThan(0);
            expect([labelled.width, labelled.height]).toEqual([8, 8]);
            expect(labelled.worldOrigin.asTuple()).toEqual([0, 0]);
        });

        it('asks before drawing a very large number of labels and skips them when declined', async () => {
            const questions: string[] = [];
            const events: ProgressEvent[] = [];
            const combiner = createCombiner({
                gridStep: 1,
                confirm: async (message) => {
                    questions.push(message);
                    return false;
                },
                onProgress: (event) => events.push(event),
                progressIntervalMs: 0,
            });

            const image = await combiner.combine({
                world: 'minecraft_overworld',
                zoom: 0,
                area: new Rect(-128, -128, 128, 128),
            });

            expect([image.width, image.height]).toEqual([32, 32]);
            expect(questions).toHaveLength(1);
            expect(questions[0]).toContain('66049 coordinate labels');
            expect(events.filter((event) => event.phase === 'overlay').at(-1)?.fraction).toBe(1);
        });
    });

    describe('progress and logging', () => {
        let memory: MemoryLogSink;
        let previous: LoggingConfig;

        beforeEach(() => {
            memory = createMemoryLogSink();
            previous = configureLogging({ level: 'debug', sink: memory.sink });
        });

        afterEach(() => {
            configureLogging(previous);
        });

        it('reports tile progress through the callback', async () => {
            const events: ProgressEvent[] = [];
            await createCombiner({ onProgress: (event) => events.push(event), progressIntervalMs: 0 }).combine({
                world: 'minecraft_overworld',
                zoom: 3,
            });

            expect(events.map((event) => event.fraction)).toEqual([0.25, 0.5, 0.75, 1]);
            expect(events.every((event) => event.phase === 'tiles')).toBe(true);
        });

        it('logs progress when asked to show it without a callback', async () => {
            await createCombiner({ showProgress: true }).combine({ world: 'sparse', zoom: 3 });

            expect(memory.entries.some((entry) => entry.message === 'tiles: 100% (1_1)')).toBe(true);
        });

        it('warns and keeps the image when auto crop finds no content', async () => {
            const image = await createCombiner().combine({ world: 'blank', zoom: 3, crop: 'auto' });

            expect([image.width, image.height]).toEqual([4, 4]);
            expect(
                memory.entries.some(
                    (entry) =>
                        entry.severity === 'warning' &&
                        entry.message === 'Image has no visible content; skipping automatic crop',
                ),
            ).toBe(true);
        });
    });

    describe('errors', () => {
        it('rejects a tiles path that is not a directory', () => {
            expect(() => new Combiner(path.join(tilesDir, 'missing'))).toThrow(ConfigurationError);
        });

        it('rejects invalid options', () => {
            expect(() => createCombiner({ gridStep: -1 })).toThrow(ConfigurationError);
            expect(() => createCombiner({ tileSize: 0 })).toThrow(ConfigurationError);
            expect(() => createCombiner({ tileConcurrency: 0 })).toThrow(ConfigurationError);
        });

        it('rejects an unknown world', async () => {
            await expect(createCombiner().combine({ world: 'nowhere', zoom: 3 })).rejects.toMatchObject({
                code: 'configuration',
                reason: 'unknown-world',
            });
        });

        it('rejects an empty area and an invalid crop', async () => {
            const combiner = createCombiner();

            await expect(
                combiner.combine({ world: 'minecraft_overworld', zoom: 3, area: new Rect(0, 0, 0, 4) }),
            ).rejects.toMatchObject({ reason: 'invalid-area' });
            await expect(
                combiner.combine({ world: 'minecraft_overworld', zoom: 3, crop: [0, 4] }),
            ).rejects.toMatchObject({ reason: 'invalid-crop' });
        });

        it('fails when the zoom level has no tiles', async () => {
            await expect(createCombiner().combine({ world: 'minecraft_overworld', zoom: 2 })).rejects.toBeInstanceOf(
                NoTilesFoundError,
            );
        });

        it('fails on a tile that cannot be decoded', async () => {
            await expect(createCombiner().combine({ world: 'broken', zoom: 3 })).rejects.toBeInstanceOf(TileReadError);
        });

        it('cancels when a very large image is declined', async () => {
            const questions: string[] = [];
            const combiner = createCombiner({
                confirm: (message) => {
                    questions.push(message);
                    return false;
                },
            });

            await expect(
                combiner.combine({ world: 'minecraft_overworld', zoom: 3, area: new Rect(0, 0, 20004, 4) }),
            ).rejects.toBeInstanceOf(CombineCancelledError);
            expect(questions[0]).toContain('20004x4');
        });

        it('cancels when the signal is already aborted', async () => {
            const controller = new AbortController();
            controller.abort();

            await expect(
                createCombiner().combine({ world: 'minecraft_overworld', zoom: 3, signal: controller.signal }),
            ).rejects.toBeInstanceOf(CombineCancelledError);
        });
    });
});
