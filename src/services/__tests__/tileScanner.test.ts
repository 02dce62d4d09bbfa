import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { listWorlds, parseTileName, scanTiles } from '../tileScanner';

describe('parseTileName', () => {
    it('reads signed column and row indices', () => {
        expect(parseTileName('-3_12.png')?.asTuple()).toEqual([-3, 12]);
        expect(parseTileName('3_4')?.asTuple()).toEqual([3, 4]);
    });

    it('rejects names that are not tiles', () => {
        expect(parseTileName('1_2_3.png')).toBeNull();
        expect(parseTileName('a_b.png')).toBeNull();
        expect(parseTileName('readme.txt')).toBeNull();
    });
});

describe('tile directory scanning', () => {
    let root: string;

    beforeEach(async () => {
        root = await mkdtemp(path.join(os.tmpdir(), 'tile-map-scan-'));
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
    });

    it('collects tile files by index', async () => {
        const zoomDir = path.join(root, '3');
        await mkdir(path.join(zoomDir, '3_3.png'), { recursive: true });
        await Promise.all(
            ['0_0.png', '-1_2.png', 'readme.txt', 'a_b.png'].map((name) => writeFile(path.join(zoomDir, name), '')),
        );

        const tiles = await scanTiles(zoomDir, 'png');

        expect([...tiles.keys()]).toEqual(['-1,2', '0,0']);
        expect(tiles.get('-1,2')).toEqual({ col: -1, row: 2, path: path.join(zoomDir, '-1_2.png') });
    });

    it('matches extensions case-insensitively and accepts any with *', async () => {
        await Promise.all(['0_0.PNG', '1_0.webp'].map((name) => writeFile(path.join(root, name), '')));

        expect([...(await scanTiles(root, 'png')).keys()]).toEqual(['0,0']);
        expect([...(await scanTiles(root, '*')).keys()]).toEqual(['0,0', '1,0']);
    });

    it('returns an empty map for a missing directory', async () => {
        const tiles = await scanTiles(path.join(root, 'missing'));

        expect(tiles.size).toBe(0);
    });

    it('lists directories holding zoom levels as worlds', async () => {
        await mkdir(path.join(root, 'minecraft_the_end', '3'), { recursive: true });
        await mkdir(path.join(root, 'minecraft_overworld', '0'), { recursive: true });
        await mkdir(path.join(root, 'notes'), { recursive: true });
        await writeFile(path.join(root, 'file.txt'), '');

        expect(await listWorlds(root)).toEqual(['minecraft_overworld', 'minecraft_the_end']);
    });
});
