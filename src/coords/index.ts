import { Coord2i } from '@/geometry';
import type { MapImage } from '@/types';
import { floorDiv } from '@/utils/math';

// =============================================================================
// TYPES
// =============================================================================

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

/**
 * - `tile`: tile/region indices, as named by the tile files (`{col}_{row}`)
 * - `world`: in-world block coordinates
 * - `canvas`: pixel coordinates on the stitched image
 */
export type CoordSpace = 'tile' | 'world' | 'canvas';

export type TileIndex = Brand<Coord2i, 'TileIndex'>;
export type WorldCoord = Brand<Coord2i, 'WorldCoord'>;
export type CanvasCoord = Brand<Coord2i, 'CanvasCoord'>;

export type CoordOf<T extends CoordSpace> = T extends 'tile'
    ? TileIndex
    : T extends 'world'
      ? WorldCoord
      : CanvasCoord;

export type AnyCoord = TileIndex | WorldCoord | CanvasCoord;

export interface ConvertContext {
    /** Canvas pixel at which world block (0, 0) lies. */
    worldOrigin: Coord2i;
    /** In-world blocks covered by one pixel at the image's zoom level. */
    blocksPerPixel: number;
    /** Pixel width and height of one tile image. */
    tileSize: number;
}

// =============================================================================
// CONSTRUCTORS
// =============================================================================

export const asTile = (x: number, y: number): TileIndex => new Coord2i(x, y) as TileIndex;
export const asWorld = (x: number, y: number): WorldCoord => new Coord2i(x, y) as WorldCoord;
export const asCanvas = (x: number, y: number): CanvasCoord => new Coord2i(x, y) as CanvasCoord;

// =============================================================================
// INTERNAL CONVERSION HELPERS
// =============================================================================

const toWorld = (coord: Coord2i, from: CoordSpace, ctx: ConvertContext): WorldCoord => {
    switch (from) {
        case 'world':
            return asWorld(coord.x, coord.y);
        case 'tile': {
            const blocks = coord.mul(ctx.tileSize * ctx.blocksPerPixel);
            return asWorld(blocks.x, blocks.y);
        }
        case 'canvas': {
            const blocks = coord.sub(ctx.worldOrigin).mul(ctx.blocksPerPixel);
            return asWorld(blocks.x, blocks.y);
        }
        default:
            return from satisfies never;
    }
};

const fromWorld = (coord: WorldCoord, to: CoordSpace, ctx: ConvertContext): AnyCoord => {
    switch (to) {
        case 'world':
            return coord;
        case 'tile':
            return asTile(
                floorDiv(coord.x, ctx.tileSize * ctx.blocksPerPixel),
                floorDiv(coord.y, ctx.tileSize * ctx.blocksPerPixel),
            );
        case 'canvas':
            return asCanvas(
                ctx.worldOrigin.x + floorDiv(coord.x, ctx.blocksPerPixel),
                ctx.worldOrigin.y + floorDiv(coord.y, ctx.blocksPerPixel),
            );
        default:
            return to satisfies never;
    }
};

// =============================================================================
// PUBLIC CONVERSION API
// =============================================================================

export const convert = <TTo extends CoordSpace>(
    coord: Coord2i,
    from: CoordSpace,
    to: TTo,
    ctx: ConvertContext,
): CoordOf<TTo> => {
    const world = toWorld(coord, from, ctx);
    return fromWorld(world, to, ctx) as CoordOf<TTo>;
};

// =============================================================================
// TRANSFORMER
// =============================================================================

export class MapTransformer {
    private readonly ctx: ConvertContext;

    constructor(ctx: ConvertContext) {
        this.ctx = ctx;
    }

    /** Same conversion rules with the world origin moved, e.g. after a crop. */
    withOrigin(worldOrigin: Coord2i): MapTransformer {
        return new MapTransformer({ ...this.ctx, worldOrigin });
    }

    toWorldSpace(coord: Coord2i, from: CoordSpace = 'canvas'): WorldCoord {
        return convert(coord, from, 'world', this.ctx);
    }

    toCanvasSpace(coord: Coord2i, from: CoordSpace = 'world'): CanvasCoord {
        return convert(coord, from, 'canvas', this.ctx);
    }

    toTileSpace(coord: Coord2i, from: CoordSpace = 'world'): TileIndex {
        return convert(coord, from, 'tile', this.ctx);
    }
}

export const createTransformer = (ctx: ConvertContext): MapTransformer => new MapTransformer(ctx);

/** Transformer for the pixels of a combined map image, cropped or not. */
export const transformerFor = (image: MapImage): MapTransformer =>
    new MapTransformer({
        worldOrigin: image.worldOrigin,
        blocksPerPixel: image.blocksPerPixel,
        tileSize: image.tileSize,
    });
