import sharp from 'sharp';

import { Rect } from '@/geometry';

import { CHANNEL_MAX, type Color, type RgbaTuple } from './color';

/** Row-major, straight-alpha RGBA pixels. */
export interface Raster {
    width: number;
    height: number;
    data: Uint8Array;
}

export const RGBA_CHANNELS = 4;

const pixelOffset = (raster: Raster, x: number, y: number): number => (y * raster.width + x) * RGBA_CHANNELS;

export const createRaster = (width: number, height: number, fill?: Color): Raster => {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
        throw new RangeError(`Raster size must be non-negative integers: ${width}x${height}`);
    }
    const data = new Uint8Array(width * height * RGBA_CHANNELS);
    if (fill && !fill.isTransparent) {
        const rgba = fill.toRgba();
        for (let offset = 0; offset < data.length; offset += RGBA_CHANNELS) {
            data.set(rgba, offset);
        }
    }
    return { width, height, data };
};

export const rasterRect = (raster: Raster): Rect => new Rect(0, 0, raster.width, raster.height);

export const getPixel = (raster: Raster, x: number, y: number): RgbaTuple => {
    if (x < 0 || y < 0 || x >= raster.width || y >= raster.height) {
        throw new RangeError(`Pixel (${x}, ${y}) is outside a ${raster.width}x${raster.height} raster`);
    }
    const offset = pixelOffset(raster, x, y);
    const { data } = raster;
    return [data[offset] ?? 0, data[offset + 1] ?? 0, data[offset + 2] ?? 0, data[offset + 3] ?? 0];
};

/** A rectangle of solid color to draw with {@link fillRects}. */
export interface RectFill {
    rect: Rect;
    color: Color;
}

/** A raster to draw with {@link compositeRasters}, top-left at `(left, top)`. */
export interface RasterLayer {
    raster: Raster;
    left: number;
    top: number;
}

/**
 * Widens 1 (grey), 2 (grey + alpha) and 3 (RGB) channel pixel data to RGBA.
 */
export const expandToRgba = (data: Uint8Array, width: number, height: number, channels: number): Uint8Array => {
    if (channels === RGBA_CHANNELS) {
        return data;
    }
    if (channels < 1 || channels > RGBA_CHANNELS) {
        throw new RangeError(`Unsupported channel count: ${channels}`);
    }
    const pixels = width * height;
    const out = new Uint8Array(pixels * RGBA_CHANNELS);
    for (let i = 0; i < pixels; i += 1) {
        const src = i * channels;
        const dst = i * RGBA_CHANNELS;
        const first = data[src] ?? 0;
        if (channels <= 2) {
            out[dst] = first;
            out[dst + 1] = first;
            out[dst + 2] = first;
            out[dst + 3] = channels === 2 ? (data[src + 1] ?? 255) : 255;
        } else {
            out[dst] = first;
            out[dst + 1] = data[src + 1] ?? 0;
            out[dst + 2] = data[src + 2] ?? 0;
            out[dst + 3] = 255;
        }
    }
    return out;
};

const TRANSPARENT = { r: 0, g: 0, b: 0, alpha: 0 };

const sharpColor = (color: Color) => {
    const [r, g, b, alpha] = color.toRgba();
    return { r, g, b, alpha: alpha / CHANNEL_MAX };
};

const rawInfo = (raster: Raster): sharp.CreateRaw => ({
    width: raster.width,
    height: raster.height,
    channels: RGBA_CHANNELS,
});

const rawBuffer = (raster: Raster): Buffer =>
    Buffer.from(raster.data.buffer, raster.data.byteOffset, raster.data.byteLength);

/** A sharp pipeline reading `raster`, with no cap on the input size. */
export const rasterInput = (raster: Raster): sharp.Sharp =>
    sharp(raster.data, { raw: rawInfo(raster), limitInputPixels: false });

/** Runs `pipeline` to raw RGBA pixels. */
export const toRaster = async (pipeline: sharp.Sharp): Promise<Raster> => {
    const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
    return {
        width: info.width,
        height: info.height,
        data: expandToRgba(new Uint8Array(data), info.width, info.height, info.channels),
    };
};

const copyRaster = (raster: Raster): Raster => ({
    width: raster.width,
    height: raster.height,
    data: raster.data.slice(),
});

/**
 * Copies `rect` out of `raster` into a new raster of the rect's size. Parts
 * of `rect` outside the source come out transparent.
 */
export const cropRaster = async (raster: Raster, rect: Rect): Promise<Raster> => {
    const area = rect.intersect(rasterRect(raster));
    if (!area) {
        return createRaster(Math.max(0, rect.width), Math.max(0, rect.height));
    }
    let pipeline = rasterInput(raster).extract({
        left: area.x1,
        top: area.y1,
        width: area.width,
        height: area.height,
    });
    if (!area.equals(rect)) {
        pipeline = pipeline.extend({
            left: area.x1 - rect.x1,
            top: area.y1 - rect.y1,
            right: rect.x2 - area.x2,
            bottom: rect.y2 - area.y2,
            background: TRANSPARENT,
        });
    }
    return toRaster(pipeline);
};

/**
 * Alpha-composites `layers` in order onto `base`, returning a new raster.
 * Parts of a layer outside `base` are clipped.
 */
export const compositeRasters = async (base: Raster, layers: readonly RasterLayer[]): Promise<Raster> => {
    const overlays: sharp.OverlayOptions[] = [];
    for (const { raster, left, top } of layers) {
        const area = new Rect(left, top, left + raster.width, top + raster.height).intersect(rasterRect(base));
        if (!area) {
            continue;
        }
        const visible =
            area.width === raster.width && area.height === raster.height
                ? raster
                : await cropRaster(raster, area.translateBy([-left, -top]));
        overlays.push({
            input: rawBuffer(visible),
            raw: rawInfo(visible),
            left: area.x1,
            top: area.y1,
            limitInputPixels: false,
        });
    }
    if (overlays.length === 0) {
        return copyRaster(base);
    }
    return toRaster(rasterInput(base).composite(overlays));
};

/** Blends each fill over the pixels of its rect that lie inside the raster, returning a new raster. */
export const fillRects = async (raster: Raster, fills: readonly RectFill[]): Promise<Raster> => {
    const overlays: sharp.OverlayOptions[] = [];
    for (const { rect, color } of fills) {
        const area = rect.intersect(rasterRect(raster));
        if (!area || color.isTransparent) {
            continue;
        }
        overlays.push({
            input: {
                create: {
                    width: area.width,
                    height: area.height,
                    channels: RGBA_CHANNELS,
                    background: sharpColor(color),
                },
            },
            left: area.x1,
            top: area.y1,
        });
    }
    if (overlays.length === 0) {
        return raster;
    }
    return toRaster(rasterInput(raster).composite(overlays));
};

/**
 * Tight bounds (exclusive far edge) of the pixels with non-zero alpha, or
 * `null` for a fully transparent raster.
 */
export const getBoundingBox = (raster: Raster): Rect | null => {
    let minX = raster.width;
    let minY = raster.height;
    let maxX = -1;
    let maxY = -1;
    for (let y = 0; y < raster.height; y += 1) {
        for (let x = 0; x < raster.width; x += 1) {
            if ((raster.data[pixelOffset(raster, x, y) + 3] ?? 0) === 0) {
                continue;
            }
            if (x < minX) minX = x;
            if (x > maxX) maxX = x;
            if (y < minY) minY = y;
            maxY = y;
        }
    }
    if (maxX < 0) {
        return null;
    }
    return new Rect(minX, minY, maxX + 1, maxY + 1);
};

/** A new raster with `raster` composited over a solid `background`. */
export const flattenRaster = async (raster: Raster, background: Color): Promise<Raster> => {
    if (raster.width === 0 || raster.height === 0) {
        return copyRaster(raster);
    }
    const canvas = sharp({
        create: {
            width: raster.width,
            height: raster.height,
            channels: RGBA_CHANNELS,
            background: sharpColor(background),
        },
        limitInputPixels: false,
    });
    return toRaster(
        canvas.composite([
            {
                input: rawBuffer(raster),
                raw: rawInfo(raster),
                limitInputPixels: false,
            },
        ]),
    );
};
