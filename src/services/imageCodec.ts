import sharp from 'sharp';

import { expandToRgba, rasterInput, toRaster, type Raster } from '@/utils/raster';

import { TileReadError } from './errors';

export type ImageFormat = 'png' | 'webp' | 'jpeg';

/** Reads an image file into an RGBA raster; any failure becomes a {@link TileReadError}. */
export const decodeImage = async (path: string): Promise<Raster> => {
    try {
        const { data, info } = await sharp(path, { limitInputPixels: false })
            .ensureAlpha()
            .raw()
            .toBuffer({ resolveWithObject: true });
        return {
            width: info.width,
            height: info.height,
            data: expandToRgba(new Uint8Array(data), info.width, info.height, info.channels),
        };
    } catch (error) {
        throw new TileReadError(path, error);
    }
};

export const encodeImage = async (raster: Raster, format: ImageFormat = 'png'): Promise<Buffer> => {
    const pipeline = rasterInput(raster);
    switch (format) {
        case 'png':
            return pipeline.png().toBuffer();
        case 'webp':
            return pipeline.webp({ lossless: true }).toBuffer();
        case 'jpeg':
            // no alpha in jpeg; transparent areas come out black unless flattened first
            return pipeline.flatten({ background: { r: 0, g: 0, b: 0 } }).jpeg().toBuffer();
        default:
            return format satisfies never;
    }
};

/** Overlay entry for an SVG document drawn at the top-left corner. */
export const svgLayer = (svg: string): sharp.OverlayOptions => ({
    input: Buffer.from(svg),
    top: 0,
    left: 0,
    limitInputPixels: false,
});

/** Rasterizes `svg` (sized like `raster`) and draws it over `raster`, returning a new raster. */
export const compositeSvg = async (raster: Raster, svg: string): Promise<Raster> => {
    if (raster.width === 0 || raster.height === 0) {
        return { width: raster.width, height: raster.height, data: raster.data.slice() };
    }
    return toRaster(rasterInput(raster).composite([svgLayer(svg)]));
};
