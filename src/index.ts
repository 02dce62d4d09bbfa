export { Combiner } from './services/combiner';
export type { CombinerOptions } from './services/combiner';

export type {
    CombineOptions,
    CombinerStyle,
    ConfirmFn,
    CropOption,
    MapImage,
    ProgressEvent,
    ProgressPhase,
    ProgressReporter,
    TileFile,
    TileMap,
} from './types';

export { Coord2f, Coord2i, Grid, Rect } from './geometry';
export type { CoordTuple, GridOptions, RectTuple } from './geometry';

export {
    asCanvas,
    asTile,
    asWorld,
    convert,
    createTransformer,
    MapTransformer,
    transformerFor,
} from './coords';
export type { CanvasCoord, ConvertContext, CoordSpace, TileIndex, WorldCoord } from './coords';

export { Color, NAMED_COLORS } from './utils/color';
export type { ColorName, RgbaTuple } from './utils/color';
export { createRaster, cropRaster, getBoundingBox, getPixel } from './utils/raster';
export type { Raster } from './utils/raster';

export {
    LARGE_IMAGE_WARN_PX,
    OVERLAY_CONFIRM_THRESHOLD,
    TILE_SIZE_PX,
    ZOOM_BLOCKS_PER_PIXEL,
    ZOOM_LEVELS,
} from './constants/map';
export type { ZoomLevel } from './constants/map';
export { DEFAULT_COMBINER_STYLE, resolveCombinerStyle } from './constants/style';

export { loadCombinerStyle, parseCombinerStyle, serializeCombinerStyle } from './services/styleConfig';
export type { SerializedCombinerStyle } from './services/styleConfig';
export { decodeImage, encodeImage } from './services/imageCodec';
export type { ImageFormat } from './services/imageCodec';
export { listWorlds, parseTileName, scanTiles } from './services/tileScanner';
export { ThrottledProgress } from './services/progress';

export {
    CombineCancelledError,
    CombinerError,
    ConfigurationError,
    InternalError,
    isCombinerError,
    NoTilesFoundError,
    TileReadError,
} from './services/errors';
export type { CombinerErrorCode, ConfigurationErrorReason } from './services/errors';

export { configureLogging, createLogger, createMemoryLogSink } from './services/logger';
export type { LogEntry, Logger, LogSeverity, LogSink, MemoryLogSink } from './services/logger';
