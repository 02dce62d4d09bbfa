export { Coord2f, Coord2i, type Coord2fOperand, type Coord2iOperand, type CoordTuple } from './coord';
export { Grid, type GridOptions, type GridOriginMode } from './grid';
export { Rect, type RectTuple, type ResizeOptions } from './rect';
