export {
  clampZoom,
  stepZoom,
  wheelZoom,
  computeFitScale,
  resolveViewTransform,
  projectPoint,
  unprojectPoint,
  projectRect,
  unprojectRect,
  pageScreenRect,
  toScreen,
  toDoc,
  toScreenRect,
  toDocRect,
  rectContainsPoint,
  expandRect
} from './CoordinateTransform';

export type { TransformOptions, ZoomLimits, ViewTransform } from './CoordinateTransform';
