/**
 * Document space <-> screen space mapping.
 *
 * screen = margin + pan + doc * fitScale * zoom
 *
 * With a bottom-left origin the document Y axis is flipped against the page
 * height before scaling. All functions here are pure.
 */

import type {
  FitStrategy,
  OriginConvention,
  Point,
  Rect,
  ResolvedOverlayOptions,
  Size,
  ViewParams
} from '../types';

export type TransformOptions = Pick<
  ResolvedOverlayOptions,
  'fitStrategy' | 'originConvention' | 'marginX' | 'marginY' | 'minZoom' | 'maxZoom'
>;

export type ZoomLimits = Pick<ResolvedOverlayOptions, 'minZoom' | 'maxZoom'>;

/**
 * A view resolved into the numbers needed to project points.
 */
export interface ViewTransform {
  /** fitScale * zoom */
  scale: number;
  fitScale: number;
  zoom: number;
  /** Screen position of the document origin (margins plus pan) */
  originX: number;
  originY: number;
  pageHeight: number;
  origin: OriginConvention;
}

/**
 * Clamp a zoom value into the supported range.
 * Non-finite values resolve to the minimum.
 */
export function clampZoom(zoom: number, limits: ZoomLimits): number {
  if (!Number.isFinite(zoom)) return limits.minZoom;
  return Math.max(limits.minZoom, Math.min(limits.maxZoom, zoom));
}

/**
 * Apply one discrete zoom step (multiply on 'in', divide on 'out').
 */
export function stepZoom(
  zoom: number,
  direction: 'in' | 'out',
  step: number,
  limits: ZoomLimits
): number {
  const next = direction === 'in' ? zoom * step : zoom / step;
  return clampZoom(next, limits);
}

/**
 * Continuous zoom from a wheel delta. Positive delta zooms in.
 */
export function wheelZoom(
  zoom: number,
  delta: number,
  factor: number,
  limits: ZoomLimits
): number {
  const multiplier = 1 + delta * factor;
  if (multiplier <= 0) return limits.minZoom;
  return clampZoom(zoom * multiplier, limits);
}

/**
 * Scale that maps the page into the panel with no user zoom.
 * Degenerate sizes resolve to 1.
 */
export function computeFitScale(panelSize: Size, pageSize: Size, strategy: FitStrategy): number {
  if (pageSize.width <= 0 || pageSize.height <= 0 || panelSize.width <= 0) {
    return 1;
  }

  const widthScale = panelSize.width / pageSize.width;
  if (strategy === 'widthOnly') {
    return widthScale;
  }

  if (panelSize.height <= 0) {
    return 1;
  }
  return Math.min(widthScale, panelSize.height / pageSize.height);
}

export function resolveViewTransform(view: ViewParams, options: TransformOptions): ViewTransform {
  const fitScale = computeFitScale(view.panelSize, view.pageSize, options.fitStrategy);
  const zoom = clampZoom(view.zoom, options);

  return {
    scale: fitScale * zoom,
    fitScale,
    zoom,
    originX: options.marginX + view.pan.x,
    originY: options.marginY + view.pan.y,
    pageHeight: view.pageSize.height,
    origin: options.originConvention
  };
}

export function projectPoint(t: ViewTransform, p: Point): Point {
  const docY = t.origin === 'bottomLeft' ? t.pageHeight - p.y : p.y;
  return {
    x: t.originX + p.x * t.scale,
    y: t.originY + docY * t.scale
  };
}

export function unprojectPoint(t: ViewTransform, p: Point): Point {
  const x = (p.x - t.originX) / t.scale;
  const y = (p.y - t.originY) / t.scale;
  return {
    x,
    y: t.origin === 'bottomLeft' ? t.pageHeight - y : y
  };
}

/**
 * Project a document rect given by its top edge. In bottom-left convention
 * `top` is the larger Y value; the screen rect still grows downward.
 */
export function projectRect(t: ViewTransform, rect: Rect): Rect {
  const topLeft = projectPoint(t, rect);
  return {
    x: topLeft.x,
    y: topLeft.y,
    width: rect.width * t.scale,
    height: Math.abs(rect.height) * t.scale
  };
}

/**
 * Screen rect covered by the whole page.
 */
export function pageScreenRect(t: ViewTransform, pageSize: Size): Rect {
  return {
    x: t.originX,
    y: t.originY,
    width: pageSize.width * t.scale,
    height: pageSize.height * t.scale
  };
}

export function unprojectRect(t: ViewTransform, rect: Rect): Rect {
  const topLeft = unprojectPoint(t, rect);
  return {
    x: topLeft.x,
    y: topLeft.y,
    width: rect.width / t.scale,
    height: rect.height / t.scale
  };
}

export function toScreen(docPoint: Point, view: ViewParams, options: TransformOptions): Point {
  return projectPoint(resolveViewTransform(view, options), docPoint);
}

export function toDoc(screenPoint: Point, view: ViewParams, options: TransformOptions): Point {
  return unprojectPoint(resolveViewTransform(view, options), screenPoint);
}

export function toScreenRect(docRect: Rect, view: ViewParams, options: TransformOptions): Rect {
  return projectRect(resolveViewTransform(view, options), docRect);
}

export function toDocRect(screenRect: Rect, view: ViewParams, options: TransformOptions): Rect {
  return unprojectRect(resolveViewTransform(view, options), screenRect);
}

export function rectContainsPoint(rect: Rect, p: Point): boolean {
  return p.x >= rect.x && p.x <= rect.x + rect.width && p.y >= rect.y && p.y <= rect.y + rect.height;
}

export function expandRect(rect: Rect, amount: number): Rect {
  return {
    x: rect.x - amount,
    y: rect.y - amount,
    width: rect.width + amount * 2,
    height: rect.height + amount * 2
  };
}
