export { OverlayRenderer, copyPreview, OVERLAY_COLORS, HINT_TEXT, EDIT_HINT_TEXT } from './OverlayRenderer';
export type { FrameInput, FrameResult, OverlayRendererEvents } from './OverlayRenderer';
export { CanvasSurface } from './CanvasSurface';
export { CanvasManager } from './CanvasManager';
export type { CanvasInputHandler, CanvasManagerEvents } from './CanvasManager';
export type {
  RenderSurface,
  RasterImage,
  TextPaint,
  StrokePaint,
  TextAlign,
  TextBaseline
} from './types';
