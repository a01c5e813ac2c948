export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface Rect extends Point, Size {}

/**
 * Which corner of the page document-space Y is measured from.
 */
export type OriginConvention = 'topLeft' | 'bottomLeft';

/**
 * How the page is fitted into the panel before user zoom.
 * - 'uniformFit': largest scale at which the whole page fits (aspect preserved)
 * - 'widthOnly': page width fills the panel width
 */
export type FitStrategy = 'uniformFit' | 'widthOnly';

export type ItemType =
  | 'Text'
  | 'Title'
  | 'Header'
  | 'Table'
  | 'FormLabel'
  | 'FormField'
  | 'Checkbox';

export const ITEM_TYPES: readonly ItemType[] = [
  'Text',
  'Title',
  'Header',
  'Table',
  'FormLabel',
  'FormField',
  'Checkbox'
];

/**
 * Document-space rectangle of an item. `height` is always non-negative once
 * an item has been normalized.
 */
export interface BoundingBox {
  left: number;
  top: number;
  width: number;
  height: number;
}

/**
 * One positioned text fragment.
 */
export interface DocumentItem {
  readonly id: string;
  readonly bbox: Readonly<BoundingBox>;
  /** Source text. Never mutated; user edits live in the text overrides. */
  readonly content: string;
  readonly fontSize: number;
  readonly bold: boolean;
  readonly italic: boolean;
  readonly itemType: ItemType;
}

export interface ItemOffset {
  dx: number;
  dy: number;
}

/**
 * Per-frame render input.
 */
export interface DocumentState {
  /** Paint order; later items paint over (and win hit-tests against) earlier ones */
  readonly items: readonly DocumentItem[];
  readonly pageSize: Readonly<Size>;
  readonly zoom: number;
  readonly offset: Readonly<Point>;
  readonly searchQuery: string;
  readonly searchResults: ReadonlySet<string>;
  readonly itemOffsets: ReadonlyMap<string, ItemOffset>;
  readonly itemTextOverrides: ReadonlyMap<string, string>;
  readonly columnCount: number;
  readonly columnBoundaries: readonly number[];
  readonly editMode: boolean;
}

/**
 * View parameters consumed by the coordinate transform.
 */
export interface ViewParams {
  panelSize: Size;
  pageSize: Size;
  zoom: number;
  pan: Point;
}

export type CursorStyle = 'default' | 'pointer' | 'grab' | 'grabbing' | 'move';

/**
 * Engine options. Every field is optional; see DEFAULT_OVERLAY_OPTIONS.
 */
export interface OverlayOptions {
  originConvention?: OriginConvention;
  fitStrategy?: FitStrategy;
  /** Text longer than this many characters is wrap-eligible */
  wrapThreshold?: number;
  /** Pixels added on every side of a measured glyph rect for hit-testing */
  hitPadding?: number;

  /** Screen-space margin left of the page origin */
  marginX?: number;
  /** Screen-space margin above the page origin (leaves room for the status line) */
  marginY?: number;
  minZoom?: number;
  maxZoom?: number;
  /** Multiplier applied by one zoom-in step (divisor for zoom-out) */
  zoomStep?: number;
  /** Zoom change per unit of wheel delta */
  wheelZoomFactor?: number;
  /** Reference page size when the extraction carries none (US Letter) */
  defaultPageSize?: Size;

  minFontSize?: number;
  maxFontSize?: number;
  /** Substituted for missing or non-positive font sizes (document units) */
  defaultFontSize?: number;
  fontFamily?: string;
  lineHeightFactor?: number;
  /** Upper bound on the width of wrap-eligible text */
  wrapCapWidth?: number;
  /** Phrases that make text wrap-eligible regardless of length */
  wrapTriggers?: string[];
  /** Slack factor applied to the bbox width of single-line text */
  singleLineSlack?: number;
  /** Floor for any layout width */
  singleLineMinWidth?: number;
  /** Space kept free at the right edge of the panel when wrapping */
  rightMargin?: number;
  maxLines?: number;

  /** Pointer travel (px) before a press becomes a drag */
  dragThreshold?: number;
  doubleClickThreshold?: number;
  doubleClickDistance?: number;
  /** How long the "copied" toast stays up (ms) */
  copyToastDuration?: number;
  copyPreviewLength?: number;

  /** Monotonic clock in milliseconds */
  now?: () => number;
}

export type ResolvedOverlayOptions = Required<OverlayOptions>;

export const DEFAULT_OVERLAY_OPTIONS: ResolvedOverlayOptions = {
  originConvention: 'topLeft',
  fitStrategy: 'uniformFit',
  wrapThreshold: 50,
  hitPadding: 2,

  marginX: 20,
  marginY: 50,
  minZoom: 0.5,
  maxZoom: 3.0,
  zoomStep: 1.2,
  wheelZoomFactor: 0.001,
  defaultPageSize: { width: 612, height: 792 },

  minFontSize: 8,
  maxFontSize: 24,
  defaultFontSize: 12,
  fontFamily: 'sans-serif',
  lineHeightFactor: 1.2,
  wrapCapWidth: 400,
  wrapTriggers: ['must be signed'],
  singleLineSlack: 1.1,
  singleLineMinWidth: 40,
  rightMargin: 20,
  maxLines: 10,

  dragThreshold: 3,
  doubleClickThreshold: 300,
  doubleClickDistance: 5,
  copyToastDuration: 2000,
  copyPreviewLength: 50,

  now: () => performance.now()
};

function positive(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : fallback;
}

function nonNegative(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value >= 0 ? value : fallback;
}

/**
 * Merge user options over the defaults. Out-of-range numbers fall back to the
 * default instead of being rejected.
 */
export function resolveOverlayOptions(options: OverlayOptions = {}): ResolvedOverlayOptions {
  const d = DEFAULT_OVERLAY_OPTIONS;
  const minZoom = positive(options.minZoom, d.minZoom);
  const maxZoom = Math.max(minZoom, positive(options.maxZoom, d.maxZoom));
  const minFontSize = positive(options.minFontSize, d.minFontSize);
  const maxFontSize = Math.max(minFontSize, positive(options.maxFontSize, d.maxFontSize));
  const pageSize = options.defaultPageSize;

  return {
    originConvention: options.originConvention ?? d.originConvention,
    fitStrategy: options.fitStrategy ?? d.fitStrategy,
    wrapThreshold: nonNegative(options.wrapThreshold, d.wrapThreshold),
    hitPadding: nonNegative(options.hitPadding, d.hitPadding),

    marginX: options.marginX !== undefined && Number.isFinite(options.marginX) ? options.marginX : d.marginX,
    marginY: options.marginY !== undefined && Number.isFinite(options.marginY) ? options.marginY : d.marginY,
    minZoom,
    maxZoom,
    zoomStep: Math.max(1.0001, positive(options.zoomStep, d.zoomStep)),
    wheelZoomFactor: positive(options.wheelZoomFactor, d.wheelZoomFactor),
    defaultPageSize: {
      width: positive(pageSize?.width, d.defaultPageSize.width),
      height: positive(pageSize?.height, d.defaultPageSize.height)
    },

    minFontSize,
    maxFontSize,
    defaultFontSize: positive(options.defaultFontSize, d.defaultFontSize),
    fontFamily: options.fontFamily || d.fontFamily,
    lineHeightFactor: positive(options.lineHeightFactor, d.lineHeightFactor),
    wrapCapWidth: positive(options.wrapCapWidth, d.wrapCapWidth),
    wrapTriggers: options.wrapTriggers ? [...options.wrapTriggers] : [...d.wrapTriggers],
    singleLineSlack: positive(options.singleLineSlack, d.singleLineSlack),
    singleLineMinWidth: positive(options.singleLineMinWidth, d.singleLineMinWidth),
    rightMargin: nonNegative(options.rightMargin, d.rightMargin),
    maxLines: Math.max(1, Math.floor(positive(options.maxLines, d.maxLines))),

    dragThreshold: nonNegative(options.dragThreshold, d.dragThreshold),
    doubleClickThreshold: nonNegative(options.doubleClickThreshold, d.doubleClickThreshold),
    doubleClickDistance: nonNegative(options.doubleClickDistance, d.doubleClickDistance),
    copyToastDuration: nonNegative(options.copyToastDuration, d.copyToastDuration),
    copyPreviewLength: Math.max(1, Math.floor(positive(options.copyPreviewLength, d.copyPreviewLength))),

    now: options.now ?? d.now
  };
}
