/**
 * Image formats the engine can read
 */
export type SupportedFormat = 'jpeg' | 'png' | 'bmp' | 'tiff' | 'webp' | 'unknown';

/**
 * Formats a batch export can write
 */
export type OutputFormat = 'jpeg' | 'png';

/**
 * 8-bit interleaved pixel buffer, row-major, no row padding.
 * 3 channels = opaque RGB, 4 channels = RGBA with straight alpha.
 */
export interface RasterImage {
  readonly width: number;
  readonly height: number;
  readonly channels: 3 | 4;
  readonly data: Uint8Array;
}

export interface Size {
  readonly width: number;
  readonly height: number;
}

export interface Point {
  readonly x: number;
  readonly y: number;
}

// ─── Watermark ────────────────────────────────────────────────────────────────

export interface TextWatermarkSpec {
  readonly kind: 'text';
  readonly content: string;
  readonly fontFamily: string;
  /** Explicit TrueType/OpenType file, tried before the family name */
  readonly fontPath?: string;
  readonly fontSizePx: number;
  readonly bold: boolean;
  readonly italic: boolean;
  /** `#RGB`, `#RRGGBB`, `rgb(r, g, b)` or a basic colour name */
  readonly color: string;
  /** 0..100 */
  readonly opacityPercent: number;
  readonly shadowEnabled: boolean;
}

export interface ImageWatermarkSpec {
  readonly kind: 'image';
  readonly sourcePath: string;
  /** 10..100 */
  readonly scalePercent: number;
  /** 0..100 */
  readonly opacityPercent: number;
}

/**
 * Exactly one watermark is applied per export.
 */
export type WatermarkSpec = TextWatermarkSpec | ImageWatermarkSpec;

// ─── Placement ────────────────────────────────────────────────────────────────

export type Anchor = 'top-left' | 'top-right' | 'bottom-left' | 'bottom-right' | 'center';

export interface PresetPlacement {
  readonly kind: 'preset';
  readonly anchor: Anchor;
  readonly marginPx: number;
}

/**
 * A point picked on a preview canvas. The canvas size it was captured
 * against travels with it so it can be mapped onto any raster size.
 */
export interface CustomPlacement {
  readonly kind: 'custom';
  readonly previewX: number;
  readonly previewY: number;
  readonly previewCanvasWidth: number;
  readonly previewCanvasHeight: number;
  /** Margin used if the rule has to fall back to a preset */
  readonly marginPx?: number;
}

export type PlacementRule = PresetPlacement | CustomPlacement;

// ─── Export ───────────────────────────────────────────────────────────────────

export type NamingPolicy =
  | { readonly kind: 'keep' }
  | { readonly kind: 'prefix'; readonly prefix: string }
  | { readonly kind: 'suffix'; readonly suffix: string };

export interface ExportOptions {
  readonly outputFormat: OutputFormat;
  /** 0..100, JPEG only */
  readonly jpegQuality: number;
  readonly namingPolicy: NamingPolicy;
}

/**
 * Raw capture-date tags as found in an EXIF block
 */
export interface CaptureDateTags {
  dateTimeOriginal?: string;
  dateTimeDigitized?: string;
  dateTime?: string;
}

// ─── Batch ────────────────────────────────────────────────────────────────────

export interface BatchFailure {
  path: string;
  reason: string;
}

export interface BatchProgress {
  /** Files finished so far, including this one */
  completed: number;
  total: number;
  path: string;
  ok: boolean;
}

/**
 * Result of `runBatch()`. Both lists keep input order.
 */
export interface BatchResult {
  succeeded: string[];
  failed: BatchFailure[];
  /** `true` when the run stopped early because its signal was aborted */
  cancelled: boolean;
}
