/**
 * photomark - watermark compositing engine
 *
 * Text and image watermarks, preview-to-full-resolution placement,
 * EXIF capture-date extraction and batch export.
 *
 * @packageDocumentation
 */

// Rendering
export { renderWatermark, renderTextWatermark, renderImageWatermark, shadowOffset, scaledSize } from './render/index.js';
export type { RenderDeps, TextRenderDeps, ImageRenderDeps } from './render/index.js';

// Placement
export { toFullRes } from './geometry/transform.js';
export { resolvePlacement, anchorPosition, DEFAULT_MARGIN_PX } from './geometry/placement.js';

// Capture dates
export { extractExifDate, readExifDate, isCalendarDate } from './exif/date.js';
export { readCaptureDateTags } from './exif/reader.js';
export { locateExifBlock } from './exif/locate.js';

// Export
export { runBatch, planOutputs } from './operations/batch.js';
export type { BatchOptions } from './operations/batch.js';
export { exportFile } from './operations/export.js';
export { outputFileName, outputPathFor } from './operations/naming.js';
export { collectImageFiles, sharesSourceDirectory } from './operations/files.js';
export { fitPreviewSize, renderPreview, customPlacementFromPreview } from './operations/preview.js';
export type { PreviewResult } from './operations/preview.js';
export { stampCaptureDate, dateStampOutputDir } from './operations/date-stamp.js';
export type { DateStampResult } from './operations/date-stamp.js';

// Pixels and codecs
export { decodeImage, encodeImage, resizeRaster, fadeRaster, compositeRaster } from './raster/codec.js';
export type { EncodeFormat, EncodeOptions } from './raster/codec.js';
export { createRaster, withAlpha, withoutAlpha } from './raster/raster.js';

// Text
export { parseColor } from './text/color.js';
export { resolveFont, DEFAULT_FONT_PROVIDERS } from './text/fonts.js';
export type { FontProvider, FontHandle, FontRequest } from './text/fonts.js';
export { canvasRasterizer } from './text/rasterizer.js';
export type { GlyphRasterizer } from './text/rasterizer.js';

// Configuration
export {
  parseWatermarkSpec,
  parsePlacementRule,
  parseExportOptions,
  parseDateStampOptions,
} from './config.js';
export type { DateStampOptions } from './config.js';

// Format detection
export { detectFormat } from './detect.js';

// Logging
export { consoleLogger, silentLogger } from './log.js';
export type { Logger } from './log.js';

// Types
export type * from './types.js';

// Error classes
export {
  PhotomarkError,
  InvalidTransformError,
  FontResolutionError,
  InvalidColorError,
  MissingOverlayAssetError,
  MissingMetadataDateError,
  DecodeError,
  EncodeError,
  WriteError,
  ConfigError,
  CorruptedFileError,
  BufferOverflowError,
} from './errors.js';
