/**
 * Base error class for photomark errors
 */
export class PhotomarkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PhotomarkError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when a preview point cannot be mapped to full resolution
 * because the recorded preview canvas has no area
 */
export class InvalidTransformError extends PhotomarkError {
  public readonly previewWidth: number;
  public readonly previewHeight: number;

  constructor(previewWidth: number, previewHeight: number) {
    super(`Invalid preview canvas size ${previewWidth}x${previewHeight}`);
    this.name = 'InvalidTransformError';
    this.previewWidth = previewWidth;
    this.previewHeight = previewHeight;
  }
}

/**
 * Raised by a font provider that could not produce a face.
 * The renderer moves on to the next provider.
 */
export class FontResolutionError extends PhotomarkError {
  public readonly source: string;

  constructor(source: string, message: string) {
    super(`Font resolution failed (${source}): ${message}`);
    this.name = 'FontResolutionError';
    this.source = source;
  }
}

/**
 * Thrown when a colour string cannot be parsed
 */
export class InvalidColorError extends PhotomarkError {
  public readonly value: string;

  constructor(value: string) {
    super(`Invalid color: ${value}`);
    this.name = 'InvalidColorError';
    this.value = value;
  }
}

/**
 * The overlay image of an image watermark is missing or unreadable
 */
export class MissingOverlayAssetError extends PhotomarkError {
  public readonly path: string;

  constructor(path: string, reason?: string) {
    super(reason ? `Overlay image unavailable: ${path} (${reason})` : `Overlay image unavailable: ${path}`);
    this.name = 'MissingOverlayAssetError';
    this.path = path;
  }
}

/**
 * The source file carries no capture-date tag
 */
export class MissingMetadataDateError extends PhotomarkError {
  public readonly path: string;

  constructor(path: string) {
    super(`No EXIF date found: ${path}`);
    this.name = 'MissingMetadataDateError';
    this.path = path;
  }
}

/**
 * Thrown when image bytes cannot be decoded into pixels
 */
export class DecodeError extends PhotomarkError {
  constructor(message: string) {
    super(`Decode failed: ${message}`);
    this.name = 'DecodeError';
  }
}

/**
 * Thrown when pixels cannot be encoded to the requested format
 */
export class EncodeError extends PhotomarkError {
  constructor(message: string) {
    super(`Encode failed: ${message}`);
    this.name = 'EncodeError';
  }
}

/**
 * Thrown when an encoded image cannot be written to its destination
 */
export class WriteError extends PhotomarkError {
  public readonly path: string;

  constructor(path: string, message: string) {
    super(`Write failed for ${path}: ${message}`);
    this.name = 'WriteError';
    this.path = path;
  }
}

/**
 * Thrown when a watermark, placement or export record fails validation
 */
export class ConfigError extends PhotomarkError {
  public readonly issues: string[];

  constructor(subject: string, issues: string[]) {
    super(`Invalid ${subject}: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Thrown when the image file is corrupted or malformed
 */
export class CorruptedFileError extends PhotomarkError {
  public readonly offset: number | undefined;

  constructor(message: string, offset?: number) {
    super(offset !== undefined ? `${message} at offset ${offset}` : message);
    this.name = 'CorruptedFileError';
    this.offset = offset;
  }
}

/**
 * Thrown when attempting to read beyond buffer bounds
 */
export class BufferOverflowError extends PhotomarkError {
  public readonly requested: number;
  public readonly available: number;

  constructor(requested: number, available: number) {
    super(`Buffer overflow: requested ${requested} bytes but only ${available} available`);
    this.name = 'BufferOverflowError';
    this.requested = requested;
    this.available = available;
  }
}

/**
 * Render an unknown thrown value as a one-line reason
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
