/**
 * Validation and defaults for the records callers hand to the engine.
 * Saved templates and CLI flags are untrusted; everything passes through
 * these schemas before it reaches a renderer.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_MARGIN_PX } from './geometry/placement.js';
import type { ExportOptions, PlacementRule, WatermarkSpec } from './types.js';

export const DEFAULT_JPEG_QUALITY = 95;
export const DEFAULT_PREFIX = 'wm_';
export const DEFAULT_SUFFIX = '_watermarked';
export const DEFAULT_FONT_SIZE = 36;
export const DEFAULT_COLOR = '#FFFFFF';

const percent = z.number().min(0).max(100);

export const textWatermarkSchema = z.object({
  kind: z.literal('text'),
  content: z.string(),
  fontFamily: z.string().default(''),
  fontPath: z.string().min(1).optional(),
  fontSizePx: z.number().int().positive().default(DEFAULT_FONT_SIZE),
  bold: z.boolean().default(false),
  italic: z.boolean().default(false),
  color: z.string().default(DEFAULT_COLOR),
  opacityPercent: percent.default(100),
  shadowEnabled: z.boolean().default(true),
});

export const imageWatermarkSchema = z.object({
  kind: z.literal('image'),
  sourcePath: z.string().min(1),
  scalePercent: z.number().min(10).max(100).default(100),
  opacityPercent: percent.default(100),
});

export const watermarkSpecSchema = z.discriminatedUnion('kind', [
  textWatermarkSchema,
  imageWatermarkSchema,
]);

export const anchorSchema = z.enum(['top-left', 'top-right', 'bottom-left', 'bottom-right', 'center']);

export const placementRuleSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('preset'),
    anchor: anchorSchema,
    marginPx: z.number().int().min(0).default(DEFAULT_MARGIN_PX),
  }),
  z.object({
    kind: z.literal('custom'),
    previewX: z.number().finite(),
    previewY: z.number().finite(),
    previewCanvasWidth: z.number().positive(),
    previewCanvasHeight: z.number().positive(),
    marginPx: z.number().int().min(0).optional(),
  }),
]);

export const namingPolicySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('keep') }),
  z.object({ kind: z.literal('prefix'), prefix: z.string().default(DEFAULT_PREFIX) }),
  z.object({ kind: z.literal('suffix'), suffix: z.string().default(DEFAULT_SUFFIX) }),
]);

export const exportOptionsSchema = z.object({
  outputFormat: z.enum(['jpeg', 'png']).default('jpeg'),
  jpegQuality: percent.default(DEFAULT_JPEG_QUALITY),
  namingPolicy: namingPolicySchema.default({ kind: 'keep' }),
});

/**
 * Flags accepted by the date-watermark CLI
 */
export const dateStampOptionsSchema = z.object({
  fontSize: z.number().int().positive().default(DEFAULT_FONT_SIZE),
  color: z.string().default(DEFAULT_COLOR),
  position: z.enum(['tl', 'tr', 'bl', 'br', 'center']).default('br'),
  margin: z.number().int().min(0).default(DEFAULT_MARGIN_PX),
  font: z.string().min(1).optional(),
});

export type DateStampOptions = z.infer<typeof dateStampOptionsSchema>;

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message));
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, subject: string, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) throw new ConfigError(subject, issuesOf(result.error));
  return result.data;
}

/**
 * @throws ConfigError
 */
export function parseWatermarkSpec(input: unknown): WatermarkSpec {
  return parseWith(watermarkSpecSchema, 'watermark', input);
}

/**
 * A custom rule without a usable preview canvas size is rejected here.
 *
 * @throws ConfigError
 */
export function parsePlacementRule(input: unknown): PlacementRule {
  return parseWith(placementRuleSchema, 'placement', input);
}

/**
 * @throws ConfigError
 */
export function parseExportOptions(input: unknown): ExportOptions {
  return parseWith(exportOptionsSchema, 'export options', input);
}

/**
 * @throws ConfigError
 */
export function parseDateStampOptions(input: unknown): DateStampOptions {
  return parseWith(dateStampOptionsSchema, 'options', input);
}
