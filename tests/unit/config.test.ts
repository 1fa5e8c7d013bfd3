import { describe, it, expect } from 'vitest';
import {
  parseWatermarkSpec,
  parsePlacementRule,
  parseExportOptions,
  parseDateStampOptions,
} from '../../src/config.js';
import { ConfigError } from '../../src/errors.js';

describe('parseWatermarkSpec', () => {
  it('should fill text defaults', () => {
    expect(parseWatermarkSpec({ kind: 'text', content: '© Studio' })).toEqual({
      kind: 'text',
      content: '© Studio',
      fontFamily: '',
      fontSizePx: 36,
      bold: false,
      italic: false,
      color: '#FFFFFF',
      opacityPercent: 100,
      shadowEnabled: true,
    });
  });

  it('should fill image defaults', () => {
    expect(parseWatermarkSpec({ kind: 'image', sourcePath: '/logos/mark.png' })).toEqual({
      kind: 'image',
      sourcePath: '/logos/mark.png',
      scalePercent: 100,
      opacityPercent: 100,
    });
  });

  it('should reject scale below ten percent', () => {
    expect(() => parseWatermarkSpec({ kind: 'image', sourcePath: '/a.png', scalePercent: 5 })).toThrow(ConfigError);
  });

  it('should name the failing field', () => {
    expect(() => parseWatermarkSpec({ kind: 'text', content: 'x', opacityPercent: 150 })).toThrow(
      /^Invalid watermark: opacityPercent: /,
    );
  });
});

describe('parsePlacementRule', () => {
  it('should default the preset margin', () => {
    expect(parsePlacementRule({ kind: 'preset', anchor: 'center' })).toEqual({
      kind: 'preset',
      anchor: 'center',
      marginPx: 12,
    });
  });

  it('should reject a custom rule without a canvas size', () => {
    expect(() =>
      parsePlacementRule({ kind: 'custom', previewX: 1, previewY: 1, previewCanvasWidth: 0, previewCanvasHeight: 10 }),
    ).toThrow(ConfigError);
  });

  it('should reject unknown anchors', () => {
    expect(() => parsePlacementRule({ kind: 'preset', anchor: 'middle' })).toThrow(/^Invalid placement: /);
  });
});

describe('parseExportOptions', () => {
  it('should default to JPEG at quality 95 keeping names', () => {
    expect(parseExportOptions({})).toEqual({
      outputFormat: 'jpeg',
      jpegQuality: 95,
      namingPolicy: { kind: 'keep' },
    });
  });

  it('should default the prefix and suffix', () => {
    expect(parseExportOptions({ namingPolicy: { kind: 'prefix' } }).namingPolicy).toEqual({
      kind: 'prefix',
      prefix: 'wm_',
    });
    expect(parseExportOptions({ namingPolicy: { kind: 'suffix' } }).namingPolicy).toEqual({
      kind: 'suffix',
      suffix: '_watermarked',
    });
  });
});

describe('parseDateStampOptions', () => {
  it('should apply the CLI defaults', () => {
    expect(parseDateStampOptions({})).toEqual({ fontSize: 36, color: '#FFFFFF', position: 'br', margin: 12 });
  });

  it('should reject an unknown position', () => {
    expect(() => parseDateStampOptions({ position: 'middle' })).toThrow(ConfigError);
  });
});
