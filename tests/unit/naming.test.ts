import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { outputFileName, outputPathFor, fileStem } from '../../src/operations/naming.js';

describe('outputFileName', () => {
  it('should add the prefix and the output extension', () => {
    expect(outputFileName('/in/photo.png', { outputFormat: 'jpeg', namingPolicy: { kind: 'prefix', prefix: 'wm_' } })).toBe(
      'wm_photo.jpg',
    );
  });

  it('should add the suffix before the extension', () => {
    expect(
      outputFileName('/in/IMG_0001.JPG', { outputFormat: 'png', namingPolicy: { kind: 'suffix', suffix: '_watermarked' } }),
    ).toBe('IMG_0001_watermarked.png');
  });

  it('should keep the stem and swap the extension', () => {
    expect(outputFileName('/in/holiday.tiff', { outputFormat: 'jpeg', namingPolicy: { kind: 'keep' } })).toBe(
      'holiday.jpg',
    );
  });

  it('should only strip the last extension', () => {
    expect(fileStem('/in/archive.2023.jpg')).toBe('archive.2023');
  });
});

describe('outputPathFor', () => {
  it('should join the output directory', () => {
    expect(outputPathFor('/in/a.bmp', '/out', { outputFormat: 'png', namingPolicy: { kind: 'keep' } })).toBe(
      join('/out', 'a.png'),
    );
  });
});
