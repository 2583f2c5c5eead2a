import { describe, it, expect } from 'vitest';
import { classifyStar, readScore } from '../src/extraction/stars.js';
import { LightnessImage } from '../src/imaging/LightnessImage.js';
import { parseProcessingPresets } from '../src/presets.js';

const presets = parseProcessingPresets({ starMargin: 1 });

/** `width` x `height` at 90 with `paint` applied to columns `cols` on rows 3..6. */
function slot(width: number, height: number, marks: ReadonlyArray<[number[], number]>): LightnessImage {
  const data = new Uint8Array(width * height).fill(90);
  for (const [cols, value] of marks) {
    for (let y = 3; y <= 6; y++) for (const x of cols) data[y * width + x] = value;
  }
  return new LightnessImage(width, height, data);
}

describe('classifyStar', () => {
  it('reads a white core as a new star', () => {
    expect(classifyStar(slot(6, 10, [[[2, 3], 255]]), presets)).toBe('☆');
  });

  it('reads a shaded glyph as an old star', () => {
    expect(classifyStar(slot(6, 10, [[[2, 3], 180]]), presets)).toBe('★');
  });

  it('reads a flat slot as empty', () => {
    expect(classifyStar(slot(6, 10, []), presets)).toBe('_');
  });

  it('ignores glyph pixels inside the side margin', () => {
    expect(classifyStar(slot(6, 10, [[[0, 5], 255]]), presets)).toBe('_');
  });
});

describe('readScore', () => {
  it('classifies three equal slots left to right', () => {
    const row = slot(18, 10, [[[2, 3], 180], [[8, 9], 255]]);
    expect(readScore(row, presets)).toBe('★☆_');
  });

  it('falls back to the full height when no glyph rows are found', () => {
    expect(readScore(LightnessImage.filled(18, 10, 90), presets)).toBe('___');
  });
});
