import { LightnessImage } from '../imaging/LightnessImage.js';
import type { RecognitionPresets } from '../presets.js';

export type BackgroundPatch = 'line' | 'corner';

const INK = 0;
const PAPER = 255;
const BORDER_BAND = 3;

const NEIGHBOURS_4: ReadonlyArray<[number, number]> = [[1, 0], [-1, 0], [0, 1], [0, -1]];
const NEIGHBOURS_8: ReadonlyArray<[number, number]> = [
  ...NEIGHBOURS_4, [1, 1], [1, -1], [-1, 1], [-1, -1],
];

/**
 * Collect the component of `mask` (non-zero cells) connected to `seed`,
 * clearing it from the mask. Returns the cell indices visited.
 */
function takeComponent(
  mask: Uint8Array,
  width: number,
  height: number,
  seed: number,
  neighbours: ReadonlyArray<[number, number]>,
): number[] {
  if (!mask[seed]) return [];
  const component: number[] = [];
  const stack = [seed];
  mask[seed] = 0;
  while (stack.length > 0) {
    const idx = stack.pop();
    if (idx === undefined) break;
    component.push(idx);
    const x = idx % width;
    const y = (idx - x) / width;
    for (const [dx, dy] of neighbours) {
      const nx = x + dx;
      const ny = y + dy;
      if (nx < 0 || ny < 0 || nx >= width || ny >= height) continue;
      const n = ny * width + nx;
      if (mask[n]) {
        mask[n] = 0;
        stack.push(n);
      }
    }
  }
  return component;
}

/** Mean lightness of a corner patch; the whole crop when the patch falls outside it. */
export function sampleBackground(crop: LightnessImage, patch: readonly [number, number, number, number]): number {
  const [x0, y0, x1, y1] = patch;
  const region = crop.crop({ left: x0, top: y0, right: x1, bottom: y1 });
  return region.isEmpty ? crop.mean() : region.mean();
}

/** Background cut-off: sampled lightness plus the delta of the highest bound it reaches. */
export function backgroundThreshold(background: number, presets: RecognitionPresets): number {
  const sorted = [...presets.backgroundThresholds].sort((a, b) => a.bound - b.bound);
  const ratio = background / 255;
  let delta = sorted[0].delta;
  for (const t of sorted) {
    if (ratio >= t.bound) delta = t.delta;
  }
  return background + delta * 255;
}

/**
 * Turn a crop of outlined light text into black glyphs on white. Dark outline
 * and background are treated as a barrier, light regions reachable from the
 * top-left corner are background, oversized blobs and ink touching the border
 * are removed.
 */
export function prepareForRecognition(
  crop: LightnessImage,
  presets: RecognitionPresets,
  patch: BackgroundPatch,
): LightnessImage {
  const { width: w, height: h, data } = crop;
  const out = new Uint8Array(w * h).fill(PAPER);
  if (w === 0 || h === 0) return new LightnessImage(w, h, out);

  const bg = sampleBackground(crop, patch === 'line' ? presets.lineBgSampling : presets.cornerBgSampling);
  const bgThresh = backgroundThreshold(bg, presets);

  // 1 = bright glyph interior candidate
  const ink = new Uint8Array(w * h);
  for (let i = 0; i < data.length; i++) {
    const barrier = data[i] <= presets.outlineUpper || data[i] <= bgThresh;
    ink[i] = barrier ? 0 : 1;
  }

  takeComponent(ink, w, h, 0, NEIGHBOURS_4);

  const maxBlob = Math.floor(presets.blobFraction * w * h);
  const scratch = ink.slice();
  for (let i = 0; i < scratch.length; i++) {
    if (!scratch[i]) continue;
    const blob = takeComponent(scratch, w, h, i, NEIGHBOURS_8);
    if (blob.length > maxBlob) for (const idx of blob) ink[idx] = 0;
  }

  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      const nearBorder = x < BORDER_BAND || y < BORDER_BAND || x >= w - BORDER_BAND || y >= h - BORDER_BAND;
      if (nearBorder) takeComponent(ink, w, h, y * w + x, NEIGHBOURS_4);
    }
  }

  for (let i = 0; i < ink.length; i++) if (ink[i]) out[i] = INK;
  return new LightnessImage(w, h, out);
}
