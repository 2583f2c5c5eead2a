import type { Axis, LightnessImage } from '../imaging/LightnessImage.js';
import type { SamplerPreset } from '../presets.js';

export type Statistic = 'average' | 'minimum' | 'maximum';
export type ThresholdMode = 'absolute' | 'relative';

/** How a region collapses to a 1-D profile. */
export interface ProfileSpec {
  stat: Statistic;
  axis: Axis;
  mode: ThresholdMode;
}

export interface SamplePolicy extends ProfileSpec {
  /** 'max' takes the near-maximum band, 'avg' the mean of the whole profile. */
  pick: 'max' | 'avg';
}

/**
 * One value per row ('row') or per column ('col'), normalized to [0, 1].
 */
export function reduceProfile(image: LightnessImage, stat: Statistic, axis: Axis): number[] {
  const { width, height, data } = image;
  const outer = axis === 'row' ? height : width;
  const inner = axis === 'row' ? width : height;
  const profile = new Array<number>(outer);
  for (let o = 0; o < outer; o++) {
    let acc = stat === 'minimum' ? 255 : 0;
    for (let i = 0; i < inner; i++) {
      const v = axis === 'row' ? data[o * width + i] : data[i * width + o];
      if (stat === 'average') acc += v;
      else if (stat === 'minimum') { if (v < acc) acc = v; }
      else if (v > acc) acc = v;
    }
    profile[o] = inner === 0 ? 0 : (stat === 'average' ? acc / inner : acc) / 255;
  }
  return profile;
}

/** Rescale a profile to its own [min, max] range; a flat profile maps to zeros. */
export function normalizeRange(profile: readonly number[]): number[] {
  if (profile.length === 0) return [];
  let lo = Infinity;
  let hi = -Infinity;
  for (const v of profile) {
    if (v < lo) lo = v;
    if (v > hi) hi = v;
  }
  const span = hi - lo;
  return span === 0 ? profile.map(() => 0) : profile.map(v => (v - lo) / span);
}

export function profileOf(image: LightnessImage, spec: ProfileSpec): number[] {
  const raw = reduceProfile(image, spec.stat, spec.axis);
  return spec.mode === 'relative' ? normalizeRange(raw) : raw;
}

const mean = (values: readonly number[]) =>
  values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;

/**
 * Representative extreme of a profile. With `exclude`, values at or above
 * `exclude - tolerance` are discounted first so a local extreme can be found
 * beneath a known global one.
 */
export function representative(
  values: readonly number[],
  pick: SamplePolicy['pick'],
  tolerance: number,
  exclude?: number,
): number {
  let pool = values;
  if (exclude !== undefined) {
    const below = values.filter(v => v < exclude - tolerance);
    if (below.length > 0) pool = below;
  }
  if (pool.length === 0) return 0;
  if (pick === 'avg') return mean(pool);

  const top = Math.max(...pool);
  return mean(pool.filter(v => v >= top - tolerance));
}

/** Sample a scaled threshold from a region. */
export function sampleThreshold(
  image: LightnessImage,
  policy: SamplePolicy,
  preset: SamplerPreset,
  exclude?: number,
): number {
  const profile = profileOf(image, policy);
  return representative(profile, policy.pick, preset.repCharTol, exclude) * preset.filterScale;
}
