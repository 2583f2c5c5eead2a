import type { Axis, LightnessImage } from '../imaging/LightnessImage.js';
import { profileOf, reduceProfile, type ProfileSpec, type Statistic } from './profile.js';

export type Crossing = 'rise' | 'fall';

/** Secondary condition a crossing must satisfy before it is reported. */
export interface ScanGuard {
  stat: Statistic;
  above: number;
}

export type ScanRule =
  /** First `first` crossing from the start, last `last` crossing from the end. */
  | { find: 'first-last'; first: Crossing; last: Crossing }
  /** First `first` crossing, then the first `next` crossing after it. */
  | { find: 'first-next'; first: Crossing; next: Crossing }
  /** First `next` crossing, optionally guarded. Reported as [0, end]. */
  | { find: 'from-start'; next: Crossing; guard?: ScanGuard };

export type ScanPolicy = ProfileSpec & ScanRule;

/** Begin/end positions. A missing position is 0, or the profile length for a backward scan. */
export type ScanPair = [number, number];

export interface Scan {
  profile: number[];
  pair: ScanPair;
}

const above = (v: number, threshold: number) => v > threshold;

export function crossesAt(profile: readonly number[], i: number, threshold: number, dir: Crossing): boolean {
  if (i < 1 || i >= profile.length) return false;
  const before = above(profile[i - 1], threshold);
  const after = above(profile[i], threshold);
  return dir === 'rise' ? !before && after : before && !after;
}

function firstCrossing(profile: readonly number[], threshold: number, dir: Crossing, after = 0): number {
  for (let i = Math.max(1, after + 1); i < profile.length; i++) {
    if (crossesAt(profile, i, threshold, dir)) return i;
  }
  return 0;
}

function lastCrossing(profile: readonly number[], threshold: number, dir: Crossing): number {
  for (let i = profile.length - 1; i >= 1; i--) {
    if (crossesAt(profile, i, threshold, dir)) return i;
  }
  return profile.length;
}

/**
 * Find threshold crossings in a profile. `guardProfile` holds the values the
 * rule's guard is tested against, index-aligned with `profile`.
 */
export function scanProfile(
  profile: readonly number[],
  threshold: number,
  rule: ScanRule,
  guardProfile?: readonly number[],
): ScanPair {
  switch (rule.find) {
    case 'first-last':
      return [firstCrossing(profile, threshold, rule.first), lastCrossing(profile, threshold, rule.last)];

    case 'first-next': {
      const begin = firstCrossing(profile, threshold, rule.first);
      if (begin === 0) return [0, 0];
      return [begin, firstCrossing(profile, threshold, rule.next, begin)];
    }

    case 'from-start': {
      const { guard } = rule;
      for (let i = 1; i < profile.length; i++) {
        if (!crossesAt(profile, i, threshold, rule.next)) continue;
        if (guard && !((guardProfile?.[i] ?? -Infinity) > guard.above)) continue;
        return [0, i];
      }
      return [0, 0];
    }
  }
}

/** Reduce a region by the policy's statistic and scan it. */
export function scanImage(image: LightnessImage, threshold: number, policy: ScanPolicy): Scan {
  const profile = profileOf(image, policy);
  const guardProfile = policy.find === 'from-start' && policy.guard
    ? reduceProfile(image, policy.guard.stat, policy.axis)
    : undefined;
  return { profile, pair: scanProfile(profile, threshold, policy, guardProfile) };
}

/**
 * Vertical (or horizontal) extent of ink: the first line whose minimum drops
 * more than `margin` below its average, and the line after the last one that
 * still does. Returns [0, 0] when no line diverges.
 */
export function inkExtent(image: LightnessImage, margin: number, axis: Axis = 'row'): ScanPair {
  const avg = reduceProfile(image, 'average', axis);
  const min = reduceProfile(image, 'minimum', axis);
  let first = -1;
  let last = -1;
  for (let i = 0; i < avg.length; i++) {
    if (avg[i] - min[i] > margin) {
      if (first < 0) first = i;
      last = i;
    }
  }
  return first < 0 ? [0, 0] : [first, last + 1];
}

/** Number of bright/dark alternations across a column-maximum profile. */
export function countAlternations(image: LightnessImage, threshold: number): number {
  const profile = reduceProfile(image, 'maximum', 'col');
  let count = 0;
  for (let i = 1; i < profile.length; i++) {
    if (above(profile[i - 1], threshold) !== above(profile[i], threshold)) count++;
  }
  return count;
}
