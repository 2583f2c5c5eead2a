import type { LightnessImage } from '../imaging/LightnessImage.js';
import { logger } from '../logger.js';
import { sampleThreshold } from '../measurement/profile.js';
import { inkExtent } from '../measurement/scanner.js';
import type { ProcessingPresets } from '../presets.js';
import { NEW_STAR, NO_STAR, OLD_STAR, STARS_PER_ATTACK, type StarGlyph } from './glyphs.js';

/**
 * A new star always has a white core. Otherwise any change across the
 * column maxima means an earned star; a flat crop is an empty slot.
 */
export function classifyStar(slot: LightnessImage, presets: ProcessingPresets): StarGlyph {
  const m = presets.starMargin;
  const core = slot.width > 2 * m ? slot.crop({ left: m, right: slot.width - m }) : slot;
  if (core.isEmpty) return NO_STAR;

  if (core.max() / 255 >= presets.whiteThreshold) return NEW_STAR;

  const change = sampleThreshold(core,
    { pick: 'avg', mode: 'relative', stat: 'maximum', axis: 'col' }, presets.samplers.noStar);
  return change === 0 ? NO_STAR : OLD_STAR;
}

/** Bound the glyphs vertically, split into three slots and classify each. */
export function readScore(starsRow: LightnessImage, presets: ProcessingPresets): string {
  let [top, bottom] = inkExtent(starsRow, presets.blackThreshold, 'row');
  if (bottom <= top) {
    logger.warn(`[Stars] No glyph rows found in ${starsRow.width}x${starsRow.height} crop`);
    top = 0;
    bottom = starsRow.height;
  }
  top = Math.max(0, top - presets.starMargin);
  bottom = Math.min(starsRow.height, bottom + presets.starMargin);

  return starsRow
    .crop({ top, bottom })
    .split(STARS_PER_ATTACK, 'col')
    .map(slot => classifyStar(slot, presets))
    .join('');
}
