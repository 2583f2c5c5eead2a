import { ScoreOrderError } from '../errors.js';

export const OLD_STAR = '★';
export const NEW_STAR = '☆';
export const NO_STAR = '_';

export type StarGlyph = typeof OLD_STAR | typeof NEW_STAR | typeof NO_STAR;

// Left to right a score never gets stronger: stars earned earlier, then new stars, then empty slots.
const STRENGTH: Record<StarGlyph, number> = {
  [OLD_STAR]: 2,
  [NEW_STAR]: 1,
  [NO_STAR]: 0,
};

export const STARS_PER_ATTACK = 3;

function isStarGlyph(ch: string): ch is StarGlyph {
  return ch === OLD_STAR || ch === NEW_STAR || ch === NO_STAR;
}

export function isValidScore(score: string): boolean {
  const glyphs = Array.from(score);
  if (glyphs.length !== STARS_PER_ATTACK) return false;
  let previous = Infinity;
  for (const ch of glyphs) {
    if (!isStarGlyph(ch)) return false;
    if (STRENGTH[ch] > previous) return false;
    previous = STRENGTH[ch];
  }
  return true;
}

export function assertScoreOrder(score: string, field = 'score'): void {
  if (!isValidScore(score)) {
    throw new ScoreOrderError(field, score,
      `Star string "${score}" is out of order; the stars column is misaligned`);
  }
}

export function countStars(score: string): number {
  let n = 0;
  for (const ch of score) if (ch === OLD_STAR || ch === NEW_STAR) n++;
  return n;
}

// ─── Digit correction ───

// Glyphs the recognizer confuses with digits.
const CONFUSABLE: Record<string, string> = {
  l: '1', I: '1', '|': '1', L: '1', T: '1', d: '1', i: '1',
  g: '9',
  O: '0', o: '0',
  S: '5', s: '5',
  B: '8',
  W: '11',
  Z: '2', z: '2', e: '2',
  a: '4',
};

/** Map confusable glyphs to digits and parse; null when nothing numeric is left. */
export function correctDigits(raw: string): number | null {
  let digits = '';
  for (const ch of raw) {
    if (ch >= '0' && ch <= '9') digits += ch;
    else if (Object.hasOwn(CONFUSABLE, ch)) digits += CONFUSABLE[ch];
  }
  return digits ? Number.parseInt(digits, 10) : null;
}
