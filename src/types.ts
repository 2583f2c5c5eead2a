import type { LightnessImage } from './imaging/LightnessImage.js';

// ─── Geometry ───

/** Absolute pixel interval along one axis. */
export interface Column {
  begin: number;
  end: number;
  width: number;
}

export type ColumnName = 'rank' | 'level' | 'player' | 'enemy' | 'percentage' | 'stars';

export const COLUMN_ORDER: readonly ColumnName[] = ['rank', 'level', 'player', 'enemy', 'percentage', 'stars'];

export type DataColumns = Record<ColumnName, Column>;

export interface LineBand {
  top: number;
  bottom: number;
}

export interface Segmentation {
  /** Menu body below the header, trimmed to the text margins. */
  attackLines: LightnessImage;
  columns: DataColumns;
  bands: LineBand[];
}

// ─── Extracted records ───

export interface AttackRecord {
  enemyRank: number | null;
  target: string;
  /** Three star glyphs, or null when the sub-row held no attack. */
  score: string | null;
}

export interface PlayerRecord {
  rank: number | null;
  name: string;
  attacks: AttackRecord[];
}

export const NO_ATTACK_TARGET = 'No attack';
