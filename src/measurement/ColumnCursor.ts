import type { Column } from '../types.js';

export interface Recentred {
  column: Column;
  /** Pixels added to the column end and the cursor. */
  shift: number;
  /** First pixel after the detected gap, where the next scan starts. */
  scanStart: number;
}

/**
 * Running offset for one image. Every column starts where the previous one
 * ended, so a pass over the six data columns leaves no gaps or overlaps.
 */
export class ColumnCursor {
  private _position = 0;

  get position(): number {
    return this._position;
  }

  reset(): void {
    this._position = 0;
  }

  /** Carve a column `relativeEnd` pixels wide starting at the cursor. */
  carve(relativeEnd: number): Column {
    const begin = this._position;
    const end = begin + Math.max(0, Math.round(relativeEnd));
    this._position = end;
    return { begin, end, width: end - begin };
  }

  /**
   * Move the end of the last carved column into the gap that follows it.
   * With a gap of `g` pixels the end moves by floor(g / 2) + 1 and the next
   * scan starts at oldEnd + g + 1.
   */
  recenter(column: Column, gap: number): Recentred {
    if (column.end !== this._position) {
      throw new Error(`Cannot recentre column ending at ${column.end}; cursor is at ${this._position}`);
    }
    const shift = Math.floor(gap / 2) + 1;
    this._position += shift;
    return {
      column: { begin: column.begin, end: column.end + shift, width: column.width + shift },
      shift,
      scanStart: column.end + gap + 1,
    };
  }
}
