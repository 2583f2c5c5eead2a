import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { MeasurementError } from '../errors.js';
import { logger } from '../logger.js';

export const FALLBACK_FIELDS = [
  'menuTop',
  'menuBottom',
  'menuLeft',
  'menuRight',
  'headerEnd',
  'lineBegin',
  'lineEnd',
  'rankEnd',
  'levelEnd',
  'playerEnd',
  'enemyStart',
  'starsColEnd',
  'enemyEnd',
  'percentageBegin',
  'firstStar',
  'starsBegin',
  'realStarsEnd',
] as const;

export type FallbackField = typeof FALLBACK_FIELDS[number];

export interface FallbackRecord {
  cut: number;
  /** cut / containing dimension */
  fraction: number;
}

export interface CutMeasurement {
  field: FallbackField;
  /** Absolute position inside the containing region. */
  cut: number;
  dimension: number;
  /** False when the scanner reported no crossing at all. */
  detected: boolean;
  profile?: readonly number[];
}

export interface MeasurementFailure extends CutMeasurement {
  substituted: number | null;
}

export type MeasurementDebugHook = (failure: MeasurementFailure) => void;

const storedSchema = z.record(z.number());

const round5 = (v: number) => Math.round(v * 1e5) / 1e5;

/**
 * Last known-good cut per field. Measurements from the image in progress are
 * held as pending and only become fallbacks once the whole image succeeds.
 */
export class FallbackStore {
  private readonly records = new Map<FallbackField, FallbackRecord>();
  private readonly pending = new Map<FallbackField, FallbackRecord>();

  constructor(
    private readonly tolerance: number,
    private readonly debugHook?: MeasurementDebugHook,
  ) {}

  static fromJSON(stored: unknown, tolerance: number, debugHook?: MeasurementDebugHook): FallbackStore {
    const store = new FallbackStore(tolerance, debugHook);
    const values = storedSchema.parse(stored ?? {});
    for (const field of FALLBACK_FIELDS) {
      const cut = values[`${field} Cut`];
      const fraction = values[`${field} %`];
      if (cut !== undefined && fraction !== undefined) store.set(field, { cut, fraction });
    }
    return store;
  }

  get(field: FallbackField): FallbackRecord | undefined {
    return this.records.get(field);
  }

  set(field: FallbackField, record: FallbackRecord): void {
    this.records.set(field, record);
  }

  get size(): number {
    return this.records.size;
  }

  isWithinTolerance(field: FallbackField, fraction: number): boolean {
    const record = this.records.get(field);
    if (!record) return true;
    return Math.abs(fraction - record.fraction) <= record.fraction * this.tolerance + 1e-9;
  }

  /**
   * Validate a measured cut and return the cut the pipeline should use:
   * the measurement itself, or the stored fallback when it fails.
   */
  resolve(m: CutMeasurement): number {
    const fraction = m.dimension > 0 ? m.cut / m.dimension : 0;
    const inBounds = m.detected && m.cut > 0 && m.cut < m.dimension - 1;

    if (inBounds && this.isWithinTolerance(m.field, fraction)) {
      this.pending.set(m.field, { cut: m.cut, fraction });
      return m.cut;
    }

    const record = this.records.get(m.field);
    this.debugHook?.({ ...m, substituted: record?.cut ?? null });

    if (!record) {
      throw new MeasurementError(m.field, m.cut,
        `${m.field} measured at ${m.cut} of ${m.dimension} and no fallback is stored`);
    }

    logger.warn(`[Fallback] ${m.field} measured at ${m.cut} of ${m.dimension}; using stored cut ${record.cut}`);
    this.pending.set(m.field, record);
    return record.cut;
  }

  /** Promote the measurements of a successful image to fallbacks. */
  commitPending(): void {
    for (const [field, record] of this.pending) this.records.set(field, record);
    this.pending.clear();
  }

  discardPending(): void {
    this.pending.clear();
  }

  toJSON(): Record<string, number> {
    const out: Record<string, number> = {};
    for (const field of FALLBACK_FIELDS) {
      const record = this.records.get(field);
      if (!record) continue;
      out[`${field} Cut`] = record.cut;
      out[`${field} %`] = round5(record.fraction);
    }
    return out;
  }
}

export function loadMeasurements(path: string): Record<string, number> {
  if (!existsSync(path)) return {};
  return storedSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
}

export function saveMeasurements(path: string, store: FallbackStore): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(store.toJSON(), null, 2) + '\n', 'utf-8');
}
