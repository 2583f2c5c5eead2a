import { createWorker, PSM, type Worker } from 'tesseract.js';
import type { LightnessImage } from '../imaging/LightnessImage.js';
import { encodePng } from '../imaging/decode.js';
import { logger } from '../logger.js';

export type RecognitionMode = 'digit' | 'line';

/** Best-effort text from a single-channel bitmap. */
export interface TextRecognizer {
  recognize(bitmap: LightnessImage, mode: RecognitionMode): Promise<string>;
}

export interface NameMatch {
  name: string;
  /** 0–100 */
  confidence: number;
}

export interface NameMatcher {
  bestMatch(candidate: string, known: readonly string[]): NameMatch | null;
}

// ─── tesseract.js ───

const DIGIT_WHITELIST = '0123456789lLiIoOsSzZ|';

export class TesseractRecognizer implements TextRecognizer {
  private workerInit: Promise<Worker> | null = null;
  // One worker serves every session; jobs queue so parameters never interleave.
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly lang = 'eng') {}

  private getWorker(): Promise<Worker> {
    if (!this.workerInit) {
      this.workerInit = createWorker(this.lang);
      logger.info(`[OCR] Starting tesseract worker (${this.lang})`);
    }
    return this.workerInit;
  }

  recognize(bitmap: LightnessImage, mode: RecognitionMode): Promise<string> {
    const job = this.queue.then(() => this._recognize(bitmap, mode));
    this.queue = job.catch(() => undefined);
    return job;
  }

  private async _recognize(bitmap: LightnessImage, mode: RecognitionMode): Promise<string> {
    if (bitmap.isEmpty) return '';
    const worker = await this.getWorker();
    await worker.setParameters(mode === 'digit'
      ? { tessedit_pageseg_mode: PSM.SINGLE_CHAR, tessedit_char_whitelist: DIGIT_WHITELIST }
      : { tessedit_pageseg_mode: PSM.SINGLE_LINE, tessedit_char_whitelist: '' });
    const { data } = await worker.recognize(await encodePng(bitmap));
    return data.text.trim();
  }

  async terminate(): Promise<void> {
    if (!this.workerInit) return;
    const worker = await this.workerInit;
    this.workerInit = null;
    await worker.terminate();
    logger.info('[OCR] Tesseract worker stopped');
  }
}

// ─── Fuzzy name matching ───

function normalizeName(s: string): string {
  return s.toLowerCase().replace(/[^\p{L}\p{N}]+/gu, ' ').trim();
}

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const cur = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      cur[j] = Math.min(prev[j] + 1, cur[j - 1] + 1, prev[j - 1] + cost);
    }
    prev = cur;
  }
  return prev[b.length];
}

/** Similarity 0–100 from edit distance over normalized names. */
export function similarity(a: string, b: string): number {
  const x = normalizeName(a);
  const y = normalizeName(b);
  const longest = Math.max(x.length, y.length);
  if (longest === 0) return 0;
  return Math.round((1 - levenshtein(x, y) / longest) * 100);
}

export class LevenshteinMatcher implements NameMatcher {
  bestMatch(candidate: string, known: readonly string[]): NameMatch | null {
    let best: NameMatch | null = null;
    for (const name of known) {
      const confidence = similarity(candidate, name);
      if (!best || confidence > best.confidence) best = { name, confidence };
    }
    return best;
  }
}
