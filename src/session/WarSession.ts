import { v4 as uuid } from 'uuid';
import type { AliasBook } from '../data/nameLists.js';
import { PipelineError } from '../errors.js';
import { LineAssembler } from '../extraction/LineAssembler.js';
import { NameDictionary } from '../extraction/NameDictionary.js';
import type { NameMatcher, TextRecognizer } from '../extraction/recognizers.js';
import { decodeLightness } from '../imaging/decode.js';
import { LightnessImage } from '../imaging/LightnessImage.js';
import { logger } from '../logger.js';
import { saveMeasurements, type FallbackStore } from '../measurement/FallbackStore.js';
import { Segmenter } from '../measurement/Segmenter.js';
import type { GameRules, ProcessingPresets } from '../presets.js';
import type { HistoryDb } from '../roster/HistoryDb.js';
import { scorePlayer, scoreRoster, tabulatePlayer, type ScoredPlayer } from '../roster/scoring.js';
import { WarRoster, type Placement } from '../roster/WarRoster.js';

export interface WarSessionDeps {
  presets: ProcessingPresets;
  rules: GameRules;
  recognizer: TextRecognizer;
  matcher: NameMatcher;
  aliases: AliasBook;
  knownPlayers: readonly string[];
  fallback: FallbackStore;
}

export type ImageResult =
  | { ok: true; label: string; placements: Placement[] }
  | { ok: false; label: string; error: PipelineError };

export interface SessionSummary {
  id: string;
  createdAt: number;
  images: number;
  committed: boolean;
  players: ScoredPlayer[];
  newScores: Record<string, number>;
  lines: string[];
}

export type HistorySink = Pick<HistoryDb, 'recordWar'>;

/**
 * One war's batch of screenshots feeding one commit to history. Images are
 * processed strictly in arrival order; a failed image leaves the roster and
 * the stored measurements as they were before it.
 */
export class WarSession {
  readonly id = uuid();
  readonly createdAt = Date.now();
  private readonly roster: WarRoster;
  private readonly assembler: LineAssembler;
  private readonly segmenter: Segmenter;
  private queue: Promise<unknown> = Promise.resolve();
  private imageCount = 0;
  private committed = false;

  constructor(private readonly deps: WarSessionDeps) {
    this.roster = new WarRoster(deps.presets.maxWarPlayers, deps.aliases);
    this.segmenter = new Segmenter(deps.presets, deps.fallback);
    this.assembler = new LineAssembler({
      presets: deps.presets,
      recognizer: deps.recognizer,
      matcher: deps.matcher,
      players: new NameDictionary(deps.knownPlayers),
      enemies: new NameDictionary(),
    });
  }

  get isCommitted(): boolean {
    return this.committed;
  }

  processImage(input: Buffer | LightnessImage, label?: string): Promise<ImageResult> {
    const job = this.queue.then(() => this._processImage(input, label ?? `image-${this.imageCount + 1}`));
    this.queue = job.catch(() => undefined);
    return job;
  }

  private async _processImage(input: Buffer | LightnessImage, label: string): Promise<ImageResult> {
    if (this.committed) throw new Error(`Session ${this.id} is already committed`);
    const image = input instanceof LightnessImage ? input : await decodeLightness(input);
    logger.info(`[Session] ${this.id} processing ${label} (${image.width}x${image.height})`);

    try {
      const segmentation = this.segmenter.segment(image);
      const records = await this.assembler.assemble(segmentation, label);
      const placements = this.roster.placeAll(records);
      this.deps.fallback.commitPending();
      this.imageCount++;
      logger.info(`[Session] ${label}: ${placements.filter(p => p.status === 'placed').length} of ${records.length} lines placed`);
      return { ok: true, label, placements };
    } catch (err) {
      this.deps.fallback.discardPending();
      if (err instanceof PipelineError) {
        logger.warn(`[Session] ${label} rejected at ${err.field}: ${err.message}`);
        return { ok: false, label, error: err };
      }
      throw err;
    }
  }

  summary(): SessionSummary {
    const players = scoreRoster(this.roster.players(), this.deps.rules);
    for (const player of players) logger.debug(`[Session] ${tabulatePlayer(player)}`);
    return {
      id: this.id,
      createdAt: this.createdAt,
      images: this.imageCount,
      committed: this.committed,
      players,
      newScores: this.newScores(),
      lines: players.map(p => tabulatePlayer(p)),
    };
  }

  /** Score of every placed player, keyed by name. */
  newScores(): Record<string, number> {
    const scores: Record<string, number> = {};
    for (const player of this.roster.players()) scores[player.name] = scorePlayer(player, this.deps.rules);
    return scores;
  }

  /**
   * Merge this war into history and persist the measurements it settled on.
   * `edits` are reviewed scores that replace or add to the computed ones.
   */
  async commit(history: HistorySink, measurementsPath?: string, edits: Record<string, number> = {}): Promise<number> {
    await this.queue;
    if (this.committed) throw new Error(`Session ${this.id} is already committed`);
    const edited = Object.keys(edits);
    if (edited.length > 0) logger.info(`[Session] ${this.id} committing with edited scores for ${edited.join(', ')}`);
    const warId = history.recordWar(this.id, { ...this.newScores(), ...edits });
    if (measurementsPath) saveMeasurements(measurementsPath, this.deps.fallback);
    this.committed = true;
    logger.info(`[Session] ${this.id} committed as war ${warId}`);
    return warId;
  }
}
