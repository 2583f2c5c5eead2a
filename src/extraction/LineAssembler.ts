import type { LightnessImage } from '../imaging/LightnessImage.js';
import { ExtractionError } from '../errors.js';
import { logger } from '../logger.js';
import { sampleThreshold } from '../measurement/profile.js';
import { scanImage } from '../measurement/scanner.js';
import type { ProcessingPresets } from '../presets.js';
import {
  NO_ATTACK_TARGET,
  type AttackRecord,
  type DataColumns,
  type LineBand,
  type PlayerRecord,
  type Segmentation,
} from '../types.js';
import { assertScoreOrder, correctDigits } from './glyphs.js';
import type { NameDictionary } from './NameDictionary.js';
import { prepareForRecognition } from './preprocess.js';
import type { NameMatcher, TextRecognizer } from './recognizers.js';
import { readScore } from './stars.js';

export const ATTACKS_PER_LINE = 2;

export interface LineAssemblerDeps {
  presets: ProcessingPresets;
  recognizer: TextRecognizer;
  matcher: NameMatcher;
  players: NameDictionary;
  enemies: NameDictionary;
}

/**
 * Builds one player record per row band. Recognition calls run one after
 * another; nothing here is shared between images except the dictionaries.
 */
export class LineAssembler {
  constructor(private readonly deps: LineAssemblerDeps) {}

  async assemble(segmentation: Segmentation, label: string): Promise<PlayerRecord[]> {
    const records: PlayerRecord[] = [];
    for (const [i, band] of segmentation.bands.entries()) {
      const record = await this.readLine(segmentation.attackLines, segmentation.columns, band, `${label}#${i + 1}`);
      logger.debug(`[Lines] ${label}#${i + 1}: ${JSON.stringify(record)}`);
      records.push(record);
    }
    return records;
  }

  async readLine(lines: LightnessImage, columns: DataColumns, band: LineBand, lineLabel: string): Promise<PlayerRecord> {
    const row = lines.crop({ top: band.top, bottom: band.bottom });
    const crop = (name: keyof DataColumns) => row.crop({ left: columns[name].begin, right: columns[name].end });

    const rank = await this._readNumber(crop('rank'));
    const name = await this._readName(crop('player'), this.deps.players);
    if (!name) {
      throw new ExtractionError('player', '', `No player name could be read on line ${lineLabel}`);
    }

    const enemyHalves = crop('enemy').split(ATTACKS_PER_LINE, 'row');
    const starHalves = crop('stars').split(ATTACKS_PER_LINE, 'row');
    const attacks: AttackRecord[] = [];
    for (let k = 0; k < ATTACKS_PER_LINE; k++) {
      attacks.push(await this.readAttack(enemyHalves[k], starHalves[k], `${lineLabel} attack ${k + 1}`));
    }
    return { rank, name, attacks };
  }

  async readAttack(enemy: LightnessImage, stars: LightnessImage, attackLabel: string): Promise<AttackRecord> {
    const { presets } = this.deps;

    const prepared = prepareForRecognition(enemy, presets.recognition, 'line');
    const blank = sampleThreshold(prepared,
      { pick: 'avg', mode: 'absolute', stat: 'average', axis: 'row' }, presets.samplers.attackBlank);
    if (blank >= 1) {
      return { enemyRank: null, target: NO_ATTACK_TARGET, score: null };
    }

    const splitTh = sampleThreshold(enemy,
      { pick: 'max', mode: 'absolute', stat: 'minimum', axis: 'col' }, presets.samplers.textMenu);
    const [rankBegin, nameBegin] = scanImage(enemy, splitTh,
      { mode: 'absolute', stat: 'minimum', axis: 'col', find: 'first-next', first: 'fall', next: 'rise' }).pair;
    if (nameBegin === 0) {
      throw new ExtractionError('enemyName', rankBegin, `Enemy rank and name could not be separated on ${attackLabel}`);
    }

    const enemyRank = await this._readNumber(enemy.crop({ left: rankBegin, right: nameBegin }));
    const target = await this._readName(enemy.crop({ left: nameBegin }), this.deps.enemies);

    const score = readScore(stars, presets);
    assertScoreOrder(score, `${attackLabel} score`);
    return { enemyRank, target, score };
  }

  private async _readNumber(crop: LightnessImage): Promise<number | null> {
    const bitmap = prepareForRecognition(crop, this.deps.presets.recognition, 'corner');
    return correctDigits(await this.deps.recognizer.recognize(bitmap, 'digit'));
  }

  private async _readName(crop: LightnessImage, dictionary: NameDictionary): Promise<string> {
    const bitmap = prepareForRecognition(crop, this.deps.presets.recognition, 'line');
    const raw = await this.deps.recognizer.recognize(bitmap, 'line');
    return dictionary.correct(raw, this.deps.matcher, this.deps.presets.nameConfidence);
  }
}
