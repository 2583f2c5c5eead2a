import type { LightnessImage } from '../imaging/LightnessImage.js';
import { MeasurementError } from '../errors.js';
import { logger } from '../logger.js';
import type { ProcessingPresets } from '../presets.js';
import type { Column, DataColumns, LineBand, Segmentation } from '../types.js';
import { ColumnCursor } from './ColumnCursor.js';
import type { FallbackField, FallbackStore } from './FallbackStore.js';
import { sampleThreshold, type SamplePolicy } from './profile.js';
import { countAlternations, scanImage, type Scan, type ScanPolicy } from './scanner.js';

// Column minimum must stay above this share of the global minimum threshold
// for a rise to count as the end of the stars column.
const STARS_END_GUARD_SCALE = 0.95;

// Alternations across the stars column for one, two and three bright star cores.
const ONE_STAR_MAX_ALTERNATIONS = 2;
const TWO_STAR_ALTERNATIONS = [4, 5];

const MAX_REL_AVG_ROW: SamplePolicy = { pick: 'max', mode: 'relative', stat: 'average', axis: 'row' };
const MAX_REL_AVG_COL: SamplePolicy = { pick: 'max', mode: 'relative', stat: 'average', axis: 'col' };
const MAX_ABS_AVG_COL: SamplePolicy = { pick: 'max', mode: 'absolute', stat: 'average', axis: 'col' };
const MAX_ABS_MIN_ROW: SamplePolicy = { pick: 'max', mode: 'absolute', stat: 'minimum', axis: 'row' };
const MAX_ABS_MIN_COL: SamplePolicy = { pick: 'max', mode: 'absolute', stat: 'minimum', axis: 'col' };

const ABS_MIN_COL = { mode: 'absolute', stat: 'minimum', axis: 'col' } as const;

/**
 * Carves one screenshot into the menu, the attack-lines region, six data
 * columns and the row bands. A Segmenter holds the column cursor for a single
 * image; `segment` resets it so the same input always yields the same columns.
 */
export class Segmenter {
  private readonly cursor = new ColumnCursor();

  constructor(
    private readonly presets: ProcessingPresets,
    private readonly fallback: FallbackStore,
  ) {}

  segment(source: LightnessImage): Segmentation {
    this.cursor.reset();
    const menu = this.cropMenu(source);
    const attackLines = this.cropAttackLines(menu);
    const columns = this.carveColumns(attackLines);
    const bands = this.findLineBands(attackLines);
    logger.debug(`[Segmenter] ${bands.length} line bands, columns ${JSON.stringify(columns)}`);
    return { attackLines, columns, bands };
  }

  // ─── Source → Menu ───

  cropMenu(source: LightnessImage): LightnessImage {
    const { samplers } = this.presets;
    const rowTh = sampleThreshold(source, MAX_REL_AVG_ROW, samplers.rowSrcAvg);
    const colTh = sampleThreshold(source, MAX_REL_AVG_COL, samplers.colSrcAvg);

    const rows = scanImage(source, rowTh,
      { mode: 'relative', stat: 'average', axis: 'row', find: 'first-last', first: 'rise', last: 'fall' });
    const cols = scanImage(source, colTh,
      { mode: 'relative', stat: 'average', axis: 'col', find: 'first-last', first: 'rise', last: 'fall' });

    const top = this._resolve('menuTop', rows, 0, 0, source.height);
    const bottom = this._resolve('menuBottom', rows, 1, 0, source.height);
    const left = this._resolve('menuLeft', cols, 0, 0, source.width);
    const right = this._resolve('menuRight', cols, 1, 0, source.width);

    if (bottom <= top || right <= left) {
      throw new MeasurementError('menu', { top, bottom, left, right }, 'Menu bounds are empty');
    }
    return source.crop({ top, bottom, left, right });
  }

  // ─── Menu → Attack-Lines ───

  cropAttackLines(menu: LightnessImage): LightnessImage {
    const { samplers, pxMargin: px } = this.presets;
    const colTh = sampleThreshold(menu, MAX_ABS_AVG_COL, samplers.colMenuMaxAvg);
    const rowTh = sampleThreshold(menu, MAX_ABS_MIN_ROW, samplers.rowMenuMin);

    const header = scanImage(menu.crop({ top: px }), rowTh,
      { mode: 'absolute', stat: 'minimum', axis: 'row', find: 'first-next', first: 'fall', next: 'fall' });
    const headerEnd = this._resolve('headerEnd', header, 1, px, menu.height);

    const body = menu.crop({ top: headerEnd });
    const margins = scanImage(body, colTh,
      { mode: 'absolute', stat: 'average', axis: 'col', find: 'first-last', first: 'fall', last: 'rise' });
    const lineBegin = this._resolve('lineBegin', margins, 0, 0, menu.width);
    const lineEnd = this._resolve('lineEnd', margins, 1, 0, menu.width);

    if (lineEnd <= lineBegin) {
      throw new MeasurementError('lineEnd', lineEnd, `Text margins ${lineBegin}..${lineEnd} are empty`);
    }
    return body.crop({ left: lineBegin, right: lineEnd });
  }

  // ─── Attack-Lines → Six Columns ───

  carveColumns(lines: LightnessImage): DataColumns {
    const p = this.presets;
    const { samplers } = p;
    const W = lines.width;
    this.cursor.reset();

    const inner = lines.crop({ left: p.outlierMargin, right: W - p.outlierMargin });
    const globalMinTh = sampleThreshold(inner, MAX_ABS_MIN_COL, samplers.colAlGlobalMin);
    const sepTh = sampleThreshold(inner, MAX_REL_AVG_COL, samplers.colAlSep);

    const rank = this.cursor.carve(this._resolve('rankEnd',
      scanImage(lines, sepTh,
        { mode: 'relative', stat: 'average', axis: 'col', find: 'first-next', first: 'fall', next: 'rise' }),
      1, 0, W));

    const levelEnd = this._resolve('levelEnd',
      scanImage(lines.crop({ left: rank.end }), p.blackThreshold,
        { ...ABS_MIN_COL, find: 'first-next', first: 'fall', next: 'fall' }),
      1, rank.end, W);
    const level = this._carveTo(levelEnd);

    // Names can carry dark glyphs of their own, so the player scan starts past a look-ahead.
    const playerFrom = level.end + p.lookAheadMargin;
    const playerEnd = this._resolve('playerEnd',
      scanImage(lines.crop({ left: playerFrom }), sepTh,
        { mode: 'relative', stat: 'average', axis: 'col', find: 'from-start', next: 'fall' }),
      1, playerFrom, W);
    const player = this._carveTo(playerEnd);

    const { enemy: measuredEnemy, localMinTh, starsColEnd } = this._measureEnemy(lines, player, globalMinTh, sepTh);
    const { enemy, percentage } = this._measurePercentage(lines, measuredEnemy, localMinTh);
    const stars = this._measureStars(lines, percentage, localMinTh, starsColEnd);

    return { rank, level, player, enemy, percentage, stars };
  }

  private _measureEnemy(lines: LightnessImage, player: Column, globalMinTh: number, sepTh: number) {
    const p = this.presets;
    const W = lines.width;

    const enemyStart = this._resolve('enemyStart',
      scanImage(lines.crop({ left: player.end }), p.blackThreshold,
        { ...ABS_MIN_COL, find: 'from-start', next: 'fall' }),
      1, player.end, W);

    const starsFrom = player.end + p.pxMargin;
    const starsColEnd = this._resolve('starsColEnd',
      scanImage(lines.crop({ left: starsFrom }), sepTh, {
        mode: 'relative', stat: 'average', axis: 'col', find: 'from-start', next: 'rise',
        guard: { stat: 'minimum', above: globalMinTh * STARS_END_GUARD_SCALE },
      }),
      1, starsFrom, W);

    // Enemy rows alternate background shade, so the return-to-background level
    // is sampled locally beneath the global one.
    const localMinTh = sampleThreshold(
      lines.crop({ left: enemyStart + p.pxMargin, right: starsColEnd - p.pxMargin }),
      MAX_ABS_MIN_COL, p.samplers.colAlLocalMin, globalMinTh);

    const enemyFrom = enemyStart + p.lookAheadMargin;
    const enemyEnd = this._resolve('enemyEnd',
      scanImage(lines.crop({ left: enemyFrom }), localMinTh,
        { ...ABS_MIN_COL, find: 'from-start', next: 'rise' }),
      1, enemyFrom, W);

    return { enemy: this._carveTo(enemyEnd), localMinTh, starsColEnd };
  }

  private _measurePercentage(lines: LightnessImage, measuredEnemy: Column, localMinTh: number) {
    const p = this.presets;
    const W = lines.width;

    const percentageBegin = this._resolve('percentageBegin',
      scanImage(lines.crop({ left: measuredEnemy.end }), localMinTh,
        { ...ABS_MIN_COL, find: 'from-start', next: 'fall' }),
      1, measuredEnemy.end, W);

    const { column: enemy, scanStart } = this.cursor.recenter(measuredEnemy, percentageBegin - measuredEnemy.end);

    const firstStar = this._resolve('firstStar',
      scanImage(lines.crop({ left: scanStart }), p.whiteThreshold,
        { mode: 'absolute', stat: 'maximum', axis: 'col', find: 'from-start', next: 'rise' }),
      1, scanStart, W);

    // Walk left from the first bright star core to the gap before the star.
    const mirrored = scanImage(lines.crop({ left: scanStart, right: firstStar }).flipX(), localMinTh,
      { ...ABS_MIN_COL, find: 'first-next', first: 'rise', next: 'fall' });
    const stepsBack = mirrored.pair[0];
    const starsBegin = this.fallback.resolve({
      field: 'starsBegin',
      cut: firstStar - stepsBack,
      dimension: W,
      detected: stepsBack > 0,
      profile: mirrored.profile,
    });

    return { enemy, percentage: this._carveTo(starsBegin) };
  }

  private _measureStars(lines: LightnessImage, percentage: Column, localMinTh: number, starsColEnd: number): Column {
    const p = this.presets;
    const W = lines.width;
    const scanEnd = starsColEnd - p.pxMargin;

    const mirrored = scanImage(lines.crop({ left: percentage.end, right: scanEnd }).flipX(), localMinTh,
      { ...ABS_MIN_COL, find: 'from-start', next: 'fall' });
    const stepsBack = mirrored.pair[1];
    const realStarsEnd = this.fallback.resolve({
      field: 'realStarsEnd',
      cut: scanEnd - stepsBack,
      dimension: W,
      detected: stepsBack > 0,
      profile: mirrored.profile,
    });

    let width = realStarsEnd - percentage.end;
    const alternations = countAlternations(lines.crop({ left: percentage.end, right: starsColEnd }), p.whiteThreshold);
    if (alternations <= ONE_STAR_MAX_ALTERNATIONS) {
      width *= 3;
    } else if (TWO_STAR_ALTERNATIONS.includes(alternations)) {
      width = (width * 3) / 2;
    }
    return this.cursor.carve(Math.min(Math.round(width), W - this.cursor.position));
  }

  // ─── Attack-Lines → Row Bands ───

  findLineBands(lines: LightnessImage): LineBand[] {
    const { pxMargin: px, samplers } = this.presets;
    const H = lines.height;
    const th = sampleThreshold(lines, MAX_ABS_MIN_ROW, samplers.newLine);
    const bands: LineBand[] = [];

    let top = 0;
    while (top < H) {
      const from = top + px;
      const [bottomRel, nextRel] = scanImage(lines.crop({ top: from }), th,
        { mode: 'absolute', stat: 'minimum', axis: 'row', find: 'first-next', first: 'rise', next: 'fall' }).pair;

      if (bottomRel === 0) {
        bands.push({ top, bottom: H });
        break;
      }
      const bottom = from + bottomRel;
      bands.push({ top, bottom });
      if (nextRel === 0 || bottom + (bottom - top) >= H) break;
      top = from + nextRel;
    }
    return bands;
  }

  // ─── Helpers ───

  private _carveTo(end: number): Column {
    return this.cursor.carve(end - this.cursor.position);
  }

  private _resolve(field: FallbackField, scan: Scan, which: 0 | 1, offset: number, dimension: number): number {
    const relative = scan.pair[which];
    return this.fallback.resolve({
      field,
      cut: offset + relative,
      dimension,
      detected: relative > 0 && relative < scan.profile.length,
      profile: scan.profile,
    });
  }
}
