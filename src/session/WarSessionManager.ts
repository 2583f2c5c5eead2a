import type { Config } from '../config.js';
import { loadAliasBook, loadNameList } from '../data/nameLists.js';
import type { NameMatcher, TextRecognizer } from '../extraction/recognizers.js';
import { logger } from '../logger.js';
import { FallbackStore, loadMeasurements } from '../measurement/FallbackStore.js';
import type { GameRules } from '../presets.js';
import { WarSession } from './WarSession.js';

/**
 * Creates sessions from the current config and files on disk. Each session
 * gets its own fallback store, dictionaries and roster; the recognizer and
 * matcher are shared.
 */
export class WarSessionManager {
  private readonly sessions = new Map<string, WarSession>();

  constructor(
    private readonly config: Config,
    private readonly recognizer: TextRecognizer,
    private readonly matcher: NameMatcher,
    private rules: GameRules = config.gameRules,
  ) {}

  create(): WarSession {
    const { paths, processing } = this.config;

    let knownPlayers: string[] = [];
    try {
      knownPlayers = loadNameList(paths.players);
    } catch (err) {
      logger.warn(`[Session] Starting without a player list: ${err instanceof Error ? err.message : String(err)}`);
    }

    const session = new WarSession({
      presets: processing,
      rules: this.rules,
      recognizer: this.recognizer,
      matcher: this.matcher,
      aliases: loadAliasBook(paths.multiAccounts),
      knownPlayers,
      fallback: FallbackStore.fromJSON(
        loadMeasurements(paths.measurements),
        processing.fallbackTolerance,
        failure => logger.debug(`[Fallback] ${failure.field} rejected cut ${failure.cut} of ${failure.dimension}`, {
          profile: failure.profile,
        }),
      ),
    });
    this.sessions.set(session.id, session);
    logger.info(`[Session] Created ${session.id} (${knownPlayers.length} known players)`);
    return session;
  }

  get(id: string): WarSession | undefined {
    return this.sessions.get(id);
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  list(): WarSession[] {
    return [...this.sessions.values()];
  }

  /** Rules for sessions created from now on. */
  get gameRules(): GameRules {
    return this.rules;
  }

  setGameRules(rules: GameRules): void {
    this.rules = rules;
  }
}
