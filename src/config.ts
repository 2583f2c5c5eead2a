import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { gameRulesSchema, processingSchema } from './presets.js';

const projectRoot = resolve(import.meta.dirname, '..');

// Load .env from project root
loadDotenv({ path: resolve(projectRoot, '.env') });

export const configPath = resolve(projectRoot, 'tracker.config.json');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().optional(),
  DATA_DIR: z.string().default('./data'),
  LOG_LEVEL: z.string().default('info'),
  OCR_LANG: z.string().default('eng'),
});

const fileSchema = z.object({
  server: z.object({
    port: z.number().int().positive().default(3000),
    jsonLimit: z.string().default('25mb'),
  }).default({}),
  paths: z.object({
    players: z.string().default('players.txt'),
    multiAccounts: z.string().default('multi_accounts.json'),
    historyDb: z.string().default('war_history.db'),
    measurements: z.string().default('measurements.json'),
  }).default({}),
  processing: processingSchema.default({}),
  gameRules: gameRulesSchema.default({}),
});

export type TrackerFileConfig = z.infer<typeof fileSchema>;

/** Typed config from the parsed config file and environment. Relative paths resolve under DATA_DIR. */
export function loadTrackerConfig(raw: unknown, environment: NodeJS.ProcessEnv = {}, root = projectRoot) {
  const env = envSchema.parse(environment);
  const file = fileSchema.parse(raw ?? {});
  const dataDir = resolve(root, env.DATA_DIR);
  const inData = (p: string) => (isAbsolute(p) ? p : resolve(dataDir, p));

  return {
    server: {
      port: env.PORT ?? file.server.port,
      jsonLimit: file.server.jsonLimit,
    },
    logLevel: env.LOG_LEVEL,
    ocr: {
      lang: env.OCR_LANG,
    },
    paths: {
      dataDir,
      players: inData(file.paths.players),
      multiAccounts: inData(file.paths.multiAccounts),
      historyDb: inData(file.paths.historyDb),
      measurements: inData(file.paths.measurements),
    },
    processing: file.processing,
    gameRules: file.gameRules,
  };
}

export type Config = ReturnType<typeof loadTrackerConfig>;

function readConfigFile(path: string): Record<string, unknown> {
  if (!existsSync(path)) return {};
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return z.record(z.unknown()).parse(parsed);
}

export const config: Config = loadTrackerConfig(readConfigFile(configPath), process.env);

/** Shallow-merge one section of the config file and write it back. */
export function writeConfigSection(
  section: keyof TrackerFileConfig,
  values: Record<string, unknown>,
  path = configPath,
): void {
  const current = readConfigFile(path);
  const existing = z.record(z.unknown()).safeParse(current[section]);
  current[section] = { ...(existing.success ? existing.data : {}), ...values };
  writeFileSync(path, JSON.stringify(current, null, 2) + '\n', 'utf-8');
}
