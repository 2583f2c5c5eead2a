import { Router } from 'express';
import { z } from 'zod';
import type { Config } from '../config.js';
import { writeConfigSection } from '../config.js';
import { logger } from '../logger.js';
import { gameRulesSchema } from '../presets.js';
import type { HistoryDb } from '../roster/HistoryDb.js';
import type { WarSessionManager } from '../session/WarSessionManager.js';

interface RouteContext {
  config: Config;
  sessions: WarSessionManager;
  history: HistoryDb;
}

const imageBodySchema = z.object({
  label: z.string().trim().min(1).optional(),
  imageBase64: z.string().min(1),
});

const commitBodySchema = z.object({
  scores: z.record(z.number().int()).optional(),
});

const rulesBodySchema = z.record(z.unknown());

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

export function createApiRoutes(ctx: RouteContext): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({ status: 'ok', sessions: ctx.sessions.list().length });
  });

  // ─── Sessions ───

  router.post('/sessions', (_req, res) => {
    try {
      const session = ctx.sessions.create();
      res.status(201).json({ id: session.id });
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  router.get('/sessions/:id', (req, res) => {
    const session = ctx.sessions.get(req.params.id);
    if (!session) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }
    res.json(session.summary());
  });

  router.post('/sessions/:id/images', async (req, res) => {
    const session = ctx.sessions.get(req.params.id);
    if (!session) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }
    const body = imageBodySchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: 'imageBase64 is required', issues: body.error.issues });
      return;
    }
    try {
      const result = await session.processImage(Buffer.from(body.data.imageBase64, 'base64'), body.data.label);
      if (!result.ok) {
        res.status(422).json(result);
        return;
      }
      res.json(result);
    } catch (err) {
      logger.error(`[API] Image processing failed: ${errorMessage(err)}`);
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  router.post('/sessions/:id/commit', async (req, res) => {
    const session = ctx.sessions.get(req.params.id);
    if (!session) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }
    if (session.isCommitted) {
      res.status(409).json({ error: 'Session is already committed' });
      return;
    }
    const body = commitBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ error: 'scores must map player names to integers', issues: body.error.issues });
      return;
    }
    try {
      const warId = await session.commit(ctx.history, ctx.config.paths.measurements, body.data.scores);
      res.json({ warId, leaderboard: ctx.history.leaderboard() });
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  router.delete('/sessions/:id', (req, res) => {
    if (!ctx.sessions.delete(req.params.id)) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }
    res.json({ ok: true });
  });

  // ─── History ───

  router.get('/history', (_req, res) => {
    try {
      res.json(ctx.history.leaderboard());
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  router.get('/history.csv', (_req, res) => {
    try {
      res.type('text/csv').send(ctx.history.exportCsv());
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  // ─── Game rules ───

  router.get('/config/rules', (_req, res) => {
    res.json(ctx.sessions.gameRules);
  });

  router.put('/config/rules', (req, res) => {
    const body = rulesBodySchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: 'Expected a JSON object of game rules' });
      return;
    }
    const rules = gameRulesSchema.safeParse({ ...ctx.sessions.gameRules, ...body.data });
    if (!rules.success) {
      res.status(400).json({ error: 'Invalid game rules', issues: rules.error.issues });
      return;
    }
    try {
      writeConfigSection('gameRules', rules.data);
      ctx.sessions.setGameRules(rules.data);
      logger.info('[API] Game rules updated; applies to new sessions');
      res.json(rules.data);
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  return router;
}
