import express, { type NextFunction, type Request, type Response } from 'express';
import { UserNotFoundError } from './errors.js';
import { Xuid } from './identity/xuid.js';
import type { SettingsStoreInterface } from './interfaces/SettingsStoreInterface.js';
import type { ProxyConfig } from './configManager.js';
import type { BandwidthSource, Orchestrator } from './proxy/Orchestrator.js';
import type { StatisticsService } from './services/StatisticsService.js';
import type { CooldownPolicy } from './utils/cooldown.js';
import type { BuiltResponse } from './utils/responseBuilder.js';
import { compileValidator } from './utils/jsonValidation.js';
import { createLogger, NAMESPACES } from './logging.js';

const serverLog = createLogger(NAMESPACES.server.main);
const adminLog = createLogger(NAMESPACES.server.admin);

export const CHAT_ROUTES = ['/', '/chat/completions', '/quiet/', '/quiet/chat/completions'];

export interface AppDependencies {
  config: ProxyConfig;
  orchestrator: Orchestrator;
  store: SettingsStoreInterface;
  statistics: StatisticsService;
  bandwidth: BandwidthSource;
  cooldown: CooldownPolicy;
  xuidSecret: string | Uint8Array;
  /** Unix milliseconds the process started at. */
  startedAt?: number;
  now?: () => number;
}

const validateAnnouncement = compileValidator<{ text: string }>({
  type: 'object',
  required: ['text'],
  properties: { text: { type: 'string' } }
});

const validatePurge = compileValidator<{ apiKey: string }>({
  type: 'object',
  required: ['apiKey'],
  properties: { apiKey: { type: 'string', minLength: 1 } }
});

const send = (res: Response, built: BuiltResponse) => {
  res.status(built.status).set('Content-Type', built.contentType).send(built.body);
};

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

export function createApp(deps: AppDependencies): express.Express {
  const { config, orchestrator, store, statistics, bandwidth, cooldown } = deps;
  const now = deps.now ?? Date.now;
  const startedAt = deps.startedAt ?? now();

  const app = express();
  app.disable('x-powered-by');

  // Chat clients run in the browser; every route answers any origin
  app.use((req, res, next) => {
    res.set({
      'Access-Control-Allow-Origin': '*',
      'Access-Control-Allow-Methods': 'GET, POST, PUT, DELETE, OPTIONS',
      'Access-Control-Allow-Headers': req.get('Access-Control-Request-Headers') ?? 'Authorization, Content-Type'
    });
    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  });

  app.use(express.json({ limit: '50mb' }));

  // Unparseable bodies get the same answer as a missing one
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).type('text/plain').send('Bad Request. Missing or invalid JSON.');
      return;
    }
    next(err);
  });

  const requireSecret = (req: Request, res: Response): boolean => {
    const secret = req.query.secret;
    if (!config.adminSecret || typeof secret !== 'string' || secret !== config.adminSecret) {
      adminLog('[ADMIN] Rejected request without a valid secret');
      res.status(403).json({ success: false, error: 'secret required.' });
      return false;
    }
    return true;
  };

  app.get('/', (_req, res) => {
    res.type('text/plain').send(`${config.proxy.name} ${config.proxy.version} is running.`);
  });

  app.get('/health', async (_req, res) => {
    try {
      const usage = await bandwidth.usage();
      res.json({
        admin: config.proxy.admin,
        bandwidth: usage ?? null,
        bwarning: usage !== undefined && usage >= config.bandwidthWarningMiB,
        cooldown: cooldown.apply(usage),
        cpolicy: cooldown.toString(),
        keyspace: await store.keyCount(),
        uptime: Math.floor((now() - startedAt) / 1000),
        version: config.proxy.version
      });
    } catch (error) {
      serverLog(`[SERVER] Health check failed: ${errorMessage(error)}`);
      res.status(500).json({ error: 'Health check failed' });
    }
  });

  app.get('/stats', async (_req, res) => {
    try {
      const buckets = await statistics.query();
      res.json(Object.fromEntries(buckets.map(({ bucket, counters }) => [bucket, counters])));
    } catch (error) {
      serverLog(`[SERVER] Failed to read statistics: ${errorMessage(error)}`);
      res.status(500).json({ error: 'Failed to read statistics' });
    }
  });

  app.post(CHAT_ROUTES, async (req, res) => {
    const body: unknown = req.body;
    const built = await orchestrator.handle({
      path: req.path,
      authorization: req.get('Authorization'),
      body
    });
    send(res, built);
  });

  app.put('/admin/announcement', async (req, res) => {
    if (!requireSecret(req, res)) return;
    const parsed = validateAnnouncement(req.body);
    if (!parsed.valid) {
      res.status(400).json({ success: false, error: 'text required.' });
      return;
    }
    try {
      await store.setAnnouncement(parsed.data.text.trim());
      adminLog(`[ADMIN] Announcement ${parsed.data.text.trim() ? 'set' : 'cleared'}`);
      res.json({ success: true });
    } catch (error) {
      adminLog(`[ADMIN] Failed to set announcement: ${errorMessage(error)}`);
      res.status(500).json({ success: false, error: 'Failed to set announcement' });
    }
  });

  app.delete('/admin/users', async (req, res) => {
    if (!requireSecret(req, res)) return;
    const parsed = validatePurge(req.body);
    if (!parsed.valid) {
      res.status(400).json({ success: false, error: 'apiKey required.' });
      return;
    }
    const xuid = new Xuid(parsed.data.apiKey, deps.xuidSecret);
    try {
      await store.remove(xuid);
      adminLog(`[ADMIN] Purged user ${xuid.pretty()}`);
      res.json({ success: true });
    } catch (error) {
      if (error instanceof UserNotFoundError) {
        res.status(404).json({ success: false, error: 'user not found.' });
        return;
      }
      adminLog(`[ADMIN] Failed to purge user: ${errorMessage(error)}`);
      res.status(500).json({ success: false, error: 'Failed to purge user' });
    }
  });

  return app;
}

export default createApp;
