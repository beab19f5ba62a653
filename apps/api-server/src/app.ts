import { Hono } from 'hono';
import { logger } from 'hono/logger';
import { createLogger } from '@aph/logger';
import { loadConfig, type AppConfig } from './config.js';
import { createHubServices, type HubOverrides, type HubServices } from './hub-bridge.js';
import { createAttestationRouter } from './routes/attestation.js';
import { createHealthRouter } from './routes/health.js';
import { createProofRouter } from './routes/proof.js';

export const APP_VERSION = '0.1.0';

const httpLog = createLogger('http');

export interface CreateAppOptions {
  readonly config?: AppConfig;
  readonly overrides?: HubOverrides;
}

export async function createApp(options: CreateAppOptions = {}) {
  const config = options.config ?? loadConfig();
  const hub: HubServices = await createHubServices(config, options.overrides);
  const app = new Hono();

  // Middleware
  app.use('*', logger((message, ...rest) => httpLog.info([message, ...rest].join(' '))));

  app.onError((err, c) => {
    httpLog.error({ err, path: c.req.path }, 'unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  // Routes
  app.route('/', createHealthRouter(hub, APP_VERSION, options.overrides?.now));
  app.route('/attestation', createAttestationRouter(hub));
  app.route('/proof', createProofRouter(hub));

  return { app, hub, config };
}
