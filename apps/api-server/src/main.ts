import { serve } from '@hono/node-server';
import { createLogger } from '@aph/logger';
import { createApp } from './app.js';

const log = createLogger('api-server');

async function main() {
  const { app, hub, config } = await createApp();

  log.info({ provider: hub.provider, vms: config.vms.map((vm) => vm.identity) }, 'attestation hub configured');

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info({ port: info.port }, 'server listening');
  });

  const shutdown = () => {
    hub.close();
    server.close();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'startup failed');
  process.exitCode = 1;
});
