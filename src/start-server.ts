#!/usr/bin/env node
import { ConfigManager } from './config/manager.js';
import { createGateway } from './gateway.js';
import { startHTTPServer, stopHTTPServer } from './http/server.js';
import { errorMessage } from './utils/errors.js';

/**
 * Start the employee portal and the portal router on their configured ports.
 */
async function main(): Promise<void> {
  const configManager = new ConfigManager({ secretsDir: process.env.SECRETS_DIR });
  const config = await configManager.loadConfig();

  console.log('Starting employee portal gateway...');
  console.log(`Departments: ${config.departments.map((d) => d.name).join(', ')}`);
  console.log(`Router evidence: ${config.router.evidence}`);

  const gateway = createGateway(config);
  const servers = [
    await startHTTPServer(gateway.portalApp, config.server.portalPort, 'Portal'),
    await startHTTPServer(gateway.routerApp, config.server.routerPort, 'Router'),
  ];

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) {
      return;
    }
    stopping = true;
    console.log(`\nReceived ${signal}, shutting down...`);
    gateway.destroy();
    Promise.all(servers.map(stopHTTPServer)).then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(`Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('Fatal error:', errorMessage(error));
  process.exit(1);
});
