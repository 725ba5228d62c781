#!/usr/bin/env node

/**
 * Remote browser console.
 *
 * Holds one Chromium instance in-process and exposes it to web clients: each
 * client gets a live JPEG stream of the active tab and replays its mouse,
 * keyboard and tab input into the real browser. All clients share the same
 * browser and tabs.
 */

import { loadConfig } from './config.js';
import { createGateway } from './gateway.js';
import { buildLaunchProfiles, chromiumLauncher } from './launcher.js';
import { createLogger, errorMessage, setLogLevel } from './logger.js';
import { TabController } from './tab-controller.js';

const log = createLogger('server');

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const controller = new TabController({
    launcher: chromiumLauncher,
    profiles: buildLaunchProfiles(config.browser),
    viewport: config.browser.viewport,
    startUrl: config.browser.startUrl,
    newTabUrl: config.browser.newTabUrl,
    jpegQuality: config.browser.jpegQuality,
  });

  log.info('Initializing browser...');
  await controller.initialize();
  log.info(`Browser mode: ${controller.getMode()}`);

  const gateway = createGateway(config, controller);
  await gateway.start();

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`${signal} received, shutting down`);
    try {
      await gateway.stop();
      await controller.close();
    } catch (err) {
      log.error('Shutdown failed', { error: errorMessage(err) });
      process.exit(1);
    }
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((err) => {
  log.error('Server failed to start', { error: errorMessage(err) });
  process.exit(1);
});
