import { chromium } from 'playwright-core';
import type { Config } from './config.js';
import { findLocalChrome, getChromeUserDataDir, prepareProfileDir } from './browser-utils.js';
import { createLogger } from './logger.js';
import type { ContextHandle, ViewportSize } from './types.js';

const log = createLogger('launcher');

/** Flags that keep sites from flagging the session as automated. */
export const STEALTH_ARGS = [
  '--disable-blink-features=AutomationControlled',
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-web-security',
  '--disable-features=VizDisplayCompositor',
  '--disable-background-timer-throttling',
  '--disable-backgrounding-occluded-windows',
  '--disable-renderer-backgrounding',
];

export const DEGRADED_ARGS = ['--no-sandbox', '--disable-dev-shm-usage', '--disable-gpu'];

export type LaunchMode = 'persistent' | 'headless';

export interface LaunchProfile {
  mode: LaunchMode;
  userDataDir: string;
  headless: boolean;
  args: string[];
  viewport: ViewportSize;
  executablePath?: string;
  userAgent?: string;
  /** Host Chrome user data to seed a new profile directory from */
  seedFrom?: string;
}

export interface BrowserLauncher {
  launch(profile: LaunchProfile): Promise<ContextHandle>;
}

/**
 * The launch attempts, in order: the configured persistent profile, then a
 * reduced headless configuration on its own profile directory.
 */
export function buildLaunchProfiles(
  browser: Config['browser'],
  locateChrome: () => string | undefined = findLocalChrome,
): LaunchProfile[] {
  const executablePath = browser.chromePath ?? locateChrome();
  const { width, height } = browser.viewport;

  return [
    {
      mode: 'persistent',
      userDataDir: browser.profileDir,
      headless: browser.headless,
      args: [...STEALTH_ARGS, `--window-size=${width},${height}`],
      viewport: browser.viewport,
      executablePath,
      userAgent: browser.userAgent,
      seedFrom: browser.seedProfile ? getChromeUserDataDir() : undefined,
    },
    {
      mode: 'headless',
      userDataDir: browser.fallbackProfileDir,
      headless: true,
      args: [...DEGRADED_ARGS, `--window-size=${width},${height}`],
      viewport: browser.viewport,
      executablePath,
    },
  ];
}

/**
 * Launches Chromium through playwright-core. playwright-core ships no browser
 * of its own, so without an executable path Playwright falls back to the
 * installed Chrome channel.
 */
export const chromiumLauncher: BrowserLauncher = {
  async launch(profile) {
    prepareProfileDir(profile.userDataDir, profile.seedFrom);
    log.info(`Launching Chromium (${profile.mode})`, {
      userDataDir: profile.userDataDir,
      headless: profile.headless,
      executablePath: profile.executablePath ?? 'chrome channel',
    });

    const context = await chromium.launchPersistentContext(profile.userDataDir, {
      headless: profile.headless,
      args: profile.args,
      viewport: profile.viewport,
      ...(profile.executablePath ? { executablePath: profile.executablePath } : { channel: 'chrome' }),
      ...(profile.userAgent ? { userAgent: profile.userAgent } : {}),
    });
    return context;
  },
};
