import { existsSync, cpSync, mkdirSync } from 'fs';
import { platform } from 'os';
import { join } from 'path';
import { createLogger, errorMessage } from './logger.js';

const log = createLogger('launcher');

/**
 * Finds the local Chrome installation path based on the operating system.
 */
export function findLocalChrome(): string | undefined {
  const systemPlatform = platform();
  const chromePaths: string[] = [];

  if (systemPlatform === 'darwin') {
    chromePaths.push(
      '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
      '/Applications/Chromium.app/Contents/MacOS/Chromium',
      `${process.env.HOME}/Applications/Google Chrome.app/Contents/MacOS/Google Chrome`,
      `${process.env.HOME}/Applications/Chromium.app/Contents/MacOS/Chromium`,
    );
  } else if (systemPlatform === 'win32') {
    chromePaths.push(
      'C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe',
      'C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe',
      `${process.env.LOCALAPPDATA}\\Google\\Chrome\\Application\\chrome.exe`,
      `${process.env.PROGRAMFILES}\\Google\\Chrome\\Application\\chrome.exe`,
      'C:\\Program Files\\Chromium\\Application\\chrome.exe',
    );
  } else {
    chromePaths.push(
      '/usr/bin/google-chrome',
      '/usr/bin/google-chrome-stable',
      '/usr/bin/chromium',
      '/usr/bin/chromium-browser',
      '/snap/bin/chromium',
      '/usr/local/bin/chromium',
      '/opt/google/chrome/chrome',
    );
  }

  for (const p of chromePaths) {
    if (p && existsSync(p)) {
      return p;
    }
  }

  return undefined;
}

/**
 * Gets the Chrome user data directory path based on the operating system.
 */
export function getChromeUserDataDir(): string | undefined {
  const systemPlatform = platform();

  if (systemPlatform === 'darwin') {
    return `${process.env.HOME}/Library/Application Support/Google/Chrome`;
  } else if (systemPlatform === 'win32') {
    return `${process.env.LOCALAPPDATA}\\Google\\Chrome\\User Data`;
  } else {
    return `${process.env.HOME}/.config/google-chrome`;
  }
}

/**
 * Makes sure the persistent profile directory exists. When `seedFrom` is given
 * and the directory is new, the Default profile found there is copied in so
 * cookies and sessions carry over. Existing directories are left untouched.
 */
export function prepareProfileDir(profileDir: string, seedFrom?: string): string {
  if (existsSync(profileDir)) {
    return profileDir;
  }

  mkdirSync(profileDir, { recursive: true });

  if (seedFrom) {
    const sourceDefaultProfile = join(seedFrom, 'Default');
    if (existsSync(sourceDefaultProfile)) {
      try {
        cpSync(sourceDefaultProfile, join(profileDir, 'Default'), { recursive: true });
        log.info(`Seeded profile from ${sourceDefaultProfile}`);
      } catch (err) {
        log.warn('Profile copy failed, continuing with a fresh profile', { error: errorMessage(err) });
      }
    }
  }

  return profileDir;
}

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Prepends `https://` unless the URL already names a scheme.
 * Returns null for blank input.
 */
export function normalizeUrl(raw: string): string | null {
  const url = raw.trim();
  if (!url) return null;
  if (SCHEME_PATTERN.test(url) || url.toLowerCase().startsWith('about:')) {
    return url;
  }
  return `https://${url}`;
}

const KNOWN_SITES: ReadonlyArray<[fragment: string, title: string]> = [
  ['google.', 'Google'],
  ['github.com', 'GitHub'],
  ['youtube.com', 'YouTube'],
  ['wikipedia.org', 'Wikipedia'],
  ['stackoverflow.com', 'Stack Overflow'],
  ['accounts.', 'Sign In'],
  ['login', 'Sign In'],
];

/**
 * Best-effort tab label. Playwright only exposes titles asynchronously, so the
 * page list is labelled from the URL alone.
 */
export function guessPageTitle(url: string): string {
  const lower = url.toLowerCase();
  if (lower === '' || lower === 'about:blank') return 'New Tab';
  for (const [fragment, title] of KNOWN_SITES) {
    if (lower.includes(fragment)) return title;
  }
  return 'Browser Tab';
}
