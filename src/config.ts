import { existsSync } from 'fs';
import { basename, dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import { z } from 'zod';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// src/ when run from sources, dist/src/ once built
export const PROJECT_ROOT =
  basename(resolve(__dirname, '..')) === 'dist'
    ? resolve(__dirname, '..', '..')
    : resolve(__dirname, '..');

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

/**
 * Settings read from the environment. Names match the variables in `.env`.
 */
export const ConfigSchema = z.object({
  HOST: z.string().min(1).default('127.0.0.1'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8001),
  WS_PATH: z.string().startsWith('/').default('/ws'),

  PROFILE_DIR: z.string().min(1).default('browser_data'),
  FALLBACK_PROFILE_DIR: z.string().min(1).default('browser_data_fallback'),
  /** Copy the host Chrome "Default" profile into a profile dir that does not exist yet */
  SEED_PROFILE: flag(false),
  HEADLESS: flag(false),
  CHROME_PATH: optionalText,
  USER_AGENT: optionalText,

  START_URL: z.string().min(1).default('https://www.google.com'),
  NEW_TAB_URL: z.string().min(1).default('about:blank'),
  VIEWPORT_WIDTH: z.coerce.number().int().positive().default(1920),
  VIEWPORT_HEIGHT: z.coerce.number().int().positive().default(1080),

  FRAME_INTERVAL_MS: z.coerce.number().int().positive().default(100),
  JPEG_QUALITY: z.coerce.number().int().min(1).max(100).default(80),
  ADD_TAB_COOLDOWN_MS: z.coerce.number().int().min(0).default(5000),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

type Env = z.infer<typeof ConfigSchema>;

export interface Config {
  server: { host: string; port: number; wsPath: string; staticDir: string };
  browser: {
    profileDir: string;
    fallbackProfileDir: string;
    seedProfile: boolean;
    headless: boolean;
    chromePath?: string;
    userAgent?: string;
    startUrl: string;
    newTabUrl: string;
    viewport: { width: number; height: number };
    jpegQuality: number;
  };
  stream: { frameIntervalMs: number };
  gateway: { addTabCooldownMs: number };
  logLevel: Env['LOG_LEVEL'];
}

/**
 * Parse and validate settings from an environment map.
 * Relative profile directories are resolved against the project root.
 */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n');
    throw new Error(`Invalid config\n${message}`);
  }
  const e = parsed.data;

  return {
    server: {
      host: e.HOST,
      port: e.PORT,
      wsPath: e.WS_PATH,
      staticDir: join(PROJECT_ROOT, 'public'),
    },
    browser: {
      profileDir: resolve(PROJECT_ROOT, e.PROFILE_DIR),
      fallbackProfileDir: resolve(PROJECT_ROOT, e.FALLBACK_PROFILE_DIR),
      seedProfile: e.SEED_PROFILE,
      headless: e.HEADLESS,
      chromePath: e.CHROME_PATH,
      userAgent: e.USER_AGENT,
      startUrl: e.START_URL,
      newTabUrl: e.NEW_TAB_URL,
      viewport: { width: e.VIEWPORT_WIDTH, height: e.VIEWPORT_HEIGHT },
      jpegQuality: e.JPEG_QUALITY,
    },
    stream: { frameIntervalMs: e.FRAME_INTERVAL_MS },
    gateway: { addTabCooldownMs: e.ADD_TAB_COOLDOWN_MS },
    logLevel: e.LOG_LEVEL,
  };
}

/**
 * Load `.env` from the project root (if present) and parse `process.env`.
 */
export function loadConfig(): Config {
  const envPath = join(PROJECT_ROOT, '.env');
  if (existsSync(envPath)) {
    dotenv.config({ path: envPath });
  }
  return parseConfig(process.env);
}
