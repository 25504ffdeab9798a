/**
 * @description: Centralizes static host runtime configuration defaults and env parsing.
 * @scope: utility
 * @module: RuntimeConfig
 * @risk: moderate - A wrong web root serves the wrong tree or nothing at all.
 */
import fs from 'node:fs';
import path from 'node:path';
import { config as loadEnv } from 'dotenv';

type RuntimeConfig = {
  /** Empty string disables disk lookups (embedded-only mode). */
  webRoot: string;
  port: number;
  host: string;
};

type Env = Record<string, string | undefined>;

// --- Defaults ---
const DEFAULT_WEB_ROOT = 'public';
const DEFAULT_PORT = 3000;
const DEFAULT_HOST = '::';

// --- Helpers ---
const parsePort = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isInteger(parsed) && parsed > 0 && parsed < 65536 ? parsed : fallback;
};

// An explicitly empty STATIC_WEB_ROOT means embedded-only; unset means the default.
const parseWebRoot = (value: string | undefined): string => {
  if (value === undefined) {
    return DEFAULT_WEB_ROOT;
  }
  return value.trim();
};

const parseRuntimeConfig = (env: Env): RuntimeConfig => ({
  webRoot: parseWebRoot(env.STATIC_WEB_ROOT),
  port: parsePort(env.PORT, DEFAULT_PORT),
  host: env.HOST?.trim() || DEFAULT_HOST
});

// --- Environment bootstrap ---
// Load a .env file from the working directory when present.
if (fs.existsSync(path.join(process.cwd(), '.env'))) {
  loadEnv();
}

const runtimeConfig: Readonly<RuntimeConfig> = Object.freeze(parseRuntimeConfig(process.env));

export { DEFAULT_HOST, DEFAULT_PORT, DEFAULT_WEB_ROOT, parseRuntimeConfig, runtimeConfig };
export type { RuntimeConfig };
