import dotenv from 'dotenv';
import { resolve } from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';

export const DEFAULT_PORT = 8000;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'], { message: 'Expected true, false, 1 or 0' })
  .transform((value) => value === 'true' || value === '1');

const integer = (name: string) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, `${name} must be a whole number`)
    .transform((value) => Number.parseInt(value, 10));

const envSchema = z.object({
  PREVIEW_PORT: integer('Port')
    .pipe(z.number().min(1, 'Port must be between 1 and 65535').max(65535, 'Port must be between 1 and 65535'))
    .default(String(DEFAULT_PORT)),
  PREVIEW_HOST: z.string().trim().min(1).optional(),
  PREVIEW_ROOT: z.string().trim().min(1).optional(),
  PREVIEW_SHUTDOWN_TIMEOUT_MS: integer('Shutdown timeout').default('10000'),
  PREVIEW_LOG_REQUESTS: booleanFlag.default('true'),
});

export interface LauncherConfig {
  port: number;
  host?: string;
  rootDirectory: string;
  shutdownTimeoutMs: number;
  logRequests: boolean;
}

/**
 * Reads launcher settings from the environment. Empty variables count as
 * unset. Relative roots resolve against `cwd`.
 */
export function parseConfig(env: NodeJS.ProcessEnv, cwd: string = process.cwd()): LauncherConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const result = envSchema.safeParse(present);

  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const { PREVIEW_PORT, PREVIEW_HOST, PREVIEW_ROOT, PREVIEW_SHUTDOWN_TIMEOUT_MS, PREVIEW_LOG_REQUESTS } = result.data;

  return {
    port: PREVIEW_PORT,
    host: PREVIEW_HOST,
    rootDirectory: PREVIEW_ROOT ? resolve(cwd, PREVIEW_ROOT) : cwd,
    shutdownTimeoutMs: PREVIEW_SHUTDOWN_TIMEOUT_MS,
    logRequests: PREVIEW_LOG_REQUESTS,
  };
}

/** npm runs scripts from the package root; INIT_CWD is where it was invoked. */
export function invocationDirectory(env: NodeJS.ProcessEnv = process.env): string {
  return env.INIT_CWD || process.cwd();
}

export function loadConfig(): LauncherConfig {
  const cwd = invocationDirectory();
  dotenv.config({ path: resolve(cwd, '.env') });
  return parseConfig(process.env, cwd);
}
