import { fileURLToPath } from 'node:url';

import dotenv from 'dotenv';

export type EnvLoadReport = {
  profile: 'production' | 'non-production';
  workerEnvOverride: boolean;
  rootEnvPath: string;
  workerEnvPath: string;
};

export type EnvLoadOptions = {
  rootEnvPath?: string;
  workerEnvPath?: string;
  /** Target object; process.env when omitted. */
  env?: Record<string, string>;
};

const DEFAULT_ROOT_ENV_PATH = fileURLToPath(new URL('../../../.env', import.meta.url));
const DEFAULT_WORKER_ENV_PATH = fileURLToPath(new URL('../.env', import.meta.url));

function getProfile(nodeEnv: string | undefined): 'production' | 'non-production' {
  return (nodeEnv ?? '').trim().toLowerCase() === 'production' ? 'production' : 'non-production';
}

/**
 * Load env independently of the working directory:
 * 1. Repo root `.env` (never overrides what is already set)
 * 2. `apps/worker/.env` (overrides in non-production)
 */
export function loadWorkerEnv(opts: EnvLoadOptions = {}): EnvLoadReport {
  const rootEnvPath = opts.rootEnvPath ?? DEFAULT_ROOT_ENV_PATH;
  const workerEnvPath = opts.workerEnvPath ?? DEFAULT_WORKER_ENV_PATH;
  const target = opts.env ? { processEnv: opts.env } : {};

  dotenv.config({ path: rootEnvPath, override: false, ...target });

  const profile = getProfile(opts.env ? opts.env.NODE_ENV : process.env.NODE_ENV);
  const workerEnvOverride = profile !== 'production';
  dotenv.config({ path: workerEnvPath, override: workerEnvOverride, ...target });

  return { profile, workerEnvOverride, rootEnvPath, workerEnvPath };
}
