/**
 * Credentials & Process-wide Runtime
 *
 * The configuration boundary hands the core one Credentials object. It is
 * validated, frozen, and shared by reference with every component through
 * PaymentRuntime.
 *
 * Single initialization:
 * - initialize() may replace a configuration nobody has read yet
 * - once any component has read it, re-initialization fails loudly
 */

import { config as loadDotenv } from 'dotenv';
import { ConfigError, NotInitializedError } from '../errors/errors.js';
import type { Logger } from '../utils/logger.js';

// =============================================================================
// CREDENTIALS
// =============================================================================

export interface Credentials {
  readonly api_key: string;
  readonly api_secret: string;
  readonly project_id: string;
  readonly base_url: string;
  /** Hard upper bound per transport attempt */
  readonly timeout_ms: number;
}

export interface CredentialsInput {
  api_key?: string;
  api_secret?: string;
  project_id?: string;
  base_url?: string;
  timeout_ms?: number;
}

export const DEFAULT_BASE_URL = 'http://127.0.0.1:4000/api/v1';
export const DEFAULT_TIMEOUT_MS = 30_000;

export function validateCredentials(input: CredentialsInput): Credentials {
  if (!input.api_key || !input.api_secret) {
    throw new ConfigError('API credentials not provided (api_key and api_secret are required)');
  }
  if (!input.project_id) {
    throw new ConfigError('Project ID not provided');
  }

  const baseUrl = (input.base_url ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
  let parsed: URL;
  try {
    parsed = new URL(baseUrl);
  } catch (error) {
    throw new ConfigError(`Invalid base_url: ${baseUrl}`, { cause: error });
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigError(`Invalid base_url protocol: ${parsed.protocol}`);
  }

  const timeoutMs = input.timeout_ms ?? DEFAULT_TIMEOUT_MS;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigError(`Invalid timeout_ms: ${timeoutMs}`);
  }

  return Object.freeze({
    api_key: input.api_key,
    api_secret: input.api_secret,
    project_id: input.project_id,
    base_url: baseUrl,
    timeout_ms: timeoutMs,
  });
}

/**
 * Read credentials from the environment.
 *
 * A `.env` file in the working directory is loaded first; variables
 * already set in the environment win.
 */
export function loadCredentialsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  options: { dotenvPath?: string } = {}
): Credentials {
  if (env === process.env) {
    loadDotenv({ path: options.dotenvPath });
  }

  const rawTimeout = env.TLEDGER_TIMEOUT_MS;
  const timeoutMs = rawTimeout !== undefined && rawTimeout !== '' ? Number(rawTimeout) : undefined;

  return validateCredentials({
    api_key: env.TLEDGER_API_KEY,
    api_secret: env.TLEDGER_API_SECRET,
    project_id: env.TLEDGER_PROJECT_ID,
    base_url: env.TLEDGER_API_BASE_URL || undefined,
    timeout_ms: timeoutMs,
  });
}

// =============================================================================
// RUNTIME (guarded one-time construction)
// =============================================================================

export type InitializedHook = (credentials: Credentials) => void;

export class PaymentRuntime {
  private current: Credentials | null = null;
  private used = false;
  private hooks: InitializedHook[] = [];

  constructor(private readonly logger?: Logger) {}

  initialize(input: CredentialsInput | Credentials): Credentials {
    if (this.used) {
      throw new ConfigError(
        'Payment core already in use: re-initialization is not supported mid-process'
      );
    }

    const credentials = validateCredentials(input);
    this.current = credentials;

    for (const hook of this.hooks) {
      try {
        hook(credentials);
      } catch (error) {
        this.logger?.warn({ error }, 'Initialization hook failed');
      }
    }

    this.logger?.info(
      { baseUrl: credentials.base_url, projectId: credentials.project_id },
      'Payment core initialized'
    );
    return credentials;
  }

  /**
   * Register a hook run after each successful initialize().
   */
  onInitialized(hook: InitializedHook): void {
    this.hooks.push(hook);
  }

  isInitialized(): boolean {
    return this.current !== null;
  }

  /**
   * Read the credentials; locks the configuration against re-initialization.
   */
  credentials(): Credentials {
    if (!this.current) {
      throw new NotInitializedError();
    }
    this.used = true;
    return this.current;
  }
}
