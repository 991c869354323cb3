/**
 * Configuration Module
 */

export type { Credentials, CredentialsInput, InitializedHook } from './credentials.js';

export {
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  validateCredentials,
  loadCredentialsFromEnv,
  PaymentRuntime,
} from './credentials.js';
