/**
 * Configuration module
 *
 * JSON configuration file, validated with zod and resolved into subscriptions,
 * shared accounts and notify targets.
 */

export { loadConfig, resolveConfig } from './loader';
export { configFileSchema, durationSchema } from './schema';
export type {
  AppConfig,
  Env,
  HeartbeatConfig,
  NotifyRef,
  NotifyTarget,
  ReporterConfig,
  StateConfig,
  Subscription,
} from './types';
