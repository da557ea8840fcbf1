/**
 * Config module exports.
 *
 * @module config
 */

export {
  loadConfig,
  getEnvInt,
  getEnvString,
  getEnvBool,
  Role,
  USAGE,
  DEFAULT_GROUP,
  DEFAULT_PORT,
  DEFAULT_INTERVAL_MS,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_REPORT_INTERVAL_MS,
  type ProbeConfig,
  type ConfigResult,
  type Env,
} from './config.js';
