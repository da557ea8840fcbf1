/**
 * Library entry point.
 *
 * @module mcast-probe
 */

export * from './address/index.js';
export * from './endpoint/index.js';
export * from './stats/index.js';
export * from './server/index.js';
export * from './client/index.js';
export * from './config/index.js';
export { ProbeError, ProbeErrorCode, isFatalError, describeError } from './errors.js';
export { sleep } from './utils/sleep.js';
