/**
 * Client module exports.
 *
 * @module client
 */

export {
  createProbeClient,
  buildProbe,
  ProbeFormat,
  type ProbeClient,
  type ProbeClientConfig,
  type ProbeClientDeps,
} from './client-loop.js';
