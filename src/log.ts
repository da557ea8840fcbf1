/**
 * Diagnostic loggers.
 *
 * Enable with DEBUG=mcast-probe:* (or a single namespace).
 * Operator-facing lines do not go through here.
 *
 * @module log
 */

import createDebug from 'debug';

const ROOT_NAMESPACE = 'mcast-probe';

export const log = {
  address: createDebug(`${ROOT_NAMESPACE}:address`),
  endpoint: createDebug(`${ROOT_NAMESPACE}:endpoint`),
  server: createDebug(`${ROOT_NAMESPACE}:server`),
  client: createDebug(`${ROOT_NAMESPACE}:client`),
};

const MAX_PREVIEW_BYTES = 64;

/**
 * Printable preview of a datagram payload. Non-printable bytes become '.'.
 */
export function previewPayload(payload: Uint8Array): string {
  const limit = Math.min(payload.length, MAX_PREVIEW_BYTES);
  let text = '';

  for (let i = 0; i < limit; i += 1) {
    const byte = payload[i];
    text += byte >= 0x20 && byte <= 0x7e ? String.fromCharCode(byte) : '.';
  }

  if (payload.length > MAX_PREVIEW_BYTES) {
    text += '...';
  }

  return text;
}
