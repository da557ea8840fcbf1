/**
 * Endpoint module exports.
 *
 * @module endpoint
 */

export { createEndpoint, bindServer, bindClient } from './endpoint.js';

export {
  ReceiveStatus,
  WILDCARD_ADDRESS,
  DEFAULT_INBOX_SIZE,
  formatPeer,
  type PeerAddress,
  type ReceiveResult,
  type SendResult,
  type Endpoint,
  type EndpointStats,
  type EndpointOptions,
  type ServerEndpointOptions,
  type ClientEndpointOptions,
  type DatagramSocket,
  type SocketFactory,
} from './types.js';
