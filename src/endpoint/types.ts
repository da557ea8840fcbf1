/**
 * Endpoint types.
 *
 * @module endpoint/types
 */

import type { BindOptions, SocketOptions } from 'node:dgram';
import type { EventEmitter } from 'node:events';
import type { AddressInfo } from 'node:net';

import type { GroupAddress, InterfaceRef, InterfaceTable } from '../address/index.js';
import type { ProbeError } from '../errors.js';

// ============================================================================
// Constants
// ============================================================================

export const WILDCARD_ADDRESS = '::';
export const DEFAULT_INBOX_SIZE = 1024;

// ============================================================================
// Addresses
// ============================================================================

export interface PeerAddress {
  readonly address: string;
  readonly port: number;
}

export function formatPeer(peer: PeerAddress): string {
  if (peer.address.includes(':')) {
    return `[${peer.address}]:${peer.port}`;
  }
  return `${peer.address}:${peer.port}`;
}

// ============================================================================
// Results
// ============================================================================

export const ReceiveStatus = {
  OK: 'OK',
  TIMEOUT: 'TIMEOUT',
  FAILED: 'FAILED',
  STOPPED: 'STOPPED',
} as const;

export type ReceiveStatus = (typeof ReceiveStatus)[keyof typeof ReceiveStatus];

export type ReceiveResult =
  | {
      readonly status: typeof ReceiveStatus.OK;
      readonly payload: Uint8Array;
      readonly source: PeerAddress;
    }
  | { readonly status: typeof ReceiveStatus.TIMEOUT }
  | { readonly status: typeof ReceiveStatus.FAILED; readonly error: ProbeError }
  | { readonly status: typeof ReceiveStatus.STOPPED };

export type SendResult =
  | { readonly success: true; readonly bytes: number }
  | { readonly success: false; readonly error: ProbeError };

export interface EndpointStats {
  readonly datagramsIn: number;
  readonly datagramsOut: number;
  readonly sendFailures: number;
  readonly receiveFailures: number;
  readonly inboxDropped: number;
}

// ============================================================================
// Endpoint
// ============================================================================

export interface Endpoint {
  /** Best effort; resolves with a failure instead of throwing. */
  send(payload: Uint8Array, destination: PeerAddress): Promise<SendResult>;
  /**
   * Next datagram, waiting up to `timeoutMs` (null waits without bound).
   * Resolves STOPPED once the endpoint is closed or `signal` aborts.
   */
  receive(timeoutMs: number | null, signal?: AbortSignal): Promise<ReceiveResult>;
  joinGroup(group: GroupAddress, iface: InterfaceRef): void;
  leaveGroup(group: GroupAddress, iface: InterfaceRef): void;
  setOutboundInterface(iface: InterfaceRef): void;
  localAddress(): PeerAddress;
  getStats(): EndpointStats;
  isClosed(): boolean;
  close(): Promise<void>;
}

// ============================================================================
// Socket Capability
// ============================================================================

/** The subset of `dgram.Socket` an endpoint drives. */
export interface DatagramSocket extends EventEmitter {
  bind(options: BindOptions): unknown;
  send(
    msg: Uint8Array,
    port: number,
    address: string,
    callback: (error: Error | null, bytes: number) => void
  ): void;
  close(callback?: () => void): unknown;
  address(): AddressInfo;
  addMembership(multicastAddress: string, multicastInterface?: string): void;
  dropMembership(multicastAddress: string, multicastInterface?: string): void;
  setMulticastInterface(multicastInterface: string): void;
  setMulticastLoopback(flag: boolean): unknown;
  setMulticastTTL(ttl: number): unknown;
}

export type SocketFactory = (options: SocketOptions) => DatagramSocket;

export interface EndpointOptions {
  readonly table?: InterfaceTable;
  readonly socketFactory?: SocketFactory;
  readonly inboxSize?: number;
}

export interface ServerEndpointOptions extends EndpointOptions {
  /** Receive our own multicast traffic. Defaults to true. */
  readonly loopback?: boolean;
}

export interface ClientEndpointOptions extends EndpointOptions {
  /** Multicast hop limit; the OS default when absent. */
  readonly hops?: number;
}
