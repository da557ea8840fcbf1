/**
 * UDP endpoint over a single IPv6 dgram socket.
 *
 * Datagrams are pushed by the socket's 'message' event and pulled by
 * `receive()`. Anything that arrives while no receive is pending waits in
 * a bounded inbox. Sends go straight to the socket, so one task can sit in
 * `receive()` while others send on the same handle.
 *
 * @module endpoint/endpoint
 */

import { createSocket, type BindOptions, type RemoteInfo } from 'node:dgram';
import { once } from 'node:events';

import {
  createInterfaceTable,
  isDefaultInterface,
  parseIpv6,
  type GroupAddress,
  type InterfaceRef,
  type InterfaceTable,
} from '../address/index.js';
import { ProbeError, ProbeErrorCode, describeError } from '../errors.js';
import { log } from '../log.js';

import {
  DEFAULT_INBOX_SIZE,
  WILDCARD_ADDRESS,
  ReceiveStatus,
  formatPeer,
  type ClientEndpointOptions,
  type DatagramSocket,
  type Endpoint,
  type EndpointOptions,
  type EndpointStats,
  type PeerAddress,
  type ReceiveResult,
  type SendResult,
  type ServerEndpointOptions,
  type SocketFactory,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

type QueuedResult = Extract<ReceiveResult, { status: 'OK' | 'FAILED' }>;

interface Waiter {
  settle(result: ReceiveResult): void;
}

const TIMEOUT_RESULT: ReceiveResult = { status: ReceiveStatus.TIMEOUT };
const STOPPED_RESULT: ReceiveResult = { status: ReceiveStatus.STOPPED };

// ============================================================================
// Helpers
// ============================================================================

const systemSocketFactory: SocketFactory = (options) => createSocket(options);

function scopedWildcard(zone: string | null): string | undefined {
  if (zone === null) {
    return undefined;
  }
  return `${WILDCARD_ADDRESS}%${zone}`;
}

function isLinkLocalUnicast(address: string): boolean {
  const bytes = parseIpv6(address);
  return bytes !== null && bytes[0] === 0xfe && (bytes[1] & 0xc0) === 0x80;
}

function closeQuietly(socket: DatagramSocket): void {
  try {
    socket.close();
  } catch (err) {
    log.endpoint('close after failure: %s', describeError(err));
  }
}

async function bindSocket(socket: DatagramSocket, options: BindOptions): Promise<void> {
  try {
    const listening = once(socket, 'listening');
    socket.bind(options);
    await listening;
  } catch (err) {
    closeQuietly(socket);
    throw new ProbeError(
      ProbeErrorCode.BIND_FAILED,
      `failed to bind [${options.address ?? WILDCARD_ADDRESS}]:${options.port ?? 0}: ${describeError(err)}`,
      { cause: err }
    );
  }
}

// ============================================================================
// Endpoint
// ============================================================================

export function createEndpoint(
  socket: DatagramSocket,
  options: EndpointOptions = {}
): Endpoint {
  // --------------------------------------------------------------------------
  // State
  // --------------------------------------------------------------------------

  const table: InterfaceTable = options.table ?? createInterfaceTable();
  const inboxSize = options.inboxSize ?? DEFAULT_INBOX_SIZE;

  const inbox: QueuedResult[] = [];
  const waiters: Waiter[] = [];
  let closed = false;

  // Zone appended to link-local unicast destinations
  let replyZone: string | null = null;

  let datagramsIn = 0;
  let datagramsOut = 0;
  let sendFailures = 0;
  let receiveFailures = 0;
  let inboxDropped = 0;

  // --------------------------------------------------------------------------
  // Delivery
  // --------------------------------------------------------------------------

  function deliver(result: QueuedResult): void {
    const waiter = waiters.shift();
    if (waiter !== undefined) {
      waiter.settle(result);
      return;
    }

    if (inbox.length >= inboxSize) {
      inbox.shift();
      inboxDropped += 1;
    }
    inbox.push(result);
  }

  function stopWaiters(): void {
    while (waiters.length > 0) {
      const waiter = waiters.shift();
      if (waiter !== undefined) {
        waiter.settle(STOPPED_RESULT);
      }
    }
  }

  socket.on('message', (msg: Buffer, rinfo: RemoteInfo) => {
    datagramsIn += 1;
    deliver({
      status: ReceiveStatus.OK,
      payload: new Uint8Array(msg),
      source: { address: rinfo.address, port: rinfo.port },
    });
  });

  socket.on('error', (err: Error) => {
    receiveFailures += 1;
    deliver({
      status: ReceiveStatus.FAILED,
      error: new ProbeError(ProbeErrorCode.RECV_FAILED, `receive failed: ${err.message}`, {
        cause: err,
      }),
    });
  });

  socket.on('close', () => {
    closed = true;
    stopWaiters();
  });

  // --------------------------------------------------------------------------
  // Receive
  // --------------------------------------------------------------------------

  function receive(timeoutMs: number | null, signal?: AbortSignal): Promise<ReceiveResult> {
    const queued = inbox.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }

    if (closed || signal?.aborted === true) {
      return Promise.resolve(STOPPED_RESULT);
    }

    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout> | null = null;
      const waiter: Waiter = { settle };

      function onAbort(): void {
        settle(STOPPED_RESULT);
      }

      function settle(result: ReceiveResult): void {
        if (timer !== null) {
          clearTimeout(timer);
          timer = null;
        }
        signal?.removeEventListener('abort', onAbort);

        const index = waiters.indexOf(waiter);
        if (index !== -1) {
          waiters.splice(index, 1);
        }
        resolve(result);
      }

      if (timeoutMs !== null) {
        timer = setTimeout(() => settle(TIMEOUT_RESULT), timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      waiters.push(waiter);
    });
  }

  // --------------------------------------------------------------------------
  // Send
  // --------------------------------------------------------------------------

  function sendFailure(destination: PeerAddress, reason: string, cause?: unknown): SendResult {
    sendFailures += 1;
    return {
      success: false,
      error: new ProbeError(
        ProbeErrorCode.SEND_FAILED,
        `failed to send to ${formatPeer(destination)}: ${reason}`,
        { cause }
      ),
    };
  }

  function destinationHost(address: string): string {
    if (replyZone === null || address.includes('%') || !isLinkLocalUnicast(address)) {
      return address;
    }
    return `${address}%${replyZone}`;
  }

  function send(payload: Uint8Array, destination: PeerAddress): Promise<SendResult> {
    if (closed) {
      return Promise.resolve(sendFailure(destination, 'endpoint is closed'));
    }

    const host = destinationHost(destination.address);

    return new Promise((resolve) => {
      try {
        socket.send(payload, destination.port, host, (err, bytes) => {
          if (err !== null) {
            resolve(sendFailure(destination, err.message, err));
            return;
          }
          datagramsOut += 1;
          resolve({ success: true, bytes });
        });
      } catch (err) {
        resolve(sendFailure(destination, describeError(err), err));
      }
    });
  }

  // --------------------------------------------------------------------------
  // Multicast
  // --------------------------------------------------------------------------

  function joinGroup(group: GroupAddress, iface: InterfaceRef): void {
    let zone: string | null = null;
    if (!isDefaultInterface(iface)) {
      zone = table.zoneOf(iface);
      if (zone === null) {
        throw new ProbeError(
          ProbeErrorCode.JOIN_FAILED,
          `failed to join ${group.text} on interface ${iface.index}: no such interface`
        );
      }
    }

    try {
      socket.addMembership(group.text, scopedWildcard(zone));
    } catch (err) {
      throw new ProbeError(
        ProbeErrorCode.JOIN_FAILED,
        `failed to join ${group.text} on interface ${iface.index}: ${describeError(err)}`,
        { cause: err }
      );
    }
    if (zone !== null) {
      replyZone = zone;
    }
  }

  function leaveGroup(group: GroupAddress, iface: InterfaceRef): void {
    try {
      socket.dropMembership(group.text, scopedWildcard(table.zoneOf(iface)));
    } catch (err) {
      log.endpoint('leave %s: %s', group.text, describeError(err));
    }
  }

  function setOutboundInterface(iface: InterfaceRef): void {
    if (isDefaultInterface(iface)) {
      return;
    }

    const zone = table.zoneOf(iface);
    if (zone === null) {
      throw new ProbeError(
        ProbeErrorCode.BIND_FAILED,
        `failed to select outbound interface ${iface.index}: no such interface`
      );
    }

    try {
      socket.setMulticastInterface(`${WILDCARD_ADDRESS}%${zone}`);
    } catch (err) {
      throw new ProbeError(
        ProbeErrorCode.BIND_FAILED,
        `failed to select outbound interface ${zone}: ${describeError(err)}`,
        { cause: err }
      );
    }
    replyZone = zone;
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  function localAddress(): PeerAddress {
    const info = socket.address();
    return { address: info.address, port: info.port };
  }

  function getStats(): EndpointStats {
    return {
      datagramsIn,
      datagramsOut,
      sendFailures,
      receiveFailures,
      inboxDropped,
    };
  }

  async function close(): Promise<void> {
    if (closed) {
      return;
    }
    closed = true;
    stopWaiters();

    return new Promise((resolve) => {
      try {
        socket.close(() => resolve());
      } catch (err) {
        log.endpoint('close: %s', describeError(err));
        resolve();
      }
    });
  }

  return {
    send,
    receive,
    joinGroup,
    leaveGroup,
    setOutboundInterface,
    localAddress,
    getStats,
    isClosed: () => closed,
    close,
  };
}

// ============================================================================
// Role Constructors
// ============================================================================

/**
 * Bind `[::]:port` with address reuse and join `group` on `iface`.
 */
export async function bindServer(
  port: number,
  group: GroupAddress,
  iface: InterfaceRef,
  options: ServerEndpointOptions = {}
): Promise<Endpoint> {
  const factory = options.socketFactory ?? systemSocketFactory;
  const socket = factory({ type: 'udp6', reuseAddr: true });

  await bindSocket(socket, { port, address: WILDCARD_ADDRESS });

  const endpoint = createEndpoint(socket, options);

  try {
    endpoint.joinGroup(group, iface);
  } catch (err) {
    await endpoint.close();
    throw err;
  }

  if (options.loopback ?? true) {
    try {
      socket.setMulticastLoopback(true);
    } catch (err) {
      log.endpoint('multicast loopback: %s', describeError(err));
    }
  }

  log.endpoint('server bound on port %d, joined %s', port, group.text);
  return endpoint;
}

/**
 * Bind `[::]` on an ephemeral port. A non-default `iface` becomes the
 * outbound multicast interface.
 */
export async function bindClient(
  iface: InterfaceRef,
  options: ClientEndpointOptions = {}
): Promise<Endpoint> {
  const factory = options.socketFactory ?? systemSocketFactory;
  const socket = factory({ type: 'udp6' });

  await bindSocket(socket, { port: 0, address: WILDCARD_ADDRESS });

  const endpoint = createEndpoint(socket, options);

  try {
    endpoint.setOutboundInterface(iface);
    if (options.hops !== undefined) {
      socket.setMulticastTTL(options.hops);
    }
  } catch (err) {
    await endpoint.close();
    if (err instanceof ProbeError) {
      throw err;
    }
    throw new ProbeError(
      ProbeErrorCode.BIND_FAILED,
      `failed to configure client socket: ${describeError(err)}`,
      { cause: err }
    );
  }

  log.endpoint('client bound on port %d', endpoint.localAddress().port);
  return endpoint;
}
