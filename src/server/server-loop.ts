/**
 * Probe server: receive a datagram, unicast a reply to its source, repeat.
 *
 * Replies go through a bounded queue so the loop is already waiting for
 * datagram N+1 while the reply to datagram N is still being sent.
 *
 * @module server/server-loop
 */

import {
  ReceiveStatus,
  formatPeer,
  type Endpoint,
  type PeerAddress,
} from '../endpoint/index.js';
import { log, previewPayload } from '../log.js';
import { createReplyQueue, type ReplyQueue } from './reply-queue.js';

// ============================================================================
// Constants
// ============================================================================

const ACK_TOKEN = 'ACK';
const ECHO_PREFIX = 'ACK:';
const RESPONSE_PREFIX = 'RESPONSE:';

// ============================================================================
// Types
// ============================================================================

export const ReplyMode = {
  /** Fixed "ACK". */
  ACK: 'ack',
  /** "ACK:" followed by the received payload. */
  ECHO: 'echo',
  /** "RESPONSE:<n>", n counting replies issued by this server. */
  RESPONSE: 'response',
} as const;

export type ReplyMode = (typeof ReplyMode)[keyof typeof ReplyMode];

export const ServerState = {
  IDLE: 'IDLE',
  LISTENING: 'LISTENING',
  /** Listening, with replies still being sent. */
  REPLYING: 'REPLYING',
  STOPPED: 'STOPPED',
} as const;

export type ServerState = (typeof ServerState)[keyof typeof ServerState];

export interface ProbeServerConfig {
  readonly replyMode: ReplyMode;
  readonly replyConcurrency: number;
  readonly maxPendingReplies: number;
}

export interface ProbeServerStats {
  readonly state: ServerState;
  readonly received: number;
  readonly replied: number;
  readonly replyFailures: number;
  readonly repliesDropped: number;
  readonly receiveFailures: number;
  readonly pendingReplies: number;
}

export interface ProbeServer {
  /** Serve until `stop()`, the signal aborts, or the endpoint closes. */
  run(signal?: AbortSignal): Promise<void>;
  stop(): void;
  /** Resolves once every queued reply has been sent or has failed. */
  whenRepliesSettled(): Promise<void>;
  getStats(): ProbeServerStats;
}

// ============================================================================
// Default Configuration
// ============================================================================

function createDefaultConfig(): ProbeServerConfig {
  return {
    replyMode: ReplyMode.ECHO,
    replyConcurrency: 16,
    maxPendingReplies: 256,
  };
}

// ============================================================================
// Reply Payloads
// ============================================================================

const encoder = new TextEncoder();

export function buildReply(
  mode: ReplyMode,
  received: Uint8Array,
  replyNumber: number
): Uint8Array {
  if (mode === ReplyMode.ACK) {
    return encoder.encode(ACK_TOKEN);
  }

  if (mode === ReplyMode.RESPONSE) {
    return encoder.encode(`${RESPONSE_PREFIX}${replyNumber}`);
  }

  const prefix = encoder.encode(ECHO_PREFIX);
  const reply = new Uint8Array(prefix.length + received.length);
  reply.set(prefix, 0);
  reply.set(received, prefix.length);
  return reply;
}

// ============================================================================
// Probe Server
// ============================================================================

export function createProbeServer(
  endpoint: Endpoint,
  configOverrides?: Partial<ProbeServerConfig>
): ProbeServer {
  // --------------------------------------------------------------------------
  // State
  // --------------------------------------------------------------------------

  const config: ProbeServerConfig = {
    ...createDefaultConfig(),
    ...configOverrides,
  };

  const replies: ReplyQueue = createReplyQueue({
    concurrency: config.replyConcurrency,
    maxPending: config.maxPendingReplies,
  });

  const controller = new AbortController();
  let state: ServerState = ServerState.IDLE;

  let received = 0;
  let replyCount = 0;
  let replied = 0;
  let replyFailures = 0;
  let repliesDropped = 0;
  let receiveFailures = 0;

  // --------------------------------------------------------------------------
  // Replying
  // --------------------------------------------------------------------------

  function dispatchReply(payload: Uint8Array, source: PeerAddress): void {
    replyCount += 1;
    const reply = buildReply(config.replyMode, payload, replyCount);

    const accepted = replies.enqueue(async () => {
      const result = await endpoint.send(reply, source);
      if (result.success) {
        replied += 1;
        log.server('replied %d bytes to %s', result.bytes, formatPeer(source));
        return;
      }
      replyFailures += 1;
      console.warn(`Warning: ${result.error.message}`);
    });

    if (!accepted) {
      repliesDropped += 1;
      console.warn(`Reply queue full, dropping reply to ${formatPeer(source)}`);
    }
  }

  // --------------------------------------------------------------------------
  // Public API
  // --------------------------------------------------------------------------

  async function run(signal?: AbortSignal): Promise<void> {
    if (state !== ServerState.IDLE) {
      throw new Error(`Probe server cannot run from state ${state}`);
    }

    if (signal !== undefined) {
      if (signal.aborted) {
        stop();
      } else {
        signal.addEventListener('abort', stop, { once: true });
      }
    }

    state = ServerState.LISTENING;

    try {
      while (!controller.signal.aborted) {
        const result = await endpoint.receive(null, controller.signal);

        if (result.status === ReceiveStatus.STOPPED) {
          break;
        }

        if (result.status === ReceiveStatus.TIMEOUT) {
          continue;
        }

        if (result.status === ReceiveStatus.FAILED) {
          receiveFailures += 1;
          console.warn(`Warning: ${result.error.message}`);
          continue;
        }

        received += 1;
        log.server(
          'received %d bytes from %s: %s',
          result.payload.length,
          formatPeer(result.source),
          previewPayload(result.payload)
        );

        dispatchReply(result.payload, result.source);
      }
    } finally {
      signal?.removeEventListener('abort', stop);
      state = ServerState.STOPPED;
    }
  }

  function stop(): void {
    controller.abort();
  }

  function whenRepliesSettled(): Promise<void> {
    return replies.onIdle();
  }

  function getStats(): ProbeServerStats {
    const queueStats = replies.getStats();
    const replying = state === ServerState.LISTENING && queueStats.running > 0;
    return {
      state: replying ? ServerState.REPLYING : state,
      received,
      replied,
      replyFailures,
      repliesDropped,
      receiveFailures,
      pendingReplies: queueStats.running + queueStats.pending,
    };
  }

  return {
    run,
    stop,
    whenRepliesSettled,
    getStats,
  };
}
