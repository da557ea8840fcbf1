/**
 * Probe client.
 *
 * Three units run side by side over one endpoint and one aggregator:
 * - sender: one probe to the group every `intervalMs`
 * - receiver: counts every datagram that comes back, per source address
 * - reporter: prints a summary every `reportIntervalMs`
 *
 * Replies are never matched to probes. The success rate is replies
 * received over probes sent.
 *
 * @module client/client-loop
 */

import {
  ReceiveStatus,
  formatPeer,
  type Endpoint,
  type PeerAddress,
} from '../endpoint/index.js';
import { log, previewPayload } from '../log.js';
import {
  createStatsAggregator,
  formatReport,
  type StatsAggregator,
  type StatsSnapshot,
} from '../stats/index.js';
import { sleep } from '../utils/sleep.js';

// ============================================================================
// Constants
// ============================================================================

const RECEIVE_ERROR_BACKOFF_MS = 10;
const FINAL_PREFIX = 'FINAL: ';

// ============================================================================
// Types
// ============================================================================

export const ProbeFormat = {
  /** "PING <seq>" */
  SPACE: 'space',
  /** "PING:<seq>" */
  COLON: 'colon',
} as const;

export type ProbeFormat = (typeof ProbeFormat)[keyof typeof ProbeFormat];

export interface ProbeClientConfig {
  readonly intervalMs: number;
  /** Receive poll granularity, and how long to wait after the last counted probe. */
  readonly timeoutMs: number;
  readonly reportIntervalMs: number;
  /** Stop after this many probes; null probes until aborted. */
  readonly count: number | null;
  readonly probeFormat: ProbeFormat;
  readonly perPeer: boolean;
}

export interface ProbeClientDeps {
  readonly stats: StatsAggregator;
  readonly print: (line: string) => void;
}

export interface ProbeClient {
  /** Probe until aborted or `count` is reached; resolves to the final snapshot. */
  run(signal?: AbortSignal): Promise<StatsSnapshot>;
  getSnapshot(): StatsSnapshot;
  /** Sequence number of the last probe attempted. */
  getSequence(): number;
  getSendFailures(): number;
}

// ============================================================================
// Default Configuration
// ============================================================================

function createDefaultConfig(): ProbeClientConfig {
  return {
    intervalMs: 1000,
    timeoutMs: 500,
    reportIntervalMs: 5000,
    count: null,
    probeFormat: ProbeFormat.SPACE,
    perPeer: true,
  };
}

// ============================================================================
// Probe Payloads
// ============================================================================

const encoder = new TextEncoder();

export function buildProbe(format: ProbeFormat, sequence: number): Uint8Array {
  const separator = format === ProbeFormat.COLON ? ':' : ' ';
  return encoder.encode(`PING${separator}${sequence}`);
}

// ============================================================================
// Probe Client
// ============================================================================

export function createProbeClient(
  endpoint: Endpoint,
  target: PeerAddress,
  configOverrides?: Partial<ProbeClientConfig>,
  deps?: Partial<ProbeClientDeps>
): ProbeClient {
  // --------------------------------------------------------------------------
  // State
  // --------------------------------------------------------------------------

  const config: ProbeClientConfig = {
    ...createDefaultConfig(),
    ...configOverrides,
  };

  const stats: StatsAggregator = deps?.stats ?? createStatsAggregator();
  const print = deps?.print ?? ((line: string) => console.log(line));

  let sequence = 0;
  let sendFailures = 0;
  let running = false;

  // --------------------------------------------------------------------------
  // Reporter
  // --------------------------------------------------------------------------

  function report(prefix: string): StatsSnapshot {
    const snapshot = stats.snapshot();
    for (const line of formatReport(snapshot, { prefix, perPeer: config.perPeer })) {
      print(line);
    }
    return snapshot;
  }

  // --------------------------------------------------------------------------
  // Sender
  // --------------------------------------------------------------------------

  function countReached(): boolean {
    return config.count !== null && sequence >= config.count;
  }

  /** True when it stopped because `count` was reached. */
  async function runSender(signal?: AbortSignal): Promise<boolean> {
    while (signal?.aborted !== true) {
      sequence += 1;
      const probe = buildProbe(config.probeFormat, sequence);
      const result = await endpoint.send(probe, target);

      if (result.success) {
        stats.recordSent();
        log.client('sent probe %d to %s', sequence, formatPeer(target));
      } else {
        sendFailures += 1;
        console.warn(`Failed to send probe ${sequence}: ${result.error.message}`);
      }

      if (countReached()) {
        return true;
      }

      const slept = await sleep(config.intervalMs, signal);
      if (!slept) {
        return false;
      }
    }
    return false;
  }

  // --------------------------------------------------------------------------
  // Receiver
  // --------------------------------------------------------------------------

  async function runReceiver(signal: AbortSignal): Promise<void> {
    for (;;) {
      const result = await endpoint.receive(config.timeoutMs, signal);

      if (result.status === ReceiveStatus.STOPPED) {
        return;
      }

      if (result.status === ReceiveStatus.TIMEOUT) {
        continue;
      }

      if (result.status === ReceiveStatus.FAILED) {
        log.client('receive failed: %s', result.error.message);
        await sleep(RECEIVE_ERROR_BACKOFF_MS, signal);
        continue;
      }

      stats.recordReceived(result.source);
      log.client(
        'got %d bytes from %s: %s',
        result.payload.length,
        formatPeer(result.source),
        previewPayload(result.payload)
      );
    }
  }

  // --------------------------------------------------------------------------
  // Public API
  // --------------------------------------------------------------------------

  async function run(signal?: AbortSignal): Promise<StatsSnapshot> {
    if (running) {
      throw new Error('Probe client is already running');
    }
    running = true;

    const receiverController = new AbortController();
    const receiver = runReceiver(receiverController.signal);
    const reporterId = setInterval(() => {
      report('');
    }, config.reportIntervalMs);

    try {
      const completed = await runSender(signal);
      if (completed) {
        // Give replies to the last probe a chance to arrive
        await sleep(config.timeoutMs, signal);
      }
    } finally {
      clearInterval(reporterId);
      receiverController.abort();
      await receiver;
      running = false;
    }

    return report(FINAL_PREFIX);
  }

  return {
    run,
    getSnapshot: () => stats.snapshot(),
    getSequence: () => sequence,
    getSendFailures: () => sendFailures,
  };
}
