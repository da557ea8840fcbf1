/**
 * Probe statistics aggregator.
 *
 * One instance is shared by the sender, receiver and reporter. Every
 * mutation is a synchronous increment, so no update can interleave with
 * another; readers get copies.
 *
 * @module stats/stats
 */

import { formatPeer, type PeerAddress } from '../endpoint/index.js';

// ============================================================================
// Constants
// ============================================================================

const MAX_PEERS = 1024;

/** Bucket for replies from peers beyond MAX_PEERS. */
export const OTHER_PEERS_KEY = '(other)';

// ============================================================================
// Types
// ============================================================================

export interface StatsSnapshot {
  readonly totalSent: number;
  readonly totalReceived: number;
  /** Reply count per peer address. */
  readonly perPeer: ReadonlyMap<string, number>;
}

export const PeerKeyMode = {
  ADDRESS: 'ADDRESS',
  ADDRESS_PORT: 'ADDRESS_PORT',
} as const;

export type PeerKeyMode = (typeof PeerKeyMode)[keyof typeof PeerKeyMode];

export interface StatsAggregatorConfig {
  readonly maxPeers: number;
  readonly peerKey: PeerKeyMode;
}

// ============================================================================
// Default Configuration
// ============================================================================

function createDefaultConfig(): StatsAggregatorConfig {
  return {
    maxPeers: MAX_PEERS,
    peerKey: PeerKeyMode.ADDRESS,
  };
}

// ============================================================================
// Aggregator
// ============================================================================

export interface StatsAggregator {
  recordSent(): void;
  recordReceived(peer: PeerAddress): void;
  snapshot(): StatsSnapshot;
}

export function createStatsAggregator(
  configOverrides?: Partial<StatsAggregatorConfig>
): StatsAggregator {
  const config: StatsAggregatorConfig = {
    ...createDefaultConfig(),
    ...configOverrides,
  };

  let totalSent = 0;
  let totalReceived = 0;
  const perPeer = new Map<string, number>();

  function peerKey(peer: PeerAddress): string {
    if (config.peerKey === PeerKeyMode.ADDRESS_PORT) {
      return formatPeer(peer);
    }
    return peer.address;
  }

  function recordSent(): void {
    totalSent += 1;
  }

  function recordReceived(peer: PeerAddress): void {
    let key = peerKey(peer);
    if (!perPeer.has(key) && perPeer.size >= config.maxPeers) {
      key = OTHER_PEERS_KEY;
    }

    totalReceived += 1;
    perPeer.set(key, (perPeer.get(key) ?? 0) + 1);
  }

  function snapshot(): StatsSnapshot {
    return {
      totalSent,
      totalReceived,
      perPeer: new Map(perPeer),
    };
  }

  return {
    recordSent,
    recordReceived,
    snapshot,
  };
}
