/**
 * Report line formatting.
 *
 * @module stats/format
 */

import type { StatsSnapshot } from './stats.js';

const PERCENT_DECIMALS = 2;

/** `part / max(whole, 1) * 100` with two decimals. */
export function formatPercent(part: number, whole: number): string {
  const percent = (part * 100) / Math.max(whole, 1);
  return percent.toFixed(PERCENT_DECIMALS);
}

export function successRate(snapshot: StatsSnapshot): number {
  return (snapshot.totalReceived * 100) / Math.max(snapshot.totalSent, 1);
}

export function formatSummary(snapshot: StatsSnapshot): string {
  return (
    `sent=${snapshot.totalSent} ` +
    `recv=${snapshot.totalReceived} ` +
    `success=${formatPercent(snapshot.totalReceived, snapshot.totalSent)}%`
  );
}

/**
 * Peers ordered by reply count, highest first, then by address.
 */
export function sortedPeers(snapshot: StatsSnapshot): Array<[string, number]> {
  return [...snapshot.perPeer.entries()].sort((a, b) => {
    if (a[1] !== b[1]) {
      return b[1] - a[1];
    }
    return a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0;
  });
}

// Share is against probes sent, not probes that reached the peer:
// one probe can draw replies from many peers.
export function formatPeerLine(peer: string, replies: number, totalSent: number): string {
  return `  peer ${peer} replies=${replies} share=${formatPercent(replies, totalSent)}%`;
}

export interface ReportOptions {
  readonly prefix: string;
  readonly perPeer: boolean;
}

export function formatReport(snapshot: StatsSnapshot, options: ReportOptions): string[] {
  const lines = [options.prefix + formatSummary(snapshot)];

  if (options.perPeer) {
    for (const [peer, replies] of sortedPeers(snapshot)) {
      lines.push(formatPeerLine(peer, replies, snapshot.totalSent));
    }
  }

  return lines;
}
