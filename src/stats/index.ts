/**
 * Stats module exports.
 *
 * @module stats
 */

export {
  createStatsAggregator,
  OTHER_PEERS_KEY,
  PeerKeyMode,
  type StatsAggregator,
  type StatsAggregatorConfig,
  type StatsSnapshot,
} from './stats.js';

export {
  formatPercent,
  formatSummary,
  formatPeerLine,
  formatReport,
  sortedPeers,
  successRate,
  type ReportOptions,
} from './format.js';
