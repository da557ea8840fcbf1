/**
 * Server module exports.
 *
 * @module server
 */

export {
  createProbeServer,
  buildReply,
  ReplyMode,
  ServerState,
  type ProbeServer,
  type ProbeServerConfig,
  type ProbeServerStats,
} from './server-loop.js';

export {
  createReplyQueue,
  type ReplyJob,
  type ReplyQueue,
  type ReplyQueueConfig,
  type ReplyQueueStats,
} from './reply-queue.js';
