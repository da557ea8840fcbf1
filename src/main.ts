#!/usr/bin/env node
/**
 * Command-line entry point.
 *
 * Server: join the group and acknowledge every datagram until interrupted.
 * Client: probe the group, report periodically, print a final summary on
 * Ctrl+C (or after --count probes).
 *
 * @module main
 */

import {
  describeInterface,
  describeRecovery,
  parseMulticastAddress,
  resolveInterface,
  type GroupAddress,
  type InterfaceRef,
} from './address/index.js';
import { bindClient, bindServer, formatPeer } from './endpoint/index.js';
import { createProbeServer } from './server/index.js';
import { createProbeClient } from './client/index.js';
import { Role, USAGE, loadConfig, type ProbeConfig } from './config/index.js';
import { ProbeError, describeError } from './errors.js';

// ============================================================================
// Failure Reporting
// ============================================================================

function exitWithError(err: ProbeError): never {
  console.error(`Error: ${err.message}`);
  process.exit(1);
}

// ============================================================================
// Roles
// ============================================================================

async function runServer(
  config: ProbeConfig,
  group: GroupAddress,
  iface: InterfaceRef,
  signal: AbortSignal
): Promise<void> {
  console.log(
    `Starting server: joining multicast ${group.text} on port ${config.port} ` +
    `(interface ${describeInterface(iface)}, if_index=${iface.index})`
  );

  const endpoint = await bindServer(config.port, group, iface, { loopback: config.loopback });
  const server = createProbeServer(endpoint, { replyMode: config.replyMode });

  // Print stats periodically
  const statsIntervalId = setInterval(() => {
    const stats = server.getStats();
    console.log(
      `[SERVER] received=${stats.received} ` +
      `replied=${stats.replied} ` +
      `failed=${stats.replyFailures} ` +
      `dropped=${stats.repliesDropped} ` +
      `pending=${stats.pendingReplies}`
    );
  }, config.reportIntervalMs);

  try {
    await server.run(signal);
    await server.whenRepliesSettled();
  } finally {
    clearInterval(statsIntervalId);
    endpoint.leaveGroup(group, iface);
    await endpoint.close();
  }

  const stats = server.getStats();
  console.log(`FINAL: received=${stats.received} replied=${stats.replied}`);
}

async function runClient(
  config: ProbeConfig,
  group: GroupAddress,
  iface: InterfaceRef,
  signal: AbortSignal
): Promise<void> {
  const target = { address: group.text, port: config.port };

  console.log(
    `Starting client: sending to ${formatPeer(target)} every ${config.intervalMs} ms, ` +
    `timeout ${config.timeoutMs} ms`
  );

  const endpoint = await bindClient(iface, {
    hops: config.hops ?? undefined,
  });

  const client = createProbeClient(endpoint, target, {
    intervalMs: config.intervalMs,
    timeoutMs: config.timeoutMs,
    reportIntervalMs: config.reportIntervalMs,
    count: config.count,
    probeFormat: config.probeFormat,
    perPeer: config.perPeer,
  });

  try {
    await client.run(signal);
  } finally {
    await endpoint.close();
  }
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const loaded = loadConfig(process.argv.slice(2), process.env);
  if (!loaded.success) {
    exitWithError(loaded.error);
  }

  if (loaded.showHelp) {
    console.log(USAGE);
    return;
  }

  const config = loaded.config;

  const parsed = parseMulticastAddress(config.group);
  if (!parsed.success) {
    exitWithError(parsed.error);
  }

  const note = describeRecovery(parsed);
  if (note !== null) {
    console.log(note);
  }
  if (parsed.warning !== null) {
    console.warn(`Warning: ${parsed.warning}`);
  }

  const resolved = resolveInterface(config.ifname);
  if (!resolved.success) {
    exitWithError(resolved.error);
  }

  // Graceful shutdown
  const controller = new AbortController();

  function shutdown(): void {
    if (controller.signal.aborted) {
      return;
    }
    console.log(
      config.role === Role.CLIENT
        ? '\nCtrl-C received, printing stats...'
        : '\nShutting down...'
    );
    controller.abort();
  }

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  try {
    if (config.role === Role.SERVER) {
      await runServer(config, parsed.address, resolved.iface, controller.signal);
    } else {
      await runClient(config, parsed.address, resolved.iface, controller.signal);
    }
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
  }
}

// Run
main().catch((err: unknown) => {
  if (err instanceof ProbeError) {
    exitWithError(err);
  }
  console.error('Fatal error:', describeError(err));
  process.exit(1);
});
