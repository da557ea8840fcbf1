/**
 * Configuration from environment variables and command-line flags.
 *
 * Environment values are read first; flags override them. Malformed
 * integers in the environment fall back to the default, malformed flags
 * are rejected.
 *
 * @module config/config
 */

import { parseArgs } from 'node:util';

import { ReplyMode } from '../server/index.js';
import { ProbeFormat } from '../client/index.js';
import { ProbeError, ProbeErrorCode, describeError } from '../errors.js';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_GROUP = 'ff12c909:3199:e8ba:6f6f:7d23:e6ae:d85d';
export const DEFAULT_PORT = 3000;
export const DEFAULT_INTERVAL_MS = 1000;
export const DEFAULT_TIMEOUT_MS = 500;
export const DEFAULT_REPORT_INTERVAL_MS = 5000;

const MAX_PORT = 65535;
const MAX_HOPS = 255;
// Largest delay setTimeout/setInterval accept before clamping to 1 ms
const MAX_TIMER_MS = 2_147_483_647;

const ENV_PREFIX = 'MCAST_PROBE_';

// ============================================================================
// Types
// ============================================================================

export const Role = {
  SERVER: 'server',
  CLIENT: 'client',
} as const;

export type Role = (typeof Role)[keyof typeof Role];

export interface ProbeConfig {
  readonly role: Role;
  readonly group: string;
  readonly port: number;
  readonly intervalMs: number;
  readonly timeoutMs: number;
  readonly reportIntervalMs: number;
  readonly ifname: string | undefined;
  readonly count: number | null;
  readonly replyMode: ReplyMode;
  readonly probeFormat: ProbeFormat;
  readonly hops: number | null;
  readonly loopback: boolean;
  readonly perPeer: boolean;
}

export type ConfigResult =
  | { readonly success: true; readonly config: ProbeConfig; readonly showHelp: boolean }
  | { readonly success: false; readonly error: ProbeError };

export type Env = Readonly<Record<string, string | undefined>>;

interface IntRange {
  readonly min: number;
  readonly max: number;
}

// ============================================================================
// Usage
// ============================================================================

export const USAGE = `Usage: mcast-probe [options]

IPv6 multicast reachability probe. The server joins a group and acknowledges
every datagram; the client sends probes to the group and counts replies.

Options:
  -s, --server               run in server mode (default: client)
  -a, --maddr <addr>         multicast IPv6 group (default: ${DEFAULT_GROUP})
  -p, --port <port>          group port (default: ${DEFAULT_PORT})
  -n, --interval <ms>        probe interval (default: ${DEFAULT_INTERVAL_MS})
  -t, --timeout <ms>         receive poll and final wait (default: ${DEFAULT_TIMEOUT_MS})
  -I, --ifname <name|index>  interface for membership / outbound probes
  -c, --count <n>            stop after n probes (default: until interrupted)
  -r, --report-interval <ms> report period (default: ${DEFAULT_REPORT_INTERVAL_MS})
      --reply <mode>         server reply: ack, echo, response (default: echo)
      --probe-format <fmt>   probe text: space ("PING 1"), colon ("PING:1")
      --hops <n>             multicast hop limit for probes
      --no-loopback          server: do not loop back own multicast
      --per-peer             print per-peer lines (default)
      --no-per-peer          summary lines only
  -h, --help                 show this help

Every option can also be set through ${ENV_PREFIX}* environment variables.
Set DEBUG=mcast-probe:* for per-packet diagnostics.
`;

// ============================================================================
// Environment Helpers
// ============================================================================

export function getEnvInt(env: Env, name: string, defaultValue: number): number {
  const value = env[ENV_PREFIX + name];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (!Number.isFinite(parsed)) {
    return defaultValue;
  }
  return parsed;
}

export function getEnvString(env: Env, name: string, defaultValue: string): string {
  const value = env[ENV_PREFIX + name];
  if (value === undefined) {
    return defaultValue;
  }
  return value;
}

export function getEnvBool(env: Env, name: string, defaultValue: boolean): boolean {
  const value = env[ENV_PREFIX + name];
  if (value === undefined) {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off') {
    return false;
  }
  if (normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on') {
    return true;
  }
  return defaultValue;
}

// ============================================================================
// Validation
// ============================================================================

function invalid(message: string): ProbeError {
  return new ProbeError(ProbeErrorCode.INVALID_CONFIG, message);
}

function checkRange(option: string, value: number, range: IntRange): number {
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw invalid(`${option} must be an integer between ${range.min} and ${range.max}, got ${value}`);
  }
  return value;
}

function parseIntOption(option: string, raw: string, range: IntRange): number {
  if (!/^-?\d+$/.test(raw.trim())) {
    throw invalid(`${option} must be an integer, got '${raw}'`);
  }
  return checkRange(option, parseInt(raw, 10), range);
}

function pickOne<T extends string>(option: string, raw: string, allowed: readonly T[]): T {
  const normalized = raw.trim().toLowerCase();
  for (const candidate of allowed) {
    if (candidate === normalized) {
      return candidate;
    }
  }
  throw invalid(`${option} must be one of ${allowed.join(', ')}, got '${raw}'`);
}

const POSITIVE: IntRange = { min: 1, max: Number.MAX_SAFE_INTEGER };
const TIMER_MS: IntRange = { min: 1, max: MAX_TIMER_MS };
const PORTS: IntRange = { min: 1, max: MAX_PORT };
const HOPS: IntRange = { min: 0, max: MAX_HOPS };

const REPLY_MODES: readonly ReplyMode[] = Object.values(ReplyMode);
const PROBE_FORMATS: readonly ProbeFormat[] = Object.values(ProbeFormat);
const ROLES: readonly Role[] = Object.values(Role);

// ============================================================================
// Loading
// ============================================================================

function optionalEnvInt(env: Env, name: string): number | null {
  const value = env[ENV_PREFIX + name];
  if (value === undefined || value.trim() === '') {
    return null;
  }
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : null;
}

function fromEnvironment(env: Env): ProbeConfig {
  const ifname = env[ENV_PREFIX + 'IFNAME'];
  const count = optionalEnvInt(env, 'COUNT');
  const hops = optionalEnvInt(env, 'HOPS');

  return {
    role: pickOne('MCAST_PROBE_ROLE', getEnvString(env, 'ROLE', Role.CLIENT), ROLES),
    group: getEnvString(env, 'GROUP', DEFAULT_GROUP),
    port: checkRange('MCAST_PROBE_PORT', getEnvInt(env, 'PORT', DEFAULT_PORT), PORTS),
    intervalMs: checkRange(
      'MCAST_PROBE_INTERVAL_MS',
      getEnvInt(env, 'INTERVAL_MS', DEFAULT_INTERVAL_MS),
      TIMER_MS
    ),
    timeoutMs: checkRange(
      'MCAST_PROBE_TIMEOUT_MS',
      getEnvInt(env, 'TIMEOUT_MS', DEFAULT_TIMEOUT_MS),
      TIMER_MS
    ),
    reportIntervalMs: checkRange(
      'MCAST_PROBE_REPORT_MS',
      getEnvInt(env, 'REPORT_MS', DEFAULT_REPORT_INTERVAL_MS),
      TIMER_MS
    ),
    ifname: ifname === undefined || ifname.trim() === '' ? undefined : ifname,
    count: count === null ? null : checkRange('MCAST_PROBE_COUNT', count, POSITIVE),
    replyMode: pickOne('MCAST_PROBE_REPLY', getEnvString(env, 'REPLY', ReplyMode.ECHO), REPLY_MODES),
    probeFormat: pickOne(
      'MCAST_PROBE_FORMAT',
      getEnvString(env, 'FORMAT', ProbeFormat.SPACE),
      PROBE_FORMATS
    ),
    hops: hops === null ? null : checkRange('MCAST_PROBE_HOPS', hops, HOPS),
    loopback: getEnvBool(env, 'LOOPBACK', true),
    perPeer: getEnvBool(env, 'PER_PEER', true),
  };
}

function readFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: false,
      options: {
        server: { type: 'boolean', short: 's' },
        maddr: { type: 'string', short: 'a' },
        port: { type: 'string', short: 'p' },
        interval: { type: 'string', short: 'n' },
        timeout: { type: 'string', short: 't' },
        ifname: { type: 'string', short: 'I' },
        count: { type: 'string', short: 'c' },
        'report-interval': { type: 'string', short: 'r' },
        reply: { type: 'string' },
        'probe-format': { type: 'string' },
        hops: { type: 'string' },
        'no-loopback': { type: 'boolean' },
        'per-peer': { type: 'boolean' },
        'no-per-peer': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (err) {
    throw invalid(describeError(err));
  }
}

function parseFlags(argv: readonly string[], base: ProbeConfig): { config: ProbeConfig; showHelp: boolean } {
  const values = readFlags(argv).values;

  let perPeer = base.perPeer;
  if (values['per-peer'] === true) {
    perPeer = true;
  }
  if (values['no-per-peer'] === true) {
    perPeer = false;
  }

  const config: ProbeConfig = {
    role: values.server === true ? Role.SERVER : base.role,
    group: values.maddr ?? base.group,
    port: values.port === undefined ? base.port : parseIntOption('--port', values.port, PORTS),
    intervalMs:
      values.interval === undefined
        ? base.intervalMs
        : parseIntOption('--interval', values.interval, TIMER_MS),
    timeoutMs:
      values.timeout === undefined
        ? base.timeoutMs
        : parseIntOption('--timeout', values.timeout, TIMER_MS),
    reportIntervalMs:
      values['report-interval'] === undefined
        ? base.reportIntervalMs
        : parseIntOption('--report-interval', values['report-interval'], TIMER_MS),
    ifname: values.ifname ?? base.ifname,
    count: values.count === undefined ? base.count : parseIntOption('--count', values.count, POSITIVE),
    replyMode: values.reply === undefined ? base.replyMode : pickOne('--reply', values.reply, REPLY_MODES),
    probeFormat:
      values['probe-format'] === undefined
        ? base.probeFormat
        : pickOne('--probe-format', values['probe-format'], PROBE_FORMATS),
    hops: values.hops === undefined ? base.hops : parseIntOption('--hops', values.hops, HOPS),
    loopback: values['no-loopback'] === true ? false : base.loopback,
    perPeer,
  };

  return { config, showHelp: values.help === true };
}

/**
 * Build the configuration from `env` then `argv` (without the node and
 * script entries).
 */
export function loadConfig(argv: readonly string[], env: Env): ConfigResult {
  try {
    const { config, showHelp } = parseFlags(argv, fromEnvironment(env));
    return { success: true, config, showHelp };
  } catch (err) {
    if (err instanceof ProbeError) {
      return { success: false, error: err };
    }
    return { success: false, error: invalid(describeError(err)) };
  }
}
