import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';

import { DEFAULT_INTERFACE } from '../../address/index.js';
import { bindClient, type Endpoint } from '../../endpoint/index.js';
import { buildProbe, createProbeClient, ProbeFormat } from '../../client/index.js';
import { FakeNetwork, type FakeSocket } from '../helpers/fake-network.js';
import { fakeUnixTable } from '../helpers/interfaces.js';

const decoder = new TextDecoder();
const encoder = new TextEncoder();

const TARGET = { address: 'ff02::1:3', port: 3000 };
const CLIENT_HOST = '2001:db8::a';

describe('buildProbe', () => {
  test('space format', () => {
    expect(decoder.decode(buildProbe(ProbeFormat.SPACE, 1))).toBe('PING 1');
  });

  test('colon format', () => {
    expect(decoder.decode(buildProbe(ProbeFormat.COLON, 12))).toBe('PING:12');
  });
});

describe('ProbeClient', () => {
  let network: FakeNetwork;
  let endpoint: Endpoint;
  let socket: FakeSocket;
  let lines: string[];
  const extra: Endpoint[] = [];

  function print(line: string): void {
    lines.push(line);
  }

  beforeEach(async () => {
    network = new FakeNetwork();
    endpoint = await bindClient(DEFAULT_INTERFACE, {
      socketFactory: network.factory(CLIENT_HOST),
      table: fakeUnixTable(),
    });
    const created = network.sockets[0];
    if (created === undefined) {
      throw new Error('client socket missing');
    }
    socket = created;
    lines = [];
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    for (const other of extra.splice(0)) {
      await other.close();
    }
    await endpoint.close();
    vi.restoreAllMocks();
  });

  test('sends count numbered probes to the group and reports none answered', async () => {
    const client = createProbeClient(
      endpoint,
      TARGET,
      { intervalMs: 5, timeoutMs: 20, reportIntervalMs: 60_000, count: 5 },
      { print }
    );

    const snapshot = await client.run();

    expect(socket.sent).toEqual([
      { payload: 'PING 1', port: 3000, address: 'ff02::1:3' },
      { payload: 'PING 2', port: 3000, address: 'ff02::1:3' },
      { payload: 'PING 3', port: 3000, address: 'ff02::1:3' },
      { payload: 'PING 4', port: 3000, address: 'ff02::1:3' },
      { payload: 'PING 5', port: 3000, address: 'ff02::1:3' },
    ]);
    expect(snapshot.totalSent).toBe(5);
    expect(snapshot.totalReceived).toBe(0);
    expect(lines).toEqual(['FINAL: sent=5 recv=0 success=0.00%']);
  });

  test('uses the configured probe format', async () => {
    const client = createProbeClient(
      endpoint,
      TARGET,
      { intervalMs: 5, timeoutMs: 5, count: 2, probeFormat: ProbeFormat.COLON },
      { print }
    );

    await client.run();

    expect(socket.sent.map((d) => d.payload)).toEqual(['PING:1', 'PING:2']);
  });

  test('a failed send is warned about and not counted as sent', async () => {
    socket.failNextSends = 1;
    const client = createProbeClient(
      endpoint,
      TARGET,
      { intervalMs: 5, timeoutMs: 5, count: 3 },
      { print }
    );

    const snapshot = await client.run();

    expect(snapshot.totalSent).toBe(2);
    expect(client.getSequence()).toBe(3);
    expect(client.getSendFailures()).toBe(1);
    expect(console.warn).toHaveBeenCalledWith(
      'Failed to send probe 1: failed to send to [ff02::1:3]:3000: send EHOSTUNREACH'
    );
    expect(lines).toEqual(['FINAL: sent=2 recv=0 success=0.00%']);
  });

  test('counts every datagram that arrives, keyed by source address', async () => {
    const responder = await bindClient(DEFAULT_INTERFACE, {
      socketFactory: network.factory('2001:db8::b'),
      table: fakeUnixTable(),
    });
    extra.push(responder);

    const client = createProbeClient(
      endpoint,
      TARGET,
      { intervalMs: 1000, timeoutMs: 10, count: null },
      { print }
    );
    const controller = new AbortController();
    const running = client.run(controller.signal);

    const clientAddress = { address: CLIENT_HOST, port: endpoint.localAddress().port };
    await responder.send(encoder.encode('ACK'), clientAddress);
    await responder.send(encoder.encode('ACK'), clientAddress);

    await vi.waitFor(() => {
      expect(client.getSnapshot().totalReceived).toBe(2);
    });
    controller.abort();
    const snapshot = await running;

    expect(snapshot.totalSent).toBe(1);
    expect([...snapshot.perPeer.entries()]).toEqual([['2001:db8::b', 2]]);
    expect(lines).toEqual([
      'FINAL: sent=1 recv=2 success=200.00%',
      '  peer 2001:db8::b replies=2 share=200.00%',
    ]);
  });

  test('per-peer lines can be turned off', async () => {
    const responder = await bindClient(DEFAULT_INTERFACE, {
      socketFactory: network.factory('2001:db8::b'),
      table: fakeUnixTable(),
    });
    extra.push(responder);

    const client = createProbeClient(
      endpoint,
      TARGET,
      { intervalMs: 1000, timeoutMs: 10, perPeer: false },
      { print }
    );
    const controller = new AbortController();
    const running = client.run(controller.signal);

    await responder.send(encoder.encode('ACK'), {
      address: CLIENT_HOST,
      port: endpoint.localAddress().port,
    });
    await vi.waitFor(() => {
      expect(client.getSnapshot().totalReceived).toBe(1);
    });
    controller.abort();
    await running;

    expect(lines).toEqual(['FINAL: sent=1 recv=1 success=100.00%']);
  });

  test('aborting stops the sender and prints the final summary', async () => {
    const client = createProbeClient(
      endpoint,
      TARGET,
      { intervalMs: 5, timeoutMs: 10, reportIntervalMs: 60_000 },
      { print }
    );
    const controller = new AbortController();
    const running = client.run(controller.signal);

    await vi.waitFor(() => {
      expect(client.getSequence()).toBeGreaterThanOrEqual(3);
    });
    controller.abort();
    const snapshot = await running;
    const sentAtStop = socket.sent.length;

    expect(snapshot.totalSent).toBe(client.getSequence());
    expect(lines).toEqual([`FINAL: sent=${snapshot.totalSent} recv=0 success=0.00%`]);

    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(socket.sent.length).toBe(sentAtStop);
  });

  test('prints a periodic report while running', async () => {
    const client = createProbeClient(
      endpoint,
      TARGET,
      { intervalMs: 5, timeoutMs: 10, reportIntervalMs: 15 },
      { print }
    );
    const controller = new AbortController();
    const running = client.run(controller.signal);

    await vi.waitFor(() => {
      expect(lines.length).toBeGreaterThanOrEqual(1);
    });
    controller.abort();
    await running;

    expect(lines[0]).toMatch(/^sent=\d+ recv=0 success=0\.00%$/);
    expect(lines[lines.length - 1]).toMatch(/^FINAL: sent=\d+ recv=0 success=0\.00%$/);
  });

  test('cannot be run twice at once', async () => {
    const client = createProbeClient(endpoint, TARGET, { intervalMs: 5, timeoutMs: 5 }, { print });
    const controller = new AbortController();
    const running = client.run(controller.signal);

    await expect(client.run()).rejects.toThrow('Probe client is already running');

    controller.abort();
    await running;
  });
});
