import { describe, expect, it } from 'vitest';

import { ClientError } from '@/lib/errors/error';

import { catalogToJson } from '../client';
import { collectMetricCatalog, INVENTORY_ROOTS, mapWithConcurrency } from '../pipeline';
import { counterIdsOf, counterXml, entityIdOf, envelope, loggedInSession } from './fake-vsphere';

import type { FakeHandler } from './fake-vsphere';

const COUNTERS: Record<number, string> = {
  2: counterXml(2, 'CPU', 'Usage', 'Percent'),
  6: counterXml(6, 'CPU', 'Usage in MHz', 'MHz'),
  24: counterXml(24, 'Net', 'Usage', 'KBps'),
};

const AVAILABLE: Record<string, Array<[number, string]>> = {
  'vm-A': [
    [2, ''],
    [6, ''],
  ],
  'vm-B': [
    [6, ''],
    [24, 'vmnic0'],
  ],
};

function inventoryOf(ids: string[]): FakeHandler {
  return () => ({
    body: envelope(
      `<RetrievePropertiesResponse xmlns="urn:vim25">${ids
        .map(
          (id) =>
            `<returnval><obj type="VirtualMachine">${id}</obj><propSet><name>name</name><val>${id.toLowerCase()}-name</val></propSet></returnval>`,
        )
        .join('')}</RetrievePropertiesResponse>`,
    ),
  });
}

const availableMetrics: FakeHandler = ({ payload }) => ({
  body: envelope(
    `<QueryAvailablePerfMetricResponse xmlns="urn:vim25">${(AVAILABLE[entityIdOf(payload)] ?? [])
      .map(([id, instance]) => `<returnval><counterId>${id}</counterId><instance>${instance}</instance></returnval>`)
      .join('')}</QueryAvailablePerfMetricResponse>`,
  ),
});

function counterInfo(known: number[] = [2, 6, 24]): FakeHandler {
  return ({ payload }) => ({
    body: envelope(
      `<QueryPerfCounterResponse xmlns="urn:vim25">${counterIdsOf(payload)
        .filter((id) => known.includes(id))
        .map((id) => COUNTERS[id])
        .join('')}</QueryPerfCounterResponse>`,
    ),
  });
}

describe('collectMetricCatalog', () => {
  it('joins available metrics to one deduplicated counter catalog', async () => {
    const { session, requests, operations } = await loggedInSession({
      RetrieveProperties: inventoryOf(['vm-A', 'vm-B']),
      QueryAvailablePerfMetric: availableMetrics,
      QueryPerfCounter: counterInfo(),
    });

    const { entries, catalog } = await collectMetricCatalog(session, INVENTORY_ROOTS.virtual_machines);

    expect(operations()).toEqual([
      'RetrieveServiceContent',
      'Login',
      'RetrieveProperties',
      'QueryAvailablePerfMetric',
      'QueryAvailablePerfMetric',
      'QueryPerfCounter',
    ]);
    expect(counterIdsOf(requests[5]?.payload ?? '')).toEqual([2, 6, 24]);
    expect([...catalog.keys()]).toEqual([2, 6, 24]);
    expect(catalog.get(24)?.label).toBe('Net - Usage');

    expect(entries.map((entry) => entry.ref)).toEqual([
      { kind: 'VirtualMachine', id: 'vm-A' },
      { kind: 'VirtualMachine', id: 'vm-B' },
    ]);
    expect(entries[0]?.name).toBe('vm-a-name');
    expect(entries[1]?.metrics.map((metric) => [metric.counter.counterId, metric.instance])).toEqual([
      [6, ''],
      [24, 'vmnic0'],
    ]);

    // Both objects share the catalog's descriptor for counter 6.
    expect(entries[0]?.metrics[1]?.counter).toBe(catalog.get(6));
    expect(entries[1]?.metrics[0]?.counter).toBe(catalog.get(6));
  });

  it('produces identical output for identical responses', async () => {
    const handlers = {
      RetrieveProperties: inventoryOf(['vm-A', 'vm-B']),
      QueryAvailablePerfMetric: availableMetrics,
      QueryPerfCounter: counterInfo(),
    };
    const first = await collectMetricCatalog((await loggedInSession(handlers)).session, INVENTORY_ROOTS.virtual_machines);
    const second = await collectMetricCatalog((await loggedInSession(handlers)).session, INVENTORY_ROOTS.virtual_machines);

    expect(JSON.stringify(second.entries)).toBe(JSON.stringify(first.entries));
    expect(catalogToJson(second.catalog)).toBe(catalogToJson(first.catalog));
  });

  it('keys the catalog JSON by counter id in ascending order', async () => {
    const { session } = await loggedInSession({
      RetrieveProperties: inventoryOf(['vm-B', 'vm-A']),
      QueryAvailablePerfMetric: availableMetrics,
      QueryPerfCounter: counterInfo(),
    });

    const { catalog } = await collectMetricCatalog(session, INVENTORY_ROOTS.virtual_machines);

    expect([...catalog.keys()]).toEqual([6, 24, 2]);
    expect(Object.keys(JSON.parse(catalogToJson(catalog)))).toEqual(['2', '6', '24']);
  });

  it('keeps object order with concurrent discovery', async () => {
    const { session } = await loggedInSession({
      RetrieveProperties: inventoryOf(['vm-B', 'vm-A']),
      QueryAvailablePerfMetric: async (request) => {
        if (entityIdOf(request.payload) === 'vm-B') await new Promise((resolve) => setTimeout(resolve, 15));
        return availableMetrics(request);
      },
      QueryPerfCounter: counterInfo(),
    });

    const { entries, catalog } = await collectMetricCatalog(session, INVENTORY_ROOTS.virtual_machines, {
      concurrency: 2,
    });

    expect(entries.map((entry) => entry.ref.id)).toEqual(['vm-B', 'vm-A']);
    expect([...catalog.keys()]).toEqual([6, 24, 2]);
  });

  it('skips counter metadata when no metrics are available', async () => {
    const { session, operations } = await loggedInSession({
      RetrieveProperties: inventoryOf(['vm-C']),
      QueryAvailablePerfMetric: availableMetrics,
    });

    const { entries, catalog } = await collectMetricCatalog(session, INVENTORY_ROOTS.virtual_machines);

    expect(entries).toEqual([{ ref: { kind: 'VirtualMachine', id: 'vm-C' }, name: 'vm-c-name', metrics: [] }]);
    expect(catalog.size).toBe(0);
    expect(operations()).not.toContain('QueryPerfCounter');
  });

  it('fails when a counter is missing from the metadata', async () => {
    const { session } = await loggedInSession({
      RetrieveProperties: inventoryOf(['vm-A', 'vm-B']),
      QueryAvailablePerfMetric: availableMetrics,
      QueryPerfCounter: counterInfo([2, 6]),
    });

    await expect(collectMetricCatalog(session, INVENTORY_ROOTS.virtual_machines)).rejects.toThrowError(
      'counter 24 is missing from the counter metadata',
    );
  });

  it('fails the whole run on the first discovery error', async () => {
    const { session, operations } = await loggedInSession({
      RetrieveProperties: inventoryOf(['vm-A', 'vm-B']),
      QueryAvailablePerfMetric: () => ({ status: 503, body: 'busy' }),
    });

    const err = await collectMetricCatalog(session, INVENTORY_ROOTS.virtual_machines).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ClientError);
    expect(err instanceof ClientError ? err.appError.code : undefined).toBe('TRANSPORT_HTTP_STATUS');
    expect(operations().filter((op) => op === 'QueryAvailablePerfMetric')).toHaveLength(1);
  });
});

describe('mapWithConcurrency', () => {
  it('bounds the number of tasks in flight and keeps input order', async () => {
    let inFlight = 0;
    let peak = 0;
    const out = await mapWithConcurrency([30, 5, 20, 1], 2, async (delay) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, delay));
      inFlight -= 1;
      return delay * 10;
    });

    expect(out).toEqual([300, 50, 200, 10]);
    expect(peak).toBe(2);
  });

  it('stops starting work and aborts in-flight tasks after a failure', async () => {
    const started: number[] = [];
    let abortedSeen = false;

    const run = mapWithConcurrency([0, 1, 2, 3], 2, (item, signal) => {
      started.push(item);
      if (item === 1) return Promise.reject(new Error('boom'));
      return new Promise<number>((_, reject) => {
        signal.addEventListener('abort', () => {
          abortedSeen = true;
          reject(new Error('aborted'));
        });
      });
    });

    await expect(run).rejects.toThrowError('boom');
    expect(started).toEqual([0, 1]);
    expect(abortedSeen).toBe(true);
  });

  it('rejects instead of returning partial results when the caller cancels', async () => {
    const parent = new AbortController();
    const started: number[] = [];

    const run = mapWithConcurrency(
      [1, 2, 3],
      1,
      async (item) => {
        started.push(item);
        if (item === 1) parent.abort();
        return item * 10;
      },
      parent.signal,
    );

    await expect(run).rejects.toBeInstanceOf(ClientError);
    await expect(run).rejects.toMatchObject({ appError: { code: 'TRANSPORT_ABORTED', category: 'transport' } });
    expect(started).toEqual([1]);
  });

  it('runs nothing when the caller has already cancelled', async () => {
    const parent = new AbortController();
    parent.abort();
    const started: number[] = [];

    const run = mapWithConcurrency(
      [1, 2],
      2,
      async (item) => {
        started.push(item);
        return item;
      },
      parent.signal,
    );

    await expect(run).rejects.toMatchObject({ appError: { code: 'TRANSPORT_ABORTED' } });
    expect(started).toEqual([]);
  });
});
