import { ErrorCode } from '@/lib/errors/error-codes';
import { protocolError, transportError } from '@/lib/errors/error';
import { logEvent } from '@/lib/logging/logger';

import { retrieveInventory } from './inventory';
import { queryAvailableMetrics, queryCounterInfo } from './metrics';
import { asText } from './transcode';

import type { SessionManager } from './session';
import type { AggregatedMetricCatalog, EnrichedObject, MetricId, ObjectRef } from './types';

export type InventoryRoot = {
  /** Object type the inventory traversal lists. */
  objectType: string;
  /** Entity kind used when querying metrics for each listed object. */
  entityType: string;
};

export const INVENTORY_ROOTS = {
  virtual_machines: { objectType: 'VirtualMachine', entityType: 'VirtualMachine' },
  compute_resources: { objectType: 'ComputeResource', entityType: 'ComputeResource' },
  hosts: { objectType: 'HostSystem', entityType: 'HostSystem' },
} as const satisfies Record<string, InventoryRoot>;

export type InventoryRootName = keyof typeof INVENTORY_ROOTS;

export type MetricCatalog = {
  entries: EnrichedObject[];
  catalog: AggregatedMetricCatalog;
};

export type PipelineOptions = {
  concurrency?: number;
  signal?: AbortSignal;
};

/**
 * Runs `fn` over `items` with at most `limit` in flight and keeps results in input order.
 * The first failure stops new work, aborts the shared signal and is rethrown.
 * A cancelled `parentSignal` rejects with TRANSPORT_ABORTED; there are no partial results.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, signal: AbortSignal) => Promise<R>,
  parentSignal?: AbortSignal,
): Promise<R[]> {
  const out: R[] = new Array<R>(items.length);
  const controller = new AbortController();
  const forwardAbort = () => controller.abort();
  if (parentSignal?.aborted) controller.abort();
  else parentSignal?.addEventListener('abort', forwardAbort, { once: true });

  const failures: unknown[] = [];
  let nextIdx = 0;

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    for (;;) {
      if (failures.length > 0 || controller.signal.aborted) return;
      const idx = nextIdx;
      nextIdx += 1;
      if (idx >= items.length) return;
      try {
        out[idx] = await fn(items[idx], controller.signal);
      } catch (err) {
        failures.push(err);
        controller.abort();
        return;
      }
    }
  });

  try {
    await Promise.all(workers);
  } finally {
    parentSignal?.removeEventListener('abort', forwardAbort);
  }

  if (failures.length > 0) throw failures[0];
  if (controller.signal.aborted) {
    throw transportError({
      code: ErrorCode.TRANSPORT_ABORTED,
      message: 'operation was cancelled',
      redacted_context: { completed: out.filter((value) => value !== undefined).length, total: items.length },
    });
  }
  return out;
}

function logStep(step: number, name: string, fields: Record<string, unknown>) {
  logEvent({ level: 'info', service: 'client', event_type: 'pipeline.step', step, name, ...fields });
}

/**
 * Lists the objects under `root`, discovers each one's available metrics and joins them to one
 * catalog of counter descriptions fetched in a single batch. Any failure aborts the whole run.
 */
export async function collectMetricCatalog(
  session: SessionManager,
  root: InventoryRoot,
  options: PipelineOptions = {},
): Promise<MetricCatalog> {
  const { propertySets } = await retrieveInventory(session, root.objectType, ['name'], false, {
    signal: options.signal,
  });
  logStep(1, 'inventory', { object_type: root.objectType, objects: propertySets.length });

  const available = await mapWithConcurrency(
    propertySets,
    options.concurrency ?? 1,
    async (set, signal): Promise<MetricId[]> => {
      const entity: ObjectRef = { kind: root.entityType, id: set.obj.id };
      const { metrics } = await queryAvailableMetrics(session, entity, { signal });
      return metrics;
    },
    options.signal,
  );
  logStep(2, 'available_metrics', { objects: available.length });

  const distinct: number[] = [];
  const seen = new Set<number>();
  for (const metrics of available) {
    for (const metric of metrics) {
      if (seen.has(metric.counterId)) continue;
      seen.add(metric.counterId);
      distinct.push(metric.counterId);
    }
  }
  logStep(3, 'distinct_counters', { counters: distinct.length });

  const catalog: AggregatedMetricCatalog = new Map();
  if (distinct.length > 0) {
    const { counters } = await queryCounterInfo(session, distinct, { signal: options.signal });
    const byId = new Map(counters.map((counter) => [counter.counterId, counter]));
    for (const id of distinct) {
      const counter = byId.get(id);
      if (counter) catalog.set(id, counter);
    }
  }
  logStep(4, 'counter_info', { counters: catalog.size });

  const entries = propertySets.map((set, index): EnrichedObject => {
    const name = asText(set.properties.name);
    const metrics = (available[index] ?? []).map((metric) => {
      const counter = catalog.get(metric.counterId);
      if (!counter) {
        throw protocolError({
          code: ErrorCode.SOAP_UNEXPECTED_RESPONSE,
          message: `counter ${metric.counterId} is missing from the counter metadata`,
          redacted_context: { counter_id: metric.counterId, object_id: set.obj.id },
        });
      }
      return { instance: metric.instance, counter };
    });
    return { ref: { kind: root.entityType, id: set.obj.id }, ...(name !== undefined ? { name } : {}), metrics };
  });
  logStep(5, 'join', { entries: entries.length });

  return { entries, catalog };
}
