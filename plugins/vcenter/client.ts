import { ErrorCode } from '@/lib/errors/error-codes';
import { configError, toAppError } from '@/lib/errors/error';
import { logEvent } from '@/lib/logging/logger';

import { retrieveInventory } from './inventory';
import { queryAvailableMetrics, queryCounterInfo, queryPerf } from './metrics';
import { collectMetricCatalog, INVENTORY_ROOTS } from './pipeline';
import { parseClientConfig } from './config';
import { SessionManager } from './session';
import { createHttpTransport, PacedTransport } from './transport';

import type { ClientConfig } from './config';
import type { AvailableMetricsOptions, PerfQuery } from './metrics';
import type { InventoryRoot, InventoryRootName, MetricCatalog } from './pipeline';
import type { SessionSnapshot } from './session';
import type { SoapCallOutcome } from './soap';
import type { CardinalitySchema } from './transcode';
import type { Transport } from './transport';
import type {
  ApiStats,
  CallOutputs,
  CallResult,
  CounterDescriptor,
  MetricId,
  ObjectRef,
  PerfSamples,
  PropertySet,
  ServiceRefs,
  SessionState,
} from './types';

export type VcenterClientDeps = {
  /** Replaces the HTTP transport, e.g. with an in-process fake. */
  transport?: Transport;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

export type PropertiesRequest = {
  objectType: string;
  propertyPaths: readonly string[];
  includeAll?: boolean;
  arrays?: CardinalitySchema;
};

export type ListedObject = {
  ref: ObjectRef;
  name?: string;
};

export type CatalogResult = CallResult<MetricCatalog> & { catalog_json?: string };

export type VcenterClient = {
  discoverService: (outputs?: Partial<CallOutputs>) => Promise<CallResult<ServiceRefs>>;
  login: (outputs?: Partial<CallOutputs>) => Promise<CallResult<{ state: SessionState }>>;
  retrieveProperties: (request: PropertiesRequest, outputs?: Partial<CallOutputs>) => Promise<CallResult<PropertySet[]>>;
  listObjects: (root: InventoryRootName, outputs?: Partial<CallOutputs>) => Promise<CallResult<ListedObject[]>>;
  availableMetrics: (
    entity: ObjectRef,
    options?: Omit<AvailableMetricsOptions, 'signal'>,
    outputs?: Partial<CallOutputs>,
  ) => Promise<CallResult<MetricId[]>>;
  counterInfo: (counterIds: readonly number[], outputs?: Partial<CallOutputs>) => Promise<CallResult<CounterDescriptor[]>>;
  queryPerf: (
    entity: ObjectRef,
    query: Omit<PerfQuery, 'signal'>,
    outputs?: Partial<CallOutputs>,
  ) => Promise<CallResult<PerfSamples>>;
  metricCatalog: (root: InventoryRootName | InventoryRoot, outputs?: Partial<CallOutputs>) => Promise<CatalogResult>;
  stats: () => ApiStats;
  session: () => SessionSnapshot;
};

type Completed<T> = {
  value: T;
  /** Wire exchange backing the result; composite operations have none. */
  call?: SoapCallOutcome;
  latencyMs?: number;
};

const unconfiguredTransport: Transport = {
  call: async () => {
    throw configError({ code: ErrorCode.CONFIG_ENDPOINT_MISSING, message: 'endpoint is not configured' });
  },
};

/** Serializes the catalog as a JSON object keyed by counter id. Integer-like keys come out in ascending order. */
export function catalogToJson(catalog: MetricCatalog['catalog']): string {
  return JSON.stringify(Object.fromEntries(catalog));
}

/**
 * Public client. Operations never throw: failures come back in the `error` field of the result.
 */
export function createVcenterClient(configInput: unknown, deps: VcenterClientDeps = {}): VcenterClient {
  const config: ClientConfig = parseClientConfig(configInput);

  const inner =
    deps.transport ??
    (config.endpoint
      ? createHttpTransport({ endpoint: config.endpoint, strictTls: config.strictTls, timeoutMs: config.timeoutMs })
      : unconfiguredTransport);
  const transport = new PacedTransport(inner, {
    minIntervalMs: config.minIntervalMs,
    timeoutMs: config.timeoutMs,
    now: deps.now,
    sleep: deps.sleep,
  });
  const session = new SessionManager(transport, { endpoint: config.endpoint });
  const now = deps.now ?? Date.now;

  async function run<T>(
    operation: string,
    outputs: Partial<CallOutputs> | undefined,
    fn: () => Promise<Completed<T>>,
    toJson: (value: T) => string = (value) => JSON.stringify(value),
  ): Promise<CallResult<T>> {
    const flags: CallOutputs = { ...config.outputs, ...outputs };
    try {
      const done = await fn();
      const latency = done.call?.latencyMs ?? done.latencyMs;
      return {
        error: '',
        ...(flags.raw ? { raw: done.call?.raw ?? '' } : {}),
        ...(flags.headers ? { headers: done.call?.headers ?? {} } : {}),
        ...(flags.json ? { json: toJson(done.value) } : {}),
        ...(flags.value ? { value: done.value } : {}),
        ...(latency !== undefined ? { latency_ms: latency } : {}),
      };
    } catch (err) {
      const appError = toAppError(err);
      logEvent({
        level: 'error',
        service: 'client',
        event_type: 'client.call_failed',
        operation,
        code: appError.code,
        category: appError.category,
        message: appError.message,
      });
      return { error: appError.message, error_detail: appError };
    }
  }

  return {
    discoverService: (outputs) =>
      run('discoverService', outputs, async () => {
        const { refs, ...call } = await session.discoverService();
        return { value: refs, call };
      }),

    login: (outputs) =>
      run('login', outputs, async () => {
        const call = await session.login(config.username, config.password);
        return { value: { state: session.snapshot().state }, call };
      }),

    retrieveProperties: (request, outputs) =>
      run('retrieveProperties', outputs, async () => {
        const { propertySets, call } = await retrieveInventory(
          session,
          request.objectType,
          request.propertyPaths,
          request.includeAll ?? false,
          { arrays: request.arrays },
        );
        return { value: propertySets, call };
      }),

    listObjects: (root, outputs) =>
      run('listObjects', outputs, async () => {
        const preset = INVENTORY_ROOTS[root];
        const { propertySets, call } = await retrieveInventory(session, preset.objectType, ['name'], false);
        const value = propertySets.map((set): ListedObject => {
          const name = set.properties.name;
          return {
            ref: { kind: preset.entityType, id: set.obj.id },
            ...(typeof name === 'string' ? { name } : {}),
          };
        });
        return { value, call };
      }),

    availableMetrics: (entity, options, outputs) =>
      run('availableMetrics', outputs, async () => {
        const { metrics, call } = await queryAvailableMetrics(session, entity, options);
        return { value: metrics, call };
      }),

    counterInfo: (counterIds, outputs) =>
      run('counterInfo', outputs, async () => {
        const { counters, call } = await queryCounterInfo(session, counterIds);
        return { value: counters, call };
      }),

    queryPerf: (entity, query, outputs) =>
      run('queryPerf', outputs, async () => {
        const { samples, call } = await queryPerf(session, entity, query);
        return { value: samples, call };
      }),

    metricCatalog: async (root, outputs) => {
      const preset = typeof root === 'string' ? INVENTORY_ROOTS[root] : root;
      const started = now();
      const collected: { value?: MetricCatalog } = {};
      const result = await run(
        'metricCatalog',
        outputs,
        async () => {
          const value = await collectMetricCatalog(session, preset, { concurrency: config.concurrency });
          collected.value = value;
          return { value, latencyMs: now() - started };
        },
        (value) => JSON.stringify(value.entries),
      );
      const json = outputs?.json ?? config.outputs.json;
      if (result.error || !json || !collected.value) return result;
      return { ...result, catalog_json: catalogToJson(collected.value.catalog) };
    },

    stats: () => transport.stats(),
    session: () => session.snapshot(),
  };
}
