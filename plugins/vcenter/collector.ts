import { z } from 'zod/v4';

import { ErrorCode } from '@/lib/errors/error-codes';
import { sessionError, toAppError, validationError } from '@/lib/errors/error';
import { logEvent } from '@/lib/logging/logger';

import { catalogToJson, createVcenterClient } from './client';
import { configFromEnv } from './config';

import type { AppError } from '@/lib/errors/error';
import type { VcenterClient, VcenterClientDeps } from './client';
import type { InventoryRootName } from './pipeline';
import type { ApiStats, CallOutputs, CallResult } from './types';

const ROOT_NAMES = ['virtual_machines', 'compute_resources', 'hosts'] as const satisfies readonly InventoryRootName[];
const RootName = z.enum(ROOT_NAMES);
const EntitySchema = z.object({ kind: z.string().min(1), id: z.string().min(1) });
const DateInput = z.string().min(1);

const OperationSchema = z.discriminatedUnion('operation', [
  z.object({ operation: z.literal('healthcheck'), args: z.object({}).optional() }),
  z.object({
    operation: z.literal('inventory'),
    args: z.object({
      object_type: z.string().min(1),
      property_paths: z.array(z.string()).default([]),
      include_all: z.boolean().default(false),
    }),
  }),
  z.object({ operation: z.literal('objects'), args: z.object({ root: RootName }) }),
  z.object({
    operation: z.literal('available_metrics'),
    args: z.object({
      entity: EntitySchema,
      begin_time: DateInput.optional(),
      end_time: DateInput.optional(),
      interval_id: z.number().int().optional(),
    }),
  }),
  z.object({
    operation: z.literal('counter_info'),
    args: z.object({ counter_ids: z.array(z.number().int()).min(1) }),
  }),
  z.object({
    operation: z.literal('perf'),
    args: z.object({
      entity: EntitySchema,
      metrics: z.array(z.object({ counter_id: z.number().int(), instance: z.string().default('') })).min(1),
      format: z.enum(['csv', 'normal']).default('csv'),
      begin_time: DateInput.optional(),
      end_time: DateInput.optional(),
      max_sample: z.number().int().positive().optional(),
      interval_id: z.number().int().optional(),
    }),
  }),
  z.object({ operation: z.literal('metric_catalog'), args: z.object({ root: RootName }) }),
]);

export const CollectorRequestSchema = z.object({
  schema_version: z.literal('vcenter-request-v1'),
  config: z.record(z.string(), z.unknown()).optional(),
  request: OperationSchema,
});

export type CollectorRequestV1 = z.infer<typeof CollectorRequestSchema>;
type CollectorOperation = CollectorRequestV1['request'];

export type CollectorResponseV1 = {
  schema_version: 'vcenter-response-v1';
  result: unknown;
  stats: ApiStats;
  errors: AppError[];
};

export type CollectorRun = { response: CollectorResponseV1; exitCode: number };

// The response document carries decoded values only.
const VALUE_ONLY: CallOutputs = { raw: false, headers: false, json: false, value: true };

const EMPTY_STATS: ApiStats = { totalCalls: 0, totalTimeMs: 0, averageMs: 0, lastMs: 0 };

function makeResponse(partial: Partial<CollectorResponseV1>): CollectorResponseV1 {
  return {
    schema_version: 'vcenter-response-v1',
    result: null,
    stats: { ...EMPTY_STATS },
    errors: [],
    ...partial,
  };
}

function unwrap<T>(result: CallResult<T>): { ok: true; value: T | undefined } | { ok: false; error: AppError } {
  if (!result.error) return { ok: true, value: result.value };
  return {
    ok: false,
    error: result.error_detail ?? toAppError(new Error(result.error)),
  };
}

async function runOperation(client: VcenterClient, request: CollectorOperation): Promise<CallResult<unknown>> {
  switch (request.operation) {
    case 'healthcheck': {
      if (client.session().state === 'authenticated') return { error: '', value: { ok: true } };
      const error = sessionError({ code: ErrorCode.SESSION_NOT_AUTHENTICATED, message: 'session is not authenticated' });
      return { error: error.message, error_detail: error.appError };
    }
    case 'inventory':
      return client.retrieveProperties(
        {
          objectType: request.args.object_type,
          propertyPaths: request.args.property_paths,
          includeAll: request.args.include_all,
        },
        VALUE_ONLY,
      );
    case 'objects':
      return client.listObjects(request.args.root, VALUE_ONLY);
    case 'available_metrics':
      return client.availableMetrics(
        request.args.entity,
        {
          beginTime: request.args.begin_time,
          endTime: request.args.end_time,
          intervalId: request.args.interval_id,
        },
        VALUE_ONLY,
      );
    case 'counter_info':
      return client.counterInfo(request.args.counter_ids, VALUE_ONLY);
    case 'perf':
      return client.queryPerf(
        request.args.entity,
        {
          metrics: request.args.metrics.map((m) => ({ counterId: m.counter_id, instance: m.instance })),
          format: request.args.format,
          beginTime: request.args.begin_time,
          endTime: request.args.end_time,
          maxSample: request.args.max_sample,
          intervalId: request.args.interval_id,
        },
        VALUE_ONLY,
      );
    case 'metric_catalog': {
      const result = await client.metricCatalog(request.args.root, VALUE_ONLY);
      if (result.error || !result.value) return result;
      const catalog: unknown = JSON.parse(catalogToJson(result.value.catalog));
      return { error: '', value: { entries: result.value.entries, catalog } };
    }
  }
}

/**
 * Validates one request document, logs in, runs the operation and builds the response document.
 */
export async function runCollector(input: unknown, deps: VcenterClientDeps = {}): Promise<CollectorRun> {
  const parsed = CollectorRequestSchema.safeParse(input);
  if (!parsed.success) {
    const error = validationError({
      code: ErrorCode.VALIDATION_FAILED,
      message: 'invalid request document',
      details: parsed.error.issues.map((issue) => ({
        field: issue.path.map(String).join('.'),
        issue: issue.code,
        message: issue.message,
      })),
    });
    return { response: makeResponse({ errors: [error.appError] }), exitCode: 1 };
  }

  const request = parsed.data;
  let client: VcenterClient;
  try {
    client = createVcenterClient({ ...configFromEnv(), ...request.config }, deps);
  } catch (err) {
    return { response: makeResponse({ errors: [toAppError(err)] }), exitCode: 1 };
  }

  logEvent({ level: 'info', service: 'collector', event_type: 'collector.start', operation: request.request.operation });

  const login = unwrap(await client.login(VALUE_ONLY));
  if (!login.ok) {
    return { response: makeResponse({ stats: client.stats(), errors: [login.error] }), exitCode: 1 };
  }

  const outcome = unwrap(await runOperation(client, request.request));
  const stats = client.stats();

  logEvent({
    level: 'info',
    service: 'collector',
    event_type: 'collector.finish',
    operation: request.request.operation,
    ok: outcome.ok,
    total_calls: stats.totalCalls,
  });

  if (!outcome.ok) return { response: makeResponse({ stats, errors: [outcome.error] }), exitCode: 1 };
  return { response: makeResponse({ result: outcome.value ?? null, stats }), exitCode: 0 };
}
