import { ErrorCode } from '@/lib/errors/error-codes';
import { protocolError, validationError } from '@/lib/errors/error';

import { asArray, asObject, asText } from './transcode';

import type { SessionManager } from './session';
import type { SoapCallOutcome } from './soap';
import type {
  CounterDescriptor,
  MetricId,
  ObjectRef,
  PerfFormat,
  PerfSample,
  PerfSamples,
  PerfSeries,
  StructuredObject,
  StructuredValue,
} from './types';

export type AvailableMetricsOptions = {
  beginTime?: string | Date;
  endTime?: string | Date;
  intervalId?: number;
  signal?: AbortSignal;
};

export type PerfQuery = {
  metrics: readonly MetricId[];
  format?: PerfFormat;
  beginTime?: string | Date;
  endTime?: string | Date;
  maxSample?: number;
  intervalId?: number;
  signal?: AbortSignal;
};

/** UTC `YYYY-MM-DDTHH:MM:SSZ`. */
export function formatVimDateTime(input: string | Date, field = 'time'): string {
  const date = input instanceof Date ? input : new Date(input);
  if (Number.isNaN(date.getTime())) {
    throw validationError({
      code: ErrorCode.VALIDATION_FAILED,
      message: `${field} is not a valid date`,
      details: [{ field, issue: 'invalid_date' }],
    });
  }
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function optionalDate(input: string | Date | undefined, field: string): string | undefined {
  return input === undefined ? undefined : formatVimDateTime(input, field);
}

function requireEntity(entity: ObjectRef) {
  if (!entity.kind.trim() || !entity.id.trim()) {
    throw validationError({
      code: ErrorCode.VALIDATION_FAILED,
      message: 'entity kind and id are required',
      details: [{ field: 'entity', issue: 'empty' }],
    });
  }
}

function readInteger(value: StructuredValue | undefined, what: string): number {
  const text = asText(value)?.trim();
  const num = text ? Number(text) : Number.NaN;
  if (!Number.isInteger(num)) {
    throw protocolError({
      code: ErrorCode.SOAP_UNEXPECTED_RESPONSE,
      message: `${what} is not an integer`,
      redacted_context: { value: text ?? null },
    });
  }
  return num;
}

function returnvals(value: StructuredValue): StructuredValue[] {
  return asArray(asObject(value)?.returnval);
}

function readMetricId(value: StructuredValue | undefined): MetricId {
  const obj = asObject(value);
  return {
    counterId: readInteger(obj?.counterId, 'counterId'),
    instance: asText(obj?.instance) ?? '',
  };
}

export async function queryAvailableMetrics(
  session: SessionManager,
  entity: ObjectRef,
  options: AvailableMetricsOptions = {},
): Promise<{ metrics: MetricId[]; call: SoapCallOutcome }> {
  requireEntity(entity);
  const beginTime = optionalDate(options.beginTime, 'beginTime');
  const endTime = optionalDate(options.endTime, 'endTime');

  const refs = session.requireAuthenticated();
  const call = await session.call(
    'QueryAvailablePerfMetric',
    { perfManager: refs.perfManager, entity, beginTime, endTime, intervalId: options.intervalId },
    { signal: options.signal },
  );

  return { metrics: returnvals(call.value).map(readMetricId), call };
}

function elementInfo(value: StructuredValue | undefined) {
  const obj = asObject(value);
  return {
    label: asText(obj?.label) ?? '',
    summary: asText(obj?.summary) ?? '',
  };
}

function readCounter(value: StructuredValue): CounterDescriptor {
  const obj: StructuredObject = asObject(value) ?? {};
  const group = elementInfo(obj.groupInfo);
  const name = elementInfo(obj.nameInfo);
  const levelText = asText(obj.level)?.trim();
  const level = levelText ? Number(levelText) : Number.NaN;

  return {
    counterId: readInteger(obj.key, 'counter key'),
    groupLabel: group.label,
    nameLabel: name.label,
    label: `${group.label} - ${name.label}`,
    description: name.summary,
    unit: elementInfo(obj.unitInfo).label,
    rollupType: asText(obj.rollupType) ?? '',
    statsType: asText(obj.statsType) ?? '',
    ...(Number.isInteger(level) ? { level } : {}),
  };
}

export async function queryCounterInfo(
  session: SessionManager,
  counterIds: readonly number[],
  options: { signal?: AbortSignal } = {},
): Promise<{ counters: CounterDescriptor[]; call: SoapCallOutcome }> {
  if (counterIds.length === 0) {
    throw validationError({
      code: ErrorCode.VALIDATION_FAILED,
      message: 'counterIds must not be empty',
      details: [{ field: 'counterIds', issue: 'empty' }],
    });
  }
  const invalid = counterIds.filter((id) => !Number.isInteger(id));
  if (invalid.length > 0) {
    throw validationError({
      code: ErrorCode.VALIDATION_FAILED,
      message: `counterIds must be integers: ${invalid.join(', ')}`,
      details: [{ field: 'counterIds', issue: 'not_integer' }],
    });
  }

  const refs = session.requireAuthenticated();
  const call = await session.call(
    'QueryPerfCounter',
    { perfManager: refs.perfManager, counterIds },
    { signal: options.signal },
  );

  return { counters: returnvals(call.value).map(readCounter), call };
}

function parseSampleValue(cell: string): number | null {
  const trimmed = cell.trim();
  if (!trimmed) return null;
  const num = Number(trimmed);
  return Number.isFinite(num) ? num : null;
}

// "interval,timestamp,interval,timestamp,..."
function parseCsvSampleInfo(text: string): PerfSample[] {
  if (!text.trim()) return [];
  const cells = text.split(',');
  const samples: PerfSample[] = [];
  for (let i = 0; i + 1 < cells.length; i += 2) {
    samples.push({ interval: Number(cells[i]), timestamp: (cells[i + 1] ?? '').trim() });
  }
  return samples;
}

function readSeries(value: StructuredValue, format: PerfFormat): PerfSeries {
  const obj = asObject(value);
  const id = readMetricId(obj?.id);
  const cells = asArray(obj?.value).map((cell) => asText(cell) ?? '');
  const values =
    format === 'csv'
      ? cells.flatMap((csv) => (csv ? csv.split(',').map(parseSampleValue) : []))
      : cells.map(parseSampleValue);
  return { ...id, values };
}

function readSamples(entityMetric: StructuredObject | undefined, format: PerfFormat): PerfSample[] {
  if (!entityMetric) return [];
  if (format === 'csv') return parseCsvSampleInfo(asText(entityMetric.sampleInfoCSV) ?? '');
  return asArray(entityMetric.sampleInfo).map((info) => {
    const obj = asObject(info);
    return { interval: Number(asText(obj?.interval) ?? 0), timestamp: asText(obj?.timestamp) ?? '' };
  });
}

export async function queryPerf(
  session: SessionManager,
  entity: ObjectRef,
  query: PerfQuery,
): Promise<{ samples: PerfSamples; call: SoapCallOutcome }> {
  requireEntity(entity);
  if (query.metrics.length === 0) {
    throw validationError({
      code: ErrorCode.VALIDATION_FAILED,
      message: 'metrics must not be empty',
      details: [{ field: 'metrics', issue: 'empty' }],
    });
  }
  query.metrics.forEach((metric, index) => {
    if (!Number.isInteger(metric.counterId) || typeof metric.instance !== 'string') {
      throw validationError({
        code: ErrorCode.VALIDATION_FAILED,
        message: `metrics[${index}] needs an integer counterId and an instance`,
        details: [{ field: `metrics.${index}`, issue: 'invalid' }],
      });
    }
  });

  const format = query.format ?? 'csv';
  const startTime = optionalDate(query.beginTime, 'beginTime');
  const endTime = optionalDate(query.endTime, 'endTime');

  const refs = session.requireAuthenticated();
  const call = await session.call(
    'QueryPerf',
    {
      perfManager: refs.perfManager,
      entity,
      startTime,
      endTime,
      maxSample: query.maxSample,
      metricIds: query.metrics,
      intervalId: query.intervalId,
      format,
    },
    { signal: query.signal },
  );

  // One query spec was sent, so at most one entity metric comes back.
  const entityMetric = asObject(returnvals(call.value)[0]);
  const series = asArray(entityMetric?.value).map((item) => readSeries(item, format));

  return { samples: { entity, samples: readSamples(entityMetric, format), series }, call };
}
