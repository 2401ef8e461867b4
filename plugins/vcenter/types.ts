import type { AppError } from '@/lib/errors/error';

export type StructuredValue = string | StructuredValue[] | { [key: string]: StructuredValue };
export type StructuredObject = { [key: string]: StructuredValue };

/** Opaque, session-scoped handle to a managed entity. */
export type ObjectRef = {
  kind: string;
  id: string;
};

export type SessionState = 'unauthenticated' | 'service_discovered' | 'authenticated';

export type ServiceRefs = {
  propertyCollector: ObjectRef;
  perfManager: ObjectRef;
  rootFolder: ObjectRef;
  sessionManager: ObjectRef;
};

export type PropertySet = {
  obj: ObjectRef;
  properties: Record<string, StructuredValue>;
};

export type MetricId = {
  counterId: number;
  instance: string;
};

export type CounterDescriptor = {
  counterId: number;
  groupLabel: string;
  nameLabel: string;
  /** `<group> - <name>` */
  label: string;
  description: string;
  unit: string;
  rollupType: string;
  statsType: string;
  level?: number;
};

/** A counter available on one object. `counter` is the catalog entry itself, not a copy. */
export type MetricDescriptor = {
  instance: string;
  counter: CounterDescriptor;
};

export type AggregatedMetricCatalog = Map<number, CounterDescriptor>;

export type EnrichedObject = {
  ref: ObjectRef;
  name?: string;
  metrics: MetricDescriptor[];
};

export type PerfFormat = 'csv' | 'normal';

export type PerfSample = {
  interval: number;
  timestamp: string;
};

export type PerfSeries = {
  counterId: number;
  instance: string;
  values: Array<number | null>;
};

export type PerfSamples = {
  entity: ObjectRef;
  samples: PerfSample[];
  series: PerfSeries[];
};

export type CallOutputs = {
  raw: boolean;
  headers: boolean;
  json: boolean;
  value: boolean;
};

export type CallResult<T> = {
  /** Empty string on success. A non-empty error means no other field is complete. */
  error: string;
  error_detail?: AppError;
  raw?: string;
  headers?: Record<string, string>;
  json?: string;
  value?: T;
  latency_ms?: number;
};

export type ApiStats = {
  totalCalls: number;
  totalTimeMs: number;
  averageMs: number;
  lastMs: number;
};
