import { runtimeEnv } from '@/lib/env/runtime';
import { redactJsonSecrets } from '@/lib/redaction/redact-json';

export type LogLevel = 'debug' | 'info' | 'error';
export type ServiceName = 'collector' | 'client';

export type LogEventInput = {
  event_type: string;
  level: LogLevel;
  service: ServiceName;
  message?: string;
} & Record<string, unknown>;

const EXCERPT_LIMIT = 2000;

function levelRank(level: LogLevel): number {
  if (level === 'debug') return 10;
  if (level === 'info') return 20;
  return 30;
}

function getVersion() {
  return process.env.GIT_SHA ?? process.env.npm_package_version ?? 'unknown';
}

function truncateExcerptsDeep(input: unknown): unknown {
  if (Array.isArray(input)) return input.map((v) => truncateExcerptsDeep(v));
  if (!input || typeof input !== 'object') return input;

  const obj = input as Record<string, unknown>;
  const out: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (key.endsWith('_excerpt') && typeof value === 'string') {
      out[key] = value.length > EXCERPT_LIMIT ? value.slice(0, EXCERPT_LIMIT) : value;
      continue;
    }

    out[key] = truncateExcerptsDeep(value);
  }

  return out;
}

/**
 * Emits one JSON line on stderr. Stdout is reserved for the collector response document.
 */
export function logEvent(input: LogEventInput) {
  if (levelRank(input.level) < levelRank(runtimeEnv.LOG_LEVEL)) return;

  const base = {
    ts: new Date().toISOString(),
    env: runtimeEnv.NODE_ENV,
    version: getVersion(),
    ...input,
  };

  const event = truncateExcerptsDeep(redactJsonSecrets(base));
  console.error(JSON.stringify(event));
}
