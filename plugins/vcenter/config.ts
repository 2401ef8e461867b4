import { z } from 'zod/v4';

import { ErrorCode } from '@/lib/errors/error-codes';
import { configError } from '@/lib/errors/error';
import { runtimeEnv } from '@/lib/env/runtime';

import { toSdkEndpoint } from './soap';

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export const CallOutputsSchema = z.object({
  raw: z.boolean().default(true),
  headers: z.boolean().default(true),
  json: z.boolean().default(true),
  value: z.boolean().default(true),
});

export const ClientConfigSchema = z.object({
  endpoint: z
    .string()
    .trim()
    .min(1)
    .refine(isHttpUrl, { message: 'endpoint must be an http(s) URL' })
    .transform(toSdkEndpoint)
    .optional(),
  username: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
  strictTls: z.boolean().default(false),
  minIntervalMs: z.number().int().nonnegative().default(0),
  timeoutMs: z.number().int().positive().default(30_000),
  concurrency: z.number().int().positive().max(64).default(1),
  outputs: CallOutputsSchema.default({ raw: true, headers: true, json: true, value: true }),
});

export type ClientConfigInput = z.input<typeof ClientConfigSchema>;
export type ClientConfig = z.output<typeof ClientConfigSchema>;

export function parseClientConfig(input: unknown): ClientConfig {
  const parsed = ClientConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw configError({
      code: ErrorCode.CONFIG_INVALID,
      message: 'invalid client configuration',
      details: parsed.error.issues.map((issue) => ({
        field: issue.path.map(String).join('.'),
        issue: issue.code,
        message: issue.message,
      })),
    });
  }
  return parsed.data;
}

/** Connection defaults taken from the environment. */
export function configFromEnv(): ClientConfigInput {
  return {
    ...(runtimeEnv.VCENTER_ENDPOINT ? { endpoint: runtimeEnv.VCENTER_ENDPOINT } : {}),
    ...(runtimeEnv.VCENTER_USERNAME ? { username: runtimeEnv.VCENTER_USERNAME } : {}),
    ...(runtimeEnv.VCENTER_PASSWORD ? { password: runtimeEnv.VCENTER_PASSWORD } : {}),
    strictTls: runtimeEnv.VCENTER_STRICT_TLS,
    minIntervalMs: runtimeEnv.VCENTER_MIN_INTERVAL_MS,
    timeoutMs: runtimeEnv.VCENTER_TIMEOUT_MS,
    concurrency: runtimeEnv.VCENTER_CONCURRENCY,
  };
}
