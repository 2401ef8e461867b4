import { z } from 'zod/v4';

import { createEnv } from '@t3-oss/env-core';

const booleanFlag = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(['true', 'false', '1', '0']))
  .transform((value) => value === 'true' || value === '1');

export const runtimeEnv = createEnv({
  server: {
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'error']).default('info'),

    // Connection defaults for the collector; a request document may override each of them.
    VCENTER_ENDPOINT: z.string().min(1).optional(),
    VCENTER_USERNAME: z.string().min(1).optional(),
    VCENTER_PASSWORD: z.string().min(1).optional(),
    VCENTER_STRICT_TLS: booleanFlag.default(false),
    VCENTER_MIN_INTERVAL_MS: z.coerce.number().int().nonnegative().default(0),
    VCENTER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    VCENTER_CONCURRENCY: z.coerce.number().int().positive().default(1),
  },
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
});
