#!/usr/bin/env tsx

import { ErrorCode } from '@/lib/errors/error-codes';
import { validationError } from '@/lib/errors/error';

import { runCollector } from './collector';

import type { CollectorResponseV1 } from './collector';

async function readStdinJson(): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) chunks.push(Buffer.from(chunk));
  const text = Buffer.concat(chunks).toString('utf8');
  return JSON.parse(text);
}

async function main(): Promise<number> {
  let parsed: unknown;
  try {
    parsed = await readStdinJson();
  } catch (err) {
    const error = validationError({
      code: ErrorCode.VALIDATION_FAILED,
      message: 'invalid input json',
      redacted_context: { cause: err instanceof Error ? err.message : String(err) },
    });
    const response: CollectorResponseV1 = {
      schema_version: 'vcenter-response-v1',
      result: null,
      stats: { totalCalls: 0, totalTimeMs: 0, averageMs: 0, lastMs: 0 },
      errors: [error.appError],
    };
    process.stdout.write(`${JSON.stringify(response)}\n`);
    return 1;
  }

  const result = await runCollector(parsed);
  process.stdout.write(`${JSON.stringify(result.response)}\n`);
  return result.exitCode;
}

process.exitCode = await main();
