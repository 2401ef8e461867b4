import { afterEach, describe, expect, it, vi } from 'vitest';

async function loadEnv(vars: Record<string, string | undefined>) {
  vi.resetModules();
  for (const [key, value] of Object.entries(vars)) {
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }
  const { runtimeEnv } = await import('@/lib/env/runtime');
  return runtimeEnv;
}

describe('runtimeEnv', () => {
  afterEach(() => {
    delete process.env.VCENTER_STRICT_TLS;
    delete process.env.VCENTER_MIN_INTERVAL_MS;
    delete process.env.VCENTER_ENDPOINT;
  });

  it('parses VCENTER_STRICT_TLS (true/false/1/0; case-insensitive) and defaults to false', async () => {
    await expect(loadEnv({ VCENTER_STRICT_TLS: undefined }).then((e) => e.VCENTER_STRICT_TLS)).resolves.toBe(false);
    await expect(loadEnv({ VCENTER_STRICT_TLS: 'true' }).then((e) => e.VCENTER_STRICT_TLS)).resolves.toBe(true);
    await expect(loadEnv({ VCENTER_STRICT_TLS: 'false' }).then((e) => e.VCENTER_STRICT_TLS)).resolves.toBe(false);
    await expect(loadEnv({ VCENTER_STRICT_TLS: '1' }).then((e) => e.VCENTER_STRICT_TLS)).resolves.toBe(true);
    await expect(loadEnv({ VCENTER_STRICT_TLS: '0' }).then((e) => e.VCENTER_STRICT_TLS)).resolves.toBe(false);
    await expect(loadEnv({ VCENTER_STRICT_TLS: 'TRUE' }).then((e) => e.VCENTER_STRICT_TLS)).resolves.toBe(true);
    await expect(loadEnv({ VCENTER_STRICT_TLS: 'False' }).then((e) => e.VCENTER_STRICT_TLS)).resolves.toBe(false);
  });

  it('rejects invalid VCENTER_STRICT_TLS values', async () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    await expect(loadEnv({ VCENTER_STRICT_TLS: 'yes' })).rejects.toThrow();
    spy.mockRestore();
  });

  it('coerces numeric settings and treats empty strings as unset', async () => {
    const env = await loadEnv({ VCENTER_MIN_INTERVAL_MS: '250', VCENTER_ENDPOINT: '' });
    expect(env.VCENTER_MIN_INTERVAL_MS).toBe(250);
    expect(env.VCENTER_ENDPOINT).toBeUndefined();
    expect(env.VCENTER_TIMEOUT_MS).toBe(30_000);
  });
});
