import { describe, expect, it } from 'vitest';

import { ClientError } from '@/lib/errors/error';

import { SessionManager } from '../session';
import { PacedTransport } from '../transport';
import { createFakeVsphere, envelope, fault, SESSION_COOKIE } from './fake-vsphere';

import type { FakeHandler } from './fake-vsphere';

const ENDPOINT = 'https://vcenter.example.test/sdk';

function sessionWith(handlers: Record<string, FakeHandler> = {}, endpoint: string | undefined = ENDPOINT) {
  const fake = createFakeVsphere(handlers);
  const paced = new PacedTransport(fake.transport, { minIntervalMs: 0, timeoutMs: 1000 });
  return { ...fake, session: new SessionManager(paced, { endpoint }) };
}

async function captureError(promise: Promise<unknown>): Promise<ClientError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ClientError) return err;
    throw err;
  }
  throw new Error('expected a ClientError');
}

describe('SessionManager', () => {
  it('discovers the service references', async () => {
    const { session } = sessionWith();

    const { refs } = await session.discoverService();

    expect(refs).toEqual({
      propertyCollector: { kind: 'PropertyCollector', id: 'propertyCollector' },
      perfManager: { kind: 'PerformanceManager', id: 'PerfMgr' },
      rootFolder: { kind: 'Folder', id: 'group-d1' },
      sessionManager: { kind: 'SessionManager', id: 'SessionManager' },
    });
    expect(session.snapshot().state).toBe('service_discovered');
  });

  it('logs in after discovery and sends the cookie on later calls', async () => {
    const { session, requests, operations } = sessionWith({
      QueryPerfCounter: () => ({ body: envelope('<QueryPerfCounterResponse xmlns="urn:vim25"/>') }),
    });

    await session.login('collector@vsphere.local', 'test-secret');
    expect(session.snapshot().state).toBe('authenticated');

    const refs = session.requireAuthenticated();
    await session.call('QueryPerfCounter', { perfManager: refs.perfManager, counterIds: [2] });

    expect(operations()).toEqual(['RetrieveServiceContent', 'Login', 'QueryPerfCounter']);
    expect(requests[0]?.headers.cookie).toBeUndefined();
    expect(requests[1]?.headers.cookie).toBeUndefined();
    expect(requests[2]?.headers.cookie).toBe(SESSION_COOKIE);
  });

  it('reuses discovered references on login', async () => {
    const { session, operations } = sessionWith();

    await session.discoverService();
    await session.login('collector@vsphere.local', 'test-secret');

    expect(operations()).toEqual(['RetrieveServiceContent', 'Login']);
  });

  it('fails login without a session cookie and stays discovered', async () => {
    const { session } = sessionWith({
      Login: () => ({ body: envelope('<LoginResponse xmlns="urn:vim25"><returnval><key>k</key></returnval></LoginResponse>') }),
    });

    const err = await captureError(session.login('collector@vsphere.local', 'test-secret'));

    expect(err.appError.code).toBe('SESSION_COOKIE_MISSING');
    expect(err.appError.category).toBe('session');
    expect(session.snapshot().state).toBe('service_discovered');
  });

  it('maps a login fault to a session error', async () => {
    const { session } = sessionWith({ Login: () => fault('Cannot complete login due to an incorrect user name or password.') });

    const err = await captureError(session.login('collector@vsphere.local', 'test-secret'));

    expect(err.appError.code).toBe('SESSION_LOGIN_FAILED');
    expect(err.appError.category).toBe('session');
    expect(err.message).toBe(
      'login failed: Login fault: Cannot complete login due to an incorrect user name or password.',
    );
  });

  it('reports a discovery failure inside login and stays unauthenticated', async () => {
    const { session, operations } = sessionWith({
      RetrieveServiceContent: () => ({
        body: envelope(
          '<RetrieveServiceContentResponse xmlns="urn:vim25"><returnval><rootFolder type="Folder">group-d1</rootFolder><propertyCollector type="PropertyCollector">propertyCollector</propertyCollector><sessionManager type="SessionManager">SessionManager</sessionManager></returnval></RetrieveServiceContentResponse>',
        ),
      }),
    });

    const err = await captureError(session.login('collector@vsphere.local', 'test-secret'));

    expect(err.appError.category).toBe('protocol');
    expect(err.appError.code).toBe('SOAP_UNEXPECTED_RESPONSE');
    expect(err.message).toBe('discovery failed: service content is missing perfManager');
    expect(session.snapshot().state).toBe('unauthenticated');
    expect(operations()).toEqual(['RetrieveServiceContent']);
  });

  it('requires credentials before any call', async () => {
    const { session, requests } = sessionWith();

    const err = await captureError(session.login('collector@vsphere.local', undefined));

    expect(err.appError.code).toBe('CONFIG_CREDENTIAL_MISSING');
    expect(err.appError.details).toEqual([{ field: 'password', issue: 'missing' }]);
    expect(requests).toHaveLength(0);
  });

  it('requires an endpoint before any call', async () => {
    const { session, requests } = sessionWith({}, undefined);

    const err = await captureError(session.discoverService());

    expect(err.appError.code).toBe('CONFIG_ENDPOINT_MISSING');
    expect(err.appError.category).toBe('config');
    expect(requests).toHaveLength(0);
  });

  it('refuses authenticated calls before login without touching the network', async () => {
    const { session, requests } = sessionWith();

    expect(() => session.requireAuthenticated()).toThrowError('session is not authenticated');
    const err = await captureError(
      session.call('QueryPerfCounter', { perfManager: { kind: 'PerformanceManager', id: 'PerfMgr' }, counterIds: [2] }),
    );

    expect(err.appError.code).toBe('SESSION_NOT_AUTHENTICATED');
    expect(requests).toHaveLength(0);
  });
});
