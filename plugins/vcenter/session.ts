import { ErrorCode } from '@/lib/errors/error-codes';
import { ClientError, configError, protocolError, sessionError } from '@/lib/errors/error';
import { logEvent } from '@/lib/logging/logger';

import { extractCookie, soapCall } from './soap';
import { asObject, asText } from './transcode';

import type { RequestParams, SoapOperation } from './requests';
import type { SoapCallOptions, SoapCallOutcome } from './soap';
import type { PacedTransport } from './transport';
import type { ObjectRef, ServiceRefs, SessionState, StructuredValue } from './types';

export type SessionSnapshot = {
  state: SessionState;
  serviceRefs?: ServiceRefs;
};

const SERVICE_REF_KINDS = {
  propertyCollector: 'PropertyCollector',
  perfManager: 'PerformanceManager',
  rootFolder: 'Folder',
  sessionManager: 'SessionManager',
} as const satisfies Record<keyof ServiceRefs, string>;

function readServiceRefs(value: StructuredValue): ServiceRefs {
  const content = asObject(asObject(value)?.returnval);
  const missing: string[] = [];

  const read = (field: keyof ServiceRefs): ObjectRef => {
    const id = asText(content?.[field])?.trim();
    if (!id) missing.push(field);
    return { kind: SERVICE_REF_KINDS[field], id: id ?? '' };
  };

  const refs: ServiceRefs = {
    propertyCollector: read('propertyCollector'),
    perfManager: read('perfManager'),
    rootFolder: read('rootFolder'),
    sessionManager: read('sessionManager'),
  };

  if (missing.length > 0) {
    throw protocolError({
      code: ErrorCode.SOAP_UNEXPECTED_RESPONSE,
      message: `service content is missing ${missing.join(', ')}`,
      redacted_context: { missing },
    });
  }
  return refs;
}

/**
 * Owns the session lifecycle: service discovery, login and the cookie every later call carries.
 * A failed step never changes the state.
 */
export class SessionManager {
  private readonly transport: PacedTransport;
  private readonly endpoint: string | undefined;

  private state: SessionState = 'unauthenticated';
  private refs: ServiceRefs | undefined;
  private cookie: string | undefined;

  constructor(transport: PacedTransport, input: { endpoint?: string }) {
    this.transport = transport;
    this.endpoint = input.endpoint;
  }

  snapshot(): SessionSnapshot {
    return { state: this.state, ...(this.refs ? { serviceRefs: { ...this.refs } } : {}) };
  }

  async discoverService(signal?: AbortSignal): Promise<SoapCallOutcome & { refs: ServiceRefs }> {
    if (!this.endpoint) {
      throw configError({ code: ErrorCode.CONFIG_ENDPOINT_MISSING, message: 'endpoint is not configured' });
    }

    const outcome = await soapCall(this.transport, 'RetrieveServiceContent', {}, { signal });
    const refs = readServiceRefs(outcome.value);

    this.refs = refs;
    if (this.state === 'unauthenticated') this.transition('service_discovered');
    return { ...outcome, refs };
  }

  async login(username: string | undefined, password: string | undefined, signal?: AbortSignal) {
    if (!this.endpoint) {
      throw configError({ code: ErrorCode.CONFIG_ENDPOINT_MISSING, message: 'endpoint is not configured' });
    }
    if (!username || !password) {
      throw configError({
        code: ErrorCode.CONFIG_CREDENTIAL_MISSING,
        message: 'username and password are required',
        details: [
          ...(username ? [] : [{ field: 'username', issue: 'missing' }]),
          ...(password ? [] : [{ field: 'password', issue: 'missing' }]),
        ],
      });
    }

    const refs = this.refs ?? (await this.discoverForLogin(signal));

    let outcome: SoapCallOutcome;
    try {
      outcome = await soapCall(
        this.transport,
        'Login',
        { sessionManager: refs.sessionManager, userName: username, password },
        { signal },
      );
    } catch (err) {
      if (err instanceof ClientError && err.appError.code === ErrorCode.SOAP_FAULT) {
        throw sessionError({
          code: ErrorCode.SESSION_LOGIN_FAILED,
          message: `login failed: ${err.message}`,
          redacted_context: err.appError.redacted_context,
        });
      }
      throw err;
    }

    const cookie = extractCookie(outcome.headers);
    if (!cookie) {
      throw sessionError({
        code: ErrorCode.SESSION_COOKIE_MISSING,
        message: 'login response carried no session cookie',
        redacted_context: { status: outcome.status },
      });
    }

    this.cookie = cookie;
    this.transition('authenticated');
    return outcome;
  }

  requireAuthenticated(): ServiceRefs {
    if (this.state !== 'authenticated' || !this.refs || !this.cookie) {
      throw sessionError({ code: ErrorCode.SESSION_NOT_AUTHENTICATED, message: 'session is not authenticated' });
    }
    return this.refs;
  }

  async call<Op extends SoapOperation>(
    operation: Op,
    params: RequestParams[Op],
    options: Omit<SoapCallOptions, 'cookie'> = {},
  ): Promise<SoapCallOutcome> {
    this.requireAuthenticated();
    return soapCall(this.transport, operation, params, { ...options, cookie: this.cookie });
  }

  private async discoverForLogin(signal?: AbortSignal): Promise<ServiceRefs> {
    try {
      const { refs } = await this.discoverService(signal);
      return refs;
    } catch (err) {
      if (!(err instanceof ClientError)) throw err;
      throw new ClientError({ ...err.appError, message: `discovery failed: ${err.appError.message}` });
    }
  }

  private transition(next: SessionState) {
    const previous = this.state;
    this.state = next;
    logEvent({ level: 'info', service: 'client', event_type: 'session.state', from: previous, to: next });
  }
}
