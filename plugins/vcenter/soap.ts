import { ErrorCode } from '@/lib/errors/error-codes';
import { protocolError, transportError } from '@/lib/errors/error';
import { logEvent } from '@/lib/logging/logger';
import { redactSoapCredentials } from '@/lib/redaction/redact-json';

import { buildRequest, RESPONSE_ARRAYS } from './requests';
import { asObject, asText, transcodeDocument } from './transcode';

import type { RequestParams, SoapOperation } from './requests';
import type { CardinalitySchema } from './transcode';
import type { PacedTransport } from './transport';
import type { StructuredObject, StructuredValue } from './types';

export const SOAP_ACTION = '"urn:vim25/6.0"';
export const USER_AGENT = 'vcenter-perf-collector/0.1';

const BODY_EXCERPT_LIMIT = 500;

export function toSdkEndpoint(endpoint: string): string {
  const trimmed = endpoint.trim().replace(/\/+$/, '');
  if (trimmed.endsWith('/sdk')) return trimmed;
  return `${trimmed}/sdk`;
}

/** First `name=value` pair of the set-cookie header. */
export function extractCookie(headers: Record<string, string>): string | undefined {
  const setCookie = headers['set-cookie'];
  if (!setCookie) return undefined;
  const first = setCookie.split(';')[0]?.trim();
  return first ? first : undefined;
}

export function soapHeaders(cookie?: string): Record<string, string> {
  return {
    'content-type': 'text/xml; charset=UTF-8',
    soapaction: SOAP_ACTION,
    'user-agent': USER_AGENT,
    ...(cookie ? { cookie } : {}),
  };
}

export type SoapCallOptions = {
  cookie?: string;
  signal?: AbortSignal;
  /** Extra list fields, merged with the operation's own. */
  arrays?: CardinalitySchema;
  /** Leaf tags whose attributes are kept in the decoded value. */
  leafAttributes?: readonly string[];
};

export type SoapCallOutcome = {
  operation: SoapOperation;
  status: number;
  raw: string;
  headers: Record<string, string>;
  /** Content of `<Op>Response`, or of the whole Body when that element is absent. */
  value: StructuredValue;
  latencyMs: number;
};

function isSuccessStatus(status: number) {
  return status >= 200 && status < 300;
}

function readBody(document: StructuredObject): StructuredObject | undefined {
  const envelope = asObject(document.Envelope);
  return asObject(envelope?.Body);
}

function faultMessage(fault: StructuredValue): string {
  const obj = asObject(fault);
  const text = asText(obj?.faultstring)?.trim();
  return text ? text : 'SOAP fault';
}

/**
 * Sends one operation through the paced transport and decodes the reply.
 * Faults raise a protocol error; a non-2xx status without a fault raises a transport error.
 */
export async function soapCall<Op extends SoapOperation>(
  transport: PacedTransport,
  operation: Op,
  params: RequestParams[Op],
  options: SoapCallOptions = {},
): Promise<SoapCallOutcome> {
  const payload = buildRequest(operation, params);
  const res = await transport.call(payload, soapHeaders(options.cookie), options.signal);

  logEvent({
    level: 'debug',
    service: 'client',
    event_type: 'soap.call',
    operation,
    status: res.status,
    latency_ms: res.latencyMs,
    request_excerpt: redactSoapCredentials(payload),
  });

  const statusFailure = () =>
    transportError({
      code: ErrorCode.TRANSPORT_HTTP_STATUS,
      message: `${operation} failed with status ${res.status}`,
      redacted_context: { status: res.status, body_excerpt: res.body.slice(0, BODY_EXCERPT_LIMIT) },
    });

  const arrays: CardinalitySchema = RESPONSE_ARRAYS[operation];
  let document: StructuredObject;
  try {
    document = transcodeDocument(res.body, [...arrays, ...(options.arrays ?? [])], {
      onCollapse: (path) =>
        logEvent({ level: 'debug', service: 'client', event_type: 'soap.transcode.collapsed', operation, path }),
      leafAttributes: options.leafAttributes,
    });
  } catch (err) {
    if (!isSuccessStatus(res.status)) throw statusFailure();
    throw err;
  }

  const body = readBody(document);
  if (body?.Fault !== undefined) {
    throw protocolError({
      code: ErrorCode.SOAP_FAULT,
      message: `${operation} fault: ${faultMessage(body.Fault)}`,
      redacted_context: { status: res.status, body_excerpt: res.body.slice(0, BODY_EXCERPT_LIMIT) },
    });
  }
  if (!isSuccessStatus(res.status)) throw statusFailure();
  if (!body) {
    throw protocolError({
      code: ErrorCode.SOAP_UNEXPECTED_RESPONSE,
      message: `${operation} response has no SOAP body`,
      redacted_context: { body_excerpt: res.body.slice(0, BODY_EXCERPT_LIMIT) },
    });
  }

  return {
    operation,
    status: res.status,
    raw: res.body,
    headers: res.headers,
    value: body[`${operation}Response`] ?? body,
    latencyMs: res.latencyMs,
  };
}
