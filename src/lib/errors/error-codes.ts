export const ErrorCode = {
  CONFIG_INVALID: 'CONFIG_INVALID',
  CONFIG_ENDPOINT_MISSING: 'CONFIG_ENDPOINT_MISSING',
  CONFIG_CREDENTIAL_MISSING: 'CONFIG_CREDENTIAL_MISSING',

  VALIDATION_FAILED: 'VALIDATION_FAILED',

  SESSION_NOT_AUTHENTICATED: 'SESSION_NOT_AUTHENTICATED',
  SESSION_LOGIN_FAILED: 'SESSION_LOGIN_FAILED',
  SESSION_COOKIE_MISSING: 'SESSION_COOKIE_MISSING',

  TRANSPORT_FAILED: 'TRANSPORT_FAILED',
  TRANSPORT_TIMEOUT: 'TRANSPORT_TIMEOUT',
  TRANSPORT_ABORTED: 'TRANSPORT_ABORTED',
  TRANSPORT_HTTP_STATUS: 'TRANSPORT_HTTP_STATUS',

  SOAP_MALFORMED_RESPONSE: 'SOAP_MALFORMED_RESPONSE',
  SOAP_FAULT: 'SOAP_FAULT',
  SOAP_UNEXPECTED_RESPONSE: 'SOAP_UNEXPECTED_RESPONSE',

  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];
