export const transportErrorCodes = [
  'invalid_input',
  'invalid_url',
  'timeout_error',
  'network_error',
  'tls_error',
  'response_too_large',
  'format_error',
  'credentials_error'
] as const;

export type TransportErrorCode = (typeof transportErrorCodes)[number];

export type TransportError = {
  code: TransportErrorCode;
  message: string;
};

export type TransportSuccess<T> = {ok: true; value: T};
export type TransportFailure = {ok: false; error: TransportError};
export type TransportResult<T> = TransportSuccess<T> | TransportFailure;

export const ok = <T>(value: T): TransportSuccess<T> => ({ok: true, value});

export const err = (code: TransportErrorCode, message: string): TransportFailure => ({
  ok: false,
  error: {code, message}
});
