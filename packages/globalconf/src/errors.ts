export const globalconfErrorCodes = [
  'invalid_input',
  'network_error',
  'timeout_error',
  'format_error',
  'integrity_error',
  'trust_error',
  'address_resolution_error'
] as const;

export type GlobalconfErrorCode = (typeof globalconfErrorCodes)[number];

export type GlobalconfError = {
  code: GlobalconfErrorCode;
  message: string;
};

export type GlobalconfSuccess<T> = {ok: true; value: T};
export type GlobalconfFailure = {ok: false; error: GlobalconfError};
export type GlobalconfResult<T> = GlobalconfSuccess<T> | GlobalconfFailure;

export const ok = <T>(value: T): GlobalconfSuccess<T> => ({ok: true, value});

export const err = (code: GlobalconfErrorCode, message: string): GlobalconfFailure => ({
  ok: false,
  error: {code, message}
});
