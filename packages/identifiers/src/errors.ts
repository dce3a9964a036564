export const identifierErrorCodes = ['invalid_identifier'] as const;

export type IdentifierErrorCode = (typeof identifierErrorCodes)[number];

export type IdentifierError = {
  code: IdentifierErrorCode;
  message: string;
};

export type IdentifierSuccess<T> = {ok: true; value: T};
export type IdentifierFailure = {ok: false; error: IdentifierError};
export type IdentifierResult<T> = IdentifierSuccess<T> | IdentifierFailure;

export const ok = <T>(value: T): IdentifierSuccess<T> => ({ok: true, value});

export const err = (code: IdentifierErrorCode, message: string): IdentifierFailure => ({
  ok: false,
  error: {code, message}
});
