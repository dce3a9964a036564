export const xmlErrorCodes = ['format_error'] as const;

export type XmlErrorCode = (typeof xmlErrorCodes)[number];

export type XmlError = {
  code: XmlErrorCode;
  message: string;
};

export type XmlSuccess<T> = {ok: true; value: T};
export type XmlFailure = {ok: false; error: XmlError};
export type XmlResult<T> = XmlSuccess<T> | XmlFailure;

export const ok = <T>(value: T): XmlSuccess<T> => ({ok: true, value});

export const err = (code: XmlErrorCode, message: string): XmlFailure => ({
  ok: false,
  error: {code, message}
});
