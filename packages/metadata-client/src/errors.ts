import type {TransportError} from '@xrdinfo/transport';

export const metadataErrorCodes = [
  'invalid_input',
  'connection_error',
  'timeout_error',
  'format_error',
  'protocol_fault',
  'address_resolution_error',
  'not_openapi_service',
  'openapi_read_error'
] as const;

export type MetadataErrorCode = (typeof metadataErrorCodes)[number];

/** Error reported by the remote gateway, text kept as received. */
export type ProtocolFault = {
  faultCode: string;
  faultString: string;
};

export type MetadataError = {
  code: MetadataErrorCode;
  message: string;
  fault?: ProtocolFault;
};

export type MetadataSuccess<T> = {ok: true; value: T};
export type MetadataFailure = {ok: false; error: MetadataError};
export type MetadataResult<T> = MetadataSuccess<T> | MetadataFailure;

export const ok = <T>(value: T): MetadataSuccess<T> => ({ok: true, value});

export const err = (code: MetadataErrorCode, message: string): MetadataFailure => ({
  ok: false,
  error: {code, message}
});

export const faultErr = (fault: ProtocolFault): MetadataFailure => ({
  ok: false,
  error: {code: 'protocol_fault', message: fault.faultString, fault}
});

export const fromTransportError = (error: TransportError): MetadataFailure => {
  switch (error.code) {
    case 'timeout_error':
      return err('timeout_error', error.message);
    case 'invalid_input':
    case 'invalid_url':
      return err('invalid_input', error.message);
    case 'format_error':
      return err('format_error', error.message);
    case 'network_error':
    case 'tls_error':
    case 'response_too_large':
    case 'credentials_error':
      return err('connection_error', error.message);
  }
};
