export {
  DEFAULT_MAX_RESPONSE_BYTES,
  DEFAULT_TIMEOUT_MS,
  HttpMethodSchema,
  HttpRequestSchema,
  TlsCredentialPathsSchema,
  TlsOptionsSchema,
  type HeaderValue,
  type HttpMethod,
  type HttpRequest,
  type HttpResponse,
  type MultipartPart,
  type TlsCredentialPaths,
  type TlsOptions
} from './contracts';
export {loadTlsCredentials} from './credentials';
export {
  err,
  ok,
  transportErrorCodes,
  type TransportError,
  type TransportErrorCode,
  type TransportFailure,
  type TransportResult,
  type TransportSuccess
} from './errors';
export {mapRequestError, sendHttpRequest, type HttpRequestImpl} from './http';
export {
  boundaryFromBody,
  boundaryFromContentType,
  parseHeaderBlock,
  parseHeaderValue,
  splitMultipart,
  splitMultipartBody
} from './multipart';
export {addUrlScheme, resolveUrl, trimTrailingSlash} from './url';
