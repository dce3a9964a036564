export {sharedParamsAddressResolver, createMetadataClient, type MetadataClient} from './client';
export {
  AllowedMethodsRequestSchema,
  DEFAULT_USER_ID,
  GetOpenApiRequestSchema,
  GetWsdlRequestSchema,
  ListMethodsRequestSchema,
  MetadataClientSettingsSchema,
  MetadataRequestSchema,
  MethodListTypeSchema,
  OPENAPI_METHODS,
  ProtocolSchema,
  REST_API_VERSION,
  SOAP_PROTOCOL_VERSION,
  XROAD_NAMESPACES,
  type AddressResolver,
  type MetadataClientOptions,
  type MetadataRequest,
  type MetadataResponse,
  type MetadataTarget,
  type MethodListRequest,
  type MethodListType,
  type OpenApiDocument,
  type OpenApiEndpoint,
  type OpenApiMethod,
  type Protocol,
  type ServiceDescriptionRequest,
  type WsdlOperation
} from './contracts';
export {
  err,
  metadataErrorCodes,
  ok,
  type MetadataError,
  type MetadataErrorCode,
  type MetadataFailure,
  type MetadataResult,
  type MetadataSuccess,
  type ProtocolFault
} from './errors';
export {listOpenApiEndpoints, loadOpenApiDocument} from './openapi';
export {buildSoapEnvelope} from './soap';
export {listWsdlOperations} from './wsdl';
