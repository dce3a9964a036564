import {
  ClientIdentifierSchema,
  ServiceIdentifierSchema,
  SubsystemIdentifierSchema,
  type ClientIdentifier,
  type ServiceIdentifier
} from '@xrdinfo/identifiers';
import type {StructuredLogger} from '@xrdinfo/logging';
import {DEFAULT_TIMEOUT_MS, type HttpRequestImpl, type TlsOptions} from '@xrdinfo/transport';
import {z} from 'zod';

import type {MetadataResult} from './errors';

export const SOAP_PROTOCOL_VERSION = '4.0';
export const REST_API_VERSION = 'r1';
export const DEFAULT_USER_ID = 'xrdinfo';

export const XROAD_NAMESPACES = {
  soapEnvelope: 'http://schemas.xmlsoap.org/soap/envelope/',
  xroad: 'http://x-road.eu/xsd/xroad.xsd',
  identifiers: 'http://x-road.eu/xsd/identifiers'
} as const;

export const ProtocolSchema = z.enum(['SOAP', 'REST']);
export type Protocol = z.infer<typeof ProtocolSchema>;

export const MethodListTypeSchema = z.enum(['listMethods', 'allowedMethods']);
export type MethodListType = z.infer<typeof MethodListTypeSchema>;

export const ListMethodsRequestSchema = z
  .object({
    requestType: z.literal('listMethods'),
    client: ClientIdentifierSchema,
    service: SubsystemIdentifierSchema,
    protocol: ProtocolSchema.default('SOAP')
  })
  .strict();

export const AllowedMethodsRequestSchema = z
  .object({
    requestType: z.literal('allowedMethods'),
    client: ClientIdentifierSchema,
    service: SubsystemIdentifierSchema,
    protocol: ProtocolSchema.default('SOAP')
  })
  .strict();

export const GetWsdlRequestSchema = z
  .object({
    requestType: z.literal('getWsdl'),
    client: ClientIdentifierSchema,
    service: ServiceIdentifierSchema
  })
  .strict();

export const GetOpenApiRequestSchema = z
  .object({
    requestType: z.literal('getOpenApi'),
    client: ClientIdentifierSchema,
    service: ServiceIdentifierSchema
  })
  .strict();

export const MetadataRequestSchema = z.discriminatedUnion('requestType', [
  ListMethodsRequestSchema,
  AllowedMethodsRequestSchema,
  GetWsdlRequestSchema,
  GetOpenApiRequestSchema
]);

export type MetadataRequest = z.input<typeof MetadataRequestSchema>;
export type MethodListRequest = Omit<z.input<typeof ListMethodsRequestSchema>, 'requestType'>;
export type ServiceDescriptionRequest = Omit<z.input<typeof GetWsdlRequestSchema>, 'requestType'>;

export type MetadataResponse =
  | {kind: 'serviceList'; services: ServiceIdentifier[]}
  | {kind: 'wsdlDocument'; document: string}
  | {kind: 'openApiDocument'; document: string};

export type AddressResolver = (client: ClientIdentifier) => MetadataResult<string[]>;

export type MetadataTarget = {gatewayUrl: string} | {resolveAddress: AddressResolver};

export const MetadataClientSettingsSchema = z
  .object({
    timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    userId: z.string().min(1).default(DEFAULT_USER_ID)
  })
  .strict();

export type MetadataClientOptions = z.input<typeof MetadataClientSettingsSchema> & {
  target: MetadataTarget;
  tls?: TlsOptions;
  logger?: StructuredLogger;
  requestImpl?: HttpRequestImpl;
  createRequestId?: () => string;
};

export type WsdlOperation = {
  name: string;
  version?: string;
};

export const OPENAPI_METHODS = ['get', 'put', 'post', 'delete', 'options', 'head', 'patch', 'trace'] as const;

export type OpenApiMethod = Uppercase<(typeof OPENAPI_METHODS)[number]>;

export type OpenApiEndpoint = {
  method: OpenApiMethod;
  path: string;
  operationId?: string;
  summary?: string;
  description?: string;
};

export type OpenApiDocument = {
  document: unknown;
  format: 'json' | 'yaml';
};
