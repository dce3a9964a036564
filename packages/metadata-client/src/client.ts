import {randomUUID} from 'node:crypto';

import {resolveAddresses, type SharedParams} from '@xrdinfo/globalconf';
import {toIdentifierString, type ClientIdentifier, type ServiceIdentifier} from '@xrdinfo/identifiers';
import {createNoopLogger, withLogContext} from '@xrdinfo/logging';
import {addUrlScheme} from '@xrdinfo/transport';
import {describeIssues} from '@xrdinfo/xml';
import type {z} from 'zod';

import {
  AllowedMethodsRequestSchema,
  GetOpenApiRequestSchema,
  GetWsdlRequestSchema,
  ListMethodsRequestSchema,
  MetadataClientSettingsSchema,
  MetadataRequestSchema,
  type AddressResolver,
  type MetadataClientOptions,
  type MetadataRequest,
  type MetadataResponse,
  type MethodListRequest,
  type MethodListType,
  type Protocol,
  type ServiceDescriptionRequest
} from './contracts';
import {err, ok, type MetadataResult} from './errors';
import {sendPreparedCall, type PreparedCall} from './pipeline';
import {prepareRestMethodList, prepareRestOpenApi} from './rest';
import {prepareSoapMethodList, prepareSoapWsdl} from './soap';

/** Resolves a client to the addresses of the security servers registered for it. */
export const sharedParamsAddressResolver =
  (sharedParams: SharedParams): AddressResolver =>
  client => {
    const addresses = resolveAddresses({sharedParams, client});
    return addresses.ok ? ok(addresses.value) : err('address_resolution_error', addresses.error.message);
  };

export type MetadataClient = {
  execute: (request: MetadataRequest) => Promise<MetadataResult<MetadataResponse>>;
  listMethods: (request: MethodListRequest) => Promise<MetadataResult<ServiceIdentifier[]>>;
  allowedMethods: (request: MethodListRequest) => Promise<MetadataResult<ServiceIdentifier[]>>;
  getWsdl: (request: ServiceDescriptionRequest) => Promise<MetadataResult<string>>;
  getOpenApi: (request: ServiceDescriptionRequest) => Promise<MetadataResult<string>>;
};

const mapValue = <T, U>(result: MetadataResult<T>, map: (value: T) => U): MetadataResult<U> =>
  result.ok ? ok(map(result.value)) : result;

const validate = <S extends z.ZodTypeAny>(schema: S, input: unknown): MetadataResult<z.infer<S>> => {
  const parsed = schema.safeParse(input);
  return parsed.success
    ? ok(parsed.data)
    : err('invalid_input', `Invalid metadata request: ${describeIssues(parsed.error)}`);
};

/**
 * Client for the metadata services of security servers. Every call builds one request,
 * sends it once and parses the answer; retries are left to the caller.
 */
export const createMetadataClient = (options: MetadataClientOptions): MetadataClient => {
  const settings = MetadataClientSettingsSchema.parse({
    ...(options.timeoutMs !== undefined ? {timeoutMs: options.timeoutMs} : {}),
    ...(options.userId !== undefined ? {userId: options.userId} : {})
  });
  const logger = options.logger ?? createNoopLogger();
  const createRequestId = options.createRequestId ?? randomUUID;
  const {target} = options;

  const resolveBaseUrl = (client: ClientIdentifier): MetadataResult<string> => {
    let address: string;
    if ('gatewayUrl' in target) {
      address = target.gatewayUrl;
    } else {
      const addresses = target.resolveAddress(client);
      if (!addresses.ok) return addresses;

      const [first] = addresses.value;
      if (!first) {
        return err('address_resolution_error', `No security server address for ${toIdentifierString(client)}`);
      }

      address = first;
    }

    const url = addUrlScheme({address, secure: Boolean(options.tls)});
    return URL.canParse(url) ? ok(url) : err('invalid_input', `Security server address is not a URL: ${address}`);
  };

  const run = <T>({
    operation,
    client,
    service,
    prepare
  }: {
    operation: string;
    client: ClientIdentifier;
    service: ServiceIdentifier | ClientIdentifier;
    prepare: (input: {baseUrl: string; requestId: string}) => PreparedCall<T>;
  }): Promise<MetadataResult<T>> => {
    const requestId = createRequestId();
    const fields = {request_id: requestId, operation, target: toIdentifierString(service)};

    return withLogContext(fields, async () => {
      const baseUrl = resolveBaseUrl(client);
      if (!baseUrl.ok) return baseUrl;

      return sendPreparedCall({
        call: prepare({baseUrl: baseUrl.value, requestId}),
        operation,
        timeoutMs: settings.timeoutMs,
        tls: options.tls,
        requestImpl: options.requestImpl,
        logger
      });
    });
  };

  const methodList = ({
    method,
    client,
    service,
    protocol
  }: {
    method: MethodListType;
    client: ClientIdentifier;
    service: z.infer<typeof ListMethodsRequestSchema>['service'];
    protocol: Protocol;
  }) =>
    run({
      operation: method,
      client,
      service,
      prepare: ({baseUrl, requestId}) =>
        protocol === 'REST'
          ? prepareRestMethodList({baseUrl, client, service, method})
          : prepareSoapMethodList({baseUrl, requestId, userId: settings.userId, client, service, method})
    });

  const wsdl = ({client, service}: {client: ClientIdentifier; service: ServiceIdentifier}) =>
    run({
      operation: 'getWsdl',
      client,
      service,
      prepare: ({baseUrl, requestId}) => prepareSoapWsdl({baseUrl, requestId, userId: settings.userId, client, service})
    });

  const openApi = ({client, service}: {client: ClientIdentifier; service: ServiceIdentifier}) =>
    run({
      operation: 'getOpenApi',
      client,
      service,
      prepare: ({baseUrl}) => prepareRestOpenApi({baseUrl, client, service})
    });

  const execute = async (request: MetadataRequest): Promise<MetadataResult<MetadataResponse>> => {
    const parsed = validate(MetadataRequestSchema, request);
    if (!parsed.ok) return parsed;

    const input = parsed.value;
    switch (input.requestType) {
      case 'listMethods':
      case 'allowedMethods':
        return mapValue(
          await methodList({
            method: input.requestType,
            client: input.client,
            service: input.service,
            protocol: input.protocol
          }),
          (services): MetadataResponse => ({kind: 'serviceList', services})
        );
      case 'getWsdl':
        return mapValue(await wsdl(input), (document): MetadataResponse => ({kind: 'wsdlDocument', document}));
      case 'getOpenApi':
        return mapValue(await openApi(input), (document): MetadataResponse => ({kind: 'openApiDocument', document}));
    }
  };

  return {
    execute,
    listMethods: async request => {
      const parsed = validate(ListMethodsRequestSchema, {...request, requestType: 'listMethods'});
      return parsed.ok ? methodList({method: 'listMethods', ...parsed.value}) : parsed;
    },
    allowedMethods: async request => {
      const parsed = validate(AllowedMethodsRequestSchema, {...request, requestType: 'allowedMethods'});
      return parsed.ok ? methodList({method: 'allowedMethods', ...parsed.value}) : parsed;
    },
    getWsdl: async request => {
      const parsed = validate(GetWsdlRequestSchema, {...request, requestType: 'getWsdl'});
      return parsed.ok ? wsdl(parsed.value) : parsed;
    },
    getOpenApi: async request => {
      const parsed = validate(GetOpenApiRequestSchema, {...request, requestType: 'getOpenApi'});
      return parsed.ok ? openApi(parsed.value) : parsed;
    }
  };
};
