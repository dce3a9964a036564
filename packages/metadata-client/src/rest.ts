import {
  encodeIdentifierPart,
  ServiceIdentifierSchema,
  providerOfService,
  toIdentifierString,
  type ClientIdentifier,
  type ServiceIdentifier,
  type SubsystemIdentifier
} from '@xrdinfo/identifiers';
import type {HttpResponse} from '@xrdinfo/transport';
import {describeIssues} from '@xrdinfo/xml';
import {z} from 'zod';

import {REST_API_VERSION, type MethodListType} from './contracts';
import {err, faultErr, ok, type MetadataResult} from './errors';
import type {PreparedCall} from './pipeline';

const NOT_OPENAPI_SERVICE_MESSAGE = 'Invalid service type: REST';
const OPENAPI_READ_FAILURE_PREFIX = 'Failed reading service description from';

const RestErrorSchema = z.object({
  type: z.string(),
  message: z.string()
});

const RestServiceSchema = z
  .object({
    xroad_instance: z.string(),
    member_class: z.string(),
    member_code: z.string(),
    subsystem_code: z.string().nullish(),
    service_code: z.string()
  })
  .transform(service => ({
    objectType: 'SERVICE' as const,
    instance: service.xroad_instance,
    memberClass: service.member_class,
    memberCode: service.member_code,
    ...(service.subsystem_code ? {subsystemCode: service.subsystem_code} : {}),
    serviceCode: service.service_code
  }))
  .pipe(ServiceIdentifierSchema);

const RestServiceListSchema = z.object({
  service: z.array(RestServiceSchema)
});

const parseJson = (body: Buffer): MetadataResult<unknown> => {
  try {
    const value: unknown = JSON.parse(body.toString('utf8'));
    return ok(value);
  } catch (unknownError) {
    const reason = unknownError instanceof Error ? unknownError.message : String(unknownError);
    return err('format_error', `Response is not JSON: ${reason}`);
  }
};

/**
 * Maps an error response of the REST interface. Two gateway messages about service
 * descriptions get their own codes; every other error becomes a protocol fault.
 */
export const readRestError = (response: HttpResponse): MetadataResult<never> => {
  const json = parseJson(response.body);
  const parsed = json.ok ? RestErrorSchema.safeParse(json.value) : undefined;
  if (!parsed?.success) {
    return err('format_error', `HTTP ${response.status} response carries no error description`);
  }

  const {type, message} = parsed.data;
  if (message === NOT_OPENAPI_SERVICE_MESSAGE) {
    return err('not_openapi_service', message);
  }

  if (message.startsWith(OPENAPI_READ_FAILURE_PREFIX)) {
    return err('openapi_read_error', message);
  }

  return faultErr({faultCode: type, faultString: message});
};

const isErrorStatus = (status: number) => status >= 400 && status < 600;

const parseServiceList = (response: HttpResponse): MetadataResult<ServiceIdentifier[]> => {
  if (isErrorStatus(response.status)) {
    return readRestError(response);
  }

  const json = parseJson(response.body);
  if (!json.ok) return json;

  const list = RestServiceListSchema.safeParse(json.value);
  if (!list.success) {
    return err('format_error', `Service list is malformed: ${describeIssues(list.error)}`);
  }

  return ok(list.data.service);
};

const parseOpenApi = (response: HttpResponse): MetadataResult<string> => {
  if (isErrorStatus(response.status)) {
    return readRestError(response);
  }

  return ok(response.body.toString('utf8'));
};

const restCall = <T>({
  url,
  client,
  parse
}: {
  url: URL;
  client: ClientIdentifier;
  parse: (response: HttpResponse) => MetadataResult<T>;
}): PreparedCall<T> => ({
  url: url.toString(),
  method: 'GET',
  headers: {'X-Road-Client': toIdentifierString(client), accept: 'application/json'},
  parse
});

export const prepareRestMethodList = ({
  baseUrl,
  client,
  service,
  method
}: {
  baseUrl: string;
  client: ClientIdentifier;
  service: SubsystemIdentifier;
  method: MethodListType;
}): PreparedCall<ServiceIdentifier[]> =>
  restCall({
    url: new URL(`/${REST_API_VERSION}/${toIdentifierString(service)}/${method}`, baseUrl),
    client,
    parse: parseServiceList
  });

export const prepareRestOpenApi = ({
  baseUrl,
  client,
  service
}: {
  baseUrl: string;
  client: ClientIdentifier;
  service: ServiceIdentifier;
}): PreparedCall<string> => {
  const provider = providerOfService(service);
  return restCall({
    url: new URL(
      `/${REST_API_VERSION}/${toIdentifierString(provider)}/getOpenAPI?serviceCode=${encodeIdentifierPart(service.serviceCode)}`,
      baseUrl
    ),
    client,
    parse: parseOpenApi
  });
};
