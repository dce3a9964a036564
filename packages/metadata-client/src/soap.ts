import {
  ServiceIdentifierSchema,
  type ClientIdentifier,
  type ServiceIdentifier,
  type SubsystemIdentifier
} from '@xrdinfo/identifiers';
import {boundaryFromBody, boundaryFromContentType, splitMultipart, type HttpResponse} from '@xrdinfo/transport';
import {createXmlParser, describeIssues, parseXml, RequiredTextSchema, xmlBuilder, xmlElement, XmlTextSchema} from '@xrdinfo/xml';
import {z} from 'zod';

import {SOAP_PROTOCOL_VERSION, XROAD_NAMESPACES, type MethodListType} from './contracts';
import {err, faultErr, ok, type MetadataResult} from './errors';
import type {PreparedCall} from './pipeline';

const GET_WSDL_SERVICE_CODE = 'getWsdl';

const soapParser = createXmlParser(['service']);

type HeaderIdentifier = ClientIdentifier | ServiceIdentifier;

const identifierNode = (identifier: HeaderIdentifier) => {
  const common = {
    '@_id:objectType': identifier.objectType,
    'id:xRoadInstance': identifier.instance,
    'id:memberClass': identifier.memberClass,
    'id:memberCode': identifier.memberCode
  };

  switch (identifier.objectType) {
    case 'MEMBER':
      return common;
    case 'SUBSYSTEM':
      return {...common, 'id:subsystemCode': identifier.subsystemCode};
    case 'SERVICE':
      return {
        ...common,
        ...(identifier.subsystemCode !== undefined ? {'id:subsystemCode': identifier.subsystemCode} : {}),
        'id:serviceCode': identifier.serviceCode,
        ...(identifier.serviceVersion ? {'id:serviceVersion': identifier.serviceVersion} : {})
      };
  }
};

/** Renders a SOAP request envelope with the X-Road message header. */
export const buildSoapEnvelope = ({
  client,
  service,
  userId,
  requestId,
  body
}: {
  client: ClientIdentifier;
  service: ServiceIdentifier;
  userId: string;
  requestId: string;
  body: Record<string, unknown>;
}): string =>
  `<?xml version="1.0" encoding="utf-8"?>\n${xmlBuilder.build({
    'SOAP-ENV:Envelope': {
      '@_xmlns:SOAP-ENV': XROAD_NAMESPACES.soapEnvelope,
      '@_xmlns:xroad': XROAD_NAMESPACES.xroad,
      '@_xmlns:id': XROAD_NAMESPACES.identifiers,
      'SOAP-ENV:Header': {
        'xroad:client': identifierNode(client),
        'xroad:service': identifierNode(service),
        'xroad:userId': userId,
        'xroad:id': requestId,
        'xroad:protocolVersion': SOAP_PROTOCOL_VERSION
      },
      'SOAP-ENV:Body': body
    }
  })}`;

const headerService = ({
  service,
  serviceCode
}: {
  service: SubsystemIdentifier | ServiceIdentifier;
  serviceCode: string;
}): ServiceIdentifier => ({
  objectType: 'SERVICE',
  instance: service.instance,
  memberClass: service.memberClass,
  memberCode: service.memberCode,
  ...(service.subsystemCode !== undefined ? {subsystemCode: service.subsystemCode} : {}),
  serviceCode
});

type SoapMessage = {
  envelope: string;
  attachments: Buffer[];
};

/** Separates the SOAP envelope from MIME attachments that may follow it. */
export const splitSoapMessage = (response: HttpResponse): MetadataResult<SoapMessage> => {
  const boundary = boundaryFromContentType(response.headers['content-type']) ?? boundaryFromBody(response.body);
  if (!boundary) {
    return ok({envelope: response.body.toString('utf8'), attachments: []});
  }

  const parts = splitMultipart({body: response.body, boundary});
  if (!parts.ok) {
    return err('format_error', `SOAP response: ${parts.error.message}`);
  }

  const [first, ...rest] = parts.value;
  if (!first) {
    return err('format_error', 'SOAP response: multipart message has no parts');
  }

  return ok({envelope: first.body.toString('utf8'), attachments: rest.map(part => part.body)});
};

const FaultSchema = z
  .object({
    faultcode: XmlTextSchema.default(''),
    faultstring: XmlTextSchema.default('')
  })
  .passthrough();

const EnvelopeSchema = z.object({
  Envelope: z.object({
    Body: xmlElement(z.record(z.string(), z.unknown()))
  })
});

type EnvelopeBody = Record<string, unknown>;

/** Reads the envelope body, turning a SOAP fault into a protocol fault. */
export const readSoapBody = (envelope: string): MetadataResult<EnvelopeBody> => {
  const document = parseXml({xml: envelope, parser: soapParser, label: 'SOAP response'});
  if (!document.ok) return document;

  const parsed = EnvelopeSchema.safeParse(document.value);
  if (!parsed.success) {
    return err('format_error', `SOAP response has no envelope body: ${describeIssues(parsed.error)}`);
  }

  const body = parsed.data.Envelope.Body;
  if (body.Fault !== undefined) {
    const fault = FaultSchema.safeParse(body.Fault);
    if (!fault.success) {
      return err('format_error', `SOAP fault is malformed: ${describeIssues(fault.error)}`);
    }

    return faultErr({faultCode: fault.data.faultcode, faultString: fault.data.faultstring});
  }

  return ok(body);
};

const ServiceNodeSchema = z
  .object({
    '@_objectType': z.literal('SERVICE'),
    xRoadInstance: RequiredTextSchema,
    memberClass: RequiredTextSchema,
    memberCode: RequiredTextSchema,
    // Services of the member itself carry no subsystem code.
    subsystemCode: RequiredTextSchema.optional(),
    serviceCode: RequiredTextSchema,
    serviceVersion: RequiredTextSchema.optional()
  })
  .transform(node => ({
    objectType: node['@_objectType'],
    instance: node.xRoadInstance,
    memberClass: node.memberClass,
    memberCode: node.memberCode,
    ...(node.subsystemCode !== undefined ? {subsystemCode: node.subsystemCode} : {}),
    serviceCode: node.serviceCode,
    ...(node.serviceVersion !== undefined ? {serviceVersion: node.serviceVersion} : {})
  }))
  .pipe(ServiceIdentifierSchema);

const MethodListSchema = xmlElement(z.object({service: z.array(ServiceNodeSchema).default([])}));

const parseMethodList = ({
  response,
  method
}: {
  response: HttpResponse;
  method: MethodListType;
}): MetadataResult<ServiceIdentifier[]> => {
  const message = splitSoapMessage(response);
  if (!message.ok) return message;

  const body = readSoapBody(message.value.envelope);
  if (!body.ok) return body;

  const responseElement = `${method}Response`;
  if (!(responseElement in body.value)) {
    return err('format_error', `SOAP response has no ${responseElement} element`);
  }

  const list = MethodListSchema.safeParse(body.value[responseElement]);
  if (!list.success) {
    return err('format_error', `${responseElement} is malformed: ${describeIssues(list.error)}`);
  }

  return ok(list.data.service);
};

const readAttachedFault = (attachment: string): MetadataResult<never> | undefined => {
  const body = readSoapBody(attachment);
  return !body.ok && body.error.code === 'protocol_fault' ? body : undefined;
};

const parseWsdl = (response: HttpResponse): MetadataResult<string> => {
  const message = splitSoapMessage(response);
  if (!message.ok) return message;

  const body = readSoapBody(message.value.envelope);
  if (!body.ok) return body;

  const [attachment] = message.value.attachments;
  if (!attachment || attachment.length === 0) {
    return err('format_error', 'WSDL not found in getWsdl response');
  }

  const wsdl = attachment.toString('utf8');
  // A gateway that cannot reach the provider may attach a fault in place of the WSDL.
  const fault = readAttachedFault(wsdl);
  return fault ?? ok(wsdl);
};

const soapCall = <T>({
  baseUrl,
  envelope,
  parse
}: {
  baseUrl: string;
  envelope: string;
  parse: (response: HttpResponse) => MetadataResult<T>;
}): PreparedCall<T> => ({
  url: baseUrl,
  method: 'POST',
  headers: {'content-type': 'text/xml; charset=utf-8'},
  body: envelope,
  parse
});

export const prepareSoapMethodList = ({
  baseUrl,
  requestId,
  userId,
  client,
  service,
  method
}: {
  baseUrl: string;
  requestId: string;
  userId: string;
  client: ClientIdentifier;
  service: SubsystemIdentifier;
  method: MethodListType;
}): PreparedCall<ServiceIdentifier[]> =>
  soapCall({
    baseUrl,
    envelope: buildSoapEnvelope({
      client,
      service: headerService({service, serviceCode: method}),
      userId,
      requestId,
      body: {[`xroad:${method}`]: ''}
    }),
    parse: response => parseMethodList({response, method})
  });

export const prepareSoapWsdl = ({
  baseUrl,
  requestId,
  userId,
  client,
  service
}: {
  baseUrl: string;
  requestId: string;
  userId: string;
  client: ClientIdentifier;
  service: ServiceIdentifier;
}): PreparedCall<string> =>
  soapCall({
    baseUrl,
    envelope: buildSoapEnvelope({
      client,
      service: headerService({service, serviceCode: GET_WSDL_SERVICE_CODE}),
      userId,
      requestId,
      body: {
        'xroad:getWsdl': {
          'xroad:serviceCode': service.serviceCode,
          ...(service.serviceVersion ? {'xroad:serviceVersion': service.serviceVersion} : {})
        }
      }
    }),
    parse: parseWsdl
  });
