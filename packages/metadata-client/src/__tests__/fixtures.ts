import type {ClientIdentifier, ServiceIdentifier, SubsystemIdentifier} from '@xrdinfo/identifiers';
import type {HttpRequest, HttpRequestImpl, TransportError} from '@xrdinfo/transport';

export const GATEWAY_URL = 'http://ss.example.test';

export const consumer: ClientIdentifier = {
  objectType: 'SUBSYSTEM',
  instance: 'EE',
  memberClass: 'GOV',
  memberCode: '70000310',
  subsystemCode: 'monitor'
};

export const provider: SubsystemIdentifier = {
  objectType: 'SUBSYSTEM',
  instance: 'EE',
  memberClass: 'COM',
  memberCode: '12345678',
  subsystemCode: 'registry'
};

export const serviceOf = (serviceCode: string, serviceVersion?: string): ServiceIdentifier => ({
  objectType: 'SERVICE',
  instance: provider.instance,
  memberClass: provider.memberClass,
  memberCode: provider.memberCode,
  subsystemCode: provider.subsystemCode,
  serviceCode,
  ...(serviceVersion ? {serviceVersion} : {})
});

const NAMESPACES =
  'xmlns:SOAP-ENV="http://schemas.xmlsoap.org/soap/envelope/" xmlns:xroad="http://x-road.eu/xsd/xroad.xsd" xmlns:id="http://x-road.eu/xsd/identifiers"';

export const soapEnvelope = (body: string) => `<?xml version="1.0" encoding="utf-8"?>
<SOAP-ENV:Envelope ${NAMESPACES}>
  <SOAP-ENV:Header>
    <xroad:protocolVersion>4.0</xroad:protocolVersion>
  </SOAP-ENV:Header>
  <SOAP-ENV:Body>
${body}
  </SOAP-ENV:Body>
</SOAP-ENV:Envelope>`;

export const serviceXml = (service: ServiceIdentifier) => `    <xroad:service id:objectType="SERVICE">
      <id:xRoadInstance>${service.instance}</id:xRoadInstance>
      <id:memberClass>${service.memberClass}</id:memberClass>
      <id:memberCode>${service.memberCode}</id:memberCode>${
        service.subsystemCode !== undefined ? `\n      <id:subsystemCode>${service.subsystemCode}</id:subsystemCode>` : ''
      }
      <id:serviceCode>${service.serviceCode}</id:serviceCode>${
        service.serviceVersion ? `\n      <id:serviceVersion>${service.serviceVersion}</id:serviceVersion>` : ''
      }
    </xroad:service>`;

export const multipartOf = ({boundary, parts}: {boundary: string; parts: string[]}) =>
  `${parts.map(part => `--${boundary}\r\ncontent-type: text/xml; charset=UTF-8\r\n\r\n${part}\r\n`).join('')}--${boundary}--\r\n`;

export type FakeReply =
  | {status?: number; body: string; headers?: Record<string, string>}
  | {error: TransportError};

/** Records every request and answers each with the same reply. */
export const createFakeGateway = (reply: FakeReply) => {
  const requests: HttpRequest[] = [];
  const requestImpl: HttpRequestImpl = async request => {
    requests.push(request);
    if ('error' in reply) {
      return {ok: false, error: reply.error};
    }

    return {
      ok: true,
      value: {
        status: reply.status ?? 200,
        headers: reply.headers ?? {},
        body: Buffer.from(reply.body, 'utf8')
      }
    };
  };

  return {requests, requestImpl};
};

export const createBufferedWriter = () => {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const collect = (lines: string[]) => ({
    write: (chunk: string | Uint8Array) => {
      lines.push(String(chunk).trim());
      return true;
    }
  });

  return {stdout, stderr, writer: {stdout: collect(stdout), stderr: collect(stderr)}};
};
