import {createXmlParser, describeIssues, parseXml, RequiredTextSchema} from '@xrdinfo/xml';
import {z} from 'zod';

import {ConfigurationAnchorSchema, type ConfigurationAnchor} from './contracts';
import {err, ok, type GlobalconfResult} from './errors';

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/u;

export const decodeBase64 = (text: string): Buffer | undefined => {
  const compact = text.replace(/\s+/gu, '');
  if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    return undefined;
  }

  return Buffer.from(compact, 'base64');
};

const Base64BytesSchema = RequiredTextSchema.transform((text, context) => {
  const bytes = decodeBase64(text);
  if (!bytes) {
    context.addIssue({code: z.ZodIssueCode.custom, message: 'Invalid base64 content'});
    return z.NEVER;
  }

  return bytes;
});

const AnchorDocumentSchema = z.object({
  configurationAnchor: z.object({
    generatedAt: RequiredTextSchema.optional(),
    instanceIdentifier: RequiredTextSchema,
    source: z
      .array(
        z.object({
          downloadURL: RequiredTextSchema,
          verificationCert: z.array(Base64BytesSchema).min(1)
        })
      )
      .min(1)
  })
});

const anchorParser = createXmlParser(['source', 'verificationCert']);

export const createConfigurationAnchor = (input: unknown): GlobalconfResult<ConfigurationAnchor> => {
  const parsed = ConfigurationAnchorSchema.safeParse(input);
  if (!parsed.success) {
    return err('invalid_input', describeIssues(parsed.error));
  }

  return ok(parsed.data);
};

/**
 * Reads a configuration anchor document: the instance identifier and every trusted download
 * source with its verification certificates, in document order.
 */
export const parseConfigurationAnchor = (xml: string | Buffer): GlobalconfResult<ConfigurationAnchor> => {
  const document = parseXml({
    xml: typeof xml === 'string' ? xml : xml.toString('utf8'),
    parser: anchorParser,
    label: 'Configuration anchor'
  });
  if (!document.ok) {
    return document;
  }

  const parsed = AnchorDocumentSchema.safeParse(document.value);
  if (!parsed.success) {
    return err('format_error', `Configuration anchor is invalid: ${describeIssues(parsed.error)}`);
  }

  const {generatedAt, instanceIdentifier, source} = parsed.data.configurationAnchor;
  let generatedAtDate: Date | undefined;
  if (generatedAt !== undefined) {
    generatedAtDate = new Date(generatedAt);
    if (Number.isNaN(generatedAtDate.getTime())) {
      return err('format_error', `Configuration anchor generatedAt is not a timestamp: ${generatedAt}`);
    }
  }

  const anchor = createConfigurationAnchor({
    instanceIdentifier,
    sources: source.map(entry => ({downloadUrl: entry.downloadURL, verificationCerts: entry.verificationCert})),
    ...(generatedAtDate ? {generatedAt: generatedAtDate} : {})
  });
  if (!anchor.ok) {
    return err('format_error', `Configuration anchor is invalid: ${anchor.error.message}`);
  }

  return anchor;
};
