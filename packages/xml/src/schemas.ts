import {z} from 'zod';

/** Text content of an element that may also carry attributes. */
export const XmlTextSchema = z.union([
  z.string(),
  z.object({'#text': z.string()}).passthrough().transform(node => node['#text'])
]);

export const RequiredTextSchema = XmlTextSchema.pipe(z.string().min(1));

// An element without children or attributes parses to an empty string.
export const xmlElement = <T extends z.ZodTypeAny>(schema: T) =>
  z.union([z.literal('').transform(() => ({})), z.record(z.string(), z.unknown())]).pipe(schema);

export const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
