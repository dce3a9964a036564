import {z} from 'zod';

export const DEFAULT_TIMEOUT_MS = 5_000;
export const DEFAULT_MAX_RESPONSE_BYTES = 64 * 1024 * 1024;

export const TlsOptionsSchema = z
  .object({
    cert: z.instanceof(Buffer).optional(),
    key: z.instanceof(Buffer).optional(),
    ca: z.instanceof(Buffer).optional(),
    rejectUnauthorized: z.boolean().optional()
  })
  .strict();

export type TlsOptions = z.infer<typeof TlsOptionsSchema>;

export const HttpMethodSchema = z.enum(['GET', 'POST']);
export type HttpMethod = z.infer<typeof HttpMethodSchema>;

export const HttpRequestSchema = z
  .object({
    url: z.string().min(1),
    method: HttpMethodSchema.default('GET'),
    headers: z.record(z.string(), z.string()).default({}),
    body: z.union([z.string(), z.instanceof(Buffer)]).optional(),
    timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    maxResponseBytes: z.number().int().positive().default(DEFAULT_MAX_RESPONSE_BYTES),
    tls: TlsOptionsSchema.optional()
  })
  .strict();

export type HttpRequest = z.input<typeof HttpRequestSchema>;

export type HttpResponse = {
  status: number;
  headers: Record<string, string>;
  body: Buffer;
};

export const TlsCredentialPathsSchema = z
  .object({
    certPath: z.string().min(1).optional(),
    keyPath: z.string().min(1).optional(),
    caPath: z.string().min(1).optional(),
    rejectUnauthorized: z.boolean().optional()
  })
  .strict()
  .refine(paths => Boolean(paths.certPath) === Boolean(paths.keyPath), {
    message: 'Client certificate and key must be given together'
  });

export type TlsCredentialPaths = z.infer<typeof TlsCredentialPathsSchema>;

export type MultipartPart = {
  headers: Record<string, string>;
  body: Buffer;
  // Header block and body exactly as they appear between the delimiters.
  raw: Buffer;
};

export type HeaderValue = {
  value: string;
  params: Record<string, string>;
};
