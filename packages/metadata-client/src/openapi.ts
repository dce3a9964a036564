import {parse as parseYaml} from 'yaml';

import {type OpenApiDocument, type OpenApiEndpoint, type OpenApiMethod} from './contracts';
import {err, ok, type MetadataResult} from './errors';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const toMethod = (key: string): OpenApiMethod | undefined => {
  switch (key) {
    case 'get':
      return 'GET';
    case 'put':
      return 'PUT';
    case 'post':
      return 'POST';
    case 'delete':
      return 'DELETE';
    case 'options':
      return 'OPTIONS';
    case 'head':
      return 'HEAD';
    case 'patch':
      return 'PATCH';
    case 'trace':
      return 'TRACE';
    default:
      return undefined;
  }
};

const reasonOf = (unknownError: unknown) => (unknownError instanceof Error ? unknownError.message : String(unknownError));

/** Parses an OpenAPI description, trying JSON before YAML. */
export const loadOpenApiDocument = (text: string): MetadataResult<OpenApiDocument> => {
  try {
    const document: unknown = JSON.parse(text);
    return ok({document, format: 'json'});
  } catch {
    // Not JSON; YAML is tried next.
  }

  try {
    const document: unknown = parseYaml(text);
    return ok({document, format: 'yaml'});
  } catch (unknownError) {
    return err('format_error', `OpenAPI description is neither JSON nor YAML: ${reasonOf(unknownError)}`);
  }
};

const optionalText = (operation: Record<string, unknown>, key: 'operationId' | 'summary' | 'description') => {
  const value = operation[key];
  return typeof value === 'string' && value.length > 0 ? {[key]: value} : {};
};

/**
 * Lists one endpoint per path and HTTP method of an OpenAPI 2 or 3 document, in document
 * order. Keys under a path that are not HTTP methods, such as `parameters`, are skipped.
 */
export const listOpenApiEndpoints = (document: unknown): MetadataResult<OpenApiEndpoint[]> => {
  if (!isRecord(document) || !('paths' in document)) {
    return err('format_error', 'OpenAPI document has no paths section');
  }

  const {paths} = document;
  if (!isRecord(paths)) {
    return err('format_error', 'OpenAPI paths section is not an object');
  }

  const endpoints: OpenApiEndpoint[] = [];
  for (const [path, pathItem] of Object.entries(paths)) {
    if (!isRecord(pathItem)) {
      return err('format_error', `OpenAPI path ${path} is not an object`);
    }

    for (const [key, operation] of Object.entries(pathItem)) {
      const method = toMethod(key);
      if (!method) continue;

      const details = isRecord(operation) ? operation : {};
      endpoints.push({
        method,
        path,
        ...optionalText(details, 'operationId'),
        ...optionalText(details, 'summary'),
        ...optionalText(details, 'description')
      });
    }
  }

  return ok(endpoints);
};
