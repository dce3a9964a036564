import type {HeaderValue, MultipartPart} from './contracts';
import {err, ok, type TransportResult} from './errors';

const LF = 0x0a;
const CR = 0x0d;
const DASH = 0x2d;

const splitParameters = (text: string): string[] => {
  const segments: string[] = [];
  let current = '';
  let quoted = false;

  for (let index = 0; index < text.length; index += 1) {
    const character = text.charAt(index);
    if (character === '\\' && quoted) {
      current += character + text.charAt(index + 1);
      index += 1;
      continue;
    }

    if (character === '"') {
      quoted = !quoted;
    }

    if (character === ';' && !quoted) {
      segments.push(current);
      current = '';
      continue;
    }

    current += character;
  }

  segments.push(current);
  return segments;
};

const unquote = (value: string): string =>
  value.length >= 2 && value.startsWith('"') && value.endsWith('"')
    ? value.slice(1, -1).replace(/\\(.)/gu, '$1')
    : value;

/**
 * Parses a MIME header value such as `multipart/related; boundary="abc"` into its leading
 * value and lower-cased parameters.
 */
export const parseHeaderValue = (text: string): HeaderValue => {
  const [head = '', ...rest] = splitParameters(text);
  const params: Record<string, string> = {};

  for (const segment of rest) {
    const separator = segment.indexOf('=');
    if (separator <= 0) continue;
    params[segment.slice(0, separator).trim().toLowerCase()] = unquote(segment.slice(separator + 1).trim());
  }

  return {value: head.trim(), params};
};

export const boundaryFromContentType = (contentType: string | undefined): string | undefined => {
  if (!contentType) {
    return undefined;
  }

  const parsed = parseHeaderValue(contentType);
  if (!parsed.value.toLowerCase().startsWith('multipart/')) {
    return undefined;
  }

  return parsed.params.boundary || undefined;
};

const lineEnd = (buffer: Buffer, from: number): number => {
  const index = buffer.indexOf(LF, from);
  return index === -1 ? buffer.length : index;
};

// The first line of a body without a Content-Type header names the boundary.
export const boundaryFromBody = (body: Buffer): string | undefined => {
  let offset = 0;
  while (offset < body.length) {
    const end = lineEnd(body, offset);
    const line = body.subarray(offset, end).toString('latin1').trim();
    if (line.length > 0) {
      return line.startsWith('--') && line.length > 2 ? line.slice(2) : undefined;
    }

    offset = end + 1;
  }

  return undefined;
};

export const parseHeaderBlock = (block: string): Record<string, string> => {
  const headers: Record<string, string> = {};
  let lastName: string | undefined;

  for (const line of block.split(/\r?\n/u)) {
    if (line.length === 0) continue;

    if ((line.startsWith(' ') || line.startsWith('\t')) && lastName !== undefined) {
      headers[lastName] = `${headers[lastName] ?? ''} ${line.trim()}`;
      continue;
    }

    const separator = line.indexOf(':');
    if (separator <= 0) continue;
    lastName = line.slice(0, separator).trim().toLowerCase();
    headers[lastName] = line.slice(separator + 1).trim();
  }

  return headers;
};

const stripTrailingLineBreak = (buffer: Buffer, end: number): number => {
  if (end > 0 && buffer[end - 1] === LF) {
    return end > 1 && buffer[end - 2] === CR ? end - 2 : end - 1;
  }

  return end;
};

const findHeaderEnd = (raw: Buffer): {headerEnd: number; bodyStart: number} => {
  if (raw[0] === LF) {
    return {headerEnd: 0, bodyStart: 1};
  }

  if (raw[0] === CR && raw[1] === LF) {
    return {headerEnd: 0, bodyStart: 2};
  }

  const crlf = raw.indexOf('\r\n\r\n');
  const lf = raw.indexOf('\n\n');
  if (crlf !== -1 && (lf === -1 || crlf < lf)) {
    return {headerEnd: crlf, bodyStart: crlf + 4};
  }

  if (lf !== -1) {
    return {headerEnd: lf, bodyStart: lf + 2};
  }

  return {headerEnd: raw.length, bodyStart: raw.length};
};

const toPart = (raw: Buffer): MultipartPart => {
  const {headerEnd, bodyStart} = findHeaderEnd(raw);
  return {
    headers: parseHeaderBlock(raw.subarray(0, headerEnd).toString('latin1')),
    body: raw.subarray(bodyStart),
    raw
  };
};

const findDelimiter = ({body, delimiter, from}: {body: Buffer; delimiter: Buffer; from: number}): number => {
  let index = body.indexOf(delimiter, from);
  while (index !== -1) {
    if (index === 0 || body[index - 1] === LF) {
      return index;
    }

    index = body.indexOf(delimiter, index + 1);
  }

  return -1;
};

/**
 * Splits a multipart body into its parts on byte boundaries, accepting CRLF and bare LF
 * line breaks. Each part keeps its exact raw bytes.
 */
export const splitMultipart = ({
  body,
  boundary
}: {
  body: Buffer;
  boundary: string;
}): TransportResult<MultipartPart[]> => {
  const delimiter = Buffer.from(`--${boundary}`, 'latin1');
  const first = findDelimiter({body, delimiter, from: 0});
  if (first === -1) {
    return err('format_error', `Multipart boundary "${boundary}" not found`);
  }

  const parts: MultipartPart[] = [];
  let cursor = first;

  for (;;) {
    const afterDelimiter = cursor + delimiter.length;
    if (body[afterDelimiter] === DASH && body[afterDelimiter + 1] === DASH) {
      return ok(parts);
    }

    const contentStart = lineEnd(body, afterDelimiter) + 1;
    const next = findDelimiter({body, delimiter, from: contentStart});
    if (next === -1) {
      return err('format_error', 'Multipart body has no closing delimiter');
    }

    const contentEnd = Math.max(contentStart, stripTrailingLineBreak(body, next));
    parts.push(toPart(body.subarray(contentStart, contentEnd)));
    cursor = next;
  }
};

/**
 * Splits a multipart payload whose boundary comes from its Content-Type header, or from its
 * first delimiter line when no header is available.
 */
export const splitMultipartBody = ({
  body,
  contentType
}: {
  body: Buffer;
  contentType?: string;
}): TransportResult<MultipartPart[]> => {
  const boundary = boundaryFromContentType(contentType) ?? boundaryFromBody(body);
  if (!boundary) {
    return err('format_error', 'Multipart boundary is missing');
  }

  return splitMultipart({body, boundary});
};
