import {XMLBuilder, XMLParser, XMLValidator} from 'fast-xml-parser';

import {err, ok, type XmlResult} from './errors';

export const ATTRIBUTE_PREFIX = '@_';

/**
 * Namespace prefixes are dropped and every value stays a string. Elements named in
 * `repeatedElements` always parse to arrays, even when a document carries only one.
 */
export const createXmlParser = (repeatedElements: readonly string[]) => {
  const repeated = new Set(repeatedElements);
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    removeNSPrefix: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    isArray: (tagName, _jPath, _isLeafNode, isAttribute) => !isAttribute && repeated.has(tagName)
  });
};

export const xmlBuilder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true
});

export const parseXml = ({xml, parser, label}: {xml: string; parser: XMLParser; label: string}): XmlResult<unknown> => {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    return err('format_error', `${label} is not well-formed XML: ${validation.err.msg} (line ${validation.err.line})`);
  }

  try {
    const document: unknown = parser.parse(xml);
    return ok(document);
  } catch (unknownError) {
    return err('format_error', `${label} could not be parsed: ${String(unknownError)}`);
  }
};
