export {ATTRIBUTE_PREFIX, createXmlParser, parseXml, xmlBuilder} from './document';
export {xmlErrorCodes, type XmlError, type XmlErrorCode, type XmlFailure, type XmlResult, type XmlSuccess} from './errors';
export {describeIssues, RequiredTextSchema, XmlTextSchema, xmlElement} from './schemas';
