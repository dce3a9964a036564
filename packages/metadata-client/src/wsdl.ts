import {createXmlParser, describeIssues, parseXml, XmlTextSchema} from '@xrdinfo/xml';
import {z} from 'zod';

import type {WsdlOperation} from './contracts';
import {err, ok, type MetadataResult} from './errors';

const wsdlParser = createXmlParser(['binding', 'operation']);

const BindingOperationSchema = z.union([
  z.literal('').transform(() => ({})),
  z.object({
    '@_name': z.string().optional(),
    version: XmlTextSchema.optional()
  })
]);

const WsdlSchema = z.object({
  definitions: z.object({
    binding: z
      .array(
        z.union([
          z.literal('').transform(() => ({operation: []})),
          z.object({operation: z.array(BindingOperationSchema).default([])})
        ])
      )
      .default([])
  })
});

/**
 * Lists the operations bound in a WSDL document with their X-Road service version, in
 * document order. Operations without a name are skipped.
 */
export const listWsdlOperations = (wsdl: string): MetadataResult<WsdlOperation[]> => {
  const document = parseXml({xml: wsdl, parser: wsdlParser, label: 'WSDL'});
  if (!document.ok) return document;

  const parsed = WsdlSchema.safeParse(document.value);
  if (!parsed.success) {
    return err('format_error', `WSDL has no definitions: ${describeIssues(parsed.error)}`);
  }

  const operations: WsdlOperation[] = [];
  for (const binding of parsed.data.definitions.binding) {
    for (const operation of binding.operation) {
      const name = '@_name' in operation ? operation['@_name'] : undefined;
      if (!name) continue;

      const version = 'version' in operation ? operation.version : undefined;
      operations.push({name, ...(version ? {version} : {})});
    }
  }

  return ok(operations);
};
