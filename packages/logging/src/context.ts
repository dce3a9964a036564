import {AsyncLocalStorage} from 'node:async_hooks';
import {randomUUID} from 'node:crypto';

import {z} from 'zod';

export const LogContextSchema = z
  .object({
    request_id: z.string().min(1).max(128).optional(),
    instance: z.string().min(1).optional(),
    operation: z.string().min(1).optional(),
    target: z.string().min(1).optional()
  })
  .strict();

export type LogContext = z.infer<typeof LogContextSchema>;

const logContextStorage = new AsyncLocalStorage<LogContext>();

export const runWithLogContext = <T>(context: LogContext, operation: () => T): T => {
  const parsedContext = LogContextSchema.parse(context);
  return logContextStorage.run(parsedContext, operation);
};

export const getLogContext = (): LogContext | undefined => logContextStorage.getStore();

/**
 * Runs `operation` in the current context extended with `fields`. Outside any context a new
 * one starts, with a fresh request id unless `fields` names one.
 */
export const withLogContext = <T>(fields: LogContext, operation: () => T): T =>
  runWithLogContext({...(logContextStorage.getStore() ?? {request_id: randomUUID()}), ...fields}, operation);
