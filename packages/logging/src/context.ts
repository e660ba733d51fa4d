import {AsyncLocalStorage} from 'node:async_hooks';

import {z} from 'zod';

export const LogContextSchema = z
  .object({
    correlation_id: z.string().min(1).max(128).optional(),
    request_id: z.string().min(1).max(128).optional(),
    caller_id: z.string().min(1).optional(),
    job_id: z.string().min(1).optional(),
    service_id: z.string().min(1).optional(),
    call_index: z.number().int().gte(0).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional()
  })
  .strict();

export type LogContext = z.infer<typeof LogContextSchema>;

const logContextStorage = new AsyncLocalStorage<LogContext>();

export const runWithLogContext = <T>(context: LogContext, operation: () => T): T =>
  logContextStorage.run(LogContextSchema.parse(context), operation);

export const getLogContext = (): LogContext | undefined => logContextStorage.getStore();

/**
 * Mutates the active context in place so that log lines emitted later in the
 * same async chain pick up the new fields. Outside a context this is a no-op.
 */
export const setLogContextFields = (partialContext: Partial<LogContext>): LogContext | undefined => {
  const currentContext = logContextStorage.getStore();
  if (!currentContext) {
    return undefined;
  }

  Object.assign(currentContext, LogContextSchema.partial().parse(partialContext));
  return currentContext;
};
