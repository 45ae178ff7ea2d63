/**
 * Long-running upload operations: decoding, error inspection and polling.
 *
 * @module services/file-search/operation
 */

import { z } from 'zod';
import { MCPError } from '../../server/errors.js';
import type { FileSearchService, OperationErrorInfo, UploadOperation } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DECODING
// ═══════════════════════════════════════════════════════════════════════════════

const ErrorInfoSchema = z.object({
  code: z.number().optional(),
  message: z.string().default('Unknown operation error'),
  details: z.array(z.unknown()).optional(),
});

const ResultSchema = z
  .object({
    error: ErrorInfoSchema.nullish(),
    documentName: z.string().nullish(),
  })
  .nullish();

const RawOperationSchema = z.object({
  name: z.string().nullish(),
  done: z.boolean().nullish(),
  error: ErrorInfoSchema.nullish(),
  // The SDK exposes the payload as `response`; the REST shape calls it `result`
  response: ResultSchema,
  result: ResultSchema,
});

/**
 * Decode whatever the SDK returned into an UploadOperation.
 * Absent and null fields are both mapped to "not present".
 */
export function decodeOperation(raw: unknown, fallbackName = ''): UploadOperation {
  const parsed = RawOperationSchema.parse(raw);
  const payload = parsed.result ?? parsed.response;

  const operation: UploadOperation = {
    name: parsed.name ?? fallbackName,
    done: parsed.done ?? false,
  };
  if (parsed.error) {
    operation.error = toErrorInfo(parsed.error);
  }
  if (payload) {
    operation.result = {};
    if (payload.error) operation.result.error = toErrorInfo(payload.error);
    if (payload.documentName) operation.result.documentName = payload.documentName;
  }
  return operation;
}

function toErrorInfo(error: z.infer<typeof ErrorInfoSchema>): OperationErrorInfo {
  const info: OperationErrorInfo = { message: error.message };
  if (error.code !== undefined) info.code = error.code;
  if (error.details !== undefined) info.details = error.details;
  return info;
}

// ═══════════════════════════════════════════════════════════════════════════════
// INSPECTION
// ═══════════════════════════════════════════════════════════════════════════════

export type OperationErrorLevel = 'operation' | 'result';

export type OperationState =
  | { state: 'pending' }
  | { state: 'succeeded' }
  | { state: 'failed'; level: OperationErrorLevel; error: OperationErrorInfo };

/**
 * Classify an operation. An error at either level wins over `done`, so a
 * failure reported before completion is surfaced immediately.
 */
export function inspectOperation(operation: UploadOperation): OperationState {
  if (operation.error) {
    return { state: 'failed', level: 'operation', error: operation.error };
  }
  if (operation.result?.error) {
    return { state: 'failed', level: 'result', error: operation.result.error };
  }
  return operation.done ? { state: 'succeeded' } : { state: 'pending' };
}

export function operationFailedError(
  operation: UploadOperation,
  level: OperationErrorLevel,
  error: OperationErrorInfo,
  context: Record<string, unknown> = {}
): MCPError {
  return new MCPError('OPERATION_FAILED', `Upload operation ${operation.name} failed: ${error.message}`, {
    ...context,
    operationName: operation.name,
    level,
    code: error.code,
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// POLLING
// ═══════════════════════════════════════════════════════════════════════════════

export interface PollOptions {
  /** Fixed delay between re-fetches */
  intervalMs: number;
  /** Give up after this long; 0 or undefined waits forever */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Extra details attached to any error raised */
  context?: Record<string, unknown>;
}

/**
 * Re-fetch an operation by handle until it is done.
 *
 * @throws MCPError OPERATION_FAILED when either error level is set
 * @throws MCPError OPERATION_TIMEOUT / OPERATION_CANCELLED
 */
export async function pollOperation(
  service: FileSearchService,
  initial: UploadOperation,
  options: PollOptions
): Promise<UploadOperation> {
  const { intervalMs, timeoutMs, signal, context = {} } = options;
  const deadline = timeoutMs ? Date.now() + timeoutMs : null;

  let operation = initial;
  try {
    let status = inspectOperation(operation);

    while (status.state === 'pending') {
      if (deadline !== null && Date.now() >= deadline) {
        throw new MCPError(
          'OPERATION_TIMEOUT',
          `Upload operation ${operation.name} did not complete within ${timeoutMs}ms`,
          { ...context, operationName: operation.name, timeoutMs }
        );
      }

      await waitFor(intervalMs, signal, operation.name, context);
      operation = await service.getOperation(operation.name);
      status = inspectOperation(operation);
    }

    if (status.state === 'failed') {
      throw operationFailedError(operation, status.level, status.error, context);
    }
    return operation;
  } catch (error) {
    // Abandoned operations are never re-fetched
    service.releaseOperation(operation.name);
    throw error;
  }
}

function cancelledError(operationName: string, context: Record<string, unknown>): MCPError {
  return new MCPError('OPERATION_CANCELLED', `Polling of upload operation ${operationName} was cancelled`, {
    ...context,
    operationName,
  });
}

function waitFor(
  ms: number,
  signal: AbortSignal | undefined,
  operationName: string,
  context: Record<string, unknown>
): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(cancelledError(operationName, context));
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(cancelledError(operationName, context));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
