import type { QueryBackend } from './backend.js';
import { QueryValidationError } from './errors.js';
import type { Operation, OperationKind } from './operation.js';
import { debug, describeError } from './runtime.js';

export type BatchKind = Exclude<OperationKind, 'read'>;

/** A write that can take part in a batch. */
export type BatchOperation<TResult = unknown> = Operation<TResult> & { readonly kind: BatchKind };

export interface BatchResult<TKind extends BatchKind = BatchKind, TResult = unknown> {
  kind: TKind;
  result: TResult;
}

/**
 * Results of a batch, position by position.
 */
export type BatchResults<T extends readonly BatchOperation[]> = {
  -readonly [K in keyof T]: T[K] extends Operation<infer TResult> & { readonly kind: infer TKind extends BatchKind }
    ? BatchResult<TKind, TResult>
    : never;
};

const isBatchKind = (kind: OperationKind): kind is BatchKind => kind !== 'read';

/**
 * Run writes one after another on a single transaction. Either every write
 * takes effect or, when one fails, none does and the failure is rethrown.
 */
export async function runBatch<T extends readonly BatchOperation[] | []>(
  backend: QueryBackend,
  operations: T
): Promise<BatchResults<T>> {
  for (const [index, operation] of operations.entries()) {
    if (!isBatchKind(operation.kind)) {
      throw new QueryValidationError(`Batch entry ${index} is a read; batches take writes only`);
    }
    if (operation.consumed) {
      throw new QueryValidationError(`Batch entry ${index} (${operation.entityName}) has already been executed`);
    }
  }

  try {
    const results = await backend.transaction(async tx => {
      const collected: BatchResult[] = [];
      for (const operation of operations) {
        collected.push({ kind: operation.kind, result: await operation.execute(tx) });
      }
      return collected;
    });
    debug.db(`Batch of ${operations.length} operation(s) committed`);
    // Built position by position from `operations`
    return results as unknown as BatchResults<T>;
  } catch (error) {
    debug.error(`Batch of ${operations.length} operation(s) rolled back: ${describeError(error)}`);
    throw error;
  }
}
