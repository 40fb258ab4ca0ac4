import type { QueryBackend } from './backend.js';
import type { EntityRuntime } from './entity-rows.js';
import { QueryValidationError } from './errors.js';

export type OperationKind = 'read' | 'insert' | 'update' | 'delete' | 'upsert';

/**
 * Consumption state shared by a builder and the builders its typed chain
 * methods hand back.
 */
export interface OperationState {
  consumed: boolean;
}

/**
 * Base for every query builder. Builders accumulate their query, run once,
 * and behave like a Promise so they can be awaited directly.
 */
export abstract class Operation<TResult> implements PromiseLike<TResult> {
  abstract readonly kind: OperationKind;
  protected readonly runtime: EntityRuntime;
  protected readonly state: OperationState;

  constructor(runtime: EntityRuntime, state: OperationState = { consumed: false }) {
    this.runtime = runtime;
    this.state = state;
  }

  get entityName(): string {
    return this.runtime.entity.name;
  }

  get consumed(): boolean {
    return this.state.consumed;
  }

  /**
   * Run the operation, by default on the client's backend. A second run
   * fails with {@link QueryValidationError}.
   */
  async execute(backend: QueryBackend = this.runtime.backend): Promise<TResult> {
    this.assertOpen();
    this.state.consumed = true;
    return this.run(backend);
  }

  exec(): Promise<TResult> {
    return this.execute();
  }

  protected abstract run(backend: QueryBackend): Promise<TResult>;

  protected assertOpen(): void {
    if (this.state.consumed) {
      throw new QueryValidationError(`${this.constructor.name} for ${this.entityName} has already been executed`);
    }
  }

  then<TResult1 = TResult, TResult2 = never>(
    onFulfilled?: ((value: TResult) => TResult1 | PromiseLike<TResult1>) | null,
    onRejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.execute().then(onFulfilled, onRejected);
  }

  catch<TCaught = never>(
    onRejected?: ((reason: unknown) => TCaught | PromiseLike<TCaught>) | null
  ): Promise<TResult | TCaught> {
    return this.execute().catch(onRejected);
  }

  finally(onFinally?: (() => void) | null): Promise<TResult> {
    return this.execute().finally(onFinally ?? undefined);
  }
}
