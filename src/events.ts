/**
 * Statement and connection events
 *
 * CompatEventEmitter narrows Node's EventEmitter to the CompatEvents map so a
 * listener's payload type follows from the event name. The logger asks
 * `wants()` before building a payload nobody would receive.
 */

import { EventEmitter } from 'events';
import type { CompatEvents } from './types.js';

export type CompatEventName = keyof CompatEvents;
export type CompatListener<E extends CompatEventName> = (payload: CompatEvents[E]) => void;

type StatementEvent = CompatEvents['statement'];

export class CompatEventEmitter extends EventEmitter {
  on<E extends CompatEventName>(event: E, listener: CompatListener<E>): this {
    return super.on(event, listener);
  }

  once<E extends CompatEventName>(event: E, listener: CompatListener<E>): this {
    return super.once(event, listener);
  }

  off<E extends CompatEventName>(event: E, listener: CompatListener<E>): this {
    return super.off(event, listener);
  }

  emit<E extends CompatEventName>(event: E, payload: CompatEvents[E]): boolean {
    return super.emit(event, payload);
  }

  /** True when at least one listener is attached to `event`. */
  wants(event: CompatEventName): boolean {
    return this.listenerCount(event) > 0;
  }

  /**
   * Receive only the statements run inside one transaction. Detaches itself
   * once that transaction commits or rolls back. Returns an unsubscribe
   * function for leaving earlier.
   */
  onTransactionStatements(txId: string, listener: (statement: StatementEvent) => void): () => void {
    const onStatement = (statement: StatementEvent): void => {
      if (statement.txId === txId) listener(statement);
    };
    const onTransaction = (event: CompatEvents['transaction']): void => {
      if (event.txId === txId && event.action !== 'begin') unsubscribe();
    };
    const unsubscribe = (): void => {
      this.off('statement', onStatement);
      this.off('transaction', onTransaction);
    };

    this.on('statement', onStatement);
    this.on('transaction', onTransaction);
    return unsubscribe;
  }
}
