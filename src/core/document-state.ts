/**
 * Document State Machine - lifecycle of a lazy document
 *
 * fresh -> active -> stale -> dead, with stale -> fresh on successful
 * rehydration and any state -> fresh on an explicit reiterate. Every change
 * is published as a `transition` event.
 */

import { EventEmitter } from 'events';
import { ErrorCode } from '../engine/error-codes.js';
import { DocumentState, JsonError, StateTransition } from '../types/index.js';
import { raiseEngineError } from './error-taxonomy.js';

const ALLOWED: Record<DocumentState, DocumentState[]> = {
  [DocumentState.Fresh]: [DocumentState.Active, DocumentState.Stale],
  [DocumentState.Active]: [DocumentState.Fresh, DocumentState.Stale],
  [DocumentState.Stale]: [DocumentState.Fresh, DocumentState.Dead],
  [DocumentState.Dead]: [DocumentState.Fresh]
};

export class DocumentStateMachine extends EventEmitter {
  private current: DocumentState = DocumentState.Fresh;
  private failure: JsonError | undefined;
  private debug: boolean;

  constructor(debug = false) {
    super();
    this.debug = debug;
  }

  get state(): DocumentState {
    return this.current;
  }

  /** Error that killed the document, while it is dead */
  get cause(): JsonError | undefined {
    return this.failure;
  }

  canTransition(to: DocumentState): boolean {
    return ALLOWED[this.current].includes(to);
  }

  /**
   * Move to `to`; moving to the current state does nothing
   */
  transition(to: DocumentState, reason: string, error?: JsonError): void {
    const from = this.current;
    if (from === to) {
      return;
    }
    if (!this.canTransition(to)) {
      raiseEngineError(ErrorCode.UnexpectedError, { from, to, reason });
    }

    this.current = to;
    this.failure = to === DocumentState.Dead ? error : undefined;

    if (this.debug) {
      console.log(`[ondemand-json Document] ${from} -> ${to}: ${reason}`);
    }

    const event: StateTransition = { from, to, reason };
    if (error) {
      event.error = error;
    }
    this.emit('transition', event);
  }

  markActive(): void {
    this.transition(DocumentState.Active, 'read');
  }

  markFresh(reason: string): void {
    this.transition(DocumentState.Fresh, reason);
  }

  markStale(): void {
    this.transition(DocumentState.Stale, 'parser reused');
  }

  markDead(error: JsonError): void {
    if (this.current === DocumentState.Dead) {
      this.failure = error;
      return;
    }
    if (this.current !== DocumentState.Stale) {
      this.markStale();
    }
    this.transition(DocumentState.Dead, 'rehydration failed', error);
  }
}
