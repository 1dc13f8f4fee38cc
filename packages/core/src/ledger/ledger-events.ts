/**
 * Ledger event emitter for audit logging and monitoring
 * Events are fire-and-forget so handlers never block or fail a ledger operation
 */

import type { AssetKind } from './ledger-types.js';

export type LedgerEventType = 'ledger.deposit' | 'ledger.withdrawal';

export interface LedgerEvent {
  type: LedgerEventType;
  account: string;
  asset: AssetKind;
  amount: bigint;
  timestamp: Date;
}

export type LedgerEventHandler = (event: LedgerEvent) => void | Promise<void>;

/**
 * Emitter surface the service depends on
 */
export interface LedgerEvents {
  emit(event: Omit<LedgerEvent, 'timestamp'>): void;
}

type ErrorReporter = (error: unknown, event: LedgerEvent) => void;

export class LedgerEventEmitter implements LedgerEvents {
  private handlers: LedgerEventHandler[] = [];

  constructor(
    private onHandlerError: ErrorReporter = (error, event) => {
      console.error(`Ledger event handler error (${event.type}):`, error);
    }
  ) {}

  on(handler: LedgerEventHandler) {
    this.handlers.push(handler);
  }

  emit(event: Omit<LedgerEvent, 'timestamp'>) {
    const fullEvent: LedgerEvent = {
      ...event,
      timestamp: new Date(),
    };

    // Each handler is isolated so one failure doesn't hide the others
    for (const handler of this.handlers) {
      Promise.resolve()
        .then(() => handler(fullEvent))
        .catch((error: unknown) => this.onHandlerError(error, fullEvent));
    }
  }

  /**
   * Clear all event handlers
   * Useful for testing to prevent handler accumulation
   */
  clearHandlers() {
    this.handlers = [];
  }
}

export const ledgerEvents = new LedgerEventEmitter();
