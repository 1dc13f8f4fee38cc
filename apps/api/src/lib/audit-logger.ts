import { ledgerEvents, type LedgerEvent, type LedgerEventEmitter } from '@repo/core';
import { logger as rootLogger, type Logger } from '@repo/observability';

/**
 * Initialize audit logging for ledger events
 * Every successful deposit/withdrawal becomes one structured log line
 */
export function initializeAuditLogging(
  emitter: Pick<LedgerEventEmitter, 'on'> = ledgerEvents,
  logger: Logger = rootLogger
) {
  emitter.on((event) => handleLedgerEvent(event, logger));
  logger.info('Audit logging initialized for ledger events');
}

export function handleLedgerEvent(event: LedgerEvent, logger: Logger) {
  const logEntry = {
    event: event.type,
    account: event.account,
    asset: event.asset,
    amount: event.amount,
    timestamp: event.timestamp.toISOString(),
  };

  switch (event.type) {
    case 'ledger.deposit':
      logger.info(logEntry, 'Deposit recorded');
      break;

    case 'ledger.withdrawal':
      logger.info(logEntry, 'Withdrawal completed');
      break;
  }
}
