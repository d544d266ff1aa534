import { Acquisition, TransactionEvent } from './ownership.types';

/**
 * Phrases the platform writes into metadata.notes when a waiver claim did not
 * go through. This is a best-effort reading of free-form text: a note that
 * words a failure differently is counted as a success.
 */
export const WAIVER_FAILURE_MARKERS: readonly string[] = ['claimed by another', 'failed', 'too many'];

/**
 * A waiver claim that lost to another bid or was rejected.
 */
export function isFailedWaiver(event: TransactionEvent): boolean {
  if (event.type !== 'waiver') return false;
  if (event.status === 'failed') return true;
  if (!event.notes) return false;

  const notes = event.notes.toLowerCase();
  return WAIVER_FAILURE_MARKERS.some((marker) => notes.includes(marker));
}

/**
 * Whether the transaction moves assets between more than one roster.
 */
export function isTradeBundle(event: TransactionEvent): boolean {
  return event.type === 'trade' || event.rosterIds.length > 1;
}

/**
 * Method and FAAB cost of the adds in a transaction.
 */
export function classifyAcquisition(event: TransactionEvent): Acquisition {
  if (isTradeBundle(event)) {
    return { method: 'trade', cost: 0 };
  }

  if (event.type === 'waiver' && !isFailedWaiver(event)) {
    const bid = event.waiverBid ?? 0;
    return { method: 'waiver', cost: bid > 0 ? Math.round(bid) : 0 };
  }

  return { method: 'free_agent', cost: 0 };
}
