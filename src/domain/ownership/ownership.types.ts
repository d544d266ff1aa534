/**
 * Ownership domain types
 */

export const ACQUISITION_METHODS = ['draft', 'trade', 'waiver', 'free_agent'] as const;

export type AcquisitionMethod = (typeof ACQUISITION_METHODS)[number];

export const TRANSACTION_TYPES = ['trade', 'waiver', 'free_agent', 'commissioner'] as const;

export type TransactionType = (typeof TRANSACTION_TYPES)[number];

export type TransactionStatus = 'complete' | 'failed' | 'pending';

/**
 * A future draft pick changing hands inside a trade
 */
export interface DraftPickTransfer {
  season: string;
  round: number;
  /** Roster whose original pick this is */
  rosterId: number;
  previousOwnerId: number | null;
  ownerId: number;
}

export interface TransactionEvent {
  transactionId: string;
  week: number;
  type: TransactionType;
  status: TransactionStatus;
  rosterIds: readonly number[];
  /** playerId -> receiving roster */
  adds: Readonly<Record<string, number>>;
  /** playerId -> releasing roster */
  drops: Readonly<Record<string, number>>;
  draftPicks: readonly DraftPickTransfer[];
  /** settings.waiver_bid; null when the platform sent none */
  waiverBid: number | null;
  /** metadata.notes, free-form */
  notes: string | null;
  /** Epoch milliseconds */
  created: number | null;
  /** Feed-arrival index within the week; the same-week tie-break */
  sequence: number;
}

export interface OwnershipInterval {
  playerId: string;
  rosterId: number;
  startWeek: number;
  /** null while the player is still owned at the end of the analysed range */
  endWeek: number | null;
  method: AcquisitionMethod;
  /** FAAB spent; 0 unless a successful waiver */
  cost: number;
}

export interface Acquisition {
  method: AcquisitionMethod;
  cost: number;
}
