export {
  ACQUISITION_METHODS,
  TRANSACTION_TYPES,
  type AcquisitionMethod,
  type Acquisition,
  type DraftPickTransfer,
  type OwnershipInterval,
  type TransactionEvent,
  type TransactionStatus,
  type TransactionType,
} from './ownership.types';

export { WAIVER_FAILURE_MARKERS, classifyAcquisition, isFailedWaiver, isTradeBundle } from './acquisition';

export {
  reconstructOwnership,
  orderTransactions,
  isWellFormedEvent,
  intervalsForRoster,
  effectiveEndWeek,
  isWellOrdered,
  type OwnershipTimeline,
  type ReconstructOptions,
} from './ownership-timeline';
