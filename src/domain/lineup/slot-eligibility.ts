/**
 * Slot eligibility utilities for lineup optimization.
 * Defines which player positions can fill which lineup slots.
 */

export type PositionSlot =
  | 'QB' | 'RB' | 'WR' | 'TE'
  | 'FLEX' | 'SUPER_FLEX' | 'REC_FLEX'
  | 'K' | 'DEF'
  | 'DL' | 'LB' | 'DB' | 'IDP_FLEX'
  | 'BN' | 'IR' | 'TAXI';

/**
 * Starter slots that count for scoring. BN, IR and TAXI never do.
 */
const STARTER_SLOTS: PositionSlot[] = [
  'QB',
  'RB',
  'WR',
  'TE',
  'FLEX',
  'SUPER_FLEX',
  'REC_FLEX',
  'K',
  'DEF',
  'DL',
  'LB',
  'DB',
  'IDP_FLEX',
];

/**
 * Maps each slot to the positions eligible to fill it.
 * QB is only flex-eligible through SUPER_FLEX.
 */
const SLOT_ELIGIBILITY: Record<PositionSlot, readonly string[]> = {
  QB: ['QB'],
  RB: ['RB'],
  WR: ['WR'],
  TE: ['TE'],
  FLEX: ['RB', 'WR', 'TE'],
  SUPER_FLEX: ['QB', 'RB', 'WR', 'TE'],
  REC_FLEX: ['WR', 'TE'],
  K: ['K'],
  DEF: ['DEF'],
  DL: ['DL'],
  LB: ['LB'],
  DB: ['DB'],
  IDP_FLEX: ['DL', 'LB', 'DB'],
  BN: [],
  IR: [],
  TAXI: [],
};

export const DEFAULT_ROSTER_TEMPLATE: readonly PositionSlot[] = [
  'QB', 'RB', 'RB', 'WR', 'WR', 'TE', 'FLEX', 'K', 'DEF',
];

export function isPositionSlot(value: string): value is PositionSlot {
  return Object.prototype.hasOwnProperty.call(SLOT_ELIGIBILITY, value);
}

/**
 * Check if a slot is a starter slot (counts for scoring)
 */
export function isStarterSlot(slot: PositionSlot): boolean {
  return STARTER_SLOTS.includes(slot);
}

/**
 * Check if a player position can fill a given slot
 */
export function canPositionFillSlot(position: string, slot: PositionSlot): boolean {
  return SLOT_ELIGIBILITY[slot].includes(position);
}

/**
 * Reduce a platform roster-position list to the ordered starter template.
 * Unknown entries and reserve slots are dropped; an empty result falls back
 * to the standard one-QB template.
 */
export function toStarterTemplate(rosterPositions: readonly string[]): PositionSlot[] {
  const template = rosterPositions.filter(isPositionSlot).filter(isStarterSlot);
  return template.length > 0 ? template : [...DEFAULT_ROSTER_TEMPLATE];
}

/**
 * Whether a position can fill at least one slot of the template
 */
export function canStartInTemplate(position: string, template: readonly PositionSlot[]): boolean {
  return template.some((slot) => canPositionFillSlot(position, slot));
}
