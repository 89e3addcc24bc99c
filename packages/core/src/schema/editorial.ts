/**
 * Curated state-name tables. A state or target missing from every table
 * falls back to the generic color or variant.
 */

import { TRANSITION_LABELS } from '../catalog/index.js';
import { generateLabel, toSnake } from '../naming.js';
import { lookup } from '../util.js';
import type { StatusColor, TransitionVariant } from './types.js';

export const MAX_LIST_COLUMNS = 7;
export const OVERVIEW_FIELD_LIMIT = 8;

/**
 * Fields whose enum is shared across entities under the field's own name
 * (`lease_type` -> `LeaseType`) instead of an entity-prefixed one.
 */
export const CANONICAL_ENUM_FIELDS: ReadonlySet<string> = new Set([
  'lease_type',
  'space_type',
  'property_type',
  'account_type',
  'org_type',
  'building_type',
  'role_type',
  'entry_type',
  'source_type',
  'account_subtype',
  'normal_balance',
]);

// ============================================
// STATUS COLORS
// ============================================

const SUCCESS_STATES = new Set([
  'active',
  'occupied',
  'posted',
  'approved',
  'balanced',
  'verified',
]);

const ERROR_STATES = new Set(['eviction', 'denied', 'down', 'frozen', 'voided']);

const WARNING_STATES = new Set([
  'expired',
  'notice_given',
  'make_ready',
  'unbalanced',
  'month_to_month_holdover',
]);

const INITIAL_STATES = new Set(['draft', 'submitted', 'onboarding']);

/**
 * Curated colors win; terminal states and states nothing transitions into
 * are neutral; everything else is secondary.
 */
export function classifyStateColor(
  state: string,
  terminal: ReadonlySet<string>,
  targets: ReadonlySet<string>
): StatusColor {
  if (SUCCESS_STATES.has(state)) {
    return 'success';
  }
  if (ERROR_STATES.has(state)) {
    return 'error';
  }
  if (WARNING_STATES.has(state)) {
    return 'warning';
  }
  if (terminal.has(state) || INITIAL_STATES.has(state) || !targets.has(state)) {
    return 'surface';
  }
  return 'secondary';
}

// ============================================
// TRANSITIONS
// ============================================

const DANGER_TARGETS = new Set([
  'terminated',
  'eviction',
  'denied',
  'voided',
  'dissolved',
  'closed',
]);

const PRIMARY_TARGETS = new Set([
  'active',
  'approved',
  'posted',
  'pending_approval',
  'pending_signature',
  'occupied',
  'balanced',
  'renewed',
  'screening',
  'under_review',
  'conditionally_approved',
]);

export function classifyTransitionVariant(target: string): TransitionVariant {
  if (DANGER_TARGETS.has(target)) {
    return 'danger';
  }
  if (PRIMARY_TARGETS.has(target)) {
    return 'primary';
  }
  return 'secondary';
}

/**
 * Button label for moving from `from` to `to`. Some targets read
 * differently depending on the source state: terminating a draft is a
 * cancellation.
 */
export function transitionLabel(from: string, to: string): string {
  const bySource = lookup(TRANSITION_LABELS.fromState, to) ?? [];
  const match = bySource.find((entry) => entry.from.includes(from));
  if (match) {
    return match.label;
  }
  return lookup(TRANSITION_LABELS.labels, to) ?? generateLabel(to);
}

const CONFIRM_PHRASES: Record<string, (entity: string) => string> = {
  terminated: (entity) =>
    `Are you sure you want to terminate this ${entity}? This cannot be undone.`,
  eviction: (entity) =>
    `Are you sure you want to initiate eviction proceedings on this ${entity}?`,
  voided: (entity) => `Are you sure you want to void this ${entity}?`,
  dissolved: (entity) => `Are you sure you want to dissolve this ${entity}?`,
  closed: (entity) => `Are you sure you want to close this ${entity}?`,
  denied: (entity) => `Are you sure you want to deny this ${entity}?`,
};

export function confirmMessage(target: string, entityName: string): string {
  const entity = generateLabel(toSnake(entityName)).toLowerCase();
  const phrase = lookup(CONFIRM_PHRASES, target);
  if (phrase) {
    return phrase(entity);
  }
  return `Are you sure you want to change this ${entity} to ${generateLabel(target)}?`;
}
