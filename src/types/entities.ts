// ═══════════════════════════════════════════════════════════════════════════════
// ENTITIES — Mentions and Knowledge-Base Records
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Prefix shared by built-in entity types (dates, numbers, durations...).
 */
export const SYSTEM_ENTITY_PREFIX = 'sys_';

/**
 * Entity mention extracted from an utterance by the NLU layer.
 */
export interface Entity {
  /** Surface text as it appeared in the utterance */
  readonly text: string;

  /** Entity type, e.g. `city` or `sys_time` */
  readonly type: string;

  /** Pre-resolved value (system entities only) */
  readonly value?: unknown;

  readonly role?: string;
  readonly displayText?: string;
}

/**
 * One knowledge-base record for an entity type.
 *
 * `cname` is the display name and need not be unique; `id` must be unique
 * within the entity type when present. Any other keys are carried through to
 * resolved output untouched.
 */
export interface CanonicalItem {
  readonly id?: string;
  readonly cname: string;
  readonly whitelist?: readonly string[];
  readonly [attribute: string]: unknown;
}

/**
 * A CanonicalItem as returned to callers: the alias list is an internal
 * matching artifact and is stripped.
 */
export interface ResolvedItem {
  readonly id?: string;
  readonly cname: string;
  readonly [attribute: string]: unknown;
}

export function isSystemEntity(entityType: string): boolean {
  return entityType.startsWith(SYSTEM_ENTITY_PREFIX);
}

/**
 * Copy an item without its alias list.
 */
export function stripAliases(item: CanonicalItem): ResolvedItem {
  const { whitelist: _whitelist, ...rest } = item;
  return rest;
}
