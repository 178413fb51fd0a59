import { CardRecord } from '@shared/types/arkham-card';

export type LevelQualifier = { kind: 'upgraded' } | { kind: 'level'; level: number };

export interface ParsedQuery {
  /** Trimmed, lower-cased search text without the qualifier suffix. */
  base: string;
  qualifier: LevelQualifier | null;
}

export type CardPredicate = (card: CardRecord) => boolean;

const QUALIFIER_SUFFIX = /\(([^()]+)\)$/;
const INTEGER = /^[+-]?\d+$/;

/**
 * Splits `"Shrivelling (3)"` into base `"shrivelling"` and an exact-level
 * qualifier. `(u)` means any upgraded print. Any other parenthetical stays
 * part of the base.
 */
export function parseQuery(token: string): ParsedQuery {
  const trimmed = token.trim();
  const match = QUALIFIER_SUFFIX.exec(trimmed);
  if (!match) {
    return { base: trimmed.toLowerCase(), qualifier: null };
  }

  const qualifier = parseQualifier(match[1].trim());
  if (!qualifier) {
    return { base: trimmed.toLowerCase(), qualifier: null };
  }

  return {
    base: trimmed.slice(0, match.index).trim().toLowerCase(),
    qualifier,
  };
}

function parseQualifier(value: string): LevelQualifier | null {
  if (value.toLowerCase() === 'u') {
    return { kind: 'upgraded' };
  }
  if (INTEGER.test(value)) {
    return { kind: 'level', level: parseInt(value, 10) };
  }
  return null;
}

export function cardLevel(card: CardRecord): number {
  return card.xp ?? 0;
}

/**
 * Predicate for a qualified query. It checks name containment as well as
 * level because the match stages apply it on its own to every candidate set.
 */
export function buildPredicate({ base, qualifier }: ParsedQuery): CardPredicate | null {
  if (!qualifier) {
    return null;
  }

  return (card) => {
    if (!card.name.toLowerCase().includes(base)) {
      return false;
    }
    const xp = cardLevel(card);
    return qualifier.kind === 'upgraded' ? xp > 0 : xp === qualifier.level;
  };
}
