import { DeckKind } from '@shared/types/arkham-card';

export interface DeckLink {
  kind: DeckKind;
  id: string;
}

const DECK_URL_PATTERN =
  /(https?:\/\/)?(www\.)?arkhamdb\.com\/(deck\/view|decklist\/view)\/([^\s\])]*)/i;

export const ARKHAMDB_SITE_URL = 'https://arkhamdb.com';

/**
 * Finds the first ArkhamDB deck or decklist link in free text. The id is the
 * path segment after `/view/`, cut at the next slash.
 */
export function parseDeckLink(content: string): DeckLink | null {
  const match = DECK_URL_PATTERN.exec(content);
  if (!match) {
    return null;
  }

  const kind: DeckKind = match[3].toLowerCase().startsWith('decklist') ? 'decklist' : 'deck';
  const id = (match[4] ?? '').split('/')[0];
  if (!id) {
    return null;
  }

  return { kind, id };
}

export function deckPageUrl({ kind, id }: DeckLink): string {
  return `${ARKHAMDB_SITE_URL}/${kind}/view/${id}`;
}
