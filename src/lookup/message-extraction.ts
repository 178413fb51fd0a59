import { DeckLink, parseDeckLink } from '../decks/deck-link';

const CARD_TOKEN_PATTERN = /\[\[(.+?)\]\]/g;

export interface ExtractedMessage {
  tokens: string[];
  deckLink: DeckLink | null;
}

export function extractCardTokens(content: string): string[] {
  return Array.from(content.matchAll(CARD_TOKEN_PATTERN), (match) => match[1]);
}

export function extractMessage(content: string): ExtractedMessage {
  return {
    tokens: extractCardTokens(content),
    deckLink: parseDeckLink(content),
  };
}
