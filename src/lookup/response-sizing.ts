export const BIG_CARD_COUNT = 3;
export const BIG_DECK_UNIT_COUNT = 10;

/** True when a reply should go to a thread instead of the channel. */
export function isBig(cardCount: number, deckUnitCount = 0): boolean {
  return cardCount > BIG_CARD_COUNT || deckUnitCount > BIG_DECK_UNIT_COUNT;
}
