import { Injectable } from '@nestjs/common';
import { Section } from '@shared/contracts/lookup';
import { ArkhamDeck, CardRecord } from '@shared/types/arkham-card';
import { CardCatalogRepository } from '../arkhamdb/repositories/card-catalog.repository';
import { deckPageUrl } from './deck-link';

/** Largest body kept as a single section; the platform cap is 4096. */
export const SECTION_SAFE_LENGTH = 3800;
/** Budget for each chunk once a category has to be split. */
export const SECTION_CHUNK_LENGTH = 1500;

const MISSING_SLOT_SORT_KEY = 'zzzzzz';
const MISSING_SLOT_HEADING = 'Other';

export type DeckCategory = 'asset' | 'permanent' | 'event' | 'skill' | 'treachery' | 'enemy';

export const DECK_CATEGORIES: ReadonlyArray<{ id: DeckCategory; title: string }> = [
  { id: 'asset', title: 'Assets' },
  { id: 'permanent', title: 'Permanents' },
  { id: 'event', title: 'Events' },
  { id: 'skill', title: 'Skills' },
  { id: 'treachery', title: 'Treacheries' },
  { id: 'enemy', title: 'Enemies' },
];

export function categoryOf(card: CardRecord): DeckCategory | null {
  if (card.permanent) {
    return 'permanent';
  }
  const match = DECK_CATEGORIES.find(({ id }) => id !== 'permanent' && id === card.typeCode);
  return match?.id ?? null;
}

export function formatDeckLine(card: CardRecord, quantity: number): string {
  const level = card.xp ? ` (${card.xp})` : '';
  return `- ${quantity} × [${card.name}](${card.url})${level}`;
}

/**
 * Packs lines greedily into chunks. A chunk is closed before a line would
 * push its running length (each line plus one separator) past `budget`.
 */
export function chunkLines(lines: readonly string[], budget = SECTION_CHUNK_LENGTH): string[] {
  const chunks: string[] = [];
  let buffer: string[] = [];
  let count = 0;

  for (const line of lines) {
    if (buffer.length && count + line.length + 1 > budget) {
      chunks.push(buffer.join('\n'));
      buffer = [];
      count = 0;
    }
    buffer.push(line);
    count += line.length + 1;
  }

  if (buffer.length) {
    chunks.push(buffer.join('\n'));
  }
  return chunks;
}

export function paginateCategory(title: string, lines: readonly string[]): Section[] {
  const body = lines.join('\n');
  if (body.length <= SECTION_SAFE_LENGTH) {
    return [{ title, body, paginated: false }];
  }

  const chunks = chunkLines(lines);
  return chunks.map((chunk, index) => ({
    title: `${title} [${index + 1}/${chunks.length}]`,
    body: chunk,
    paginated: true,
    part: index + 1,
    totalParts: chunks.length,
  }));
}

@Injectable()
export class DeckComposerService {
  constructor(private readonly catalog: CardCatalogRepository) {}

  compose(deck: ArkhamDeck): Section[] {
    const cards = this.catalog.getAllCards();
    const investigator = deck.investigatorCode
      ? cards.find((card) => card.code === deck.investigatorCode)
      : undefined;

    const sections: Section[] = [
      {
        title: `${investigator?.name ?? 'Investigator'}: ${deck.name} ${deck.version}`,
        body: '',
        url: deckPageUrl(deck),
        paginated: false,
      },
    ];

    const deckCards = cards.filter((card) => Object.prototype.hasOwnProperty.call(deck.slots, card.code));

    for (const { id, title } of DECK_CATEGORIES) {
      const categoryCards = deckCards.filter((card) => categoryOf(card) === id);
      if (!categoryCards.length) {
        continue;
      }

      const lines =
        id === 'asset'
          ? this.assetLines(categoryCards, deck.slots)
          : categoryCards.map((card) => formatDeckLine(card, deck.slots[card.code] ?? 1));

      sections.push(...paginateCategory(title, lines));
    }

    return sections;
  }

  private assetLines(cards: CardRecord[], slots: Record<string, number>): string[] {
    const sorted = [...cards].sort((a, b) => {
      const left = a.slot ?? MISSING_SLOT_SORT_KEY;
      const right = b.slot ?? MISSING_SLOT_SORT_KEY;
      return left < right ? -1 : left > right ? 1 : 0;
    });

    const lines: string[] = [];
    let lastSlot: string | null = null;
    for (const card of sorted) {
      const slot = card.slot ?? MISSING_SLOT_HEADING;
      if (slot !== lastSlot) {
        lines.push(`\n**${slot}:**`);
        lastSlot = slot;
      }
      lines.push(formatDeckLine(card, slots[card.code] ?? 1));
    }
    return lines;
  }
}
