import { Injectable, Logger } from '@nestjs/common';
import { CardRecord } from '@shared/types/arkham-card';

export interface CatalogSnapshot {
  readonly cards: readonly CardRecord[];
  readonly byCode: ReadonlyMap<string, CardRecord>;
  readonly nameIndex: ReadonlyMap<string, readonly CardRecord[]>;
  readonly searchKeys: readonly string[];
  readonly loadedAt: Date | null;
}

const EMPTY_SNAPSHOT: CatalogSnapshot = Object.freeze({
  cards: Object.freeze([]),
  byCode: new Map<string, CardRecord>(),
  nameIndex: new Map<string, readonly CardRecord[]>(),
  searchKeys: Object.freeze([]),
  loadedAt: null,
});

/** Lower-cases and drops everything outside a-z0-9, so "Lucky!" and "lucky" share a key. */
export function normalizeName(name: string | null | undefined): string {
  return (name ?? '').toLowerCase().replace(/[^a-z0-9]+/g, '');
}

export function buildSnapshot(records: readonly CardRecord[], loadedAt = new Date()): CatalogSnapshot {
  const cards: CardRecord[] = [];
  const byCode = new Map<string, CardRecord>();
  const nameIndex = new Map<string, CardRecord[]>();

  for (const record of records) {
    if (byCode.has(record.code)) {
      continue;
    }
    const card = Object.freeze({ ...record });
    cards.push(card);
    byCode.set(card.code, card);

    const key = normalizeName(card.name);
    if (!key) {
      continue;
    }
    const variants = nameIndex.get(key);
    if (variants) {
      variants.push(card);
    } else {
      nameIndex.set(key, [card]);
    }
  }

  return Object.freeze({
    cards: Object.freeze(cards),
    byCode,
    nameIndex,
    searchKeys: Object.freeze(Array.from(nameIndex.keys())),
    loadedAt,
  });
}

/**
 * In-memory card catalog. Readers always see one complete snapshot; `load`
 * builds the replacement off to the side and publishes it in one assignment.
 */
@Injectable()
export class CardCatalogRepository {
  private readonly logger = new Logger(CardCatalogRepository.name);
  private snapshot: CatalogSnapshot = EMPTY_SNAPSHOT;

  load(records: readonly CardRecord[]): CatalogSnapshot {
    const next = buildSnapshot(records);
    const duplicates = records.length - next.cards.length;
    if (duplicates) {
      this.logger.warn(`Dropped ${duplicates} catalog entries with duplicate codes`);
    }

    this.snapshot = next;
    this.logger.log(
      `Loaded ${next.cards.length} cards under ${next.searchKeys.length} distinct names`,
    );
    return next;
  }

  getSnapshot(): CatalogSnapshot {
    return this.snapshot;
  }

  getAllCards(): readonly CardRecord[] {
    return this.snapshot.cards;
  }

  getNameIndex(): ReadonlyMap<string, readonly CardRecord[]> {
    return this.snapshot.nameIndex;
  }

  getSearchKeys(): readonly string[] {
    return this.snapshot.searchKeys;
  }

  findByCode(code: string): CardRecord | null {
    return this.snapshot.byCode.get(code) ?? null;
  }

  isLoaded(): boolean {
    return this.snapshot.loadedAt !== null;
  }

  size(): number {
    return this.snapshot.cards.length;
  }
}
