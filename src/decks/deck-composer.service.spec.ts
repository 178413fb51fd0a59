import { ArkhamDeck } from '@shared/types/arkham-card';
import { CardCatalogRepository } from '../arkhamdb/repositories/card-catalog.repository';
import { makeCard } from '../testing/card-fixtures';
import {
  categoryOf,
  chunkLines,
  DeckComposerService,
  formatDeckLine,
  paginateCategory,
  SECTION_CHUNK_LENGTH,
  SECTION_SAFE_LENGTH,
} from './deck-composer.service';

const investigator = makeCard({ code: 'inv', name: 'Roland Banks', typeCode: 'investigator' });
const machete = makeCard({ code: 'a1', name: 'Machete', slot: 'Hand', url: 'u-a1' });
const automatic = makeCard({ code: 'a2', name: '.45 Automatic', slot: 'Hand', url: 'u-a2' });
const coat = makeCard({ code: 'a4', name: 'Leather Coat', slot: 'Body', url: 'u-a4' });
const charm = makeCard({ code: 'a5', name: 'Lucky Charm', slot: null, url: 'u-a5' });
const charisma = makeCard({ code: 'p1', name: 'Charisma', permanent: true, url: 'u-p1' });
const evidence = makeCard({ code: 'e1', name: 'Evidence!', typeCode: 'event', url: 'u-e1' });
const dynamite = makeCard({
  code: 'e2',
  name: 'Dynamite Blast',
  typeCode: 'event',
  xp: 2,
  url: 'u-e2',
});
const amnesia = makeCard({ code: 't1', name: 'Amnesia', typeCode: 'treachery', url: 'u-t1' });
const unused = makeCard({ code: 'k1', name: 'Vicious Blow', typeCode: 'skill', url: 'u-k1' });

function createComposer() {
  const repository = new CardCatalogRepository();
  repository.load([
    investigator,
    machete,
    automatic,
    coat,
    charm,
    charisma,
    evidence,
    dynamite,
    amnesia,
    unused,
  ]);
  return new DeckComposerService(repository);
}

const deck: ArkhamDeck = {
  id: '123',
  kind: 'deck',
  name: 'Test Deck',
  version: '1.0',
  investigatorCode: 'inv',
  slots: { a1: 2, a2: 2, a4: 1, a5: 1, p1: 1, e1: 2, e2: 1, t1: 1 },
};

describe('categoryOf', () => {
  it('puts permanent cards in Permanent whatever their type', () => {
    expect(categoryOf(charisma)).toBe('permanent');
    expect(categoryOf({ ...evidence, permanent: true })).toBe('permanent');
  });

  it('uses the type code otherwise', () => {
    expect(categoryOf(machete)).toBe('asset');
    expect(categoryOf(amnesia)).toBe('treachery');
    expect(categoryOf(investigator)).toBeNull();
  });
});

describe('formatDeckLine', () => {
  it('adds the level only when it is non-zero', () => {
    expect(formatDeckLine(dynamite, 1)).toBe('- 1 × [Dynamite Blast](u-e2) (2)');
    expect(formatDeckLine(evidence, 2)).toBe('- 2 × [Evidence!](u-e1)');
  });
});

describe('DeckComposerService', () => {
  it('builds a header and one section per populated category in fixed order', () => {
    const sections = createComposer().compose(deck);

    expect(sections.map((section) => section.title)).toEqual([
      'Roland Banks: Test Deck 1.0',
      'Assets',
      'Permanents',
      'Events',
      'Treacheries',
    ]);
    expect(sections[0]).toEqual({
      title: 'Roland Banks: Test Deck 1.0',
      body: '',
      url: 'https://arkhamdb.com/deck/view/123',
      paginated: false,
    });
  });

  it('omits categories with no cards', () => {
    const titles = createComposer()
      .compose(deck)
      .map((section) => section.title);

    expect(titles).not.toContain('Skills');
    expect(titles).not.toContain('Enemies');
  });

  it('groups assets under slot headings with missing slots last', () => {
    const assets = createComposer()
      .compose(deck)
      .find((section) => section.title === 'Assets');

    expect(assets?.body).toBe(
      [
        '\n**Body:**',
        '- 1 × [Leather Coat](u-a4)',
        '\n**Hand:**',
        '- 2 × [Machete](u-a1)',
        '- 2 × [.45 Automatic](u-a2)',
        '\n**Other:**',
        '- 1 × [Lucky Charm](u-a5)',
      ].join('\n'),
    );
  });

  it('lists other categories in catalog order without headings', () => {
    const sections = createComposer().compose(deck);

    expect(sections.find((section) => section.title === 'Events')?.body).toBe(
      '- 2 × [Evidence!](u-e1)\n- 1 × [Dynamite Blast](u-e2) (2)',
    );
    expect(sections.find((section) => section.title === 'Permanents')?.body).toBe(
      '- 1 × [Charisma](u-p1)',
    );
  });

  it('falls back to a generic investigator name', () => {
    const sections = createComposer().compose({
      ...deck,
      kind: 'decklist',
      investigatorCode: 'nobody',
      slots: {},
    });

    expect(sections).toEqual([
      {
        title: 'Investigator: Test Deck 1.0',
        body: '',
        url: 'https://arkhamdb.com/decklist/view/123',
        paginated: false,
      },
    ]);
  });

  it('paginates a category that outgrows a single section', () => {
    const events = Array.from({ length: 60 }, (_, index) =>
      makeCard({
        code: `ev${index}`,
        name: `Event ${index}`,
        typeCode: 'event',
        url: `https://arkhamdb.com/card/${'x'.repeat(60)}${index}`,
      }),
    );
    const repository = new CardCatalogRepository();
    repository.load(events);
    const slots = Object.fromEntries(events.map((card) => [card.code, 1]));

    const sections = new DeckComposerService(repository).compose({ ...deck, slots });
    const parts = sections.slice(1);

    expect(parts.length).toBeGreaterThan(1);
    parts.forEach((part, index) => {
      expect(part.title).toBe(`Events [${index + 1}/${parts.length}]`);
      expect(part.paginated).toBe(true);
      expect(part.body.length).toBeLessThanOrEqual(SECTION_CHUNK_LENGTH);
    });
    expect(parts.map((part) => part.body).join('\n')).toBe(
      events.map((card) => formatDeckLine(card, 1)).join('\n'),
    );
  });
});

describe('paginateCategory', () => {
  const line = (length: number) => 'x'.repeat(length);
  const atThreshold = [...Array.from({ length: 37 }, () => line(99)), line(100)];
  const overThreshold = [...Array.from({ length: 37 }, () => line(99)), line(101)];

  it('keeps a body of exactly the safe length in one section', () => {
    expect(atThreshold.join('\n')).toHaveLength(SECTION_SAFE_LENGTH);

    const sections = paginateCategory('Events', atThreshold);

    expect(sections).toHaveLength(1);
    expect(sections[0]).toEqual({
      title: 'Events',
      body: atThreshold.join('\n'),
      paginated: false,
    });
  });

  it('splits a body one character over the safe length', () => {
    const sections = paginateCategory('Events', overThreshold);

    expect(sections.map((section) => section.title)).toEqual([
      'Events [1/3]',
      'Events [2/3]',
      'Events [3/3]',
    ]);
    expect(sections.map((section) => section.body.length)).toEqual([1499, 1499, 7 * 100 + 101]);
    expect(sections[2]).toMatchObject({ part: 3, totalParts: 3, paginated: true });
  });
});

describe('chunkLines', () => {
  it('closes a chunk before it would exceed the budget', () => {
    expect(chunkLines(['aaaa', 'bbbb', 'cccc'], 10)).toEqual(['aaaa\nbbbb', 'cccc']);
  });

  it('never emits an empty chunk for an oversized first line', () => {
    expect(chunkLines(['x'.repeat(12), 'y'], 10)).toEqual(['x'.repeat(12), 'y']);
  });
});
