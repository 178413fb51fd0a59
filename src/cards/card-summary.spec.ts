import { makeCard } from '../testing/card-fixtures';
import { formatCardText, formatSkillIcons, toCardSummary } from './card-summary';

describe('formatCardText', () => {
  it('converts ArkhamDB markup to markdown', () => {
    expect(formatCardText('[[Spell]]. <b>Forced</b> - <i>Flavor</i>')).toBe(
      '**Spell**. **Forced** - _Flavor_',
    );
    expect(formatCardText(null)).toBe('');
  });
});

describe('formatSkillIcons', () => {
  it('lists the icons a card has', () => {
    expect(formatSkillIcons(makeCard({ code: 'a', name: 'A', willpower: 1, combat: 2 }))).toBe(
      'Willpower ×1, Combat ×2',
    );
    expect(formatSkillIcons(makeCard({ code: 'b', name: 'B' }))).toBe('');
  });
});

describe('toCardSummary', () => {
  it('summarises a player card', () => {
    const card = makeCard({
      code: 's3',
      name: 'Shrivelling',
      xp: 3,
      faction: 'mystic',
      factionName: 'Mystic',
      cost: 3,
      typeName: 'Asset',
      slot: 'Arcane',
      traits: 'Spell.',
      willpower: 1,
      text: '<b>Uses (4 charges).</b>',
      imageSrc: '/bundles/cards/s3.png',
      url: 'https://arkhamdb.com/card/s3',
    });

    expect(toCardSummary(card)).toEqual({
      code: 's3',
      title: 'Shrivelling (3)',
      url: 'https://arkhamdb.com/card/s3',
      description: '**Uses (4 charges).**',
      imageUrl: 'https://arkhamdb.com/bundles/cards/s3.png',
      fields: [
        {
          name: 'Details',
          value: 'Faction: _Mystic_ • Cost: _3_ • Type: _Asset_ • Slot: _Arcane_',
        },
        { name: 'Traits', value: '_Spell._' },
        { name: 'Test Icons', value: 'Willpower ×1' },
      ],
    });
  });

  it('shows enemy stats and hides the mythos faction', () => {
    const card = makeCard({
      code: 'en',
      name: 'Ghoul Minion',
      xp: null,
      faction: 'mythos',
      factionName: 'Mythos',
      typeCode: 'enemy',
      typeName: 'Enemy',
      enemyFight: 2,
      enemyEvade: 2,
      health: 2,
      healthPerInvestigator: true,
      enemyDamage: 1,
      enemyHorror: 1,
      victory: 1,
    });

    const summary = toCardSummary(card);

    expect(summary.title).toBe('Ghoul Minion');
    expect(summary.imageUrl).toBeNull();
    expect(summary.fields).toEqual([
      { name: 'Details', value: 'Type: _Enemy_' },
      {
        name: 'Enemy',
        value:
          'Fight: 2 • Evade: 2 • Health: 2 per investigator • Damage: 1 • Horror: 1 • Victory 1',
      },
    ]);
  });

  it('shows health and sanity for allies', () => {
    const card = makeCard({
      code: 'al',
      name: 'Beat Cop',
      factionName: null,
      typeName: null,
      health: 2,
      sanity: 2,
    });

    expect(toCardSummary(card).fields).toEqual([
      { name: 'Stats', value: 'Health: 2 • Sanity: 2' },
    ]);
  });
});
