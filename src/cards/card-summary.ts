import { CardSummary, CardSummaryField } from '@shared/contracts/lookup';
import { CardRecord } from '@shared/types/arkham-card';
import { ARKHAMDB_SITE_URL } from '../decks/deck-link';

type SkillKey = 'willpower' | 'intellect' | 'combat' | 'agility' | 'wild';

const SKILL_ICONS: Array<{ label: string; key: SkillKey }> = [
  { label: 'Willpower', key: 'willpower' },
  { label: 'Intellect', key: 'intellect' },
  { label: 'Combat', key: 'combat' },
  { label: 'Agility', key: 'agility' },
  { label: 'Wild', key: 'wild' },
];

const SEPARATOR = ' • ';

/** Converts ArkhamDB card markup to chat markdown. */
export function formatCardText(text: string | null): string {
  if (!text) {
    return '';
  }
  return text
    .replace(/\[\[|\]\]/g, '**')
    .replace(/<\/?b>/g, '**')
    .replace(/<\/?i>/g, '_');
}

export function formatSkillIcons(card: CardRecord): string {
  return SKILL_ICONS.flatMap(({ label, key }) => {
    const value = card[key];
    return value ? [`${label} ×${value}`] : [];
  }).join(', ');
}

export function cardTitle(card: CardRecord): string {
  return card.xp ? `${card.name} (${card.xp})` : card.name;
}

export function toCardSummary(card: CardRecord): CardSummary {
  const fields: CardSummaryField[] = [];

  const details: string[] = [];
  if (card.faction !== 'mythos' && card.factionName) {
    details.push(`Faction: _${card.factionName}_`);
  }
  if (card.cost !== null) {
    details.push(`Cost: _${card.cost}_`);
  }
  if (card.typeName) {
    details.push(`Type: _${card.typeName}_`);
  }
  if (card.slot) {
    details.push(`Slot: _${card.slot}_`);
  }
  if (details.length) {
    fields.push({ name: 'Details', value: details.join(SEPARATOR) });
  }

  if (card.traits) {
    fields.push({ name: 'Traits', value: `_${card.traits}_` });
  }

  const icons = formatSkillIcons(card);
  if (icons) {
    fields.push({ name: 'Test Icons', value: icons });
  }

  const stats = card.typeCode === 'enemy' ? enemyStats(card) : investigatorStats(card);
  if (stats.length) {
    fields.push({ name: card.typeCode === 'enemy' ? 'Enemy' : 'Stats', value: stats.join(SEPARATOR) });
  }

  return {
    code: card.code,
    title: cardTitle(card),
    url: card.url,
    description: formatCardText(card.text),
    imageUrl: card.imageSrc ? `${ARKHAMDB_SITE_URL}${card.imageSrc}` : null,
    fields,
  };
}

function enemyStats(card: CardRecord): string[] {
  const stats: string[] = [];
  if (card.enemyFight !== null) {
    stats.push(`Fight: ${card.enemyFight}`);
  }
  if (card.enemyEvade !== null) {
    stats.push(`Evade: ${card.enemyEvade}`);
  }
  if (card.health !== null) {
    stats.push(`Health: ${card.health}${card.healthPerInvestigator ? ' per investigator' : ''}`);
  }
  if (card.enemyDamage !== null) {
    stats.push(`Damage: ${card.enemyDamage}`);
  }
  if (card.enemyHorror !== null) {
    stats.push(`Horror: ${card.enemyHorror}`);
  }
  if (card.victory !== null) {
    stats.push(`Victory ${card.victory}`);
  }
  return stats;
}

function investigatorStats(card: CardRecord): string[] {
  const stats: string[] = [];
  if (card.health !== null) {
    stats.push(`Health: ${card.health}`);
  }
  if (card.sanity !== null) {
    stats.push(`Sanity: ${card.sanity}`);
  }
  return stats;
}
