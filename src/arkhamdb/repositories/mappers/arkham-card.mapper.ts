import { ArkhamDeck, CardRecord, DeckKind } from '@shared/types/arkham-card';

type RawRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function mapCard(raw: unknown): CardRecord | null {
  if (!isRecord(raw)) {
    return null;
  }

  const code = toStringOrNull(raw.code);
  const name = toStringOrNull(raw.name);
  if (!code || !name) {
    return null;
  }

  return {
    code,
    name,
    xp: toNumberOrNull(raw.xp),
    faction: toStringOrNull(raw.faction_code),
    factionName: toStringOrNull(raw.faction_name),
    typeCode: toStringOrNull(raw.type_code),
    typeName: toStringOrNull(raw.type_name),
    traits: toStringOrNull(raw.traits),
    cost: toNumberOrNull(raw.cost),
    willpower: toNumberOrNull(raw.skill_willpower),
    intellect: toNumberOrNull(raw.skill_intellect),
    combat: toNumberOrNull(raw.skill_combat),
    agility: toNumberOrNull(raw.skill_agility),
    wild: toNumberOrNull(raw.skill_wild),
    health: toNumberOrNull(raw.health),
    sanity: toNumberOrNull(raw.sanity),
    healthPerInvestigator: raw.health_per_investigator === true,
    enemyFight: toNumberOrNull(raw.enemy_fight),
    enemyEvade: toNumberOrNull(raw.enemy_evade),
    enemyDamage: toNumberOrNull(raw.enemy_damage),
    enemyHorror: toNumberOrNull(raw.enemy_horror),
    victory: toNumberOrNull(raw.victory),
    permanent: raw.permanent === true,
    slot: toStringOrNull(raw.slot),
    text: toStringOrNull(raw.text),
    imageSrc: toStringOrNull(raw.imagesrc),
    url: toStringOrNull(raw.url) ?? '',
  };
}

/**
 * Maps a deck or decklist payload. Returns null when the payload is not an
 * object; a missing or malformed `slots` map becomes an empty deck.
 */
export function mapDeck(raw: unknown, id: string, kind: DeckKind): ArkhamDeck | null {
  if (!isRecord(raw)) {
    return null;
  }

  const slots: Record<string, number> = {};
  if (isRecord(raw.slots)) {
    for (const [code, quantity] of Object.entries(raw.slots)) {
      const numeric = toNumberOrNull(quantity);
      if (numeric !== null && numeric > 0) {
        slots[code] = numeric;
      }
    }
  }

  return {
    id,
    kind,
    name: toStringOrNull(raw.name) ?? '',
    version: toStringOrNull(raw.version) ?? '',
    investigatorCode: toStringOrNull(raw.investigator_code),
    slots,
  };
}

function toStringOrNull(value: unknown): string | null {
  if (typeof value === 'string') {
    return value === '' ? null : value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

function toNumberOrNull(value: unknown): number | null {
  if (value === undefined || value === null || value === '') {
    return null;
  }
  const numeric = Number(value);
  return Number.isFinite(numeric) ? numeric : null;
}
