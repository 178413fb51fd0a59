export interface CardRecord {
  code: string;
  name: string;
  xp: number | null;
  faction: string | null;
  factionName: string | null;
  typeCode: string | null;
  typeName: string | null;
  traits: string | null;
  cost: number | null;
  willpower: number | null;
  intellect: number | null;
  combat: number | null;
  agility: number | null;
  wild: number | null;
  health: number | null;
  sanity: number | null;
  healthPerInvestigator: boolean;
  enemyFight: number | null;
  enemyEvade: number | null;
  enemyDamage: number | null;
  enemyHorror: number | null;
  victory: number | null;
  permanent: boolean;
  slot: string | null;
  text: string | null;
  imageSrc: string | null;
  url: string;
}

export type DeckKind = 'deck' | 'decklist';

export interface ArkhamDeck {
  id: string;
  kind: DeckKind;
  name: string;
  version: string;
  investigatorCode: string | null;
  slots: Record<string, number>;
}
