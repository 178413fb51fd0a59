import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { token_set_ratio } from 'fuzzball';
import { CardRecord } from '@shared/types/arkham-card';
import {
  CardCatalogRepository,
  CatalogSnapshot,
  normalizeName,
} from '../arkhamdb/repositories/card-catalog.repository';
import { DEFAULT_FUZZY_THRESHOLD } from '../config/configuration';
import { buildPredicate, cardLevel, CardPredicate, ParsedQuery, parseQuery } from './query-parser';

/** Similarity of two normalized names on a 0-100 scale. */
export type FuzzyScorer = (query: string, candidate: string) => number;

export const FUZZY_SCORER = Symbol('FUZZY_SCORER');

/** fuzzball rounds to whole numbers, so a raw 79.5 already clears a threshold of 80. */
export const tokenSetScorer: FuzzyScorer = (query, candidate) => token_set_ratio(query, candidate);

export interface MatchContext {
  query: ParsedQuery;
  baseKey: string;
  predicate: CardPredicate | null;
  snapshot: CatalogSnapshot;
}

export type MatchStageName = 'exact' | 'substring' | 'fuzzy';

export interface MatchStage {
  readonly name: MatchStageName;
  match(context: MatchContext): CardRecord[];
}

export interface TokenResolution {
  token: string;
  stage: MatchStageName | null;
  picks: CardRecord[];
}

/** First record with the lowest xp; catalog order breaks ties. */
export function pickLowestLevel(cards: readonly CardRecord[]): CardRecord | null {
  let lowest: CardRecord | null = null;
  for (const card of cards) {
    if (lowest === null || cardLevel(card) < cardLevel(lowest)) {
      lowest = card;
    }
  }
  return lowest;
}

export const exactStage: MatchStage = {
  name: 'exact',
  match({ baseKey, predicate, snapshot }) {
    const exacts = snapshot.cards.filter(
      (card) => normalizeName(card.name) === baseKey && (!predicate || predicate(card)),
    );
    if (predicate) {
      return exacts;
    }
    const lowest = pickLowestLevel(exacts);
    return lowest ? [lowest] : [];
  },
};

export const substringStage: MatchStage = {
  name: 'substring',
  match({ query, predicate, snapshot }) {
    const lowestByName = new Map<string, CardRecord>();
    for (const card of snapshot.cards) {
      if (!card.name.toLowerCase().includes(query.base) || (predicate && !predicate(card))) {
        continue;
      }
      const key = normalizeName(card.name);
      const current = lowestByName.get(key);
      if (!current || cardLevel(card) < cardLevel(current)) {
        lowestByName.set(key, card);
      }
    }
    return Array.from(lowestByName.values());
  },
};

export function createFuzzyStage(scorer: FuzzyScorer, threshold: number): MatchStage {
  return {
    name: 'fuzzy',
    match({ baseKey, predicate, snapshot }) {
      let bestKey: string | null = null;
      let bestScore = -1;
      for (const key of snapshot.searchKeys) {
        const score = scorer(baseKey, key);
        if (score > bestScore) {
          bestKey = key;
          bestScore = score;
        }
      }

      if (bestKey === null || bestScore < threshold) {
        return [];
      }

      const variants = snapshot.nameIndex.get(bestKey) ?? [];
      const lowest = pickLowestLevel(predicate ? variants.filter(predicate) : variants);
      return lowest ? [lowest] : [];
    },
  };
}

@Injectable()
export class MatchResolverService {
  private readonly logger = new Logger(MatchResolverService.name);
  private readonly stages: MatchStage[];

  constructor(
    private readonly catalog: CardCatalogRepository,
    configService: ConfigService,
    @Optional() @Inject(FUZZY_SCORER) scorer?: FuzzyScorer,
  ) {
    const threshold =
      configService.get<number>('lookup.fuzzyThreshold') ?? DEFAULT_FUZZY_THRESHOLD;
    this.stages = [exactStage, substringStage, createFuzzyStage(scorer ?? tokenSetScorer, threshold)];
  }

  /** Resolves tokens left to right into one list, deduplicated by card code. */
  resolve(tokens: string[]): CardRecord[] {
    const snapshot = this.catalog.getSnapshot();
    const matches: CardRecord[] = [];
    const seenCodes = new Set<string>();

    for (const token of tokens) {
      const { picks } = this.resolveToken(token, snapshot);
      for (const card of picks) {
        if (!seenCodes.has(card.code)) {
          seenCodes.add(card.code);
          matches.push(card);
        }
      }
    }

    return matches;
  }

  resolveToken(token: string, snapshot: CatalogSnapshot = this.catalog.getSnapshot()): TokenResolution {
    const query = parseQuery(token);
    if (!query.base) {
      return { token, stage: null, picks: [] };
    }

    const context: MatchContext = {
      query,
      baseKey: normalizeName(query.base),
      predicate: buildPredicate(query),
      snapshot,
    };

    for (const stage of this.stages) {
      const picks = stage.match(context);
      if (picks.length) {
        this.logger.debug(`"${token}" resolved by ${stage.name} match to ${picks.length} card(s)`);
        return { token, stage: stage.name, picks };
      }
    }

    return { token, stage: null, picks: [] };
  }
}
