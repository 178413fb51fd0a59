import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CardSummary, LookupResponse, Section } from '@shared/contracts/lookup';
import { CardRecord } from '@shared/types/arkham-card';
import { v4 as uuidv4 } from 'uuid';
import { ArkhamdbApiService } from '../arkhamdb/arkhamdb-api.service';
import { toCardSummary } from '../cards/card-summary';
import { MatchResolverService } from '../cards/match-resolver.service';
import { DEFAULT_CARD_MATCH_LIMIT } from '../config/configuration';
import { DeckComposerService } from '../decks/deck-composer.service';
import { DeckLink } from '../decks/deck-link';
import { extractMessage } from './message-extraction';
import { DECK_FETCH_ERROR_MESSAGE, NoMatchError, TooManyMatchesError } from './lookup.errors';
import { isBig } from './response-sizing';

const THREAD_NAME_PREFIX = 'arkhamdb';
const THREAD_HINT_LENGTH = 80;

@Injectable()
export class LookupService {
  private readonly logger = new Logger(LookupService.name);
  private readonly cardMatchLimit: number;

  constructor(
    private readonly matchResolver: MatchResolverService,
    private readonly deckComposer: DeckComposerService,
    private readonly arkhamdbApi: ArkhamdbApiService,
    configService: ConfigService,
  ) {
    this.cardMatchLimit =
      configService.get<number>('lookup.cardMatchLimit') ?? DEFAULT_CARD_MATCH_LIMIT;
  }

  /**
   * Handles one chat message: card tokens are resolved and capped before
   * anything else happens, then the deck link (if any) is fetched and
   * composed. A deck failure is reported alongside the card results.
   */
  async lookup(content: string): Promise<LookupResponse> {
    const requestId = uuidv4();
    const { tokens, deckLink } = extractMessage(content);

    if (!tokens.length && !deckLink) {
      return { requestId, handled: false, cards: [], deck: [], big: false };
    }

    let cards: CardSummary[] = [];
    if (tokens.length) {
      const matches = this.resolveCapped(tokens);
      if (!matches.length && !deckLink) {
        this.logger.log(`[${requestId}] No results for ${tokens.length} token(s)`);
        throw new NoMatchError(tokens);
      }
      cards = matches.map(toCardSummary);
    }

    let deck: Section[] = [];
    let deckError: string | undefined;
    if (deckLink) {
      try {
        deck = await this.composeDeck(deckLink);
      } catch (error) {
        this.logger.warn(
          `[${requestId}] Deck ${deckLink.kind}/${deckLink.id} failed: ${
            error instanceof Error ? error.message : String(error)
          }`,
        );
        deckError = DECK_FETCH_ERROR_MESSAGE;
      }
    }

    const big = isBig(cards.length, deck.length);
    const response: LookupResponse = { requestId, handled: true, cards, deck, big };
    if (deckError) {
      response.deckError = deckError;
    }
    if (big) {
      response.threadName = threadName(deck[0]?.title ?? cards[0]?.title);
    }

    this.logger.log(
      `[${requestId}] ${cards.length} card(s), ${deck.length} deck section(s)${big ? ', threaded' : ''}`,
    );
    return response;
  }

  searchCards(queries: string[]): CardSummary[] {
    const matches = this.resolveCapped(queries);
    if (!matches.length) {
      throw new NoMatchError(queries);
    }
    return matches.map(toCardSummary);
  }

  private resolveCapped(tokens: string[]): CardRecord[] {
    const matches = this.matchResolver.resolve(tokens);
    if (matches.length > this.cardMatchLimit) {
      throw new TooManyMatchesError(matches.length, this.cardMatchLimit);
    }
    return matches;
  }

  private async composeDeck(link: DeckLink): Promise<Section[]> {
    const deck = await this.arkhamdbApi.fetchDeck(link);
    return this.deckComposer.compose(deck);
  }
}

export function threadName(hint: string | undefined): string {
  const trimmed = (hint ?? '').trim().slice(0, THREAD_HINT_LENGTH);
  return `${THREAD_NAME_PREFIX}: ${trimmed || 'results'}`;
}
