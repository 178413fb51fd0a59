import { HttpService } from '@nestjs/axios';
import { Injectable, Logger } from '@nestjs/common';
import { AxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import { ArkhamDeck, CardRecord } from '@shared/types/arkham-card';
import { FetchError } from '../lookup/lookup.errors';
import { DeckLink } from '../decks/deck-link';
import { mapCard, mapDeck } from './repositories/mappers/arkham-card.mapper';

export const CARDS_PATH = '/api/public/cards?encounter=1';

@Injectable()
export class ArkhamdbApiService {
  private readonly logger = new Logger(ArkhamdbApiService.name);

  constructor(private readonly httpService: HttpService) {}

  async fetchCatalog(): Promise<CardRecord[]> {
    const data = await this.getJson(CARDS_PATH, 'fetching the card catalog');
    if (!Array.isArray(data)) {
      this.logger.error('Card catalog payload is not an array');
      throw new FetchError('decoding the card catalog');
    }

    const cards: CardRecord[] = [];
    let skipped = 0;
    for (const raw of data) {
      const card = mapCard(raw);
      if (card) {
        cards.push(card);
      } else {
        skipped++;
      }
    }

    if (skipped) {
      this.logger.warn(`Skipped ${skipped} catalog entries without a code or name`);
    }

    // An empty catalog would replace the current one.
    if (!cards.length) {
      this.logger.error(`Card catalog payload held no usable cards (${data.length} entries)`);
      throw new FetchError('decoding the card catalog');
    }

    return cards;
  }

  async fetchDeck({ id, kind }: DeckLink): Promise<ArkhamDeck> {
    const context = `fetching ${kind} ${id}`;
    const data = await this.getJson(
      `/api/public/${kind}/${encodeURIComponent(id)}`,
      context,
    );

    const deck = mapDeck(data, id, kind);
    if (!deck) {
      this.logger.error(`Unexpected payload while ${context}`);
      throw new FetchError(`decoding ${kind} ${id}`);
    }

    return deck;
  }

  private async getJson(path: string, context: string): Promise<unknown> {
    try {
      // Some ArkhamDB routes label JSON as text/html.
      const { data } = await firstValueFrom(
        this.httpService.get<string>(path, { responseType: 'text' }),
      );
      return JSON.parse(data);
    } catch (error) {
      this.handleRequestError(error, context);
    }
  }

  private handleRequestError(error: unknown, context: string): never {
    if (error instanceof AxiosError) {
      this.logger.error(`Error ${context}: ${error.message} ${error.response?.status ?? ''}`);
      throw new FetchError(context, error);
    }

    if (error instanceof SyntaxError) {
      this.logger.error(`Error ${context}: response is not JSON`);
    } else {
      this.logger.error(`Error ${context}: ${error instanceof Error ? error.message : String(error)}`);
    }
    throw new FetchError(context, error);
  }
}
