import {
  BadGatewayException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';

export const FETCH_ERROR_MESSAGE =
  'Something went wrong attempting to retrieve data from ArkhamDB. Take 1 horror.';
export const DECK_FETCH_ERROR_MESSAGE =
  'Something went wrong attempting to retrieve your deck from ArkhamDB. Take 1 horror.';
export const NO_MATCH_MESSAGE = 'Your search returned no results. Take 1 horror.';

export class FetchError extends BadGatewayException {
  constructor(
    readonly context: string,
    cause?: unknown,
  ) {
    super(FETCH_ERROR_MESSAGE, { cause, description: `ArkhamDB request failed while ${context}` });
  }
}

export class NoMatchError extends NotFoundException {
  constructor(readonly tokens: string[]) {
    super(NO_MATCH_MESSAGE);
  }
}

export class TooManyMatchesError extends UnprocessableEntityException {
  constructor(
    readonly matchCount: number,
    readonly limit: number,
  ) {
    super(
      `Your search returned more than ${limit} cards, and that's my hand limit. Take 1 horror.`,
    );
  }
}
