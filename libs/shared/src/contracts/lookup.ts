export interface Section {
  title: string;
  body: string;
  url?: string;
  paginated: boolean;
  part?: number;
  totalParts?: number;
}

export interface CardSummaryField {
  name: string;
  value: string;
}

export interface CardSummary {
  code: string;
  title: string;
  url: string;
  description: string;
  imageUrl: string | null;
  fields: CardSummaryField[];
}

export interface LookupRequest {
  content: string;
}

export interface LookupResponse {
  requestId: string;
  handled: boolean;
  cards: CardSummary[];
  deck: Section[];
  deckError?: string;
  big: boolean;
  threadName?: string;
}

export interface SearchCardsRequest {
  queries: string[];
}

export interface CatalogStatus {
  loaded: boolean;
  cards: number;
  loadedAt: string | null;
}
