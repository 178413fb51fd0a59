export interface AppConfiguration {
  port: number;
  arkhamdb: {
    baseUrl: string;
    timeout: number;
    userAgent: string;
  };
  catalog: {
    loadOnStartup: boolean;
  };
  lookup: {
    cardMatchLimit: number;
    fuzzyThreshold: number;
  };
}

export const DEFAULT_CARD_MATCH_LIMIT = 8;
export const DEFAULT_FUZZY_THRESHOLD = 80;

export default (): AppConfiguration => ({
  port: parseInt(process.env.PORT ?? '3000', 10),
  arkhamdb: {
    baseUrl: process.env.ARKHAMDB_BASE_URL ?? 'https://arkhamdb.com',
    timeout: parseInt(process.env.ARKHAMDB_TIMEOUT ?? '30000', 10),
    userAgent: process.env.ARKHAMDB_USER_AGENT ?? 'ArkhamdbLookup/1.0',
  },
  catalog: {
    loadOnStartup: (process.env.CATALOG_LOAD_ON_STARTUP ?? 'true') !== 'false',
  },
  lookup: {
    cardMatchLimit: parseInt(process.env.CARD_MATCH_LIMIT ?? String(DEFAULT_CARD_MATCH_LIMIT), 10),
    fuzzyThreshold: Number(process.env.FUZZY_MATCH_THRESHOLD ?? DEFAULT_FUZZY_THRESHOLD),
  },
});
