import * as Joi from 'joi';

export const validationSchema = Joi.object({
  PORT: Joi.number().default(3000),
  ARKHAMDB_BASE_URL: Joi.string().uri().default('https://arkhamdb.com'),
  ARKHAMDB_TIMEOUT: Joi.number().min(1000).default(30000),
  ARKHAMDB_USER_AGENT: Joi.string().default('ArkhamdbLookup/1.0'),
  CATALOG_LOAD_ON_STARTUP: Joi.boolean().default(true),
  CARD_MATCH_LIMIT: Joi.number().integer().min(1).default(8),
  FUZZY_MATCH_THRESHOLD: Joi.number().min(0).max(100).default(80),
});
