/**
 * @picks/core
 *
 * Configuration, API-SPORTS integration, odds normalization, the Picks Engine
 * and the data services behind the picks API.
 */

export { loadConfig, getConfig, resetConfig } from "./config";
export type { AppConfig, ApiSportsConfig } from "./config";

export * from "./services";

export {
  addDays,
  daysInRange,
  eachDay,
  formatIsoDate,
  parseIsoDate,
  todayUtc,
} from "./utils/dates";
export {
  betTypesSchema,
  booleanQuerySchema,
  dateRangeSchema,
  isoDateSchema,
  leagueSchema,
  positiveIntSchema,
  seasonSchema,
} from "./utils/validation";
