/**
 * Odds conversion, market classification and normalization
 */

export { OddsConverter, oddsConverter } from "./converter";
export {
  BET_MAP,
  classifyBet,
  classifyMarket,
  inferPeriod,
  isExcludedMarket,
  isThreeWayMarket,
  resolveBetId,
  type BetMap,
  type MarketClassification,
} from "./markets";
export {
  emptyOdds,
  listBookmakers,
  listMarkets,
  normalizeOdds,
  parseOddValue,
  pickBookmaker,
  type NormalizeOptions,
  type ParsedOddValue,
} from "./normalize";
