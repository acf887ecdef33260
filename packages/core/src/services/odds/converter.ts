/**
 * Odds conversion
 * American, decimal and probability forms of a price
 */

export class OddsConverter {
  /**
   * Convert American odds to decimal
   */
  americanToDecimal(american: number): number {
    if (american > 0) {
      return american / 100 + 1;
    }
    return 100 / Math.abs(american) + 1;
  }

  /**
   * Convert decimal odds to American
   */
  decimalToAmerican(decimal: number): number {
    if (decimal >= 2) {
      return Math.round((decimal - 1) * 100);
    }
    return Math.round(-100 / (decimal - 1));
  }

  /**
   * Implied probability from American odds
   */
  impliedProbability(american: number): number {
    if (american > 0) {
      return 100 / (american + 100);
    }
    return Math.abs(american) / (Math.abs(american) + 100);
  }

  decimalImpliedProbability(decimal: number): number {
    return decimal > 0 ? 1 / decimal : 0;
  }

  /**
   * American odds from a probability; 0 outside (0, 1)
   */
  probabilityToAmerican(probability: number): number {
    if (!(probability > 0 && probability < 1)) {
      return 0;
    }
    if (probability >= 0.5) {
      return Math.round((-100 * probability) / (1 - probability));
    }
    return Math.round((100 * (1 - probability)) / probability);
  }

  /**
   * Decimal odds from a probability; null outside (0, 1]
   */
  probabilityToDecimal(probability: number): number | null {
    if (!(probability > 0 && probability <= 1)) {
      return null;
    }
    return 1 / probability;
  }

  /**
   * Parse a bookmaker price into decimal odds.
   * Values with |x| >= 100 are American ("+150", "-110"); values above 1 are decimal.
   */
  parsePrice(raw: string | number | null | undefined): number | null {
    if (raw === null || raw === undefined) return null;
    const text = String(raw).trim();
    if (text === "") return null;
    const value = Number(text);
    if (!Number.isFinite(value)) return null;
    if (Math.abs(value) >= 100) {
      return this.americanToDecimal(value);
    }
    return value > 1 ? value : null;
  }

  /**
   * Remove the bookmaker margin by normalizing implied probabilities to sum to 1.
   * Non-positive inputs are kept as 0.
   */
  removeVig(probabilities: number[]): number[] {
    const clean = probabilities.map((p) => (Number.isFinite(p) && p > 0 ? p : 0));
    const overround = clean.reduce((sum, p) => sum + p, 0);
    if (overround <= 0) {
      return clean;
    }
    return clean.map((p) => p / overround);
  }

  formatAmerican(american: number): string {
    return american > 0 ? `+${american}` : String(american);
  }
}

export const oddsConverter = new OddsConverter();
