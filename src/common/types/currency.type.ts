export type CurrencyKind = 'fiat' | 'crypto' | 'commodity';

/** Seeded once at startup and frozen. */
export interface Currency {
  readonly code: string;
  readonly name: string;
  readonly symbol: string;
  readonly kind: CurrencyKind;
  /** Display rounding granularity used at the conversion boundary. */
  readonly decimalPlaces: number;
  readonly active: boolean;
  readonly country?: string;
}
