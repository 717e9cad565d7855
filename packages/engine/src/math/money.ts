import Decimal from 'decimal.js';

// 28 significant digits, ties away from zero.
export const Dec = Decimal.clone({ precision: 28, rounding: Decimal.ROUND_HALF_UP });

interface CurrencyConfig {
  symbol: string;
  position: 'prefix' | 'suffix';
}

const CURRENCY_CONFIG: Record<string, CurrencyConfig> = {
  USD: { symbol: '$', position: 'prefix' },
  EUR: { symbol: '€', position: 'suffix' },
  GBP: { symbol: '£', position: 'prefix' },
  JPY: { symbol: '¥', position: 'prefix' },
  CHF: { symbol: 'CHF', position: 'suffix' },
  KZT: { symbol: '₸', position: 'suffix' },
};

export function formatMoney(amountCents: number, currency = 'USD'): string {
  const isNegative = amountCents < 0;
  const [whole, fraction] = new Dec(amountCents).abs().dividedBy(100).toFixed(2).split('.');
  const absStr = `${whole.replace(/\B(?=(\d{3})+(?!\d))/g, ' ')}.${fraction}`;

  const config = CURRENCY_CONFIG[currency];

  if (config) {
    if (config.position === 'prefix') {
      return `${isNegative ? '-' : ''}${config.symbol}${absStr}`;
    }
    return `${isNegative ? '-' : ''}${absStr} ${config.symbol}`;
  }

  // Unknown currency: fallback to suffix with ISO code
  return `${isNegative ? '-' : ''}${absStr} ${currency}`;
}

/** Rounds a cent-denominated value to whole cents, half-up. */
export function roundCents(value: Decimal.Value): number {
  return new Dec(value).toDecimalPlaces(0, Decimal.ROUND_HALF_UP).toNumber();
}

/** Converts a currency amount such as "10000.00" to integer cents. */
export function toCents(amount: Decimal.Value): number {
  return roundCents(new Dec(amount).times(100));
}

export function centsToDecimal(amountCents: number): string {
  return new Dec(amountCents).dividedBy(100).toFixed(2);
}

export function addCents(...amounts: number[]): number {
  return sumCents(amounts);
}

export function subtractCents(a: number, b: number): number {
  return new Dec(a).minus(b).toNumber();
}

export function multiplyCents(amount: number, factor: Decimal.Value): number {
  return roundCents(new Dec(amount).times(factor));
}

export function sumCents(amounts: number[]): number {
  return amounts.reduce((acc, val) => new Dec(acc).plus(val).toNumber(), 0);
}
