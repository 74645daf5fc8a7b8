export function formatMoney(value: number, currency = 'USD', locale = 'en-US'): string {
  try {
    return new Intl.NumberFormat(locale, {
      style: 'currency',
      currency,
      maximumFractionDigits: 2,
    }).format(value || 0);
  } catch {
    // unknown currency code or locale
    const n = Math.round((Number(value) || 0) * 100) / 100;
    return `${currency} ${n.toFixed(2)}`;
  }
}

/** Dollars to whole cents. */
export function toCents(value: number): number {
  return Math.round(value * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}
