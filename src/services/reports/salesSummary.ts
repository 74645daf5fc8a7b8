import { fromCents, toCents } from '../../utils/currency';
import { ValidationError } from '../../utils/errors';
import { normalizeDate, SaleRecord } from '../sales/types';

export const PERIODS = ['day', 'week', 'month'] as const;
export type Period = (typeof PERIODS)[number];

export type BucketTotals = { quantity: number; revenue: number };

/** Bucket key -> totals, iterating in bucket start-date order. */
export type SalesSummary = Map<string, BucketTotals>;

export type SummaryRow = { bucket: string; quantity: number; revenue: number };

const DAY_MS = 24 * 60 * 60 * 1000;

export function isPeriod(value: string): value is Period {
  return PERIODS.some((p) => p === value);
}

function toUtc(date: string): Date {
  const d = normalizeDate(date);
  if (!d) throw new ValidationError(`invalid date "${date}" (expected YYYY-MM-DD)`);
  const [y, m, day] = d.split('-').map(Number);
  return new Date(Date.UTC(y, m - 1, day));
}

function iso(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/** Monday of the ISO week containing `d`. */
function weekStart(d: Date): Date {
  const offset = (d.getUTCDay() + 6) % 7;
  return new Date(d.getTime() - offset * DAY_MS);
}

/** First calendar day of the bucket `date` falls in. */
export function bucketStart(period: Period, date: string): string {
  const d = toUtc(date);
  switch (period) {
    case 'day': return iso(d);
    case 'week': return iso(weekStart(d));
    case 'month': return iso(d).slice(0, 8) + '01';
  }
}

/**
 * Bucket key for `date`: `2024-01-05` by day, `2024-01` by month and
 * `2024-W01` by ISO week (the week-numbering year can differ from the
 * calendar year around New Year).
 */
export function bucketOf(period: Period, date: string): string {
  const d = toUtc(date);
  switch (period) {
    case 'day': return iso(d);
    case 'month': return iso(d).slice(0, 7);
    case 'week': {
      const thursday = new Date(weekStart(d).getTime() + 3 * DAY_MS);
      const year = thursday.getUTCFullYear();
      const dayOfYear = (thursday.getTime() - Date.UTC(year, 0, 1)) / DAY_MS;
      const week = Math.floor(dayOfYear / 7) + 1;
      return `${year}-W${String(week).padStart(2, '0')}`;
    }
  }
}

/**
 * Groups sales into calendar buckets and totals quantity and revenue
 * per bucket. Each line total (quantity x unit price) is rounded to cents
 * once, then summed.
 */
export function summarize(
  period: Period,
  records: ReadonlyArray<Pick<SaleRecord, 'date' | 'quantity' | 'unitPrice'>>,
): SalesSummary {
  const acc = new Map<string, { start: string; quantity: number; cents: number }>();
  for (const r of records) {
    const key = bucketOf(period, r.date);
    let cur = acc.get(key);
    if (!cur) {
      cur = { start: bucketStart(period, r.date), quantity: 0, cents: 0 };
      acc.set(key, cur);
    }
    cur.quantity += r.quantity;
    cur.cents += Math.round(r.quantity * r.unitPrice * 100);
  }

  const ordered = [...acc.entries()].sort(([ka, a], [kb, b]) =>
    a.start === b.start ? ka.localeCompare(kb) : a.start.localeCompare(b.start));

  const summary: SalesSummary = new Map();
  for (const [key, { quantity, cents }] of ordered) {
    summary.set(key, { quantity, revenue: fromCents(cents) });
  }
  return summary;
}

export function totals(summary: ReadonlyMap<string, BucketTotals>): BucketTotals {
  let quantity = 0;
  let cents = 0;
  for (const t of summary.values()) {
    quantity += t.quantity;
    cents += toCents(t.revenue);
  }
  return { quantity, revenue: fromCents(cents) };
}

export function summaryRows(summary: SalesSummary): SummaryRow[] {
  return [...summary.entries()].map(([bucket, t]) => ({ bucket, ...t }));
}

export type ProductTotals = { count: number; quantity: number; revenue: number };

/** Product -> totals, most sales first. */
export type ProductSummary = Map<string, ProductTotals>;

export type ProductRow = { product: string } & ProductTotals;

/**
 * Per-product totals: number of sales, units sold and revenue. Ordered by
 * sale count, highest first; ties by product name.
 */
export function summarizeByProduct(
  records: ReadonlyArray<Pick<SaleRecord, 'product' | 'quantity' | 'unitPrice'>>,
): ProductSummary {
  const acc = new Map<string, { count: number; quantity: number; cents: number }>();
  for (const r of records) {
    let cur = acc.get(r.product);
    if (!cur) {
      cur = { count: 0, quantity: 0, cents: 0 };
      acc.set(r.product, cur);
    }
    cur.count += 1;
    cur.quantity += r.quantity;
    cur.cents += Math.round(r.quantity * r.unitPrice * 100);
  }

  const ordered = [...acc.entries()].sort(([pa, a], [pb, b]) =>
    a.count === b.count ? pa.localeCompare(pb) : b.count - a.count);

  const summary: ProductSummary = new Map();
  for (const [product, { count, quantity, cents }] of ordered) {
    summary.set(product, { count, quantity, revenue: fromCents(cents) });
  }
  return summary;
}

export function productRows(summary: ProductSummary): ProductRow[] {
  return [...summary.entries()].map(([product, t]) => ({ product, ...t }));
}
