import { z } from 'zod';

export const PAYMENT_TYPES = ['cash', 'card'] as const;
export type PaymentType = (typeof PAYMENT_TYPES)[number];

export type SaleRecord = {
  id: string;
  date: string;        // YYYY-MM-DD
  product: string;
  quantity: number;
  unitPrice: number;
  payment: PaymentType;
};

/** What a caller hands to the store; strings are accepted straight from argv or CSV cells. */
export type SaleInput = {
  id?: string;
  date?: string;
  product: string;
  quantity: number | string;
  unitPrice?: number | string | null;
  payment?: string;
};

export type InventoryItem = {
  product: string;
  stock: number;
  unitPrice: number | null;  // menu price, used when a sale names none
};

export type SaleFilter = {
  product?: string;
  date?: string;
  from?: string;
  to?: string;
  payment?: PaymentType;
};

// optional time part: HH:MM[:SS[.fff]] with an optional Z or +HH:MM offset
const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

const DECIMAL_RE = /^-?\d+(\.\d+)?$/;

/** Plain decimal text (`3`, `-2`, `3.50`) as a number; NaN for hex, exponents and the like. */
export function parseDecimal(raw: string): number {
  const s = raw.trim();
  return DECIMAL_RE.test(s) ? Number(s) : NaN;
}

/**
 * `2024-01-05`, `2024-01-05T09:30:00Z` and `2024-01-05 09:30` all give `2024-01-05`.
 * Null for anything that is not a real calendar date.
 */
export function normalizeDate(raw: string): string | null {
  const m = DATE_RE.exec(raw.trim());
  if (!m) return null;
  const [, y, mo, d] = m;
  const dt = new Date(Date.UTC(Number(y), Number(mo) - 1, Number(d)));
  if (
    dt.getUTCFullYear() !== Number(y) ||
    dt.getUTCMonth() !== Number(mo) - 1 ||
    dt.getUTCDate() !== Number(d)
  ) {
    return null;
  }
  return `${y}-${mo}-${d}`;
}

/** Local calendar date of `now`. */
export function todayIso(now: Date = new Date()): string {
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, '0');
  const d = String(now.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);
const toNumber = (v: unknown) => {
  const b = blankToUndefined(v);
  return typeof b === 'string' ? parseDecimal(b) : b;
};

export const CalendarDate = z
  .string({ required_error: 'date is required' })
  .transform((s, ctx) => {
    const d = normalizeDate(s);
    if (!d) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid date "${s}" (expected YYYY-MM-DD)` });
      return z.NEVER;
    }
    return d;
  });

const Count = (label: string) =>
  z
    .number({ required_error: `${label} is required`, invalid_type_error: `${label} must be a number` })
    .int(`${label} must be a whole number`)
    .min(0, `${label} must not be negative`);

const Money = z
  .number({ required_error: 'unit price is required', invalid_type_error: 'unit price must be a number' })
  .finite('unit price must be a number')
  .min(0, 'unit price must not be negative');

const ProductName = z.string({ required_error: 'product is required' }).trim().min(1, 'product is required');

const Payment = z.preprocess(
  (v) => {
    const b = blankToUndefined(v);
    return typeof b === 'string' ? b.trim().toLowerCase() : b;
  },
  z.enum(PAYMENT_TYPES, { errorMap: () => ({ message: 'payment must be cash or card' }) }).default('cash'),
);

const OptionalId = z.preprocess(blankToUndefined, z.string().trim().optional());

/** One row of the sales file. */
export const SaleRowSchema = z.object({
  id: OptionalId,
  date: CalendarDate,
  product: ProductName,
  quantity: z.preprocess(toNumber, Count('quantity')),
  unitPrice: z.preprocess(toNumber, Money),
  payment: Payment,
});

/** A sale being recorded: date defaults to today, price to the menu price. */
export const SaleInputSchema = SaleRowSchema.extend({
  date: z.preprocess(blankToUndefined, CalendarDate.optional()),
  unitPrice: z.preprocess(toNumber, Money.nullish()),
});

/** One row of the inventory file. */
export const InventoryRowSchema = z.object({
  product: ProductName,
  stock: z.preprocess(toNumber, Count('stock')),
  unitPrice: z.preprocess(toNumber, Money.nullish()).transform((v) => v ?? null),
});

export function describeIssues(err: z.ZodError): string {
  return err.issues.map((i) => i.message).join('; ');
}
