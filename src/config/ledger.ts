import path from 'path';
import { z } from 'zod';
import { isDebugFlag } from '../utils/debug';
import { ValidationError } from '../utils/errors';

export const COLUMN_KEYS = ['id', 'date', 'product', 'quantity', 'unitPrice', 'payment', 'stock'] as const;
export type ColumnKey = (typeof COLUMN_KEYS)[number];
export type ColumnMap = Record<ColumnKey, string>;

/** Header names written to new files and looked for first when reading. */
export const DEFAULT_COLUMNS: ColumnMap = {
  id: 'id',
  date: 'date',
  product: 'product',
  quantity: 'quantity',
  unitPrice: 'unit_price',
  payment: 'payment',
  stock: 'stock',
};

export type LedgerConfig = {
  dataDir: string;
  salesFile: string;
  inventoryFile: string;
  columns: ColumnMap;
  lowStockThreshold: number;
  currency: string;
  locale: string;
  debug: boolean;
};

const EnvSchema = z.object({
  CAFE_DATA_DIR: z.string().default('./data'),
  CAFE_SALES_FILE: z.string().optional(),
  CAFE_INVENTORY_FILE: z.string().optional(),
  CAFE_COLUMNS: z.string().optional(),
  CAFE_LOW_STOCK: z.coerce
    .number({ invalid_type_error: 'CAFE_LOW_STOCK must be a number' })
    .int('CAFE_LOW_STOCK must be a whole number')
    .min(0, 'CAFE_LOW_STOCK must not be negative')
    .default(5),
  CAFE_CURRENCY: z
    .string()
    .regex(/^[A-Za-z]{3}$/, 'CAFE_CURRENCY must be a three-letter currency code')
    .transform((s) => s.toUpperCase())
    .default('USD'),
  CAFE_LOCALE: z.string().default('en-US'),
  CAFE_DEBUG: z.string().optional(),
});

function isColumnKey(key: string): key is ColumnKey {
  return COLUMN_KEYS.some((k) => k === key);
}

/**
 * Parses `CAFE_COLUMNS`, e.g. `product=coffee_name,unitPrice=money`.
 * Keys not mentioned keep their default header.
 */
export function parseColumnOverrides(raw: string | undefined): ColumnMap {
  const columns: ColumnMap = { ...DEFAULT_COLUMNS };
  if (!raw) return columns;

  for (const pair of raw.split(',')) {
    if (!pair.trim()) continue;
    const eq = pair.indexOf('=');
    const key = eq > 0 ? pair.slice(0, eq).trim() : '';
    const header = eq > 0 ? pair.slice(eq + 1).trim() : '';
    if (!key || !header) {
      throw new ValidationError(`Malformed CAFE_COLUMNS entry "${pair.trim()}"`, {
        hint: 'Use key=Header pairs separated by commas, e.g. product=coffee_name,unitPrice=money',
      });
    }
    if (!isColumnKey(key)) {
      throw new ValidationError(`Unknown column key "${key}" in CAFE_COLUMNS`, {
        hint: `Known keys: ${COLUMN_KEYS.join(', ')}`,
      });
    }
    columns[key] = header;
  }
  return columns;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): LedgerConfig {
  // unset and blank variables both fall back to the default
  const present: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key]?.trim();
    if (value) present[key] = value;
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((i) => i.message).join('; '), {
      hint: 'Fix or unset the variable and run again.',
    });
  }

  const vars = parsed.data;
  const dataDir = path.resolve(cwd, vars.CAFE_DATA_DIR);
  return {
    dataDir,
    salesFile: vars.CAFE_SALES_FILE ? path.resolve(cwd, vars.CAFE_SALES_FILE) : path.join(dataDir, 'sales.csv'),
    inventoryFile: vars.CAFE_INVENTORY_FILE
      ? path.resolve(cwd, vars.CAFE_INVENTORY_FILE)
      : path.join(dataDir, 'inventory.csv'),
    columns: parseColumnOverrides(vars.CAFE_COLUMNS),
    lowStockThreshold: vars.CAFE_LOW_STOCK,
    currency: vars.CAFE_CURRENCY,
    locale: vars.CAFE_LOCALE,
    debug: isDebugFlag(vars.CAFE_DEBUG),
  };
}
