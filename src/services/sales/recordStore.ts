import { v4 as uuidv4 } from 'uuid';
import { ColumnKey, ColumnMap, DEFAULT_COLUMNS } from '../../config/ledger';
import { appendText, fileExists, readText, writeText } from '../../lib/files';
import { dbg, warn } from '../../utils/debug';
import { AppError, ValidationError, NotFoundError } from '../../utils/errors';
import { cellAt, CsvRow, findHeader, formatCsv, formatCsvRow, parseCsv } from '../imports/csv';
import { DEFAULT_LOW_STOCK, InventoryTracker } from '../stock/inventoryTracker';
import {
  describeIssues,
  InventoryItem,
  InventoryRowSchema,
  normalizeDate,
  SaleFilter,
  SaleInput,
  SaleInputSchema,
  SaleRecord,
  SaleRowSchema,
  todayIso,
} from './types';

export type RecordStoreOptions = {
  salesFile: string;
  inventoryFile: string;
  columns?: ColumnMap;
  lowStockThreshold?: number;
  today?: () => string;
};

// header spellings seen in older exports
const ALIASES: Record<ColumnKey, readonly string[]> = {
  id: ['sale_id', 'transaction_id'],
  date: ['datetime', 'sale_date', 'day'],
  product: ['coffee_name', 'item', 'name'],
  quantity: ['qty', 'qty_sold', 'units'],
  unitPrice: ['price', 'money', 'unit_cost'],
  payment: ['cash_type', 'payment_type', 'method'],
  stock: ['stock_count', 'on_hand', 'qty', 'quantity'],
};

const SALE_KEYS = ['id', 'date', 'product', 'quantity', 'unitPrice', 'payment'] as const;
type SaleKey = (typeof SALE_KEYS)[number];
type SaleLayout = Record<SaleKey, number>;

const NO_LAYOUT: SaleLayout = { id: -1, date: -1, product: -1, quantity: -1, unitPrice: -1, payment: -1 };

/**
 * Sales and inventory, held in memory and backed by two CSV files.
 * `load` reads both wholesale; `append` adds one line to the sales file and
 * rewrites the inventory file; `save` rewrites both.
 */
export class RecordStore {
  private sales: SaleRecord[] = [];
  private tracker: InventoryTracker;
  private loaded = false;

  // shape of the sales file on disk, so appended lines line up with it
  private salesHeaders: string[] = [];
  private salesLayout: SaleLayout = NO_LAYOUT;
  private salesNeedsNewline = false;
  private salesDirty = false;

  private readonly columns: ColumnMap;
  private readonly lowStockThreshold: number;
  private readonly today: () => string;

  constructor(private readonly opts: RecordStoreOptions) {
    this.columns = opts.columns ?? DEFAULT_COLUMNS;
    this.lowStockThreshold = opts.lowStockThreshold ?? DEFAULT_LOW_STOCK;
    this.today = opts.today ?? (() => todayIso());
    this.tracker = new InventoryTracker([], this.lowStockThreshold);
  }

  get salesFile(): string { return this.opts.salesFile; }
  get inventoryFile(): string { return this.opts.inventoryFile; }

  /** Live inventory; changes made through it are persisted by `saveInventory` or `save`. */
  get inventory(): InventoryTracker {
    this.ensureLoaded();
    return this.tracker;
  }

  /** Writes empty sales and inventory files (header rows only). */
  init(opts: { force?: boolean } = {}): void {
    for (const file of [this.salesFile, this.inventoryFile]) {
      if (!opts.force && fileExists(file)) {
        throw new ValidationError(`${file} already exists`, { hint: 'Pass --force to overwrite it.' });
      }
    }
    this.sales = [];
    this.tracker = new InventoryTracker([], this.lowStockThreshold);
    this.salesHeaders = this.saleHeaders();
    this.salesLayout = layoutFor(this.salesHeaders, this.columns);
    this.salesNeedsNewline = false;
    this.salesDirty = false;
    this.loaded = true;
    this.save();
  }

  load(): SaleRecord[] {
    this.tracker = new InventoryTracker(this.readInventory(), this.lowStockThreshold);
    this.sales = this.readSales();
    this.loaded = true;

    const unknown = [...new Set(this.sales.filter((s) => !this.tracker.has(s.product)).map((s) => s.product))];
    if (unknown.length) {
      warn('store', `sales reference products missing from inventory: ${unknown.join(', ')}`);
    }
    dbg('store', `loaded ${this.sales.length} sale(s), ${this.tracker.items().length} product(s)`);
    return this.sales.map((s) => ({ ...s }));
  }

  append(input: SaleInput): SaleRecord {
    const [record] = this.appendMany([input]);
    return record;
  }

  /**
   * Records every sale or none: each one is checked against the stock left
   * by the ones before it, and the first failure rejects the batch.
   * A failing error carries `batchIndex` in its context.
   */
  appendMany(inputs: SaleInput[]): SaleRecord[] {
    this.ensureLoaded();
    const trial = this.tracker.clone();
    const ids = new Set(this.sales.map((s) => s.id));
    const accepted: SaleRecord[] = [];

    inputs.forEach((input, batchIndex) => {
      try {
        const record = this.prepare(input, trial, ids);
        trial.adjustStock(record.product, -record.quantity);
        ids.add(record.id);
        accepted.push(record);
      } catch (e) {
        if (e instanceof AppError) e.context = { ...e.context, batchIndex };
        throw e;
      }
    });

    const before = this.tracker;
    const count = this.sales.length;
    this.tracker = trial;
    this.sales.push(...accepted);
    try {
      this.persistAppended(accepted);
    } catch (e) {
      this.tracker = before;
      this.sales.length = count;
      throw e;
    }
    dbg('store', `appended ${accepted.length} sale(s)`);
    return accepted.map((r) => ({ ...r }));
  }

  /** Reads a CSV in the sales format and appends its rows as one batch. */
  importFile(file: string): SaleRecord[] {
    const { headers, rows } = parseCsv(readText(file), file);
    const layout = layoutFor(headers, this.columns);
    requireColumns(file, this.columns, layout, ['date', 'product', 'quantity']);

    const inputs = rows.map((row) => rawSale(row, layout));
    try {
      return this.appendMany(inputs);
    } catch (e) {
      const index = e instanceof AppError ? e.context?.batchIndex : undefined;
      if (typeof index !== 'number') throw e;
      const message = e instanceof Error ? e.message : String(e);
      throw new ValidationError(`${file} line ${rows[index].line}: ${message}`, {
        hint: 'Nothing was imported. Fix the row and run the import again.',
        cause: e,
      });
    }
  }

  save(): void {
    this.ensureLoaded();
    this.writeSales();
    this.saveInventory();
  }

  saveInventory(): void {
    this.ensureLoaded();
    const c = this.columns;
    const rows = this.tracker.items().map((i) => [i.product, i.stock, i.unitPrice]);
    writeText(this.inventoryFile, formatCsv([c.product, c.stock, c.unitPrice], rows));
  }

  records(filter: SaleFilter = {}): SaleRecord[] {
    this.ensureLoaded();
    const date = filter.date ? checkedDate(filter.date, 'date') : null;
    const from = filter.from ? checkedDate(filter.from, 'from') : null;
    const to = filter.to ? checkedDate(filter.to, 'to') : null;
    const product = filter.product?.trim().toLowerCase();

    return this.sales
      .filter((s) =>
        (!product || s.product.toLowerCase() === product) &&
        (!date || s.date === date) &&
        (!from || s.date >= from) &&
        (!to || s.date <= to) &&
        (!filter.payment || s.payment === filter.payment))
      .map((s) => ({ ...s }));
  }

  find(id: string): SaleRecord {
    this.ensureLoaded();
    const hit = this.sales.find((s) => s.id === id.trim());
    if (!hit) throw new NotFoundError(`Sale ${id.trim()} not found`);
    return { ...hit };
  }

  private ensureLoaded() {
    if (!this.loaded) this.load();
  }

  private prepare(input: SaleInput, stock: InventoryTracker, ids: Set<string>): SaleRecord {
    const parsed = SaleInputSchema.safeParse(input);
    if (!parsed.success) throw new ValidationError(describeIssues(parsed.error));
    const sale = parsed.data;

    if (sale.quantity < 1) {
      throw new ValidationError('quantity must be greater than zero');
    }
    const item = stock.get(sale.product);
    const unitPrice = sale.unitPrice ?? item.unitPrice;
    if (unitPrice == null) {
      throw new ValidationError(`No price given for ${item.product} and it has no menu price`, {
        hint: 'Pass --price, or set a menu price with add-product --price.',
      });
    }
    if (sale.id && ids.has(sale.id)) {
      throw new ValidationError(`Sale id ${sale.id} is already taken`);
    }

    return {
      id: sale.id || uuidv4(),
      date: sale.date ?? this.today(),
      product: item.product,
      quantity: sale.quantity,
      unitPrice,
      payment: sale.payment,
    };
  }

  private persistAppended(records: SaleRecord[]) {
    if (this.salesDirty || this.salesLayout.id < 0 || this.salesLayout.payment < 0) {
      this.writeSales();
    } else if (records.length) {
      const lines = records.map((r) => formatCsvRow(this.cellsFor(r, this.salesHeaders.length, this.salesLayout)));
      appendText(this.salesFile, (this.salesNeedsNewline ? '\n' : '') + lines.join('\n') + '\n');
      this.salesNeedsNewline = false;
    }
    this.saveInventory();
  }

  private writeSales() {
    const headers = this.saleHeaders();
    const layout = layoutFor(headers, this.columns);
    const rows = this.sales.map((r) => this.cellsFor(r, headers.length, layout));
    writeText(this.salesFile, formatCsv(headers, rows));
    this.salesHeaders = headers;
    this.salesLayout = layout;
    this.salesNeedsNewline = false;
    this.salesDirty = false;
  }

  private saleHeaders(): string[] {
    return SALE_KEYS.map((k) => this.columns[k]);
  }

  private cellsFor(r: SaleRecord, width: number, layout: SaleLayout): string[] {
    const cells: string[] = new Array<string>(width).fill('');
    const put = (key: SaleKey, value: string | number) => {
      if (layout[key] >= 0) cells[layout[key]] = String(value);
    };
    put('id', r.id);
    put('date', r.date);
    put('product', r.product);
    put('quantity', r.quantity);
    put('unitPrice', r.unitPrice);
    put('payment', r.payment);
    return cells;
  }

  private readInventory(): InventoryItem[] {
    const file = this.inventoryFile;
    const text = readText(file);
    if (!text.trim()) return [];

    const { headers, rows } = parseCsv(text, file);
    const c = this.columns;
    const idx = {
      product: findHeader(headers, c.product, ALIASES.product),
      stock: findHeader(headers, c.stock, ALIASES.stock),
      unitPrice: findHeader(headers, c.unitPrice, ALIASES.unitPrice),
    };
    if (idx.product < 0 || idx.stock < 0) {
      throw new ValidationError(`${file}: missing required column(s) ${[
        idx.product < 0 ? c.product : null,
        idx.stock < 0 ? c.stock : null,
      ].filter(Boolean).join(', ')}`);
    }

    const seen = new Set<string>();
    return rows.map((row) => {
      const parsed = InventoryRowSchema.safeParse({
        product: cellAt(row, idx.product),
        stock: cellAt(row, idx.stock),
        unitPrice: idx.unitPrice >= 0 ? cellAt(row, idx.unitPrice) : undefined,
      });
      if (!parsed.success) {
        throw new ValidationError(`${file} line ${row.line}: ${describeIssues(parsed.error)}`);
      }
      const key = parsed.data.product.toLowerCase();
      if (seen.has(key)) {
        throw new ValidationError(`${file} line ${row.line}: duplicate product ${parsed.data.product}`);
      }
      seen.add(key);
      return parsed.data;
    });
  }

  private readSales(): SaleRecord[] {
    const file = this.salesFile;
    const text = readText(file);
    if (!text.trim()) {
      this.salesHeaders = [];
      this.salesLayout = NO_LAYOUT;
      this.salesNeedsNewline = false;
      this.salesDirty = true;
      return [];
    }

    const { headers, rows } = parseCsv(text, file);
    const layout = layoutFor(headers, this.columns);
    requireColumns(file, this.columns, layout, ['date', 'product', 'quantity', 'unitPrice']);

    this.salesHeaders = headers;
    this.salesLayout = layout;
    this.salesNeedsNewline = !text.endsWith('\n') && !text.endsWith('\r');
    this.salesDirty = false;

    const ids = new Set<string>();
    return rows.map((row) => {
      const parsed = SaleRowSchema.safeParse(rawSale(row, layout));
      if (!parsed.success) {
        throw new ValidationError(`${file} line ${row.line}: ${describeIssues(parsed.error)}`);
      }
      const sale = parsed.data;
      let id = sale.id;
      if (!id) {
        // rows from files without an id column get one; it is written on the next save
        id = uuidv4();
        this.salesDirty = true;
      } else if (ids.has(id)) {
        throw new ValidationError(`${file} line ${row.line}: duplicate sale id ${id}`);
      }
      ids.add(id);
      return { ...sale, id };
    });
  }
}

function layoutFor(headers: string[], columns: ColumnMap): SaleLayout {
  return {
    id: findHeader(headers, columns.id, ALIASES.id),
    date: findHeader(headers, columns.date, ALIASES.date),
    product: findHeader(headers, columns.product, ALIASES.product),
    quantity: findHeader(headers, columns.quantity, ALIASES.quantity),
    unitPrice: findHeader(headers, columns.unitPrice, ALIASES.unitPrice),
    payment: findHeader(headers, columns.payment, ALIASES.payment),
  };
}

function requireColumns(file: string, columns: ColumnMap, layout: SaleLayout, required: SaleKey[]) {
  const missing = required.filter((k) => layout[k] < 0).map((k) => columns[k]);
  if (missing.length) {
    throw new ValidationError(`${file}: missing required column(s) ${missing.join(', ')}`, {
      hint: 'Rename the header, or map it with CAFE_COLUMNS (e.g. product=coffee_name).',
    });
  }
}

function rawSale(row: CsvRow, layout: SaleLayout): SaleInput {
  const get = (key: SaleKey) => (layout[key] >= 0 ? cellAt(row, layout[key]) : undefined);
  return {
    id: get('id'),
    date: get('date'),
    product: get('product') ?? '',
    quantity: get('quantity') ?? '',
    unitPrice: get('unitPrice'),
    payment: get('payment'),
  };
}

function checkedDate(raw: string, label: string): string {
  const d = normalizeDate(raw);
  if (!d) throw new ValidationError(`invalid ${label} date "${raw}" (expected YYYY-MM-DD)`);
  return d;
}
