import path from 'path';
import { parseArgs } from 'util';
import { loadConfig } from '../config/ledger';
import { writeText } from '../lib/files';
import { formatCsv } from '../services/imports/csv';
import {
  isPeriod,
  PERIODS,
  productRows,
  summarize,
  summarizeByProduct,
  summaryRows,
  totals,
} from '../services/reports/salesSummary';
import { RecordStore } from '../services/sales/recordStore';
import { parseDecimal, PAYMENT_TYPES, PaymentType, SaleRecord } from '../services/sales/types';
import { formatMoney } from '../utils/currency';
import { dbg, setDebug } from '../utils/debug';
import { AppError, friendly, logError, ValidationError } from '../utils/errors';
import { formatTable } from '../utils/format';

export type CliIO = {
  out: (line: string) => void;
  err: (line: string) => void;
};

export type CliDeps = {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  io?: CliIO;
  today?: () => string;
};

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_USAGE = 2;

export const USAGE = [
  'Usage: cafe-ledger <command> [options]',
  '',
  'Commands:',
  '  init [--force]                                  create empty data files',
  '  sale <product> <quantity> [--price N] [--date YYYY-MM-DD] [--payment cash|card]',
  '  import <file.csv>                               append every sale in a CSV, or none',
  '  sales [--product P] [--date D] [--from D] [--to D] [--payment cash|card]',
  '  show <id>                                       print one sale',
  '  inventory                                       stock levels with OUT/LOW flags',
  '  stock <product>                                 stock of one product',
  '  add-product <product> [--stock N] [--price N]   register a product',
  '  adjust <product> <delta> [--price N]            restock (+) or write off (-)',
  '  report <day|week|month|product> [--product P] [--from D] [--to D] [--out file.csv]',
  '  help',
  '',
  'Environment: CAFE_DATA_DIR, CAFE_SALES_FILE, CAFE_INVENTORY_FILE, CAFE_COLUMNS,',
  '             CAFE_LOW_STOCK, CAFE_CURRENCY, CAFE_LOCALE, CAFE_DEBUG',
];

/** Bad command line; reported with the usage text and its own exit code. */
export class UsageError extends ValidationError {
  constructor(message: string) {
    super(message, { hint: 'Run `cafe-ledger help` for usage.' });
    this.name = 'UsageError';
  }
}

const OPTIONS = {
  force: { type: 'boolean' },
  price: { type: 'string' },
  date: { type: 'string' },
  payment: { type: 'string' },
  product: { type: 'string' },
  from: { type: 'string' },
  to: { type: 'string' },
  out: { type: 'string' },
  stock: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

// parseArgs reads "-3" as a short option; numbers are shielded and restored after parsing
const NEGATIVE_NUMBER = /^-\d+(\.\d+)?$/;
const SHIELD = 'neg:';
const shield = (arg: string) => (NEGATIVE_NUMBER.test(arg) ? SHIELD + arg.slice(1) : arg);
const unshield = (arg: string) => (arg.startsWith(SHIELD) ? '-' + arg.slice(SHIELD.length) : arg);

type Flags = {
  force?: boolean;
  price?: string;
  date?: string;
  payment?: string;
  product?: string;
  from?: string;
  to?: string;
  out?: string;
  stock?: string;
  help?: boolean;
};

type FlagName = Exclude<keyof Flags, 'help'>;

/** Options each command takes; --help goes with any of them. */
const COMMAND_FLAGS: Record<string, readonly FlagName[]> = {
  init: ['force'],
  sale: ['price', 'date', 'payment'],
  import: [],
  sales: ['product', 'date', 'from', 'to', 'payment'],
  show: [],
  inventory: [],
  stock: [],
  'add-product': ['stock', 'price'],
  adjust: ['price'],
  report: ['product', 'from', 'to', 'out'],
};

function checkFlags(command: string, flags: Flags): void {
  const allowed = Object.prototype.hasOwnProperty.call(COMMAND_FLAGS, command) ? COMMAND_FLAGS[command] : undefined;
  if (!allowed) throw new UsageError(`Unknown command "${command}"`);
  for (const [name, value] of Object.entries(flags)) {
    if (value === undefined || name === 'help') continue;
    if (!allowed.some((a) => a === name)) throw new UsageError(`Option --${name} does not apply to ${command}`);
  }
}

type Context = {
  cwd: string;
  store: RecordStore;
  args: string[];
  flags: Flags;
  io: CliIO;
  money: (n: number) => string;
};

type Command = (ctx: Context) => void;

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function parseCommandLine(argv: string[]): { command: string | undefined; args: string[]; flags: Flags } {
  try {
    const { values, positionals } = parseArgs({
      args: argv.map(shield),
      options: OPTIONS,
      allowPositionals: true,
      strict: true,
    });
    const text = (v: string | undefined) => (v === undefined ? undefined : unshield(v));
    const flags: Flags = {
      force: values.force,
      price: text(values.price),
      date: text(values.date),
      payment: text(values.payment),
      product: text(values.product),
      from: text(values.from),
      to: text(values.to),
      out: text(values.out),
      stock: text(values.stock),
      help: values.help,
    };
    const [command, ...args] = positionals.map(unshield);
    return { command, args, flags };
  } catch (e) {
    // parseArgs throws plain TypeErrors for unknown or malformed options
    throw new UsageError(e instanceof Error ? e.message : String(e));
  }
}

function arg(ctx: Context, index: number, name: string): string {
  const value = ctx.args[index];
  if (value === undefined || !value.trim()) throw new UsageError(`Missing <${name}>`);
  return value;
}

function integer(raw: string, name: string): number {
  const n = parseDecimal(raw);
  if (!Number.isInteger(n)) throw new ValidationError(`${name} must be a whole number, got "${raw}"`);
  return n;
}

function price(raw: string): number {
  const n = parseDecimal(raw);
  if (Number.isNaN(n) || n < 0) {
    throw new ValidationError(`price must be a number of zero or more, got "${raw}"`);
  }
  return n;
}

function payment(raw: string | undefined): PaymentType | undefined {
  if (raw === undefined) return undefined;
  const p = raw.trim().toLowerCase();
  const hit = PAYMENT_TYPES.find((t) => t === p);
  if (!hit) throw new ValidationError(`payment must be cash or card, got "${raw}"`);
  return hit;
}

function stockLine(ctx: Context, product: string): string {
  const item = ctx.store.inventory.get(product);
  const status = ctx.store.inventory.status(item);
  const flag = status === 'out' ? ' (OUT)' : status === 'low' ? ' (LOW)' : '';
  return `${item.product}: ${item.stock}${flag}`;
}

function salesTable(ctx: Context, sales: SaleRecord[]): string[] {
  return formatTable(
    ['ID', 'DATE', 'PRODUCT', 'QTY', 'PRICE', 'TOTAL', 'PAYMENT'],
    sales.map((s) => [
      s.id,
      s.date,
      s.product,
      String(s.quantity),
      ctx.money(s.unitPrice),
      ctx.money(s.quantity * s.unitPrice),
      s.payment,
    ]),
    ['left', 'left', 'left', 'right', 'right', 'right', 'left'],
  );
}

/** Sales count, units and revenue per product, busiest first. */
function productReport(ctx: Context, records: SaleRecord[]): void {
  const summary = summarizeByProduct(records);
  const rows = productRows(summary);

  if (ctx.flags.out) {
    const file = path.resolve(ctx.cwd, ctx.flags.out);
    const csvRows = rows.map((r) => [r.product, r.count, r.quantity, r.revenue.toFixed(2)]);
    writeText(file, formatCsv(['product', 'count', 'quantity', 'revenue'], csvRows));
    ctx.io.out(`Wrote ${rows.length} product(s) to ${file}`);
    return;
  }
  if (!rows.length) {
    ctx.io.out('No sales in range.');
    return;
  }
  const count = rows.reduce((n, r) => n + r.count, 0);
  const all = totals(summary);
  formatTable(
    ['PRODUCT', 'SALES', 'QTY', 'REVENUE'],
    [
      ...rows.map((r) => [r.product, String(r.count), String(r.quantity), ctx.money(r.revenue)]),
      ['TOTAL', String(count), String(all.quantity), ctx.money(all.revenue)],
    ],
    ['left', 'right', 'right', 'right'],
  ).forEach((l) => ctx.io.out(l));
}

const COMMANDS: Record<string, Command> = {
  sale(ctx) {
    const product = arg(ctx, 0, 'product');
    const quantity = arg(ctx, 1, 'quantity');
    const record = ctx.store.append({
      product,
      quantity,
      unitPrice: ctx.flags.price,
      date: ctx.flags.date,
      payment: ctx.flags.payment,
    });
    ctx.io.out(
      `Recorded ${record.quantity} x ${record.product} @ ${ctx.money(record.unitPrice)} on ${record.date} (${record.payment}) as ${record.id}`,
    );
    ctx.io.out(`Stock left: ${stockLine(ctx, record.product)}`);
  },

  import(ctx) {
    const file = path.resolve(ctx.cwd, arg(ctx, 0, 'file.csv'));
    const added = ctx.store.importFile(file);
    ctx.io.out(`Imported ${added.length} sale(s) from ${file}`);
    const out = ctx.store.inventory.stockouts();
    if (out.length) ctx.io.out(`Out of stock: ${out.map((i) => i.product).join(', ')}`);
  },

  sales(ctx) {
    const list = ctx.store.records({
      product: ctx.flags.product,
      date: ctx.flags.date,
      from: ctx.flags.from,
      to: ctx.flags.to,
      payment: payment(ctx.flags.payment),
    });
    if (!list.length) {
      ctx.io.out('No sales found.');
      return;
    }
    salesTable(ctx, list).forEach((l) => ctx.io.out(l));
    ctx.io.out(`${list.length} sale(s)`);
  },

  show(ctx) {
    const s = ctx.store.find(arg(ctx, 0, 'id'));
    ctx.io.out(`id:       ${s.id}`);
    ctx.io.out(`date:     ${s.date}`);
    ctx.io.out(`product:  ${s.product}`);
    ctx.io.out(`quantity: ${s.quantity}`);
    ctx.io.out(`price:    ${ctx.money(s.unitPrice)}`);
    ctx.io.out(`total:    ${ctx.money(s.quantity * s.unitPrice)}`);
    ctx.io.out(`payment:  ${s.payment}`);
  },

  inventory(ctx) {
    const inv = ctx.store.inventory;
    const items = inv.items();
    if (!items.length) {
      ctx.io.out('No products. Add one with: cafe-ledger add-product <product> --stock <n>');
      return;
    }
    const rows = items.map((i) => {
      const status = inv.status(i);
      return [
        i.product,
        String(i.stock),
        i.unitPrice == null ? '-' : ctx.money(i.unitPrice),
        status === 'ok' ? '' : status.toUpperCase(),
      ];
    });
    formatTable(['PRODUCT', 'STOCK', 'PRICE', 'STATUS'], rows, ['left', 'right', 'right', 'left'])
      .forEach((l) => ctx.io.out(l));
  },

  stock(ctx) {
    ctx.io.out(stockLine(ctx, arg(ctx, 0, 'product')));
  },

  'add-product'(ctx) {
    const product = arg(ctx, 0, 'product');
    const stock = ctx.flags.stock === undefined ? 0 : integer(ctx.flags.stock, 'stock');
    const unitPrice = ctx.flags.price === undefined ? null : price(ctx.flags.price);
    const item = ctx.store.inventory.addProduct(product, stock, unitPrice);
    ctx.store.saveInventory();
    const priced = item.unitPrice == null ? '' : ` at ${ctx.money(item.unitPrice)}`;
    ctx.io.out(`Added ${item.product} with stock ${item.stock}${priced}`);
  },

  adjust(ctx) {
    const product = arg(ctx, 0, 'product');
    const delta = integer(arg(ctx, 1, 'delta'), 'delta');
    const inv = ctx.store.inventory;
    const before = inv.getStock(product);
    inv.adjustStock(product, delta);
    if (ctx.flags.price !== undefined) inv.setPrice(product, price(ctx.flags.price));
    ctx.store.saveInventory();
    const item = inv.get(product);
    ctx.io.out(`${item.product}: ${before} -> ${item.stock}`);
  },

  report(ctx) {
    const period = arg(ctx, 0, 'period');
    const records = ctx.store.records({ product: ctx.flags.product, from: ctx.flags.from, to: ctx.flags.to });
    if (period === 'product') {
      productReport(ctx, records);
      return;
    }
    if (!isPeriod(period)) {
      throw new UsageError(`Period must be one of ${[...PERIODS, 'product'].join(', ')}, got "${period}"`);
    }

    const summary = summarize(period, records);
    const rows = summaryRows(summary);

    if (ctx.flags.out) {
      const file = path.resolve(ctx.cwd, ctx.flags.out);
      const csvRows = rows.map((r) => [r.bucket, r.quantity, r.revenue.toFixed(2)]);
      writeText(file, formatCsv(['bucket', 'quantity', 'revenue'], csvRows));
      ctx.io.out(`Wrote ${rows.length} ${period} bucket(s) to ${file}`);
      return;
    }
    if (!rows.length) {
      ctx.io.out('No sales in range.');
      return;
    }
    const all = totals(summary);
    formatTable(
      [period.toUpperCase(), 'QTY', 'REVENUE'],
      [
        ...rows.map((r) => [r.bucket, String(r.quantity), ctx.money(r.revenue)]),
        ['TOTAL', String(all.quantity), ctx.money(all.revenue)],
      ],
      ['left', 'right', 'right'],
    ).forEach((l) => ctx.io.out(l));
  },
};

/** Runs one command line and returns the process exit code. */
export function run(argv: string[], deps: CliDeps = {}): number {
  const io = deps.io ?? consoleIO;
  try {
    const { command, args, flags } = parseCommandLine(argv);
    if (command === 'help' || flags.help) {
      USAGE.forEach((l) => io.out(l));
      return EXIT_OK;
    }
    if (!command) throw new UsageError('Missing command');
    checkFlags(command, flags);

    const cwd = deps.cwd ?? process.cwd();
    const config = loadConfig(deps.env ?? process.env, cwd);
    setDebug(config.debug);
    const store = new RecordStore({
      salesFile: config.salesFile,
      inventoryFile: config.inventoryFile,
      columns: config.columns,
      lowStockThreshold: config.lowStockThreshold,
      today: deps.today,
    });
    dbg('cli', `${command} sales=${config.salesFile} inventory=${config.inventoryFile}`);

    if (command === 'init') {
      store.init({ force: flags.force });
      io.out(`Created ${config.salesFile}`);
      io.out(`Created ${config.inventoryFile}`);
      return EXIT_OK;
    }

    const handler = Object.prototype.hasOwnProperty.call(COMMANDS, command) ? COMMANDS[command] : undefined;
    if (!handler) throw new UsageError(`Unknown command "${command}"`);

    store.load();
    handler({
      cwd,
      store,
      args,
      flags,
      io,
      money: (n) => formatMoney(n, config.currency, config.locale),
    });
    return EXIT_OK;
  } catch (e) {
    const { title, body } = friendly(e);
    io.err(`Error: ${title}`);
    if (body) io.err(body);
    if (e instanceof UsageError) return EXIT_USAGE;
    if (!(e instanceof AppError)) logError(e, 'cli');
    return EXIT_ERROR;
  }
}
