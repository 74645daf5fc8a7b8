import fs from 'fs';
import os from 'os';
import path from 'path';
import { EXIT_ERROR, EXIT_OK, EXIT_USAGE, run } from '../cli/commands';
import { setDebug } from '../utils/debug';

const dirs: string[] = [];

function workspace(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cafe-ledger-cli-'));
  dirs.push(dir);
  return dir;
}

function cli(dir: string, ...argv: string[]) {
  const out: string[] = [];
  const err: string[] = [];
  const code = run(argv, {
    env: {},
    cwd: dir,
    today: () => '2024-01-15',
    io: { out: (l) => out.push(l), err: (l) => err.push(l) },
  });
  return { code, out, err };
}

/** Initialised workspace with one product: latte, stock 3, $3.50. */
function stocked(): string {
  const dir = workspace();
  expect(cli(dir, 'init').code).toBe(EXIT_OK);
  expect(cli(dir, 'add-product', 'latte', '--stock', '3', '--price', '3.5').out).toEqual([
    'Added latte with stock 3 at $3.50',
  ]);
  return dir;
}

afterEach(() => {
  while (dirs.length) fs.rmSync(dirs.pop() ?? '', { recursive: true, force: true });
});

describe('cafe-ledger cli', () => {
  it('prints usage for help', () => {
    const res = cli(workspace(), 'help');
    expect(res.code).toBe(EXIT_OK);
    expect(res.out[0]).toBe('Usage: cafe-ledger <command> [options]');
  });

  it('exits with the usage code when no command is given', () => {
    const res = cli(workspace());
    expect(res.code).toBe(EXIT_USAGE);
    expect(res.err[0]).toBe('Error: Missing command');
  });

  it('exits with the usage code for an unknown command', () => {
    const res = cli(workspace(), 'frobnicate');
    expect(res.code).toBe(EXIT_USAGE);
    expect(res.err[0]).toBe('Error: Unknown command "frobnicate"');
  });

  it('exits with the usage code for an unknown option', () => {
    expect(cli(workspace(), 'inventory', '--colour', 'red').code).toBe(EXIT_USAGE);
  });

  it('creates the data files on init', () => {
    const dir = workspace();
    const res = cli(dir, 'init');
    expect(res.out).toEqual([
      `Created ${path.join(dir, 'data', 'sales.csv')}`,
      `Created ${path.join(dir, 'data', 'inventory.csv')}`,
    ]);
    expect(fs.existsSync(path.join(dir, 'data', 'sales.csv'))).toBe(true);
  });

  it('reports missing data files as an error', () => {
    const dir = workspace();
    const res = cli(dir, 'inventory');
    expect(res.code).toBe(EXIT_ERROR);
    expect(res.err[0]).toBe(`Error: Cannot read ${path.join(dir, 'data', 'inventory.csv')}`);
  });

  it('records a sale and decrements stock', () => {
    const dir = stocked();
    const res = cli(dir, 'sale', 'latte', '2');
    expect(res.code).toBe(EXIT_OK);
    expect(res.out[0]).toMatch(/^Recorded 2 x latte @ \$3\.50 on 2024-01-15 \(cash\) as [0-9a-f-]{36}$/);
    expect(res.out[1]).toBe('Stock left: latte: 1 (LOW)');
  });

  it('refuses to oversell and leaves stock alone', () => {
    const dir = stocked();
    const res = cli(dir, 'sale', 'latte', '5');
    expect(res.code).toBe(EXIT_ERROR);
    expect(res.err[0]).toBe('Error: Not enough stock of latte: requested 5, 3 on hand.');
    expect(cli(dir, 'stock', 'latte').out).toEqual(['latte: 3 (LOW)']);
  });

  it('rejects a non-positive quantity', () => {
    const dir = stocked();
    const res = cli(dir, 'sale', 'latte', '0');
    expect(res.code).toBe(EXIT_ERROR);
    expect(res.err[0]).toBe('Error: quantity must be greater than zero');
  });

  it('reports unknown products', () => {
    const dir = stocked();
    const res = cli(dir, 'stock', 'chai');
    expect(res.code).toBe(EXIT_ERROR);
    expect(res.err).toEqual(['Error: Unknown product "chai"', 'Add it with: cafe-ledger add-product "chai" --stock <n>']);
  });

  it('adjusts stock up and down, including negative deltas', () => {
    const dir = stocked();
    expect(cli(dir, 'adjust', 'latte', '4').out).toEqual(['latte: 3 -> 7']);
    expect(cli(dir, 'adjust', 'latte', '-7').out).toEqual(['latte: 7 -> 0']);
    expect(cli(dir, 'stock', 'latte').out).toEqual(['latte: 0 (OUT)']);
  });

  it('shows the inventory with flags', () => {
    const dir = stocked();
    cli(dir, 'add-product', 'filter', '--stock', '12');
    expect(cli(dir, 'inventory').out).toEqual([
      'PRODUCT  STOCK  PRICE  STATUS',
      'filter      12      -',
      'latte        3  $3.50  LOW',
    ]);
  });

  it('lists and shows sales', () => {
    const dir = stocked();
    cli(dir, 'sale', 'latte', '1', '--date', '2024-01-02', '--payment', 'card');
    cli(dir, 'sale', 'latte', '1', '--date', '2024-01-03');

    const list = cli(dir, 'sales', '--payment', 'card');
    expect(list.out[list.out.length - 1]).toBe('1 sale(s)');
    const id = list.out[1].split(' ')[0];

    expect(cli(dir, 'show', id).out).toEqual([
      `id:       ${id}`,
      'date:     2024-01-02',
      'product:  latte',
      'quantity: 1',
      'price:    $3.50',
      'total:    $3.50',
      'payment:  card',
    ]);
    expect(cli(dir, 'sales', '--date', '2023-12-31').out).toEqual(['No sales found.']);
  });

  it('prints a monthly report with totals', () => {
    const dir = stocked();
    cli(dir, 'sale', 'latte', '2');
    const res = cli(dir, 'report', 'month');
    expect(res.code).toBe(EXIT_OK);
    expect(res.out).toEqual([
      'MONTH    QTY  REVENUE',
      '2024-01    2    $7.00',
      'TOTAL      2    $7.00',
    ]);
  });

  it('writes a report to CSV', () => {
    const dir = stocked();
    cli(dir, 'sale', 'latte', '1', '--date', '2024-01-01');
    cli(dir, 'sale', 'latte', '1', '--date', '2024-01-08');
    const res = cli(dir, 'report', 'week', '--out', 'weekly.csv');
    expect(res.out).toEqual([`Wrote 2 week bucket(s) to ${path.join(dir, 'weekly.csv')}`]);
    expect(fs.readFileSync(path.join(dir, 'weekly.csv'), 'utf8')).toBe(
      'bucket,quantity,revenue\n2024-W01,1,3.50\n2024-W02,1,3.50\n',
    );
  });

  it('says so when a report has nothing in range', () => {
    const dir = stocked();
    expect(cli(dir, 'report', 'day').out).toEqual(['No sales in range.']);
  });

  it('rejects an unknown report period', () => {
    const dir = stocked();
    const res = cli(dir, 'report', 'year');
    expect(res.code).toBe(EXIT_USAGE);
    expect(res.err[0]).toBe('Error: Period must be one of day, week, month, product, got "year"');
  });

  it('prints sales per product, busiest first', () => {
    const dir = stocked();
    cli(dir, 'add-product', 'mocha', '--stock', '5', '--price', '4');
    cli(dir, 'sale', 'mocha', '2');
    cli(dir, 'sale', 'latte', '1');
    cli(dir, 'sale', 'latte', '1');
    const res = cli(dir, 'report', 'product');
    expect(res.code).toBe(EXIT_OK);
    expect(res.out).toEqual([
      'PRODUCT  SALES  QTY  REVENUE',
      'latte        2    2    $7.00',
      'mocha        1    2    $8.00',
      'TOTAL        3    4   $15.00',
    ]);
  });

  it('writes the product report to CSV', () => {
    const dir = stocked();
    cli(dir, 'sale', 'latte', '2');
    const res = cli(dir, 'report', 'product', '--out', 'products.csv');
    expect(res.out).toEqual([`Wrote 1 product(s) to ${path.join(dir, 'products.csv')}`]);
    expect(fs.readFileSync(path.join(dir, 'products.csv'), 'utf8')).toBe('product,count,quantity,revenue\nlatte,1,2,7.00\n');
  });

  it('rejects options the command does not take', () => {
    const dir = stocked();
    const res = cli(dir, 'report', 'month', '--date', '2024-01-05');
    expect(res.code).toBe(EXIT_USAGE);
    expect(res.err[0]).toBe('Error: Option --date does not apply to report');
    expect(cli(dir, 'sale', 'latte', '1', '--from', '2024-01-01').code).toBe(EXIT_USAGE);
    expect(cli(dir, 'stock', 'latte').out).toEqual(['latte: 3 (LOW)']);
  });

  it('accepts --help with any command', () => {
    const res = cli(workspace(), 'report', '--help');
    expect(res.code).toBe(EXIT_OK);
    expect(res.out[0]).toBe('Usage: cafe-ledger <command> [options]');
  });

  it('rejects numbers written in other notations', () => {
    const dir = stocked();
    const res = cli(dir, 'adjust', 'latte', '0x10');
    expect(res.code).toBe(EXIT_ERROR);
    expect(res.err[0]).toBe('Error: delta must be a whole number, got "0x10"');
    expect(cli(dir, 'add-product', 'mocha', '--stock', '1e2').err[0]).toBe(
      'Error: stock must be a whole number, got "1e2"',
    );
  });

  it('turns on debug lines from the environment it is given', () => {
    const dir = stocked();
    const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    try {
      const code = run(['inventory'], {
        env: { CAFE_DEBUG: '1' },
        cwd: dir,
        io: { out: () => undefined, err: () => undefined },
      });
      expect(code).toBe(EXIT_OK);
      expect(spy).toHaveBeenCalledWith(
        `[cli] inventory sales=${path.join(dir, 'data', 'sales.csv')} inventory=${path.join(dir, 'data', 'inventory.csv')}`,
      );
    } finally {
      spy.mockRestore();
      setDebug(false);
    }
  });

  it('imports a CSV of sales relative to the working directory', () => {
    const dir = stocked();
    fs.writeFileSync(path.join(dir, 'till.csv'), 'date,product,quantity\n2024-01-10,latte,3\n');
    const res = cli(dir, 'import', 'till.csv');
    expect(res.out).toEqual([`Imported 1 sale(s) from ${path.join(dir, 'till.csv')}`, 'Out of stock: latte']);
  });
});
