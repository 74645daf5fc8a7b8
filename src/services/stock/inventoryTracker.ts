import { InsufficientStockError, NotFoundError, ValidationError } from '../../utils/errors';
import { InventoryItem } from '../sales/types';

export type StockStatus = 'ok' | 'low' | 'out';

export const DEFAULT_LOW_STOCK = 5;

const keyOf = (product: string) => product.trim().toLowerCase();

/**
 * Per-product stock counts. Product names match case-insensitively; the
 * spelling used when the product was added is the one reported back.
 * Counts never go below zero.
 */
export class InventoryTracker {
  private readonly byKey = new Map<string, InventoryItem>();

  constructor(items: InventoryItem[] = [], readonly lowStockThreshold: number = DEFAULT_LOW_STOCK) {
    for (const item of items) this.addProduct(item.product, item.stock, item.unitPrice);
  }

  has(product: string): boolean {
    return this.byKey.has(keyOf(product));
  }

  /** Copy of the item, or NotFoundError. */
  get(product: string): InventoryItem {
    return { ...this.entry(product) };
  }

  getStock(product: string): number {
    return this.entry(product).stock;
  }

  /** Applies `delta` and returns the new count. */
  adjustStock(product: string, delta: number): number {
    if (!Number.isInteger(delta)) {
      throw new ValidationError(`Stock change must be a whole number, got ${delta}`);
    }
    const item = this.entry(product);
    const next = item.stock + delta;
    if (next < 0) {
      throw new InsufficientStockError(item.product, -delta, item.stock);
    }
    item.stock = next;
    return next;
  }

  addProduct(product: string, stock = 0, unitPrice: number | null = null): InventoryItem {
    const name = product.trim();
    if (!name) throw new ValidationError('Product name is required');
    if (!Number.isInteger(stock) || stock < 0) {
      throw new ValidationError(`Stock for ${name} must be a whole number of zero or more, got ${stock}`);
    }
    if (unitPrice != null) assertPrice(name, unitPrice);
    if (this.byKey.has(keyOf(name))) {
      throw new ValidationError(`Product ${name} already exists`, {
        hint: `Change its stock with: cafe-ledger adjust "${name}" <delta>`,
      });
    }
    const item: InventoryItem = { product: name, stock, unitPrice };
    this.byKey.set(keyOf(name), item);
    return { ...item };
  }

  setPrice(product: string, unitPrice: number): void {
    const item = this.entry(product);
    assertPrice(item.product, unitPrice);
    item.unitPrice = unitPrice;
  }

  /** All items, ordered by product name. */
  items(): InventoryItem[] {
    return [...this.byKey.values()]
      .map((i) => ({ ...i }))
      .sort((a, b) => a.product.localeCompare(b.product));
  }

  status(item: Pick<InventoryItem, 'stock'>): StockStatus {
    if (item.stock <= 0) return 'out';
    if (item.stock <= this.lowStockThreshold) return 'low';
    return 'ok';
  }

  stockouts(): InventoryItem[] {
    return this.items().filter((i) => i.stock === 0);
  }

  /** Independent copy, for trying out a batch of changes. */
  clone(): InventoryTracker {
    return new InventoryTracker(this.items(), this.lowStockThreshold);
  }

  private entry(product: string): InventoryItem {
    const item = this.byKey.get(keyOf(product));
    if (!item) {
      throw new NotFoundError(`Unknown product "${product.trim()}"`, {
        hint: `Add it with: cafe-ledger add-product "${product.trim()}" --stock <n>`,
        context: { product },
      });
    }
    return item;
  }
}

function assertPrice(product: string, unitPrice: number) {
  if (!Number.isFinite(unitPrice) || unitPrice < 0) {
    throw new ValidationError(`Price for ${product} must be zero or more, got ${unitPrice}`);
  }
}
