export type AppErrorSeverity = 'info' | 'warn' | 'error' | 'fatal';

export type AppErrorCode = 'invalid-argument' | 'not-found' | 'insufficient-stock' | 'io' | 'unknown';

export class AppError extends Error {
  code: AppErrorCode;
  hint?: string;
  severity: AppErrorSeverity;
  cause?: unknown;
  context?: Record<string, unknown>;
  constructor(opts: { message: string; code?: AppErrorCode; hint?: string; severity?: AppErrorSeverity; cause?: unknown; context?: Record<string, unknown>; }) {
    super(opts.message);
    this.name = 'AppError';
    this.code = opts.code ?? 'unknown';
    this.hint = opts.hint;
    this.severity = opts.severity ?? 'error';
    this.cause = opts.cause;
    this.context = opts.context;
  }
}

/** Malformed input: a bad CSV row, a non-positive quantity, an unparseable option. */
export class ValidationError extends AppError {
  constructor(message: string, opts: { hint?: string; context?: Record<string, unknown>; cause?: unknown } = {}) {
    super({ message, code: 'invalid-argument', severity: 'warn', ...opts });
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, opts: { hint?: string; context?: Record<string, unknown> } = {}) {
    super({ message, code: 'not-found', severity: 'warn', ...opts });
    this.name = 'NotFoundError';
  }
}

export class InsufficientStockError extends AppError {
  readonly product: string;
  readonly requested: number;
  readonly available: number;
  constructor(product: string, requested: number, available: number) {
    super({
      message: `Not enough stock of ${product}: requested ${requested}, ${available} on hand.`,
      code: 'insufficient-stock',
      severity: 'warn',
      hint: `Restock first with: cafe-ledger adjust "${product}" <qty>`,
      context: { product, requested, available },
    });
    this.name = 'InsufficientStockError';
    this.product = product;
    this.requested = requested;
    this.available = available;
  }
}

export class IOError extends AppError {
  readonly path: string;
  constructor(message: string, path: string, cause?: unknown) {
    super({ message, code: 'io', cause, context: { path }, hint: ioHint(cause) });
    this.name = 'IOError';
    this.path = path;
  }
}

function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    return typeof err.code === 'string' ? err.code : undefined;
  }
  return undefined;
}

function ioHint(cause: unknown): string | undefined {
  switch (errnoCode(cause)) {
    case 'ENOENT': return 'Run `cafe-ledger init` to create the data files, or point CAFE_DATA_DIR at an existing directory.';
    case 'EACCES':
    case 'EPERM':  return 'Check the file permissions.';
    case 'EISDIR': return 'The path names a directory, not a file.';
    default:       return undefined;
  }
}

export function toAppError(err: unknown, context?: Record<string, unknown>): AppError {
  if (err instanceof AppError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new AppError({ message: message || 'Something went wrong.', hint: 'Run again with CAFE_DEBUG=1 for details.', cause: err, context });
}

export function friendly(err: unknown): { title: string; body: string } {
  const appErr = toAppError(err);
  const hint = appErr.hint ? `\n\n${appErr.hint}` : '';
  return { title: appErr.message || 'Error', body: hint.trim() };
}

export function logError(err: unknown, where: string, extra?: Record<string, unknown>) {
  const appErr = toAppError(err);
  const payload = { where, errCode: appErr.code, errMessage: appErr.message, context: appErr.context, extra: extra || undefined };
  console.error('[CafeLedger Error]', JSON.stringify(payload));
}
