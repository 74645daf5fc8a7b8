import { AppError, friendly, InsufficientStockError, IOError, toAppError } from '../errors';

describe('friendly', () => {
  it('uses the message as title and the hint as body', () => {
    expect(friendly(new InsufficientStockError('latte', 5, 3))).toEqual({
      title: 'Not enough stock of latte: requested 5, 3 on hand.',
      body: 'Restock first with: cafe-ledger adjust "latte" <qty>',
    });
  });

  it('hints at init when a file is missing', () => {
    const cause = Object.assign(new Error('no such file'), { code: 'ENOENT' });
    const { body } = friendly(new IOError('Cannot read data/sales.csv', 'data/sales.csv', cause));
    expect(body).toBe(
      'Run `cafe-ledger init` to create the data files, or point CAFE_DATA_DIR at an existing directory.',
    );
  });
});

describe('toAppError', () => {
  it('passes AppErrors through', () => {
    const err = new AppError({ message: 'x', code: 'not-found' });
    expect(toAppError(err)).toBe(err);
  });

  it('wraps anything else', () => {
    const wrapped = toAppError(new Error('boom'), { where: 'test' });
    expect(wrapped.code).toBe('unknown');
    expect(wrapped.message).toBe('boom');
    expect(wrapped.context).toEqual({ where: 'test' });
    expect(toAppError('plain').message).toBe('plain');
  });
});
