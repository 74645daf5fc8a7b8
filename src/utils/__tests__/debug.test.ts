import { dbg, debugEnabled, isDebugFlag, setDebug, warn } from '../debug';

describe('debug logging', () => {
  let spy: jest.SpyInstance;

  beforeEach(() => {
    spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    spy.mockRestore();
    setDebug(false);
  });

  it('reads 1 and true as on', () => {
    expect(isDebugFlag('1')).toBe(true);
    expect(isDebugFlag(' TRUE ')).toBe(true);
    expect(isDebugFlag('yes')).toBe(false);
    expect(isDebugFlag(undefined)).toBe(false);
  });

  it('writes debug lines only when switched on', () => {
    setDebug(false);
    dbg('store', 'loaded 2 sale(s)');
    expect(spy).not.toHaveBeenCalled();

    setDebug(true);
    expect(debugEnabled()).toBe(true);
    dbg('store', 'loaded 2 sale(s)');
    dbg('store', 'batch', { size: 3 });
    expect(spy.mock.calls).toEqual([['[store] loaded 2 sale(s)'], ['[store] batch', { size: 3 }]]);
  });

  it('always writes warnings', () => {
    setDebug(false);
    warn('store', 'unknown product "chai" on line 4');
    expect(spy).toHaveBeenCalledWith('[store] unknown product "chai" on line 4');
  });
});
