import { describe, it, expect } from 'vitest';
import { EXCHANGES, exchangeOf, inferExchange, isTicker, stripExchange } from '../src/exchange.js';
import { quoteLinks } from '../src/links.js';

describe('exchange helpers', () => {
  it('should infer exchanges from the leading digit', () => {
    expect(inferExchange('000001')).toBe('sz');
    expect(inferExchange('300750')).toBe('sz');
    expect(inferExchange('688981')).toBe('sh');
    expect(inferExchange('900901')).toBeUndefined();
  });

  it('should read the exchange of prefixed codes', () => {
    expect(exchangeOf('sh.600000')).toBe('sh');
    expect(exchangeOf('sz.000001')).toBe('sz');
    expect(exchangeOf('bj.430047')).toBeUndefined();
    expect(exchangeOf('600000')).toBeUndefined();
  });

  it('should detect qualified tickers', () => {
    expect(isTicker('sz.000001')).toBe(true);
    expect(isTicker('000001')).toBe(false);
    expect(isTicker('sz000001')).toBe(false);
  });

  it('should strip the prefix', () => {
    expect(stripExchange('sh.600000')).toBe('600000');
  });

  it('should name both exchanges', () => {
    expect(EXCHANGES.sz.name).toBe('SZSE');
    expect(EXCHANGES.sh.name).toBe('SSE');
  });
});

describe('quoteLinks', () => {
  it('should build quote page links', () => {
    expect(quoteLinks('sz.000001')).toEqual({
      baiduQuote: 'https://gushitong.baidu.com/stock/ab-000001',
      eastmoney: 'https://quote.eastmoney.com/concept/SZ000001.html?from=data',
      baiduSearch: 'https://www.baidu.com/s?wd=000001',
    });
  });

  it('should use the upper-case market for Shanghai', () => {
    expect(quoteLinks('sh.600000').eastmoney).toBe(
      'https://quote.eastmoney.com/concept/SH600000.html?from=data'
    );
  });
});
