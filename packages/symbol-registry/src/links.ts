/**
 * Quote page links
 */

import type { Ticker } from '@ashare/contracts';
import { exchangeOf, stripExchange } from './exchange.js';
import type { QuoteLinks } from './types.js';

/**
 * Links to external quote pages for a ticker
 *
 * @example
 * ```typescript
 * quoteLinks('sh.600000').eastmoney
 * // → 'https://quote.eastmoney.com/concept/SH600000.html?from=data'
 * ```
 */
export function quoteLinks(ticker: Ticker): QuoteLinks {
  const code = stripExchange(ticker);
  const market = (exchangeOf(ticker) ?? 'sz').toUpperCase();

  return {
    baiduQuote: `https://gushitong.baidu.com/stock/ab-${code}`,
    eastmoney: `https://quote.eastmoney.com/concept/${market}${code}.html?from=data`,
    baiduSearch: `https://www.baidu.com/s?wd=${encodeURIComponent(code)}`,
  };
}
