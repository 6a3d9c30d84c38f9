/**
 * @ashare/symbol-registry
 *
 * Ticker normalization for Shanghai/Shenzhen listings
 *
 * @example
 * ```typescript
 * import { normalizeTicker, quoteLinks } from '@ashare/symbol-registry';
 *
 * const result = normalizeTicker('600000');
 * if (result.ok) {
 *   console.log(result.ticker); // → 'sh.600000'
 *   console.log(quoteLinks(result.ticker).baiduQuote);
 * }
 * ```
 */

export type { NormalizeError, NormalizeResult, ExchangeInfo, QuoteLinks } from './types.js';

export { normalizeTicker, SUPPORTED_FORMATS } from './normalize.js';

export { EXCHANGES, isTicker, inferExchange, exchangeOf, stripExchange } from './exchange.js';

export { quoteLinks } from './links.js';
