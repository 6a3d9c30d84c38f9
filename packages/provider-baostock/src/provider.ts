/**
 * @fileoverview baostock market data provider.
 *
 * @module @ashare/provider-baostock/provider
 */

import type { MarketDataProvider, MarketDataSession } from '@ashare/contracts';
import { createChildLogger } from '@ashare/logger';
import type { Logger } from '@ashare/logger';
import { BaostockClient } from './client.js';
import { BaostockSession } from './session.js';
import { PROVIDER_NAME } from './errors.js';
import { GUEST_PASSWORD, GUEST_USER_ID } from './types.js';
import type { BaostockProviderOptions } from './types.js';

/**
 * Opens sessions against a baostock gateway.
 *
 * @example
 * ```typescript
 * const provider = new BaostockProvider({ baseUrl: 'http://127.0.0.1:8686' });
 * const session = await provider.login();
 * try {
 *   const series = await session.queryBars({
 *     ticker: 'sz.000001',
 *     frequency: Frequency.D1,
 *     start: '2024-03-01',
 *     end: '2024-03-29',
 *   });
 * } finally {
 *   await session.logout();
 * }
 * ```
 */
export class BaostockProvider implements MarketDataProvider {
  readonly name = PROVIDER_NAME;

  private readonly client: BaostockClient;
  private readonly userId: string;
  private readonly password: string;
  private readonly logger: Logger | undefined;

  constructor(options: BaostockProviderOptions = {}) {
    this.client = new BaostockClient({
      baseUrl: options.baseUrl,
      timeout: options.timeout,
      httpClient: options.httpClient,
    });
    this.userId = options.userId ?? GUEST_USER_ID;
    this.password = options.password ?? GUEST_PASSWORD;
    this.logger = options.logger
      ? createChildLogger(options.logger, { component: 'provider-baostock', provider: PROVIDER_NAME })
      : undefined;
  }

  async login(): Promise<MarketDataSession> {
    const token = await this.client.login(this.userId, this.password);
    this.logger?.debug('Session opened', { user_id: this.userId });
    return new BaostockSession(this.client, token, this.logger);
  }
}
