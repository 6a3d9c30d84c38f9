/**
 * Provider selection from configuration
 */

import type { MarketDataProvider } from '@ashare/contracts';
import type { Logger } from '@ashare/logger';
import { BaostockProvider } from '@ashare/provider-baostock';
import type { Config } from '../../config/index.js';
import { FixtureProvider } from './fixture-provider.js';

export function createProvider(config: Config['provider'], logger: Logger): MarketDataProvider {
  switch (config.type) {
    case 'fixture':
      logger.info('Using fixture provider');
      return new FixtureProvider({ logger });
    case 'baostock':
      logger.debug('Using baostock provider', { baseUrl: config.baseUrl });
      return new BaostockProvider({
        baseUrl: config.baseUrl,
        userId: config.userId,
        password: config.password,
        timeout: config.timeout,
        logger,
      });
  }
}
