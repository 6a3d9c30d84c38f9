/**
 * @ashare/analysis-kit
 *
 * Pure K-line statistics. No I/O: same inputs always produce the same summary.
 *
 * @packageDocumentation
 */

export { summarize } from './summarize.js';

export { percentChanges, classifyTrend } from './changes.js';

export { priceChange, volumeStats, countPeriods } from './aggregates.js';

export { simulateInvestment } from './investment.js';

export { summarizeConstituents } from './constituents.js';
