/**
 * K-line table and statistics panels
 */

import { FREQUENCY_TABLE } from '@ashare/contracts';
import type { Bar, FrequencySpec, KlineSummary, Series } from '@ashare/contracts';
import type { Theme } from './theme.js';
import { renderGrid, renderPanels } from './layout.js';
import type { ColumnSpec, PanelSection } from './layout.js';
import {
  formatAmount,
  formatInteger,
  formatMoney,
  formatPercent,
  formatPrice,
  formatSigned,
  formatVolume,
} from './number-format.js';

const UNIT_PLURALS: Record<FrequencySpec['periodUnit'], string> = {
  day: 'days',
  week: 'weeks',
  month: 'months',
};

/**
 * Formatter for bar series and their summaries
 */
export class KlineFormatter {
  constructor(private readonly theme: Theme) {}

  /** Title line shown above the bar table */
  formatTitle(series: Series): string {
    const spec = FREQUENCY_TABLE[series.frequency];
    return this.theme.heading(`${series.ticker} ${spec.label} bars (${series.start} ~ ${series.end})`);
  }

  /**
   * One row per bar. Daily bars add a colored change column.
   */
  formatBars(series: Series): string {
    const spec = FREQUENCY_TABLE[series.frequency];
    const daily = spec.kind === 'daily';

    const columns: ColumnSpec[] = [
      { header: spec.kind === 'minute' ? 'Time' : 'Date', align: 'center' },
      { header: 'Open' },
      { header: 'High' },
      { header: 'Low' },
      { header: 'Close' },
      ...(daily ? [{ header: 'Change' }] : []),
      { header: 'Volume' },
      { header: 'Amount' },
    ];

    const rows = series.bars.map((bar) => this.formatRow(bar, daily));
    return renderGrid(columns, rows);
  }

  private formatRow(bar: Bar, daily: boolean): string[] {
    const prices = [bar.open, bar.high, bar.low, bar.close].map(formatPrice);
    const change: string[] = [];

    if (daily) {
      const pct = bar.pctChange ?? 0;
      change.push(this.theme.bySign(pct)(formatPercent(pct)));
    }

    return [bar.period, ...prices, ...change, formatVolume(bar.volume), formatAmount(bar.amount)];
  }

  /**
   * Statistics panels: trading/trend/price on top, investment/volume below
   */
  formatSummary(summary: KlineSummary): string {
    const top = renderPanels([this.tradingPanel(summary), this.trendPanel(summary), this.pricePanel(summary)]);
    const bottom = renderPanels([this.investmentPanel(summary), this.volumePanel(summary)]);
    return `${top}\n${bottom}`;
  }

  tradingPanel(summary: KlineSummary): PanelSection {
    const spec = FREQUENCY_TABLE[summary.frequency];
    const { bars, distinctDates } = summary.periods;

    let line: string;
    if (spec.kind === 'minute') {
      line =
        distinctDates !== undefined
          ? `Total trading days: ${distinctDates} days (${bars} ${spec.key} bars)`
          : `Total trading days: ${bars} ${spec.key} bars`;
    } else {
      const unit = UNIT_PLURALS[spec.periodUnit];
      line = `Total trading ${unit}: ${bars} ${unit}`;
    }

    return { title: this.theme.accent('Trading'), lines: [line] };
  }

  trendPanel(summary: KlineSummary): PanelSection {
    const { up, down, flat, total } = summary.trend;
    const share = (count: number): string => `${((count / total) * 100).toFixed(1)}%`;

    const lines = [
      `Up: ${this.theme.up(`${up} (${share(up)})`)}`,
      `Down: ${this.theme.down(`${down} (${share(down)})`)}`,
    ];
    if (flat > 0) {
      lines.push(`Flat: ${this.theme.warn(`${flat} (${share(flat)})`)}`);
    }

    return { title: this.theme.accent('Trend'), lines };
  }

  pricePanel(summary: KlineSummary): PanelSection {
    const change = summary.priceChange;
    const title = this.theme.accent('Price');

    if (!change.available) {
      return { title, lines: [this.theme.muted('Needs two or more bars')] };
    }

    const paint = this.theme.bySign(change.absolute);
    return {
      title,
      lines: [
        `Change: ${paint(`${formatSigned(change.absolute)} (${formatSigned(change.percent)}%)`)}`,
        `Start price: ${this.theme.label(formatPrice(change.firstClose))}`,
        `End price: ${this.theme.label(formatPrice(change.lastClose))}`,
      ],
    };
  }

  investmentPanel(summary: KlineSummary): PanelSection {
    const investment = summary.investment;
    const lines = [`Principal: ${this.theme.accent(`¥${formatMoney(investment.principal, 0)}`)}`];

    if (summary.priceChange.available) {
      const paint = this.theme.bySign(investment.profit);
      const percent = `(${formatSigned(investment.profitPercent)}%)`;

      lines.push(`Shares: ${investment.shares.toFixed(0)}`);
      lines.push(`Final value: ${this.theme.accent(`¥${formatMoney(investment.finalValue)}`)}`);

      if (investment.profit > 0) {
        lines.push(`Profit: ${paint(`+¥${formatMoney(investment.profit)} ${percent}`)}`);
      } else if (investment.profit < 0) {
        lines.push(`Loss: ${paint(`¥${formatMoney(investment.profit)} ${percent}`)}`);
      } else {
        lines.push(`Break-even ${percent}`);
      }
    }

    return { title: this.theme.accent('Investment'), lines };
  }

  volumePanel(summary: KlineSummary): PanelSection {
    return {
      title: this.theme.accent('Volume'),
      lines: [
        `Average volume: ${this.theme.info(formatInteger(summary.volume.average))}`,
        `Max volume: ${this.theme.info(formatInteger(summary.volume.max))}`,
      ],
    };
  }
}
