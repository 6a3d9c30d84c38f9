/**
 * Company info, industry and quote-link renderers
 */

import type { IndustryInfo, ListingStatus, ReferenceInfo, SecurityType, Ticker } from '@ashare/contracts';
import { quoteLinks } from '@ashare/symbol-registry';
import type { Theme } from './theme.js';
import { renderKeyValue, renderPanels } from './layout.js';

const SECURITY_TYPE_LABELS: Record<SecurityType, string> = {
  stock: 'Stock',
  index: 'Index',
  other: 'Other',
  'convertible-bond': 'Convertible bond',
  etf: 'ETF',
  unknown: '-',
};

export class ReferenceFormatter {
  constructor(private readonly theme: Theme) {}

  formatInfo(ticker: Ticker, info: ReferenceInfo): string {
    const title = this.theme.heading(`${ticker} company info`);
    const table = renderKeyValue(
      [this.theme.label('Field'), this.theme.label('Value')],
      [
        ['Code', info.code],
        ['Name', info.name || '-'],
        ['IPO date', info.ipoDate ?? '-'],
        ['Delisting date', info.outDate ?? this.theme.success('Listed')],
        ['Type', SECURITY_TYPE_LABELS[info.type]],
        ['Status', this.formatStatus(info.status)],
      ]
    );
    return `${title}\n${table}`;
  }

  formatIndustry(industry: IndustryInfo): string {
    const title = this.theme.heading('Industry');
    const table = renderKeyValue(
      [this.theme.label('Field'), this.theme.label('Value')],
      [
        ['Industry', industry.industry ?? '-'],
        ['Classification', industry.classification ?? '-'],
        ['Updated', industry.updateDate ?? '-'],
      ]
    );
    return `${title}\n${table}`;
  }

  /** The "More" panel with external quote pages */
  formatLinks(ticker: Ticker): string {
    const links = quoteLinks(ticker);
    return renderPanels([
      {
        title: this.theme.accent('More'),
        lines: [
          `Baidu quote:  ${this.theme.link(links.baiduQuote)}`,
          `Eastmoney:    ${this.theme.link(links.eastmoney)}`,
          `Baidu search: ${this.theme.link(links.baiduSearch)}`,
        ],
      },
    ]);
  }

  private formatStatus(status: ListingStatus): string {
    switch (status) {
      case 'listed':
        return this.theme.success('Listed');
      case 'delisted':
        return this.theme.error('Delisted');
      case 'unknown':
        return '-';
    }
  }
}
