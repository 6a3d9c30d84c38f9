/**
 * Index constituent list and breakdown panels
 */

import type { ConstituentBreakdown, IndexConstituent, IndexSpec } from '@ashare/contracts';
import type { Theme } from './theme.js';
import { renderGrid, renderPanels } from './layout.js';

export class IndexFormatter {
  constructor(private readonly theme: Theme) {}

  formatConstituents(index: IndexSpec, constituents: readonly IndexConstituent[]): string {
    const title = this.theme.heading(`${index.name} constituents (${constituents.length} total)`);
    const grid = renderGrid(
      [
        { header: '#', align: 'center' },
        { header: 'Code', align: 'center' },
        { header: 'Name', align: 'left' },
        { header: 'Updated', align: 'center' },
      ],
      constituents.map((item, i) => [String(i + 1), item.code, item.name || '-', item.updateDate || '-'])
    );
    return `${title}\n${grid}`;
  }

  formatBreakdown(index: IndexSpec, breakdown: ConstituentBreakdown): string {
    const distribution = [
      `SSE: ${this.theme.up(String(breakdown.byExchange.sh))}`,
      `SZSE: ${this.theme.info(String(breakdown.byExchange.sz))}`,
    ];
    if (breakdown.byExchange.other > 0) {
      distribution.push(`Other: ${breakdown.byExchange.other}`);
    }

    return renderPanels([
      {
        title: this.theme.accent('Index'),
        lines: [
          `Name: ${this.theme.accent(index.name)}`,
          `Code: ${this.theme.warn(index.ticker)}`,
          `Constituents: ${this.theme.success(String(breakdown.total))}`,
        ],
      },
      { title: this.theme.accent('Exchanges'), lines: distribution },
    ]);
  }
}
