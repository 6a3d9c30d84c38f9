/**
 * Financial statement tables
 */

import type { BalanceStatement, CashFlowStatement, ProfitStatement, ReportPeriod } from '@ashare/contracts';
import type { Theme } from './theme.js';
import { renderKeyValue } from './layout.js';
import { formatPrice, formatStatementAmount } from './number-format.js';

export interface FinanceReport {
  period: ReportPeriod;
  profit: ProfitStatement | null;
  balance: BalanceStatement | null;
  cashFlow: CashFlowStatement | null;
}

export function formatPeriod(period: ReportPeriod): string {
  return `${period.year}Q${period.quarter}`;
}

export class FinanceFormatter {
  constructor(private readonly theme: Theme) {}

  /**
   * Tables for the statements that are present, in income/balance/cash-flow order
   */
  format(report: FinanceReport): string {
    const sections: string[] = [];
    const period = formatPeriod(report.period);

    if (report.profit) {
      const p = report.profit;
      sections.push(
        this.section(`Income statement (${period})`, [
          ['Operating revenue', formatStatementAmount(p.totalOperatingRevenue)],
          ['Operating cost', formatStatementAmount(p.operatingCost)],
          ['Operating profit', formatStatementAmount(p.operatingProfit)],
          ['Total profit', formatStatementAmount(p.totalProfit)],
          ['Net profit', formatStatementAmount(p.netProfit)],
          // Per-share figure; amount units would round it to 0
          ['Basic EPS', formatPrice(p.basicEarningsPerShare)],
        ])
      );
    }

    if (report.balance) {
      const b = report.balance;
      sections.push(
        this.section(`Balance sheet (${period})`, [
          ['Total assets', formatStatementAmount(b.totalAssets)],
          ['Total liabilities', formatStatementAmount(b.totalLiabilities)],
          ["Shareholders' equity", formatStatementAmount(b.totalShareholderEquity)],
          ['Current assets', formatStatementAmount(b.totalCurrentAssets)],
          ['Current liabilities', formatStatementAmount(b.totalCurrentLiabilities)],
        ])
      );
    }

    if (report.cashFlow) {
      const c = report.cashFlow;
      sections.push(
        this.section(`Cash flow statement (${period})`, [
          ['Operating cash flow', formatStatementAmount(c.operatingCashFlow)],
          ['Investing cash flow', formatStatementAmount(c.investingCashFlow)],
          ['Financing cash flow', formatStatementAmount(c.financingCashFlow)],
          ['Net change in cash', formatStatementAmount(c.netIncreaseInCash)],
        ])
      );
    }

    return sections.join('\n\n');
  }

  private section(title: string, rows: ReadonlyArray<readonly [string, string]>): string {
    const table = renderKeyValue([this.theme.label('Item'), this.theme.label('Amount')], rows);
    return `${this.theme.heading(title)}\n${table}`;
  }
}
