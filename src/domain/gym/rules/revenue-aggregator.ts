import { Injectable } from '@nestjs/common';
import { MONTH_LABELS, MonthlyRevenue, RevenueEntry } from '../models';
import { fromMinorUnits, toMinorUnits } from '../utils/money.util';

@Injectable()
export class RevenueAggregator {
  /**
   * Sums amounts per UTC calendar month of `year`. Always 12 entries,
   * January first; entries from other years are dropped.
   */
  aggregate(entries: Iterable<RevenueEntry>, year: number): number[] {
    const minorTotals = new Array<number>(12).fill(0);

    for (const entry of entries) {
      if (entry.createdAt.getUTCFullYear() !== year) continue;

      minorTotals[entry.createdAt.getUTCMonth()] += toMinorUnits(entry.amount);
    }

    return minorTotals.map(fromMinorUnits);
  }

  summarize(entries: Iterable<RevenueEntry>, year: number): MonthlyRevenue {
    const data = this.aggregate(entries, year);
    const totalMinor = data.reduce(
      (sum, value) => sum + toMinorUnits(value),
      0,
    );

    return {
      year,
      labels: [...MONTH_LABELS],
      data,
      total: fromMinorUnits(totalMinor),
    };
  }
}
