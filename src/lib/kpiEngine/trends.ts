import type { PeriodRow } from "@/lib/cashflowEngine";

import { mean, safeDivide } from "./math";
import type { KpiTrendPoint } from "./types";

/**
 * Rolling means over `window` months. The first point covers the first full
 * window, so a table shorter than the window yields no points.
 */
export function calculateKpiTrends(rows: readonly PeriodRow[], window = 3): KpiTrendPoint[] {
  const points: KpiTrendPoint[] = [];
  if (window < 1) return points;

  for (let end = window; end <= rows.length; end++) {
    const slice = rows.slice(end - window, end);
    const revenue = mean(slice.map((r) => r.totalRevenue));
    const previous = points.at(-1);

    points.push({
      period: slice[slice.length - 1].period,
      revenue,
      expenses: mean(slice.map((r) => r.totalExpenses)),
      netCashFlow: mean(slice.map((r) => r.netCashFlow)),
      burnRate: mean(slice.map((r) => Math.max(-r.netCashFlow, 0))),
      revenueMomentum: previous === undefined ? 0 : safeDivide(revenue - previous.revenue, previous.revenue) * 100,
    });
  }

  return points;
}
