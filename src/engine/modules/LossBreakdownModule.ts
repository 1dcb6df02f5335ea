import type { HeatLossComponentsV1, HeatLossSharesV1 } from '../../contracts/HeatLossOutputV1';

export interface LossBreakdownResult extends HeatLossSharesV1 {
  totalKwh: number;
  totalCost: number;
}

/**
 * Totals the four components, derives each component's share of the total
 * and prices the total at the given tariff.
 *
 * Shares are only meaningful for a finite net loss: when the total is zero,
 * negative or has overflowed to Infinity every share is 0.
 */
export function buildLossBreakdown(
  components: HeatLossComponentsV1,
  electricityCostPerKwh: number,
): LossBreakdownResult {
  const { roofKwh, wallsKwh, windowsKwh, infiltrationKwh } = components;
  const totalKwh = roofKwh + wallsKwh + windowsKwh + infiltrationKwh;

  const share = (kwh: number) => (Number.isFinite(totalKwh) && totalKwh > 0 ? (kwh / totalKwh) * 100 : 0);

  return {
    totalKwh,
    roofPct: share(roofKwh),
    wallsPct: share(wallsKwh),
    windowsPct: share(windowsKwh),
    infiltrationPct: share(infiltrationKwh),
    totalCost: totalKwh * electricityCostPerKwh,
  };
}
