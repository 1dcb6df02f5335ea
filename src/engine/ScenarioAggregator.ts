/**
 * ScenarioAggregator: the data contract behind the charts.
 *
 * Everything here is derived from HeatLossResultV1 values; no physics is
 * recomputed. Group orderings follow the option lists in HeatLossInputV1 so a
 * chart's x-axis reads from worst to best insulation / glazing.
 */

import type { HeatLossComponentId, HeatLossResultV1 } from '../contracts/HeatLossOutputV1';
import { ContractViolationError } from './errors';
import { INSULATION_BANDS, WINDOW_TYPES } from './schema/HeatLossInputV1';
import type { InsulationBand, WindowType } from './schema/HeatLossInputV1';

export interface InsulationBandMean {
  band: InsulationBand;
  meanTotalKwh: number;
}

export interface WindowTypeMean {
  windowType: WindowType;
  meanTotalCost: number;
}

export interface ComponentBreakdownRow {
  component: HeatLossComponentId;
  label: string;
  kwh: number;
  pct: number;
}

export interface ThermalMapCell {
  kwh: number;
  /** Share used for the diagram annotation (see buildThermalMapShading). */
  pct: number;
  /** 0–1, relative to the largest component. Drives the colour scale. */
  intensity: number;
}

export type ThermalMapShading = Record<HeatLossComponentId, ThermalMapCell>;

export const COMPONENT_LABELS: Record<HeatLossComponentId, string> = {
  roof: 'Roof',
  walls: 'Walls',
  windows: 'Windows',
  infiltration: 'Infiltration',
};

const COMPONENT_ORDER: readonly HeatLossComponentId[] = ['roof', 'walls', 'windows', 'infiltration'];

/** Floor for the colour-scale maximum so an all-zero result still normalises. */
const MIN_SCALE_KWH = 1e-6;

function requireNonEmpty(results: readonly HeatLossResultV1[], what: string): void {
  if (results.length === 0) {
    throw new ContractViolationError(`${what}: scenario set is empty.`);
  }
}

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function meanTotalKwhByInsulationBand(results: readonly HeatLossResultV1[]): InsulationBandMean[] {
  requireNonEmpty(results, 'meanTotalKwhByInsulationBand');
  const groups: InsulationBandMean[] = [];
  for (const band of INSULATION_BANDS) {
    const totals = results.filter(r => r.insulationBand === band).map(r => r.totalKwh);
    if (totals.length > 0) groups.push({ band, meanTotalKwh: mean(totals) });
  }
  return groups;
}

export function meanTotalCostByWindowType(results: readonly HeatLossResultV1[]): WindowTypeMean[] {
  requireNonEmpty(results, 'meanTotalCostByWindowType');
  const groups: WindowTypeMean[] = [];
  for (const windowType of WINDOW_TYPES) {
    const costs = results.filter(r => r.windowType === windowType).map(r => r.totalCost);
    if (costs.length > 0) groups.push({ windowType, meanTotalCost: mean(costs) });
  }
  return groups;
}

function componentKwh(result: HeatLossResultV1, component: HeatLossComponentId): number {
  switch (component) {
    case 'roof':         return result.roofKwh;
    case 'walls':        return result.wallsKwh;
    case 'windows':      return result.windowsKwh;
    case 'infiltration': return result.infiltrationKwh;
  }
}

function componentPct(result: HeatLossResultV1, component: HeatLossComponentId): number {
  switch (component) {
    case 'roof':         return result.roofPct;
    case 'walls':        return result.wallsPct;
    case 'windows':      return result.windowsPct;
    case 'infiltration': return result.infiltrationPct;
  }
}

export function buildComponentBreakdown(result: HeatLossResultV1): ComponentBreakdownRow[] {
  return COMPONENT_ORDER.map(component => ({
    component,
    label: COMPONENT_LABELS[component],
    kwh: componentKwh(result, component),
    pct: componentPct(result, component),
  }));
}

/**
 * Per-component shading for the house diagram.
 *
 * Unlike the result's own shares, the diagram always annotates a percentage:
 * when totalKwh ≤ 0 it divides by the component sum instead, and by 1 when
 * that is not positive either.
 */
export function buildThermalMapShading(result: HeatLossResultV1): ThermalMapShading {
  const kwh = COMPONENT_ORDER.map(c => componentKwh(result, c));

  let denominator = result.totalKwh;
  if (denominator <= 0) {
    denominator = kwh.reduce((sum, v) => sum + v, 0);
    if (denominator <= 0) denominator = 1;
  }
  const scaleMax = Math.max(...kwh, MIN_SCALE_KWH);

  const cell = (q: number): ThermalMapCell => ({
    kwh: q,
    pct: (q / denominator) * 100,
    intensity: Math.min(1, Math.max(0, q / scaleMax)),
  });

  return {
    roof: cell(result.roofKwh),
    walls: cell(result.wallsKwh),
    windows: cell(result.windowsKwh),
    infiltration: cell(result.infiltrationKwh),
  };
}
