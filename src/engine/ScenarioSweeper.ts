import type { HeatLossResultV1, ScenarioSetV1 } from '../contracts/HeatLossOutputV1';
import { computeHeatLoss } from './HeatLossCalculator';
import { ContractViolationError } from './errors';
import { INSULATION_BANDS, ROOF_MATERIALS, WINDOW_TYPES } from './schema/HeatLossInputV1';
import type {
  HeatLossInputV1,
  InsulationBand,
  RoofMaterial,
  ScenarioBaselineV1,
  WindowType,
} from './schema/HeatLossInputV1';

export interface ScenarioCombination {
  roofMaterial: RoofMaterial;
  windowType: WindowType;
  insulationBand: InsulationBand;
}

/**
 * The fixed sweep grid: roof material × window type × insulation band,
 * nested in that order (4 × 3 × 4 = 48).
 */
export function enumerateScenarioCombinations(): ScenarioCombination[] {
  const combinations: ScenarioCombination[] = [];
  for (const roofMaterial of ROOF_MATERIALS) {
    for (const windowType of WINDOW_TYPES) {
      for (const insulationBand of INSULATION_BANDS) {
        combinations.push({ roofMaterial, windowType, insulationBand });
      }
    }
  }
  return combinations;
}

/** Drops the three swept fields from a validated input (or a result). */
export function toScenarioBaseline(input: HeatLossInputV1): ScenarioBaselineV1 {
  return {
    roofAreaSqft: input.roofAreaSqft,
    wallAreaSqft: input.wallAreaSqft,
    wallMaterial: input.wallMaterial,
    ambientTempF: input.ambientTempF,
    insideTempF: input.insideTempF,
    durationHours: input.durationHours,
    airChangesPerHour: input.airChangesPerHour,
    windowAreaSqft: input.windowAreaSqft,
    electricityCostPerKwh: input.electricityCostPerKwh,
  };
}

/**
 * sweepScenarios runs computeHeatLoss once per grid combination on top of
 * the baseline and returns the results ascending by totalKwh.
 *
 * The sort is stable, so equal totals keep grid order. Any validation failure
 * means the baseline itself is bad and is thrown as a contract violation,
 * never dropped.
 */
export function sweepScenarios(baseline: ScenarioBaselineV1): ScenarioSetV1 {
  const results: HeatLossResultV1[] = [];

  for (const combination of enumerateScenarioCombinations()) {
    const outcome = computeHeatLoss({ ...baseline, ...combination });
    if (outcome.kind === 'invalid') {
      throw new ContractViolationError(
        `Scenario sweep: baseline rejected for roof=${combination.roofMaterial}, ` +
        `windows=${combination.windowType}, insulation=${combination.insulationBand}: ` +
        outcome.failure.errors.join(' '),
      );
    }
    results.push(outcome.result);
  }

  if (results.length === 0) {
    throw new ContractViolationError('Scenario sweep produced no results.');
  }
  const unsortable = results.findIndex(r => typeof r.totalKwh !== 'number' || Number.isNaN(r.totalKwh));
  if (unsortable !== -1) {
    throw new ContractViolationError(`Scenario sweep: result ${unsortable} has no numeric totalKwh.`);
  }

  return Object.freeze([...results].sort((a, b) => a.totalKwh - b.totalKwh));
}
