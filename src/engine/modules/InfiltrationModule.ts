// ─── Air Infiltration ────────────────────────────────────────────────────────
//
// Uncontrolled air exchange with outside.
//
//   V   = (roof sqft + wall sqft) × 0.092903 × ceiling height     (m³)
//   Q   = V × ACH × ΔT × 0.33 × hours / 1000                       (kWh)
//
// 0.33 Wh/(m³·K) is the volumetric heat capacity of air. The volume proxy
// treats the envelope area as floor area under a single storey.

import type { HeatLossInputV1 } from '../schema/HeatLossInputV1';
import { sqftToSqm } from '../utils/units';

/** Assumed storey height (m). */
export const CEILING_HEIGHT_M = 2.5;
/** Volumetric heat capacity of air (Wh/(m³·K)). */
export const INFILTRATION_FACTOR_WH_PER_M3K = 0.33;

export type InfiltrationInput = Pick<
  HeatLossInputV1,
  'roofAreaSqft' | 'wallAreaSqft' | 'airChangesPerHour' | 'durationHours'
> & {
  deltaTC: number;
};

export interface InfiltrationResult {
  volumeM3: number;
  infiltrationKwh: number;
}

export function runInfiltrationModule(input: InfiltrationInput): InfiltrationResult {
  const volumeM3 = sqftToSqm(input.roofAreaSqft + input.wallAreaSqft) * CEILING_HEIGHT_M;
  const infiltrationKwh =
    (volumeM3 *
      input.airChangesPerHour *
      input.deltaTC *
      INFILTRATION_FACTOR_WH_PER_M3K *
      input.durationHours) /
    1000;
  return { volumeM3, infiltrationKwh };
}
