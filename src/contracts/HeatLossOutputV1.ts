import type { HeatLossInputV1 } from '../engine/schema/HeatLossInputV1';

/** Per-component energy over the calculation period (kWh). */
export interface HeatLossComponentsV1 {
  roofKwh: number;
  wallsKwh: number;
  windowsKwh: number;
  infiltrationKwh: number;
}

/** Share of total loss per component (0–100). All zero when total ≤ 0. */
export interface HeatLossSharesV1 {
  roofPct: number;
  wallsPct: number;
  windowsPct: number;
  infiltrationPct: number;
}

/**
 * One successful calculation: the validated input echoed verbatim plus the
 * computed breakdown. Returned frozen.
 */
export interface HeatLossResultV1 extends HeatLossInputV1, HeatLossComponentsV1, HeatLossSharesV1 {
  totalKwh: number;
  totalCost: number;
}

export interface ValidationFailureV1 {
  /** One message per violated constraint, in check order. */
  errors: string[];
}

export type HeatLossOutcomeV1 =
  | { kind: 'result'; result: HeatLossResultV1 }
  | { kind: 'invalid'; failure: ValidationFailureV1 };

/** Sweep output, ascending by totalKwh. */
export type ScenarioSetV1 = readonly HeatLossResultV1[];

export type HeatLossComponentId = 'roof' | 'walls' | 'windows' | 'infiltration';
