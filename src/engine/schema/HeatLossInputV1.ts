/**
 * HeatLossInputV1 – canonical input contract for the heat-loss core.
 *
 * Geometry is entered in square feet and temperatures in °F; every physics
 * module converts to SI internally. Categorical fields are closed unions whose
 * permitted values live in the option lists below (single source of truth for
 * validation, the scenario sweep and the input panel).
 */

// ─── Categorical options ──────────────────────────────────────────────────────

export const ROOF_MATERIALS = ['asphalt', 'wood', 'metal', 'tile'] as const;
export const WALL_MATERIALS = ['brick', 'concrete', 'wood'] as const;
export const INSULATION_BANDS = ['R13-R15', 'R16-R21', 'R22-R33', 'R34-R60'] as const;
export const WINDOW_TYPES = ['single', 'double', 'triple'] as const;

export type RoofMaterial = (typeof ROOF_MATERIALS)[number];
export type WallMaterial = (typeof WALL_MATERIALS)[number];
export type InsulationBand = (typeof INSULATION_BANDS)[number];
export type WindowType = (typeof WINDOW_TYPES)[number];

// ─── Canonical input ──────────────────────────────────────────────────────────

export interface HeatLossInputV1 {
  /** Roof area (sqft). */
  roofAreaSqft: number;
  /** Exterior wall area (sqft), windows excluded. */
  wallAreaSqft: number;
  roofMaterial: RoofMaterial;
  wallMaterial: WallMaterial;
  /** Outside air temperature (°F). */
  ambientTempF: number;
  /** Heated-space setpoint (°F). May be below ambient. */
  insideTempF: number;
  /** Period the loss is integrated over (hours). */
  durationHours: number;
  insulationBand: InsulationBand;
  airChangesPerHour: number;
  /** Total glazed area (sqft). */
  windowAreaSqft: number;
  windowType: WindowType;
  /** Tariff, currency units per kWh. */
  electricityCostPerKwh: number;
}

/**
 * Un-validated input as it arrives from a form, a preset or any untyped
 * source. Categorical fields are plain strings until the validator narrows
 * them.
 */
export type HeatLossInputDraftV1 = {
  [K in keyof HeatLossInputV1]: HeatLossInputV1[K] extends number ? number : string;
};

export type HeatLossNumericField = {
  [K in keyof HeatLossInputV1]: HeatLossInputV1[K] extends number ? K : never;
}[keyof HeatLossInputV1];

/** Every field except the three the scenario sweep enumerates. */
export type ScenarioBaselineV1 = Omit<HeatLossInputV1, 'roofMaterial' | 'windowType' | 'insulationBand'>;

// ─── Type guards ──────────────────────────────────────────────────────────────

function isOneOf<T extends string>(options: readonly T[], value: string): value is T {
  return options.some(option => option === value);
}

export function isRoofMaterial(value: string): value is RoofMaterial {
  return isOneOf(ROOF_MATERIALS, value);
}

export function isWallMaterial(value: string): value is WallMaterial {
  return isOneOf(WALL_MATERIALS, value);
}

export function isInsulationBand(value: string): value is InsulationBand {
  return isOneOf(INSULATION_BANDS, value);
}

export function isWindowType(value: string): value is WindowType {
  return isOneOf(WINDOW_TYPES, value);
}
