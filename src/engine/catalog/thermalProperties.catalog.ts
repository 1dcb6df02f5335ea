/**
 * Thermal reference tables.
 *
 * Canonical source of truth for material, insulation and glazing properties:
 * import from here; never redefine these figures in other files. Every table
 * is frozen at module load.
 */

import type { InsulationBand, RoofMaterial, WallMaterial, WindowType } from '../schema/HeatLossInputV1';

export interface MaterialProperty {
  /** Thermal conductivity k (W/(m·K)). */
  thermalConductivity: number;
  /** Layer thickness (m). */
  thicknessM: number;
}

export const ROOF_MATERIAL_PROPERTIES: Readonly<Record<RoofMaterial, Readonly<MaterialProperty>>> = Object.freeze({
  asphalt: Object.freeze({ thermalConductivity: 0.2,  thicknessM: 0.005 }),
  wood:    Object.freeze({ thermalConductivity: 0.08, thicknessM: 0.01 }),
  metal:   Object.freeze({ thermalConductivity: 50,   thicknessM: 0.0007 }),
  tile:    Object.freeze({ thermalConductivity: 1.1,  thicknessM: 0.015 }),
});

export const WALL_MATERIAL_PROPERTIES: Readonly<Record<WallMaterial, Readonly<MaterialProperty>>> = Object.freeze({
  brick:    Object.freeze({ thermalConductivity: 0.6,  thicknessM: 0.2 }),
  concrete: Object.freeze({ thermalConductivity: 1.0,  thicknessM: 0.15 }),
  wood:     Object.freeze({ thermalConductivity: 0.12, thicknessM: 0.1 }),
});

/**
 * Nominal imperial R-value for each insulation band (ft²·°F·h/BTU).
 * Each band is represented by a point inside its range, not its lower bound.
 */
export const INSULATION_R_VALUES: Readonly<Record<InsulationBand, number>> = Object.freeze({
  'R13-R15': 14,
  'R16-R21': 18,
  'R22-R33': 28,
  'R34-R60': 47,
});

/** Whole-window U-value (W/(m²·K)). */
export const WINDOW_U_VALUES: Readonly<Record<WindowType, number>> = Object.freeze({
  single: 5.7,
  double: 2.8,
  triple: 1.6,
});
