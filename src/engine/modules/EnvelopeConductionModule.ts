// ─── Envelope Conduction ─────────────────────────────────────────────────────
//
// Steady-state conductive loss through the opaque envelope (roof, walls) and
// the glazing.
//
//   Opaque surfaces use a two-layer series resistance:
//     R_total = thickness / k  (structural layer)  +  R_SI  (insulation)
//     Q_W     = A_m² × ΔT / R_total
//
//   Glazing uses the whole-window U-value directly:
//     Q_W     = A_m² × U × ΔT
//
// A negative ΔT (inside colder than outside) yields negative losses, i.e. heat
// gained through the envelope. That is reported as-is, not rejected.

import {
  INSULATION_R_VALUES,
  ROOF_MATERIAL_PROPERTIES,
  WALL_MATERIAL_PROPERTIES,
  WINDOW_U_VALUES,
} from '../catalog/thermalProperties.catalog';
import type { MaterialProperty } from '../catalog/thermalProperties.catalog';
import type { HeatLossInputV1 } from '../schema/HeatLossInputV1';
import { imperialRToSi, sqftToSqm, wattsToKwh } from '../utils/units';

export type EnvelopeConductionInput = Pick<
  HeatLossInputV1,
  | 'roofAreaSqft'
  | 'wallAreaSqft'
  | 'windowAreaSqft'
  | 'roofMaterial'
  | 'wallMaterial'
  | 'windowType'
  | 'insulationBand'
  | 'durationHours'
> & {
  /** Inside minus ambient (°C). */
  deltaTC: number;
};

export interface EnvelopeConductionResult {
  /** Insulation resistance applied to both opaque surfaces (m²·K/W). */
  insulationRsi: number;
  roofW: number;
  wallsW: number;
  windowsW: number;
  roofKwh: number;
  wallsKwh: number;
  windowsKwh: number;
}

/** Series-resistance conduction through one opaque surface (W). */
export function opaqueConductionW(
  areaM2: number,
  deltaTC: number,
  material: MaterialProperty,
  insulationRsi: number,
): number {
  const layerResistance = material.thicknessM / material.thermalConductivity;
  return (areaM2 * deltaTC) / (layerResistance + insulationRsi);
}

export function glazingConductionW(areaM2: number, uValue: number, deltaTC: number): number {
  return areaM2 * uValue * deltaTC;
}

export function runEnvelopeConductionModule(input: EnvelopeConductionInput): EnvelopeConductionResult {
  const insulationRsi = imperialRToSi(INSULATION_R_VALUES[input.insulationBand]);

  const roofW = opaqueConductionW(
    sqftToSqm(input.roofAreaSqft),
    input.deltaTC,
    ROOF_MATERIAL_PROPERTIES[input.roofMaterial],
    insulationRsi,
  );
  const wallsW = opaqueConductionW(
    sqftToSqm(input.wallAreaSqft),
    input.deltaTC,
    WALL_MATERIAL_PROPERTIES[input.wallMaterial],
    insulationRsi,
  );
  const windowsW = glazingConductionW(
    sqftToSqm(input.windowAreaSqft),
    WINDOW_U_VALUES[input.windowType],
    input.deltaTC,
  );

  return {
    insulationRsi,
    roofW,
    wallsW,
    windowsW,
    roofKwh: wattsToKwh(roofW, input.durationHours),
    wallsKwh: wattsToKwh(wallsW, input.durationHours),
    windowsKwh: wattsToKwh(windowsW, input.durationHours),
  };
}
