/**
 * InputValidator: validation-as-data for HeatLossInputDraftV1.
 *
 * Every check runs (no short-circuit) so the caller can show all problems at
 * once. Messages are emitted in a fixed order: areas, roof material, wall
 * material, insulation band, window type, then one combined message for the
 * operating parameters.
 *
 * Temperatures only need to be finite: 0 °F and sub-zero readings are valid
 * winter conditions. Duration, air changes, window area and tariff must be
 * strictly positive.
 */

import {
  INSULATION_BANDS,
  ROOF_MATERIALS,
  WALL_MATERIALS,
  WINDOW_TYPES,
  isInsulationBand,
  isRoofMaterial,
  isWallMaterial,
  isWindowType,
} from '../schema/HeatLossInputV1';
import type { HeatLossInputDraftV1, HeatLossInputV1 } from '../schema/HeatLossInputV1';

export type InputValidationResult =
  | { ok: true; input: HeatLossInputV1 }
  | { ok: false; errors: string[] };

export const ROOF_MATERIAL_ERROR = `Invalid roof material. Expected one of: ${ROOF_MATERIALS.join(', ')}.`;
export const WALL_MATERIAL_ERROR = `Invalid wall material. Expected one of: ${WALL_MATERIALS.join(', ')}.`;
export const INSULATION_BAND_ERROR = `Invalid insulation band. Expected one of: ${INSULATION_BANDS.join(', ')}.`;
export const WINDOW_TYPE_ERROR = `Invalid window type. Expected one of: ${WINDOW_TYPES.join(', ')}.`;
export const OPERATING_PARAMETERS_ERROR =
  'Invalid value for one or more operating parameters. Temperatures must be finite numbers; ' +
  'duration, air changes, window area and electricity cost must be positive numbers.';

export function positiveAreaError(field: 'roofAreaSqft' | 'wallAreaSqft'): string {
  return `Invalid value for ${field}. Must be a positive number.`;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isPositiveNumber(value: unknown): value is number {
  return isFiniteNumber(value) && value > 0;
}

export function validateHeatLossInput(draft: HeatLossInputDraftV1): InputValidationResult {
  const errors: string[] = [];

  if (!isPositiveNumber(draft.roofAreaSqft)) errors.push(positiveAreaError('roofAreaSqft'));
  if (!isPositiveNumber(draft.wallAreaSqft)) errors.push(positiveAreaError('wallAreaSqft'));

  const { roofMaterial, wallMaterial, insulationBand, windowType } = draft;
  if (!isRoofMaterial(roofMaterial)) errors.push(ROOF_MATERIAL_ERROR);
  if (!isWallMaterial(wallMaterial)) errors.push(WALL_MATERIAL_ERROR);
  if (!isInsulationBand(insulationBand)) errors.push(INSULATION_BAND_ERROR);
  if (!isWindowType(windowType)) errors.push(WINDOW_TYPE_ERROR);

  const operatingOk =
    isFiniteNumber(draft.ambientTempF) &&
    isFiniteNumber(draft.insideTempF) &&
    isPositiveNumber(draft.durationHours) &&
    isPositiveNumber(draft.airChangesPerHour) &&
    isPositiveNumber(draft.windowAreaSqft) &&
    isPositiveNumber(draft.electricityCostPerKwh);
  if (!operatingOk) errors.push(OPERATING_PARAMETERS_ERROR);

  if (
    errors.length > 0 ||
    !isRoofMaterial(roofMaterial) ||
    !isWallMaterial(wallMaterial) ||
    !isInsulationBand(insulationBand) ||
    !isWindowType(windowType)
  ) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    input: { ...draft, roofMaterial, wallMaterial, insulationBand, windowType },
  };
}
