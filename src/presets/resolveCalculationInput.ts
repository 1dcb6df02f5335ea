/**
 * resolveCalculationInput.ts
 *
 * Builds the draft handed to computeHeatLoss from three layers, lowest
 * precedence first: INPUT_DEFAULTS, the selected preset, explicit overrides.
 * An override that is `undefined` leaves the lower layer in place, so a form
 * can pass every field and only the ones the user touched take effect.
 *
 * The result is a draft, not a validated input: overrides may be anything the
 * user typed, and validation belongs to the calculator.
 */

import { ContractViolationError } from '../engine/errors';
import type { HeatLossInputDraftV1 } from '../engine/schema/HeatLossInputV1';
import { INPUT_DEFAULTS, getPresetProfile } from './presetRegistry';
import type { PresetValues } from './presetRegistry';

export type HeatLossOverrides = { [K in keyof HeatLossInputDraftV1]?: HeatLossInputDraftV1[K] };

export interface ResolveInputOptions {
  presetId?: string;
  overrides?: HeatLossOverrides;
}

function definedOnly(overrides: HeatLossOverrides): HeatLossOverrides {
  const out: HeatLossOverrides = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}

export function resolveCalculationInput(options: ResolveInputOptions = {}): HeatLossInputDraftV1 {
  let presetValues: Partial<PresetValues> = {};
  if (options.presetId !== undefined) {
    const preset = getPresetProfile(options.presetId);
    if (!preset) {
      throw new ContractViolationError(`Unknown preset profile: ${options.presetId}`);
    }
    presetValues = preset.values;
  }

  return {
    ...INPUT_DEFAULTS,
    ...presetValues,
    ...definedOnly(options.overrides ?? {}),
  };
}
