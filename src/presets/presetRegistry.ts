/**
 * presetRegistry.ts
 *
 * Named building profiles and the input defaults the panel pre-fills.
 * A profile only pins the fabric and airtightness choices; geometry,
 * temperatures and tariff stay with the defaults or the user's own values.
 *
 * Physics engine is NOT touched here; this is purely input scoping.
 */

import type { HeatLossInputV1 } from '../engine/schema/HeatLossInputV1';

export type PresetId = '1950s_leaky_home' | 'new_code_min' | 'high_performance';

export type PresetValues = Pick<
  HeatLossInputV1,
  'roofMaterial' | 'wallMaterial' | 'insulationBand' | 'airChangesPerHour' | 'windowType'
>;

export interface PresetProfile {
  id: PresetId;
  title: string;
  description: string;
  values: PresetValues;
}

/** Values used for any field neither a preset nor the user supplies. */
export const INPUT_DEFAULTS: Readonly<HeatLossInputV1> = Object.freeze({
  roofAreaSqft: 1800,
  wallAreaSqft: 1500,
  roofMaterial: 'wood',
  wallMaterial: 'wood',
  ambientTempF: 50,
  insideTempF: 70,
  durationHours: 24,
  insulationBand: 'R13-R15',
  airChangesPerHour: 0.5,
  windowAreaSqft: 500,
  windowType: 'double',
  electricityCostPerKwh: 0.12,
});

export const leakyHomePreset: PresetProfile = {
  id: '1950s_leaky_home',
  title: '1950s leaky home',
  description: 'Asphalt shingles over brick, minimal batts, single glazing and draughty joinery.',
  values: {
    roofMaterial: 'asphalt',
    wallMaterial: 'brick',
    insulationBand: 'R13-R15',
    airChangesPerHour: 0.9,
    windowType: 'single',
  },
};

export const newCodeMinimumPreset: PresetProfile = {
  id: 'new_code_min',
  title: 'New build, code minimum',
  description: 'Timber frame and roof deck built to current minimum insulation with double glazing.',
  values: {
    roofMaterial: 'wood',
    wallMaterial: 'wood',
    insulationBand: 'R22-R33',
    airChangesPerHour: 0.5,
    windowType: 'double',
  },
};

export const highPerformancePreset: PresetProfile = {
  id: 'high_performance',
  title: 'High performance',
  description: 'Super-insulated timber envelope, triple glazing and a tight air barrier.',
  values: {
    roofMaterial: 'wood',
    wallMaterial: 'wood',
    insulationBand: 'R34-R60',
    airChangesPerHour: 0.3,
    windowType: 'triple',
  },
};

export const PRESET_PROFILES: readonly PresetProfile[] = [
  leakyHomePreset,
  newCodeMinimumPreset,
  highPerformancePreset,
];

export function getPresetProfile(id: string): PresetProfile | undefined {
  return PRESET_PROFILES.find(p => p.id === id);
}
