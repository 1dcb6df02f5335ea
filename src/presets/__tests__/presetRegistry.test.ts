import { describe, it, expect } from 'vitest';
import {
  PRESET_PROFILES,
  INPUT_DEFAULTS,
  getPresetProfile,
  leakyHomePreset,
  highPerformancePreset,
} from '../presetRegistry';
import { resolveCalculationInput } from '../resolveCalculationInput';
import { computeHeatLoss } from '../../engine/HeatLossCalculator';
import { ContractViolationError } from '../../engine/errors';

describe('presetRegistry integrity', () => {
  it('has three uniquely named profiles', () => {
    const ids = PRESET_PROFILES.map(p => p.id);
    expect(ids).toEqual(['1950s_leaky_home', 'new_code_min', 'high_performance']);
  });

  it('all profiles have a title and description', () => {
    for (const preset of PRESET_PROFILES) {
      expect(preset.title).toBeTruthy();
      expect(preset.description).toBeTruthy();
    }
  });

  it('every profile produces a valid calculation on the defaults', () => {
    for (const preset of PRESET_PROFILES) {
      expect(computeHeatLoss(resolveCalculationInput({ presetId: preset.id })).kind).toBe('result');
    }
  });

  it('looks profiles up by id', () => {
    expect(getPresetProfile('high_performance')).toBe(highPerformancePreset);
    expect(getPresetProfile('passive_house')).toBeUndefined();
  });

  it('defaults are frozen', () => {
    expect(Object.isFrozen(INPUT_DEFAULTS)).toBe(true);
  });
});

describe('resolveCalculationInput', () => {
  it('returns the defaults when nothing is selected', () => {
    expect(resolveCalculationInput()).toEqual(INPUT_DEFAULTS);
  });

  it('layers the preset over the defaults', () => {
    const draft = resolveCalculationInput({ presetId: '1950s_leaky_home' });
    expect(draft.roofMaterial).toBe('asphalt');
    expect(draft.wallMaterial).toBe('brick');
    expect(draft.airChangesPerHour).toBe(0.9);
    expect(draft.windowType).toBe('single');
    expect(draft.roofAreaSqft).toBe(INPUT_DEFAULTS.roofAreaSqft);
    expect(draft.insideTempF).toBe(70);
  });

  it('lets explicit overrides win over the preset', () => {
    const draft = resolveCalculationInput({
      presetId: leakyHomePreset.id,
      overrides: { windowType: 'triple', ambientTempF: 20 },
    });
    expect(draft.windowType).toBe('triple');
    expect(draft.ambientTempF).toBe(20);
    expect(draft.roofMaterial).toBe('asphalt');
  });

  it('ignores undefined overrides', () => {
    const draft = resolveCalculationInput({
      presetId: 'new_code_min',
      overrides: { insulationBand: undefined, roofAreaSqft: 2200 },
    });
    expect(draft.insulationBand).toBe('R22-R33');
    expect(draft.roofAreaSqft).toBe(2200);
  });

  it('passes invalid overrides through for the calculator to report', () => {
    const draft = resolveCalculationInput({ overrides: { roofMaterial: 'straw' } });
    expect(draft.roofMaterial).toBe('straw');
    expect(computeHeatLoss(draft).kind).toBe('invalid');
  });

  it('throws for an unknown preset id', () => {
    expect(() => resolveCalculationInput({ presetId: 'igloo' })).toThrow(ContractViolationError);
  });
});
