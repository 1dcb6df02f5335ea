import { describe, it, expect } from 'vitest';
import { runInfiltrationModule, CEILING_HEIGHT_M } from '../modules/InfiltrationModule';
import { fahrenheitDeltaToCelsius } from '../utils/units';

describe('InfiltrationModule', () => {
  it('derives volume from envelope area at the assumed ceiling height', () => {
    const r = runInfiltrationModule({
      roofAreaSqft: 1000,
      wallAreaSqft: 1000,
      airChangesPerHour: 1,
      durationHours: 10,
      deltaTC: 0,
    });
    expect(CEILING_HEIGHT_M).toBe(2.5);
    expect(r.volumeM3).toBeCloseTo(464.515, 9);
    expect(r.infiltrationKwh).toBe(0);
  });

  it('computes infiltration energy for a 10 °F difference over 10 hours', () => {
    const r = runInfiltrationModule({
      roofAreaSqft: 1000,
      wallAreaSqft: 1000,
      airChangesPerHour: 1,
      durationHours: 10,
      deltaTC: fahrenheitDeltaToCelsius(70, 60),
    });
    expect(r.infiltrationKwh).toBeCloseTo(8.516108, 6);
  });

  it('doubles with the air-change rate', () => {
    const args = { roofAreaSqft: 1800, wallAreaSqft: 1500, durationHours: 24, deltaTC: 8 };
    const once = runInfiltrationModule({ ...args, airChangesPerHour: 0.4 });
    const twice = runInfiltrationModule({ ...args, airChangesPerHour: 0.8 });
    expect(twice.infiltrationKwh).toBeCloseTo(once.infiltrationKwh * 2, 9);
  });
});
