import { describe, it, expect } from 'vitest';
import { computeHeatLoss } from '../HeatLossCalculator';
import { INSULATION_BANDS } from '../schema/HeatLossInputV1';
import type { HeatLossInputDraftV1 } from '../schema/HeatLossInputV1';
import type { HeatLossResultV1 } from '../../contracts/HeatLossOutputV1';

// ─── Shared fixtures ──────────────────────────────────────────────────────────

/** Leaky 1950s house on a mild day: the reference regression case. */
const leakyHouse: HeatLossInputDraftV1 = {
  roofAreaSqft: 1800,
  wallAreaSqft: 1500,
  roofMaterial: 'asphalt',
  wallMaterial: 'brick',
  ambientTempF: 50,
  insideTempF: 70,
  durationHours: 24,
  insulationBand: 'R13-R15',
  airChangesPerHour: 0.9,
  windowAreaSqft: 500,
  windowType: 'single',
  electricityCostPerKwh: 0.12,
};

function resultOf(draft: HeatLossInputDraftV1): HeatLossResultV1 {
  const outcome = computeHeatLoss(draft);
  if (outcome.kind !== 'result') {
    throw new Error(`expected a result, got: ${outcome.failure.errors.join(' | ')}`);
  }
  return outcome.result;
}

// ─── Golden case ──────────────────────────────────────────────────────────────

describe('computeHeatLoss – reference house', () => {
  it('reproduces the per-component breakdown', () => {
    const r = resultOf(leakyHouse);
    expect(r.roofKwh).toBeCloseTo(17.905129, 6);
    expect(r.wallsKwh).toBeCloseTo(13.277200, 6);
    expect(r.windowsKwh).toBeCloseTo(70.60628, 6);
    expect(r.infiltrationKwh).toBeCloseTo(60.702820, 6);
  });

  it('reproduces total energy and cost', () => {
    const r = resultOf(leakyHouse);
    expect(r.totalKwh).toBeCloseTo(162.491429, 6);
    expect(r.totalCost).toBeCloseTo(19.498971, 6);
  });

  it('reproduces the percentage shares', () => {
    const r = resultOf(leakyHouse);
    expect(r.roofPct).toBeCloseTo(11.019122, 5);
    expect(r.wallsPct).toBeCloseTo(8.171015, 5);
    expect(r.windowsPct).toBeCloseTo(43.452310, 5);
    expect(r.infiltrationPct).toBeCloseTo(37.357552, 5);
  });

  it('echoes every input field verbatim', () => {
    const r = resultOf(leakyHouse);
    expect(r.roofAreaSqft).toBe(1800);
    expect(r.wallAreaSqft).toBe(1500);
    expect(r.roofMaterial).toBe('asphalt');
    expect(r.wallMaterial).toBe('brick');
    expect(r.ambientTempF).toBe(50);
    expect(r.insideTempF).toBe(70);
    expect(r.durationHours).toBe(24);
    expect(r.insulationBand).toBe('R13-R15');
    expect(r.airChangesPerHour).toBe(0.9);
    expect(r.windowAreaSqft).toBe(500);
    expect(r.windowType).toBe('single');
    expect(r.electricityCostPerKwh).toBe(0.12);
  });

  it('is deterministic and returns a fresh frozen record per call', () => {
    const a = resultOf(leakyHouse);
    const b = resultOf(leakyHouse);
    expect(a).toEqual(b);
    expect(a).not.toBe(b);
    expect(Object.isFrozen(a)).toBe(true);
  });

  it('does not mutate the draft it was given', () => {
    const draft = { ...leakyHouse };
    computeHeatLoss(draft);
    expect(draft).toEqual(leakyHouse);
  });
});

// ─── Zero ΔT ──────────────────────────────────────────────────────────────────

describe('computeHeatLoss – inside equals ambient', () => {
  it('gives exactly zero energy, cost and shares', () => {
    const r = resultOf({ ...leakyHouse, insideTempF: 50 });
    expect(r.roofKwh).toBe(0);
    expect(r.wallsKwh).toBe(0);
    expect(r.windowsKwh).toBe(0);
    expect(r.infiltrationKwh).toBe(0);
    expect(r.totalKwh).toBe(0);
    expect(r.totalCost).toBe(0);
    expect(r.roofPct).toBe(0);
    expect(r.wallsPct).toBe(0);
    expect(r.windowsPct).toBe(0);
    expect(r.infiltrationPct).toBe(0);
  });
});

// ─── Negative ΔT ──────────────────────────────────────────────────────────────

describe('computeHeatLoss – inside colder than outside', () => {
  it('returns negative components instead of an error', () => {
    const r = resultOf({ ...leakyHouse, insideTempF: 30 });
    expect(r.roofKwh).toBeCloseTo(-17.905129, 6);
    expect(r.totalKwh).toBeCloseTo(-162.491429, 6);
    expect(r.totalCost).toBeCloseTo(-19.498971, 6);
  });

  it('zeroes every share when the total is not positive', () => {
    const r = resultOf({ ...leakyHouse, insideTempF: 30 });
    expect([r.roofPct, r.wallsPct, r.windowsPct, r.infiltrationPct]).toEqual([0, 0, 0, 0]);
  });

  it('accepts sub-zero and 0 °F ambient temperatures', () => {
    expect(computeHeatLoss({ ...leakyHouse, ambientTempF: 0 }).kind).toBe('result');
    expect(computeHeatLoss({ ...leakyHouse, ambientTempF: -15 }).kind).toBe('result');
  });
});

// ─── Invariants ───────────────────────────────────────────────────────────────

describe('computeHeatLoss – invariants', () => {
  const variants: HeatLossInputDraftV1[] = [
    leakyHouse,
    { ...leakyHouse, roofMaterial: 'metal', wallMaterial: 'concrete', windowType: 'triple' },
    { ...leakyHouse, insulationBand: 'R34-R60', airChangesPerHour: 0.3, ambientTempF: -10 },
    { ...leakyHouse, roofAreaSqft: 950, wallAreaSqft: 2100, durationHours: 720, windowAreaSqft: 120 },
  ];

  it('total equals the sum of the four components', () => {
    for (const v of variants) {
      const r = resultOf(v);
      expect(r.totalKwh).toBeCloseTo(r.roofKwh + r.wallsKwh + r.windowsKwh + r.infiltrationKwh, 9);
    }
  });

  it('shares sum to 100 when the total is positive', () => {
    for (const v of variants) {
      const r = resultOf(v);
      expect(r.totalKwh).toBeGreaterThan(0);
      expect(r.roofPct + r.wallsPct + r.windowsPct + r.infiltrationPct).toBeCloseTo(100, 9);
    }
  });

  it('cost is total energy times tariff', () => {
    const r = resultOf({ ...leakyHouse, electricityCostPerKwh: 0.31 });
    expect(r.totalCost).toBeCloseTo(r.totalKwh * 0.31, 9);
  });

  it('each higher insulation band strictly lowers roof and wall loss', () => {
    const results = INSULATION_BANDS.map(band => resultOf({ ...leakyHouse, insulationBand: band }));
    for (let i = 1; i < results.length; i++) {
      expect(results[i].roofKwh).toBeLessThan(results[i - 1].roofKwh);
      expect(results[i].wallsKwh).toBeLessThan(results[i - 1].wallsKwh);
    }
  });

  it('each higher insulation band strictly lowers the size of a net gain', () => {
    // Inside colder than outside: roof and wall terms are negative.
    const results = INSULATION_BANDS.map(band =>
      resultOf({ ...leakyHouse, insideTempF: 30, insulationBand: band }),
    );
    expect(results[0].roofKwh).toBeLessThan(0);
    expect(results[0].wallsKwh).toBeLessThan(0);
    for (let i = 1; i < results.length; i++) {
      expect(Math.abs(results[i].roofKwh)).toBeLessThan(Math.abs(results[i - 1].roofKwh));
      expect(Math.abs(results[i].wallsKwh)).toBeLessThan(Math.abs(results[i - 1].wallsKwh));
    }
  });

  it('keeps shares numeric when a huge area overflows the total', () => {
    const r = resultOf({ ...leakyHouse, roofAreaSqft: 1e308 });
    expect(r.totalKwh).toBe(Infinity);
    expect([r.roofPct, r.wallsPct, r.windowsPct, r.infiltrationPct]).toEqual([0, 0, 0, 0]);
  });

  it('insulation band leaves window and infiltration loss unchanged', () => {
    const low = resultOf({ ...leakyHouse, insulationBand: 'R13-R15' });
    const high = resultOf({ ...leakyHouse, insulationBand: 'R34-R60' });
    expect(high.windowsKwh).toBe(low.windowsKwh);
    expect(high.infiltrationKwh).toBe(low.infiltrationKwh);
  });

  it('energy scales linearly with duration', () => {
    const day = resultOf(leakyHouse);
    const week = resultOf({ ...leakyHouse, durationHours: 168 });
    expect(week.totalKwh).toBeCloseTo(day.totalKwh * 7, 9);
  });
});

// ─── Invalid input ────────────────────────────────────────────────────────────

describe('computeHeatLoss – invalid input', () => {
  it('returns a failure instead of a result for non-positive numeric fields', () => {
    const bad: Partial<HeatLossInputDraftV1>[] = [
      { roofAreaSqft: 0 },
      { wallAreaSqft: -1 },
      { durationHours: 0 },
      { airChangesPerHour: -0.5 },
      { windowAreaSqft: 0 },
      { electricityCostPerKwh: -0.12 },
    ];
    for (const patch of bad) {
      const outcome = computeHeatLoss({ ...leakyHouse, ...patch });
      expect(outcome.kind).toBe('invalid');
    }
  });

  it('names the offending category for a bad enum value', () => {
    const outcome = computeHeatLoss({ ...leakyHouse, windowType: 'quadruple' });
    expect(outcome).toEqual({
      kind: 'invalid',
      failure: { errors: ['Invalid window type. Expected one of: single, double, triple.'] },
    });
  });
});
