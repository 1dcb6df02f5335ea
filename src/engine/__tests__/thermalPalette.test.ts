/**
 * Tests for the heat-map colour helpers used by HouseThermalMap and
 * ComponentBreakdownChart.
 */
import { describe, it, expect } from 'vitest';
import { thermalColor, thermalLabelColor } from '../../components/visualizers/thermalPalette';

describe('thermalColor', () => {
  it('maps the ends of the scale to the first and last stops', () => {
    expect(thermalColor(0)).toBe('#000004');
    expect(thermalColor(1)).toBe('#fcffa4');
  });

  it('lands exactly on interior stops', () => {
    expect(thermalColor(0.2)).toBe('#420a68');
  });

  it('interpolates between stops', () => {
    expect(thermalColor(0.1)).toBe('#210536');
  });

  it('clamps out-of-range and non-finite intensities', () => {
    expect(thermalColor(-3)).toBe('#000004');
    expect(thermalColor(7)).toBe('#fcffa4');
    expect(thermalColor(Number.NaN)).toBe('#000004');
  });
});

describe('thermalLabelColor', () => {
  it('uses dark text only on the light end of the scale', () => {
    expect(thermalLabelColor(0.9)).toBe('#1a202c');
    expect(thermalLabelColor(0.6)).toBe('#ffffff');
    expect(thermalLabelColor(0)).toBe('#ffffff');
  });
});
