/**
 * Unit conversions shared by the physics modules.
 *
 * Inputs arrive in imperial units (sqft, °F, imperial R); outputs are kWh.
 */

export const SQFT_TO_SQM = 0.092903;
/** Divisor for a Fahrenheit *difference* to a Celsius difference. */
export const F_TO_C_DIVISOR = 1.8;
/** Imperial R (ft²·°F·h/BTU) → R_SI (m²·K/W). */
export const R_IMPERIAL_TO_SI = 0.176110;
export const SECONDS_PER_HOUR = 3600;
export const JOULES_PER_KWH = 3_600_000;

export function sqftToSqm(sqft: number): number {
  return sqft * SQFT_TO_SQM;
}

/** ΔT in °C from two Fahrenheit readings (inside − ambient). */
export function fahrenheitDeltaToCelsius(insideF: number, ambientF: number): number {
  return (insideF - ambientF) / F_TO_C_DIVISOR;
}

export function imperialRToSi(rImperial: number): number {
  return rImperial * R_IMPERIAL_TO_SI;
}

/** Energy (kWh) delivered by a constant power (W) held for `hours`. */
export function wattsToKwh(watts: number, hours: number): number {
  const joules = watts * (hours * SECONDS_PER_HOUR);
  return joules / JOULES_PER_KWH;
}
