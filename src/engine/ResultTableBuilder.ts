import type { HeatLossResultV1 } from '../contracts/HeatLossOutputV1';

export interface ResultTableRow {
  key: keyof HeatLossResultV1;
  label: string;
  /** Numbers rounded to 2 dp; categorical values as-is. */
  value: string | number;
  unit: string;
}

interface ColumnDef {
  key: keyof HeatLossResultV1;
  label: string;
  unit: string;
}

// Display order: what was modelled, then geometry and conditions, then results.
const TABLE_COLUMNS: readonly ColumnDef[] = [
  { key: 'roofMaterial',      label: 'Roof material',      unit: '' },
  { key: 'wallMaterial',      label: 'Wall material',      unit: '' },
  { key: 'insulationBand',    label: 'Insulation band',    unit: '' },
  { key: 'windowType',        label: 'Window type',        unit: '' },
  { key: 'airChangesPerHour', label: 'Air changes',        unit: 'ACH' },
  { key: 'roofAreaSqft',      label: 'Roof area',          unit: 'sqft' },
  { key: 'wallAreaSqft',      label: 'Wall area',          unit: 'sqft' },
  { key: 'windowAreaSqft',    label: 'Window area',        unit: 'sqft' },
  { key: 'ambientTempF',      label: 'Ambient temp',       unit: '°F' },
  { key: 'insideTempF',       label: 'Inside temp',        unit: '°F' },
  { key: 'durationHours',     label: 'Duration',           unit: 'h' },
  { key: 'roofKwh',           label: 'Roof loss',          unit: 'kWh' },
  { key: 'wallsKwh',          label: 'Wall loss',          unit: 'kWh' },
  { key: 'windowsKwh',        label: 'Window loss',        unit: 'kWh' },
  { key: 'infiltrationKwh',   label: 'Infiltration loss',  unit: 'kWh' },
  { key: 'totalKwh',          label: 'Total loss',         unit: 'kWh' },
  { key: 'roofPct',           label: 'Roof share',         unit: '%' },
  { key: 'wallsPct',          label: 'Wall share',         unit: '%' },
  { key: 'windowsPct',        label: 'Window share',       unit: '%' },
  { key: 'infiltrationPct',   label: 'Infiltration share', unit: '%' },
  { key: 'totalCost',         label: 'Total cost',         unit: '$' },
];

/** Field order for CSV export: inputs as entered, then computed fields. */
export const CSV_FIELDS: readonly (keyof HeatLossResultV1)[] = [
  'roofAreaSqft',
  'wallAreaSqft',
  'roofMaterial',
  'wallMaterial',
  'ambientTempF',
  'insideTempF',
  'durationHours',
  'insulationBand',
  'airChangesPerHour',
  'windowAreaSqft',
  'windowType',
  'electricityCostPerKwh',
  'roofKwh',
  'wallsKwh',
  'windowsKwh',
  'infiltrationKwh',
  'roofPct',
  'wallsPct',
  'windowsPct',
  'infiltrationPct',
  'totalCost',
  'totalKwh',
];

export function roundTo2dp(n: number): number {
  return Math.round(n * 100) / 100;
}

/** Two-decimal dollar amount with the sign ahead of the symbol: -$19.50. */
export function formatCurrency(amount: number): string {
  const digits = Math.abs(amount).toFixed(2);
  return amount < 0 && digits !== '0.00' ? `-$${digits}` : `$${digits}`;
}

export function buildResultTable(result: HeatLossResultV1): ResultTableRow[] {
  return TABLE_COLUMNS.map(({ key, label, unit }) => {
    const raw = result[key];
    return { key, label, unit, value: typeof raw === 'number' ? roundTo2dp(raw) : raw };
  });
}

/** Serialises results one per line; numbers are written unrounded. */
export function resultsToCsv(results: readonly HeatLossResultV1[]): string {
  const lines = [CSV_FIELDS.join(',')];
  for (const result of results) {
    lines.push(CSV_FIELDS.map(field => String(result[field])).join(','));
  }
  return lines.join('\n');
}
