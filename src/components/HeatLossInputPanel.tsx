/**
 * HeatLossInputPanel.tsx
 *
 * Compact input panel: chip groups for the categorical fields and number
 * inputs for geometry, conditions and tariff. Values are passed through
 * untouched; the calculator reports anything out of range.
 */
import {
  INSULATION_BANDS,
  ROOF_MATERIALS,
  WALL_MATERIALS,
  WINDOW_TYPES,
} from '../engine/schema/HeatLossInputV1';
import type { HeatLossInputDraftV1, HeatLossNumericField } from '../engine/schema/HeatLossInputV1';

// ── Shared chip button ────────────────────────────────────────────────────────

function ChipButton({
  label,
  active,
  onClick,
}: {
  label: string;
  active: boolean;
  onClick: () => void;
}) {
  return (
    <button
      type="button"
      className={`chip-btn${active ? ' chip-btn--active' : ''}`}
      onClick={onClick}
    >
      {label}
    </button>
  );
}

function ChipGroup({
  label,
  options,
  value,
  onChange,
}: {
  label: string;
  options: readonly string[];
  value: string;
  onChange: (v: string) => void;
}) {
  return (
    <div className="form-field">
      <label className="form-field__label">{label}</label>
      <div className="chip-group">
        {options.map(opt => (
          <ChipButton
            key={opt}
            label={opt}
            active={value === opt}
            onClick={() => onChange(opt)}
          />
        ))}
      </div>
    </div>
  );
}

function NumberField({
  label,
  value,
  step,
  onChange,
}: {
  label: string;
  value: number;
  step: number;
  onChange: (v: number) => void;
}) {
  return (
    <div className="form-field">
      <label className="form-field__label">
        {label}
        <input
          type="number"
          step={step}
          value={Number.isFinite(value) ? value : ''}
          onChange={e => onChange(e.target.value === '' ? Number.NaN : Number(e.target.value))}
          className="number-input"
        />
      </label>
    </div>
  );
}

// ── Panel ─────────────────────────────────────────────────────────────────────

interface Props {
  draft: HeatLossInputDraftV1;
  onChange: <K extends keyof HeatLossInputDraftV1>(key: K, value: HeatLossInputDraftV1[K]) => void;
}

const NUMERIC_FIELDS: { key: HeatLossNumericField; label: string; step: number }[] = [
  { key: 'roofAreaSqft',          label: 'Roof area (sqft)',             step: 50 },
  { key: 'wallAreaSqft',          label: 'Wall area (sqft)',             step: 50 },
  { key: 'windowAreaSqft',        label: 'Window area (sqft)',           step: 10 },
  { key: 'ambientTempF',          label: 'Outside temperature (°F)',     step: 1 },
  { key: 'insideTempF',           label: 'Inside temperature (°F)',      step: 1 },
  { key: 'durationHours',         label: 'Duration (hours)',             step: 1 },
  { key: 'airChangesPerHour',     label: 'Air changes per hour',         step: 0.1 },
  { key: 'electricityCostPerKwh', label: 'Electricity cost ($ per kWh)', step: 0.01 },
];

export default function HeatLossInputPanel({ draft, onChange }: Props) {
  return (
    <div className="heat-loss-input-panel">
      <section className="cockpit-group">
        <h4>Fabric</h4>
        <ChipGroup label="Roof material" options={ROOF_MATERIALS} value={draft.roofMaterial}
          onChange={v => onChange('roofMaterial', v)} />
        <ChipGroup label="Wall material" options={WALL_MATERIALS} value={draft.wallMaterial}
          onChange={v => onChange('wallMaterial', v)} />
        <ChipGroup label="Insulation band" options={INSULATION_BANDS} value={draft.insulationBand}
          onChange={v => onChange('insulationBand', v)} />
        <ChipGroup label="Windows" options={WINDOW_TYPES} value={draft.windowType}
          onChange={v => onChange('windowType', v)} />
      </section>

      <section className="cockpit-group">
        <h4>Geometry, conditions and tariff</h4>
        {NUMERIC_FIELDS.map(field => (
          <NumberField
            key={field.key}
            label={field.label}
            step={field.step}
            value={draft[field.key]}
            onChange={v => onChange(field.key, v)}
          />
        ))}
      </section>
    </div>
  );
}
