/**
 * PresetSelector.tsx
 *
 * Row of building-profile cards. Picking one pins the fabric and airtightness
 * fields; "Custom" releases them back to the user's own choices.
 */
import type { PresetProfile } from '../presets/presetRegistry';
import { PRESET_PROFILES } from '../presets/presetRegistry';

interface Props {
  selectedId: string | undefined;
  onSelect: (presetId: string | undefined) => void;
}

export default function PresetSelector({ selectedId, onSelect }: Props) {
  return (
    <div className="preset-selector">
      <h2>Start from a profile</h2>
      <div className="preset-grid">
        {PRESET_PROFILES.map((preset: PresetProfile) => (
          <PresetCard
            key={preset.id}
            preset={preset}
            active={selectedId === preset.id}
            onSelect={() => onSelect(preset.id)}
          />
        ))}
        <div
          className={`preset-card${selectedId === undefined ? ' preset-card--active' : ''}`}
          onClick={() => onSelect(undefined)}
          role="button"
          tabIndex={0}
          onKeyDown={e => { if (e.key === 'Enter' || e.key === ' ') onSelect(undefined); }}
        >
          <h3 className="preset-card__title">Custom</h3>
          <p className="preset-card__description">Set every field yourself.</p>
        </div>
      </div>
    </div>
  );
}

function PresetCard({
  preset,
  active,
  onSelect,
}: {
  preset: PresetProfile;
  active: boolean;
  onSelect: () => void;
}) {
  return (
    <div className={`preset-card${active ? ' preset-card--active' : ''}`} onClick={onSelect} role="button" tabIndex={0}
      onKeyDown={e => { if (e.key === 'Enter' || e.key === ' ') onSelect(); }}>
      <h3 className="preset-card__title">{preset.title}</h3>
      <p className="preset-card__description">{preset.description}</p>
      <ul className="preset-card__values">
        <li>Roof: {preset.values.roofMaterial}</li>
        <li>Walls: {preset.values.wallMaterial}</li>
        <li>Insulation: {preset.values.insulationBand}</li>
        <li>Windows: {preset.values.windowType}</li>
        <li>ACH: {preset.values.airChangesPerHour}</li>
      </ul>
    </div>
  );
}
