import { useMemo, useState } from 'react';
import PresetSelector from './components/PresetSelector';
import HeatLossInputPanel from './components/HeatLossInputPanel';
import ResultsTable from './components/ResultsTable';
import ValidationErrorList from './components/ValidationErrorList';
import ScenarioSweepPanel from './components/ScenarioSweepPanel';
import ComponentBreakdownChart from './components/visualizers/ComponentBreakdownChart';
import HouseThermalMap from './components/visualizers/HouseThermalMap';
import { computeHeatLoss } from './engine/HeatLossCalculator';
import { toScenarioBaseline } from './engine/ScenarioSweeper';
import type { HeatLossInputDraftV1 } from './engine/schema/HeatLossInputV1';
import { getPresetProfile } from './presets/presetRegistry';
import { resolveCalculationInput } from './presets/resolveCalculationInput';
import type { HeatLossOverrides } from './presets/resolveCalculationInput';
import './App.css';

export default function App() {
  const [presetId, setPresetId] = useState<string | undefined>(undefined);
  const [overrides, setOverrides] = useState<HeatLossOverrides>({});

  const draft = useMemo(() => resolveCalculationInput({ presetId, overrides }), [presetId, overrides]);
  const outcome = useMemo(() => computeHeatLoss(draft), [draft]);
  const baseline = useMemo(
    () => (outcome.kind === 'result' ? toScenarioBaseline(outcome.result) : undefined),
    [outcome],
  );

  // A newly picked profile wins over earlier edits to the fields it pins.
  const selectPreset = (id: string | undefined) => {
    setPresetId(id);
    const preset = id === undefined ? undefined : getPresetProfile(id);
    if (!preset) return;
    setOverrides(prev => {
      const next: HeatLossOverrides = { ...prev };
      for (const key of Object.keys(preset.values)) {
        Reflect.deleteProperty(next, key);
      }
      return next;
    });
  };

  const updateField = <K extends keyof HeatLossInputDraftV1>(key: K, value: HeatLossInputDraftV1[K]) => {
    setOverrides(prev => ({ ...prev, [key]: value }));
  };

  return (
    <div className="app">
      <header className="app-header">
        <h1>Heat Loss Estimator</h1>
        <p>Roof, walls, windows and air leakage over a heating period, in kWh and cost.</p>
      </header>

      <main className="app-main">
        <PresetSelector selectedId={presetId} onSelect={selectPreset} />
        <HeatLossInputPanel draft={draft} onChange={updateField} />

        {outcome.kind === 'invalid' ? (
          <ValidationErrorList failure={outcome.failure} />
        ) : (
          <>
            <section className="results-section">
              <h2>Results</h2>
              <div className="chart-row">
                <div className="chart-card">
                  <ResultsTable result={outcome.result} />
                </div>
                <div className="chart-card">
                  <h3>Where the heat goes</h3>
                  <HouseThermalMap result={outcome.result} />
                </div>
              </div>
              <div className="chart-card">
                <h3>Loss by component</h3>
                <div style={{ height: 240 }}>
                  <ComponentBreakdownChart result={outcome.result} />
                </div>
              </div>
            </section>
            {baseline && <ScenarioSweepPanel baseline={baseline} />}
          </>
        )}
      </main>
    </div>
  );
}
