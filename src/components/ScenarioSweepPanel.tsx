/**
 * ScenarioSweepPanel
 *
 * Runs the 48-combination sweep on the current baseline (everything except
 * roof material, glazing and insulation) and shows:
 *   • mean total loss per insulation band
 *   • mean total cost per window type
 *   • the five lowest-loss combinations
 * plus a CSV download of the full ordered set.
 */
import { useMemo } from 'react';
import type { ScenarioBaselineV1 } from '../engine/schema/HeatLossInputV1';
import { sweepScenarios } from '../engine/ScenarioSweeper';
import { formatCurrency, resultsToCsv, roundTo2dp } from '../engine/ResultTableBuilder';
import InsulationBandChart from './visualizers/InsulationBandChart';
import WindowCostChart from './visualizers/WindowCostChart';

interface Props {
  baseline: ScenarioBaselineV1;
}

const TOP_N = 5;

function downloadCsv(filename: string, csv: string) {
  const url = URL.createObjectURL(new Blob([csv], { type: 'text/csv' }));
  const a = document.createElement('a');
  a.href = url;
  a.download = filename;
  a.click();
  URL.revokeObjectURL(url);
}

export default function ScenarioSweepPanel({ baseline }: Props) {
  const scenarios = useMemo(() => sweepScenarios(baseline), [baseline]);
  const best = scenarios.slice(0, TOP_N);

  return (
    <section className="scenario-sweep-panel">
      <h2>Compare upgrade options</h2>
      <p className="scenario-sweep-panel__subtitle">
        Same house, same weather: every roof, window and insulation combination.
      </p>

      <div className="chart-row">
        <div className="chart-card">
          <h3>Heat loss by insulation band</h3>
          <div style={{ height: 220 }}>
            <InsulationBandChart scenarios={scenarios} />
          </div>
        </div>
        <div className="chart-card">
          <h3>Cost by window type</h3>
          <div style={{ height: 220 }}>
            <WindowCostChart scenarios={scenarios} />
          </div>
        </div>
      </div>

      <h3>Lowest-loss combinations</h3>
      <table className="results-table">
        <thead>
          <tr>
            <th>Roof</th>
            <th>Windows</th>
            <th>Insulation</th>
            <th>Total (kWh)</th>
            <th>Cost</th>
          </tr>
        </thead>
        <tbody>
          {best.map(r => (
            <tr key={`${r.roofMaterial}-${r.windowType}-${r.insulationBand}`}>
              <td>{r.roofMaterial}</td>
              <td>{r.windowType}</td>
              <td>{r.insulationBand}</td>
              <td>{roundTo2dp(r.totalKwh)}</td>
              <td>{formatCurrency(r.totalCost)}</td>
            </tr>
          ))}
        </tbody>
      </table>

      <button
        type="button"
        className="cta-btn"
        onClick={() => downloadCsv('heat-loss-scenarios.csv', resultsToCsv(scenarios))}
      >
        Download all {scenarios.length} scenarios (CSV)
      </button>
    </section>
  );
}
