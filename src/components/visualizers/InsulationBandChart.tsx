import {
  BarChart,
  Bar,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ResponsiveContainer,
} from 'recharts';
import type { ScenarioSetV1 } from '../../contracts/HeatLossOutputV1';
import { meanTotalKwhByInsulationBand } from '../../engine/ScenarioAggregator';

interface Props {
  scenarios: ScenarioSetV1;
}

export default function InsulationBandChart({ scenarios }: Props) {
  const data = meanTotalKwhByInsulationBand(scenarios);

  return (
    <ResponsiveContainer width="100%" height="100%">
      <BarChart data={data} margin={{ top: 5, right: 20, left: 0, bottom: 5 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#edf2f7" />
        <XAxis
          dataKey="band"
          tick={{ fontSize: 11 }}
          label={{ value: 'Insulation band', position: 'insideBottom', offset: -2, fontSize: 11 }}
        />
        <YAxis
          tick={{ fontSize: 10 }}
          label={{ value: 'Avg total loss (kWh)', angle: -90, position: 'insideLeft', fontSize: 11 }}
        />
        <Tooltip formatter={value => `${Number(value).toFixed(1)} kWh`} />
        <Bar dataKey="meanTotalKwh" name="Avg total loss" fill="#dd513a" radius={[3, 3, 0, 0]} />
      </BarChart>
    </ResponsiveContainer>
  );
}
