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
import { meanTotalCostByWindowType } from '../../engine/ScenarioAggregator';

interface Props {
  scenarios: ScenarioSetV1;
}

export default function WindowCostChart({ scenarios }: Props) {
  const data = meanTotalCostByWindowType(scenarios);

  return (
    <ResponsiveContainer width="100%" height="100%">
      <BarChart data={data} margin={{ top: 5, right: 20, left: 0, bottom: 5 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#edf2f7" />
        <XAxis
          dataKey="windowType"
          tick={{ fontSize: 11 }}
          label={{ value: 'Window type', position: 'insideBottom', offset: -2, fontSize: 11 }}
        />
        <YAxis
          tick={{ fontSize: 10 }}
          tickFormatter={v => `$${v}`}
          label={{ value: 'Avg total cost', angle: -90, position: 'insideLeft', fontSize: 11 }}
        />
        <Tooltip formatter={value => `$${Number(value).toFixed(2)}`} />
        <Bar dataKey="meanTotalCost" name="Avg total cost" fill="#3182ce" radius={[3, 3, 0, 0]} />
      </BarChart>
    </ResponsiveContainer>
  );
}
