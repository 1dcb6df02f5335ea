import {
  BarChart,
  Bar,
  Cell,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ResponsiveContainer,
  ReferenceLine,
} from 'recharts';
import type { HeatLossResultV1 } from '../../contracts/HeatLossOutputV1';
import { buildComponentBreakdown, buildThermalMapShading } from '../../engine/ScenarioAggregator';
import { thermalColor } from './thermalPalette';

interface Props {
  result: HeatLossResultV1;
}

// Bars share the house map's colour scale so the two views read together.
export default function ComponentBreakdownChart({ result }: Props) {
  const rows = buildComponentBreakdown(result);
  const shading = buildThermalMapShading(result);

  return (
    <ResponsiveContainer width="100%" height="100%">
      <BarChart data={rows} margin={{ top: 5, right: 20, left: 0, bottom: 5 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#f0f0f0" />
        <XAxis dataKey="label" tick={{ fontSize: 11 }} />
        <YAxis
          tick={{ fontSize: 10 }}
          label={{ value: 'Heat loss (kWh)', angle: -90, position: 'insideLeft', fontSize: 11 }}
        />
        <Tooltip
          contentStyle={{ fontSize: '0.85rem', borderRadius: '8px' }}
          formatter={value => `${Number(value).toFixed(2)} kWh`}
        />
        <ReferenceLine y={0} stroke="#a0aec0" />
        <Bar dataKey="kwh" radius={[3, 3, 0, 0]}>
          {rows.map(row => (
            <Cell key={row.component} fill={thermalColor(Math.max(shading[row.component].intensity, 0.15))} />
          ))}
        </Bar>
      </BarChart>
    </ResponsiveContainer>
  );
}
