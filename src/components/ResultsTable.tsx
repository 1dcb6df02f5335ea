import type { HeatLossResultV1 } from '../contracts/HeatLossOutputV1';
import { buildResultTable, formatCurrency } from '../engine/ResultTableBuilder';

interface Props {
  result: HeatLossResultV1;
}

export default function ResultsTable({ result }: Props) {
  const rows = buildResultTable(result);
  return (
    <table className="results-table">
      <tbody>
        {rows.map(row => (
          <tr key={row.key} className={row.key === 'totalKwh' || row.key === 'totalCost' ? 'results-table__total' : undefined}>
            <th scope="row">{row.label}</th>
            <td>
              {row.unit === '$' && typeof row.value === 'number' ? formatCurrency(row.value) : row.value}
              {row.unit && row.unit !== '$' ? ` ${row.unit}` : ''}
            </td>
          </tr>
        ))}
      </tbody>
    </table>
  );
}
