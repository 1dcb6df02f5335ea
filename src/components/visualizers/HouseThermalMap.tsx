/**
 * HouseThermalMap
 *
 * Schematic house elevation shaded by where the heat goes. Roof, walls and
 * windows are filled on the inferno scale relative to the largest component;
 * infiltration is drawn as a dashed air-leak outline around the envelope.
 *
 * Geometry is a fixed 100 × 100 viewBox; the diagram is illustrative, not to
 * scale.
 */
import type { HeatLossResultV1 } from '../../contracts/HeatLossOutputV1';
import { buildThermalMapShading } from '../../engine/ScenarioAggregator';
import type { ThermalMapCell } from '../../engine/ScenarioAggregator';
import { thermalColor, thermalLabelColor } from './thermalPalette';

interface Props {
  result: HeatLossResultV1;
}

function cellCaption(name: string, cell: ThermalMapCell): string[] {
  return [name, `${cell.kwh.toFixed(1)} kWh`, `${cell.pct.toFixed(0)}%`];
}

function Caption({ x, y, lines, fill, size = 3 }: { x: number; y: number; lines: string[]; fill: string; size?: number }) {
  return (
    <text x={x} y={y} textAnchor="middle" fontSize={size} fill={fill}>
      {lines.map((line, i) => (
        <tspan key={i} x={x} dy={i === 0 ? 0 : size * 1.15}>{line}</tspan>
      ))}
    </text>
  );
}

export default function HouseThermalMap({ result }: Props) {
  const shading = buildThermalMapShading(result);
  const { roof, walls, windows, infiltration } = shading;

  return (
    <figure className="house-thermal-map">
      <svg viewBox="0 0 100 100" role="img" aria-label="House heat-loss map">
        <text x={2} y={5} fontSize={3} fill="#4a5568">
          outside {result.ambientTempF.toFixed(0)} °F
        </text>

        {/* Infiltration: air leaking round the whole envelope */}
        <polygon
          points="17,42 50,7 83,42 83,88 17,88"
          fill="none"
          stroke={thermalColor(infiltration.intensity)}
          strokeWidth={1.2}
          strokeDasharray="2 1.5"
        />

        <rect x={20} y={40} width={60} height={45} fill={thermalColor(walls.intensity)} stroke="#1a202c" strokeWidth={0.5} />
        <polygon points="20,40 50,10 80,40" fill={thermalColor(roof.intensity)} stroke="#1a202c" strokeWidth={0.5} />
        <rect x={26} y={58} width={14} height={14} fill={thermalColor(windows.intensity)} stroke="#1a202c" strokeWidth={0.35} />
        <rect x={60} y={58} width={14} height={14} fill={thermalColor(windows.intensity)} stroke="#1a202c" strokeWidth={0.35} />
        <rect x={46} y={65} width={8} height={20} fill="#fdfdfd" stroke="#1a202c" strokeWidth={0.35} />

        <text x={50} y={50} textAnchor="middle" fontSize={3.6} fontWeight={700} fill={thermalLabelColor(walls.intensity)}>
          inside {result.insideTempF.toFixed(0)} °F
        </text>
        <Caption x={50} y={24} lines={cellCaption('roof', roof)} fill={thermalLabelColor(roof.intensity)} />
        <Caption x={30} y={78} lines={cellCaption('walls', walls)} fill={thermalLabelColor(walls.intensity)} size={2.6} />
        <Caption x={33} y={63} lines={cellCaption('windows', windows)} fill={thermalLabelColor(windows.intensity)} size={2.4} />
        <Caption x={90} y={92} lines={cellCaption('infiltration', infiltration)} fill="#2d3748" size={2.4} />
      </svg>
      <figcaption>
        roof: {result.roofMaterial}, walls: {result.wallMaterial}, insulation: {result.insulationBand},
        {' '}windows: {result.windowType}, ACH: {result.airChangesPerHour}
      </figcaption>
    </figure>
  );
}
