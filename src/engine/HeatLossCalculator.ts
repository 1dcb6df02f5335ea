import type { HeatLossOutcomeV1, HeatLossResultV1 } from '../contracts/HeatLossOutputV1';
import type { HeatLossInputDraftV1 } from './schema/HeatLossInputV1';
import { validateHeatLossInput } from './validation/InputValidator';
import { runEnvelopeConductionModule } from './modules/EnvelopeConductionModule';
import { runInfiltrationModule } from './modules/InfiltrationModule';
import { buildLossBreakdown } from './modules/LossBreakdownModule';
import { fahrenheitDeltaToCelsius } from './utils/units';

/**
 * computeHeatLoss: steady-state heat loss and running cost for one building.
 *
 * Validates first; an invalid draft comes back as the `invalid` variant with
 * every violated constraint listed, and no physics runs. A valid draft goes
 * through envelope conduction, infiltration and the breakdown in that order.
 *
 * Pure: the same draft always yields an equal, freshly allocated, frozen
 * result.
 */
export function computeHeatLoss(draft: HeatLossInputDraftV1): HeatLossOutcomeV1 {
  const validation = validateHeatLossInput(draft);
  if (!validation.ok) {
    return { kind: 'invalid', failure: { errors: validation.errors } };
  }
  const input = validation.input;

  const deltaTC = fahrenheitDeltaToCelsius(input.insideTempF, input.ambientTempF);

  const envelope = runEnvelopeConductionModule({ ...input, deltaTC });
  const infiltration = runInfiltrationModule({ ...input, deltaTC });

  const components = {
    roofKwh: envelope.roofKwh,
    wallsKwh: envelope.wallsKwh,
    windowsKwh: envelope.windowsKwh,
    infiltrationKwh: infiltration.infiltrationKwh,
  };
  const breakdown = buildLossBreakdown(components, input.electricityCostPerKwh);

  const result: HeatLossResultV1 = {
    roofAreaSqft: input.roofAreaSqft,
    wallAreaSqft: input.wallAreaSqft,
    roofMaterial: input.roofMaterial,
    wallMaterial: input.wallMaterial,
    ambientTempF: input.ambientTempF,
    insideTempF: input.insideTempF,
    durationHours: input.durationHours,
    insulationBand: input.insulationBand,
    airChangesPerHour: input.airChangesPerHour,
    windowAreaSqft: input.windowAreaSqft,
    windowType: input.windowType,
    electricityCostPerKwh: input.electricityCostPerKwh,
    ...components,
    ...breakdown,
  };

  return { kind: 'result', result: Object.freeze(result) };
}
