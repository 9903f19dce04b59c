/**
 * Detector chains: pre-filters followed by a final system detector.
 */
import { ambiguous, candidatesOf, notFound, type AssetName, type DetectResult, type Detector } from './types.js';

type StepOutcome =
  | { done: true; result: DetectResult }
  | { done: false; assets: AssetName[] };

/**
 * Apply one stage. A stage either ends the chain (a pick or a hard miss)
 * or hands its candidates to the next stage.
 */
function step(detector: Detector, assets: readonly AssetName[]): StepOutcome {
  const result = detector.detect(assets);
  if (result.kind === 'resolved') {
    return { done: true, result };
  }
  const candidates = candidatesOf(result);
  if (candidates.length === 0) {
    return { done: true, result: notFound(result.reason) };
  }
  return { done: false, assets: candidates };
}

export class DetectorChain implements Detector {
  constructor(
    readonly preFilters: readonly Detector[],
    readonly system: Detector
  ) {}

  detect(assets: readonly AssetName[]): DetectResult {
    let working: readonly AssetName[] = assets;
    for (const filter of this.preFilters) {
      const outcome = step(filter, working);
      if (outcome.done) return outcome.result;
      working = outcome.assets;
    }

    const outcome = step(this.system, working);
    if (outcome.done) return outcome.result;
    return ambiguous(outcome.assets, `${outcome.assets.length} candidates found for asset chain`);
  }
}

export function chainDetectors(preFilters: readonly Detector[], system: Detector): Detector {
  return new DetectorChain(preFilters, system);
}
