/**
 * Name-based pre-filters.
 */
import { basename } from './prioritize.js';
import { ambiguous, notFound, resolved, type AssetName, type DetectResult, type Detector } from './types.js';

export interface SingleAssetOptions {
  /** Keep the assets that do NOT contain the substring. */
  anti?: boolean;
}

/**
 * Narrow assets to those whose basename contains (or, in anti mode, lacks)
 * a substring. An exact basename match wins outright in normal mode.
 */
export class SingleAssetDetector implements Detector {
  readonly anti: boolean;

  constructor(
    readonly asset: string,
    options: SingleAssetOptions = {}
  ) {
    this.anti = options.anti ?? false;
  }

  detect(assets: readonly AssetName[]): DetectResult {
    const candidates: AssetName[] = [];
    for (const a of assets) {
      const name = basename(a);
      if (this.anti) {
        if (!name.includes(this.asset)) candidates.push(a);
        continue;
      }
      if (name === this.asset) return resolved(a);
      if (name.includes(this.asset)) candidates.push(a);
    }

    if (candidates.length === 1) {
      return resolved(candidates[0]);
    }
    if (candidates.length > 1) {
      return ambiguous(candidates, `${candidates.length} candidates found for asset \`${this.asset}\``);
    }
    return notFound(`asset \`${this.asset}\` not found`);
  }
}

export function detectSingleAsset(asset: string, options?: SingleAssetOptions): Detector {
  return new SingleAssetDetector(asset, options);
}

/**
 * Accepts whatever it is given: one asset resolves, more are ambiguous.
 */
export function detectAnyAsset(): Detector {
  return {
    detect(assets: readonly AssetName[]): DetectResult {
      if (assets.length === 1) return resolved(assets[0]);
      if (assets.length === 0) return notFound('no assets to choose from');
      return ambiguous([...assets], `${assets.length} matches found`);
    },
  };
}
