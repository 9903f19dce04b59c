import type { Preferences } from '../detect/types.js';

/** Asset pattern per platform and arch; null means auto-detect. */
export type AssetPatterns = Record<string, Record<string, string | null>>;

export interface ToolConfig {
  name: string;
  repo: string;
  binaryName: string[];
  binaryPath: string[];
  extractBinary: boolean | null;
  assetPatterns: AssetPatterns;
  /** Platform name → the tool's own spelling of it. */
  platformMap: Record<string, string>;
  /** Architecture name → the tool's own spelling of it. */
  archMap: Record<string, string>;
  /** Global preferences with the tool's own merged on top. */
  preferences: Preferences;
}

export interface Config {
  toolsDir: string;
  platforms: Record<string, string[]>;
  preferences: Preferences;
  tools: Record<string, ToolConfig>;
  /** File the config came from, null for defaults. */
  configPath: string | null;
}
