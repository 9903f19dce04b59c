/**
 * Config file discovery and loading.
 */
import * as os from 'node:os';
import * as path from 'node:path';
import { RawConfigSchema, type RawConfig } from './schema.js';
import { buildToolConfig, validatePlatforms } from './normalize.js';
import type { Config, ToolConfig } from './types.js';
import { currentPlatform } from '../platform/current.js';
import { collapseHome, expandHome, fileExists, loadYamlWithSchema, logger } from '../../utils/index.js';
import { ConfigError, ErrorCodes, SystemError, errorMessage } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';

export const CONFIG_FILE_NAME = 'binpick.yaml';

export interface LoadConfigOptions {
  cwd?: string;
  home?: string;
}

/**
 * Locations searched, in order, when no config path is given.
 */
export function configSearchPaths(cwd: string = process.cwd(), home: string = os.homedir()): string[] {
  return [
    path.join(cwd, CONFIG_FILE_NAME),
    path.join(home, '.config', 'binpick', 'config.yaml'),
    path.join(home, '.config', 'binpick.yaml'),
    path.join(home, '.binpick.yaml'),
  ];
}

/**
 * Resolve the config file to load, or null to use defaults.
 */
export async function findConfigFile(
  configPath?: string,
  options: LoadConfigOptions = {}
): Promise<string | null> {
  const cwd = options.cwd ?? process.cwd();
  const home = options.home ?? os.homedir();

  if (configPath !== undefined) {
    const fullPath = path.resolve(cwd, expandHome(configPath, home));
    if (await fileExists(fullPath)) return fullPath;
    logger.warn(`Config path provided but not found: ${fullPath}`);
    return null;
  }

  for (const candidate of configSearchPaths(cwd, home)) {
    if (await fileExists(candidate)) return candidate;
  }
  logger.debug('No configuration file found, using default settings');
  return null;
}

function defaultPlatforms(): Record<string, string[]> {
  const { platform, arch } = currentPlatform();
  return { [platform]: [arch] };
}

/**
 * Build a config from parsed YAML data, reporting problems through the logger.
 * @throws ConfigError when the data does not match the schema
 */
export function configFromObject(
  data: unknown,
  configPath: string | null = null,
  home: string = os.homedir()
): Config {
  const result = RawConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID,
      `Invalid configuration: ${formatZodError(result.error)}`,
      { path: configPath, errors: result.error.issues }
    );
  }
  return buildConfig(result.data, configPath, home);
}

function buildConfig(raw: RawConfig, configPath: string | null, home: string): Config {
  const platforms = raw.platforms ?? defaultPlatforms();
  const preferences = raw.preferences ?? {};
  const issues = validatePlatforms(platforms);

  const tools: Record<string, ToolConfig> = {};
  for (const [name, entry] of Object.entries(raw.tools ?? {})) {
    const built = buildToolConfig(name, entry, platforms, preferences);
    tools[name] = built.value;
    issues.push(...built.issues);
  }
  for (const issue of issues) {
    logger.error(issue);
  }

  return {
    toolsDir: expandHome(raw.tools_dir, home),
    platforms,
    preferences,
    tools,
    configPath,
  };
}

/**
 * Default configuration, used when no config file exists.
 */
export function getDefaultConfig(home?: string): Config {
  return configFromObject({}, null, home);
}

/**
 * Load configuration from a file, falling back to defaults when none is found.
 */
export async function loadConfig(configPath?: string, options: LoadConfigOptions = {}): Promise<Config> {
  const home = options.home ?? os.homedir();
  const found = await findConfigFile(configPath, options);
  if (!found) {
    return getDefaultConfig(home);
  }

  let raw: RawConfig;
  try {
    raw = await loadYamlWithSchema(found, RawConfigSchema);
  } catch (error) {
    // Schema violations get the same code as configFromObject gives them
    const invalid = error instanceof SystemError && error.code === ErrorCodes.INVALID_SCHEMA;
    throw new ConfigError(
      invalid ? ErrorCodes.CONFIG_INVALID : ErrorCodes.CONFIG_LOAD,
      `${invalid ? 'Invalid configuration in' : 'Failed to load config from'} ${found}: ${errorMessage(error)}`,
      { path: found, originalError: errorMessage(error) }
    );
  }
  logger.debug(`Loading configuration from: ${collapseHome(found, home)}`);
  return buildConfig(raw, found, home);
}

/**
 * Look up tools by name.
 * @throws ConfigError naming the first unknown tool
 */
export function selectTools(config: Config, names: readonly string[]): ToolConfig[] {
  if (names.length === 0) return Object.values(config.tools);
  return names.map((name) => {
    const tool = config.tools[name];
    if (!tool) {
      throw new ConfigError(ErrorCodes.UNKNOWN_TOOL, `Unknown tool: ${name}`, { tool: name });
    }
    return tool;
  });
}
