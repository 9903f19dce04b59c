/**
 * Configuration file schema.
 */
import { z } from 'zod';

/**
 * Treat a missing or null section as an empty object so inner defaults apply.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const LibcPreferenceSchema = z.enum(['glibc', 'musl']);

/** Preference fields for one platform or one platform/arch pair. */
export const PreferenceSettingsSchema = z.strictObject({
  libc: LibcPreferenceSchema.optional(),
  prefer_appimage: z.boolean().optional(),
});

/** Platform-wide fields, with any other key naming an architecture override. */
export const PlatformPreferencesSchema = z
  .object({
    libc: LibcPreferenceSchema.optional(),
    prefer_appimage: z.boolean().optional(),
  })
  .catchall(PreferenceSettingsSchema);

export const PreferencesSchema = z.record(z.string(), PlatformPreferencesSchema);

const StringOrListSchema = z.union([z.string(), z.array(z.string())]);

/** `pattern`, `{ platform: pattern }` or `{ platform: { arch: pattern } }`. */
export const AssetPatternsSchema = z.union([
  z.string(),
  z.record(
    z.string(),
    z.union([z.string(), z.null(), z.record(z.string(), z.string().nullable())])
  ),
]);

export const ToolSchema = z.object({
  repo: z.string().regex(/^[\w.-]+\/[\w.-]+$/, 'must be in the form owner/repo'),
  binary_name: StringOrListSchema.optional(),
  binary_path: StringOrListSchema.optional(),
  extract_binary: z.boolean().nullable().optional(),
  asset_patterns: AssetPatternsSchema.nullable().optional(),
  platform_map: z.record(z.string(), z.string()).default({}),
  arch_map: z.record(z.string(), z.string()).default({}),
  preferences: PreferencesSchema.optional(),
});

/** A tool is either a bare `owner/repo` string or a full entry. */
export const ToolEntrySchema = z.union([z.string(), ToolSchema]);

export const RawConfigSchema = withDefaults(
  z.object({
    tools_dir: z.string().default('~/.binpick'),
    platforms: z.record(z.string(), z.array(z.string())).optional(),
    preferences: PreferencesSchema.optional(),
    tools: z.record(z.string(), ToolEntrySchema).nullable().default({}),
  })
);

export type RawConfig = z.infer<typeof RawConfigSchema>;
export type RawToolConfig = z.infer<typeof ToolSchema>;
export type RawAssetPatterns = z.infer<typeof AssetPatternsSchema>;
