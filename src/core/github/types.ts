/**
 * GitHub release payload schemas.
 * Only the fields binpick reads are validated; the rest pass through.
 */
import { z } from 'zod';

export const ReleaseAssetSchema = z.looseObject({
  name: z.string(),
  browser_download_url: z.string(),
  size: z.number().optional(),
  content_type: z.string().optional(),
});

export const ReleaseSchema = z.looseObject({
  tag_name: z.string(),
  name: z.string().nullable().optional(),
  html_url: z.string().optional(),
  published_at: z.string().nullable().optional(),
  prerelease: z.boolean().optional(),
  assets: z.array(ReleaseAssetSchema),
});

export type ReleaseAsset = z.infer<typeof ReleaseAssetSchema>;
export type Release = z.infer<typeof ReleaseSchema>;

/** Release tag without a leading `v` (`v1.2.3` → `1.2.3`). */
export function releaseVersion(release: Pick<Release, 'tag_name'>): string {
  return release.tag_name.replace(/^v/, '');
}
