import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { Group, MediaReference } from "../types.js";

export interface MediaSource {
  /** References already validated upstream, in display order. */
  getValidatedMedia(group: Group): Promise<MediaReference[]>;
}

export class NoMediaSource implements MediaSource {
  async getValidatedMedia(): Promise<MediaReference[]> {
    return [];
  }
}

const mediaEntrySchema = z.object({
  ref: z.string().trim().min(1),
  url: z.string().trim().url(),
  alt: z.string().trim().min(1).nullable().optional(),
});

const manifestSchema = z.record(z.string().trim().min(1), z.array(mediaEntrySchema));

export function parseMediaManifest(raw: unknown, source = "media manifest"): Map<string, MediaReference[]> {
  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid ${source}: ${details}`);
  }

  const byImageSku = new Map<string, MediaReference[]>();
  for (const [imageSku, entries] of Object.entries(parsed.data)) {
    byImageSku.set(
      imageSku.trim().toUpperCase(),
      entries.map((entry) => ({ ref: entry.ref, url: entry.url, alt: entry.alt ?? null })),
    );
  }
  return byImageSku;
}

/**
 * Looks media up by each row's image SKU (falling back to the SKU itself). Rows are visited in SKU order
 * and a reference appears once, at its first position.
 */
export class ManifestMediaSource implements MediaSource {
  constructor(private readonly byImageSku: Map<string, MediaReference[]>) {}

  static async fromFile(filePath: string): Promise<ManifestMediaSource> {
    const raw: unknown = JSON.parse(await readFile(filePath, "utf8"));
    return new ManifestMediaSource(parseMediaManifest(raw, `media manifest ${filePath}`));
  }

  async getValidatedMedia(group: Group): Promise<MediaReference[]> {
    const rows = [...group.rows].sort((left, right) => left.skuId.localeCompare(right.skuId));
    const seen = new Set<string>();
    const media: MediaReference[] = [];

    for (const row of rows) {
      const key = (row.imageSku ?? row.skuId).toUpperCase();
      for (const reference of this.byImageSku.get(key) ?? []) {
        if (seen.has(reference.ref)) {
          continue;
        }
        seen.add(reference.ref);
        media.push(reference);
      }
    }

    return media;
  }
}
