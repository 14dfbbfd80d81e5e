/**
 * Reference catalog of layouts and speakers.
 *
 * Read-only for the whole run: validators receive the same `Catalog` value
 * and only query it. IDs cross into branded `LayoutId` / `SpeakerId` here
 * and nowhere else.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import type { Layout, LayoutId, Speaker, SpeakerId } from "./types.js";

export class CatalogLoadError extends Error {
  readonly name = "CatalogLoadError";

  constructor(
    message: string,
    public readonly file: string | undefined,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CatalogLoadError);
    }
  }
}

export interface CatalogData {
  layouts: Record<string, { channel_order: readonly string[] }>;
  speakers: Record<string, { azimuth_deg?: number; elevation_deg?: number }>;
}

export class Catalog {
  private readonly layouts: ReadonlyMap<string, Layout>;
  private readonly speakers: ReadonlyMap<string, Speaker>;

  private constructor(layouts: Map<string, Layout>, speakers: Map<string, Speaker>) {
    this.layouts = layouts;
    this.speakers = speakers;
  }

  /**
   * Build a catalog from plain data. Throws `CatalogLoadError` when a layout
   * has an empty or duplicated channel order, or names an unknown speaker.
   */
  static fromData(data: CatalogData): Catalog {
    const speakerIds: ReadonlySet<string> = new Set(Object.keys(data.speakers));
    const speakers = new Map<string, Speaker>();
    for (const id of [...speakerIds].sort()) {
      if (!isSpeakerId(id, speakerIds)) continue;
      const entry = data.speakers[id];
      speakers.set(id, {
        speaker_id: id,
        ...(entry?.azimuth_deg !== undefined ? { azimuth_deg: entry.azimuth_deg } : {}),
        ...(entry?.elevation_deg !== undefined ? { elevation_deg: entry.elevation_deg } : {}),
      });
    }

    const layoutIds: ReadonlySet<string> = new Set(Object.keys(data.layouts));
    const layouts = new Map<string, Layout>();
    for (const id of [...layoutIds].sort()) {
      if (!isLayoutId(id, layoutIds)) continue;
      const order = data.layouts[id]?.channel_order ?? [];
      if (order.length === 0) {
        throw new CatalogLoadError(`Layout ${id} missing or empty channel_order list.`, undefined);
      }
      const seen = new Set<string>();
      const duplicates = new Set<string>();
      const channels: SpeakerId[] = [];
      for (const ch of order) {
        if (seen.has(ch)) duplicates.add(ch);
        seen.add(ch);
        if (!isSpeakerId(ch, speakerIds)) {
          throw new CatalogLoadError(`Layout ${id} references unknown speaker: ${ch}`, undefined);
        }
        channels.push(ch);
      }
      if (duplicates.size > 0) {
        throw new CatalogLoadError(
          `Layout ${id} has duplicate channels in channel_order: ${[...duplicates].sort().join(", ")}`,
          undefined
        );
      }
      layouts.set(id, { layout_id: id, channel_order: Object.freeze(channels) });
    }

    return new Catalog(layouts, speakers);
  }

  layout(id: unknown): Layout | undefined {
    return typeof id === "string" ? this.layouts.get(id) : undefined;
  }

  speaker(id: unknown): Speaker | undefined {
    return typeof id === "string" ? this.speakers.get(id) : undefined;
  }

  hasLayout(id: unknown): boolean {
    return this.layout(id) !== undefined;
  }

  hasSpeaker(id: unknown): boolean {
    return this.speaker(id) !== undefined;
  }

  /** Layout IDs in sorted order. */
  listLayoutIds(): LayoutId[] {
    return [...this.layouts.values()].map((l) => l.layout_id);
  }

  /** Speaker IDs in sorted order. */
  listSpeakerIds(): SpeakerId[] {
    return [...this.speakers.values()].map((s) => s.speaker_id);
  }
}

// The only places raw strings become branded IDs.
function isLayoutId(id: string, known: ReadonlySet<string>): id is LayoutId {
  return known.has(id);
}

function isSpeakerId(id: string, known: ReadonlySet<string>): id is SpeakerId {
  return known.has(id);
}

// ---------------------------------------------------------------------------
// Loading from the ontology directory
// ---------------------------------------------------------------------------

const META_KEY = "_meta";

const LayoutsDocSchema = z.object({
  layouts: z.record(z.unknown()),
});

const LayoutEntrySchema = z.object({
  channel_order: z.array(z.string().min(1)).min(1),
});

const SpeakersDocSchema = z.object({
  speakers: z.record(z.unknown()),
});

const SpeakerEntrySchema = z
  .object({
    azimuth_deg: z.number().optional(),
    elevation_deg: z.number().optional(),
  })
  .nullable();

async function readYamlDocument(file: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(file, "utf-8");
  } catch (error) {
    throw new CatalogLoadError(`Cannot read catalog file: ${file}`, file, error);
  }
  try {
    return parseYaml(raw);
  } catch (error) {
    throw new CatalogLoadError(`Catalog file is not valid YAML: ${file}`, file, error);
  }
}

function describeZodError(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

/**
 * Load `layouts.yaml` and `speakers.yaml` from an ontology directory.
 */
export async function loadCatalog(ontologyDir: string): Promise<Catalog> {
  const layoutsFile = join(ontologyDir, "layouts.yaml");
  const speakersFile = join(ontologyDir, "speakers.yaml");
  const [layoutsDoc, speakersDoc] = await Promise.all([
    readYamlDocument(layoutsFile),
    readYamlDocument(speakersFile),
  ]);

  const layoutsParsed = LayoutsDocSchema.safeParse(layoutsDoc);
  if (!layoutsParsed.success) {
    throw new CatalogLoadError(
      `Layout catalog malformed: ${describeZodError(layoutsParsed.error)}`,
      layoutsFile
    );
  }
  const speakersParsed = SpeakersDocSchema.safeParse(speakersDoc);
  if (!speakersParsed.success) {
    throw new CatalogLoadError(
      `Speaker catalog malformed: ${describeZodError(speakersParsed.error)}`,
      speakersFile
    );
  }

  const data: CatalogData = { layouts: {}, speakers: {} };
  for (const [id, entry] of Object.entries(layoutsParsed.data.layouts)) {
    if (id === META_KEY) continue;
    const parsed = LayoutEntrySchema.safeParse(entry);
    if (!parsed.success) {
      throw new CatalogLoadError(
        `Layout ${id} malformed: ${describeZodError(parsed.error)}`,
        layoutsFile
      );
    }
    data.layouts[id] = parsed.data;
  }
  for (const [id, entry] of Object.entries(speakersParsed.data.speakers)) {
    if (id === META_KEY) continue;
    const parsed = SpeakerEntrySchema.safeParse(entry);
    if (!parsed.success) {
      throw new CatalogLoadError(
        `Speaker ${id} malformed: ${describeZodError(parsed.error)}`,
        speakersFile
      );
    }
    data.speakers[id] = parsed.data ?? {};
  }

  let catalog: Catalog;
  try {
    catalog = Catalog.fromData(data);
  } catch (error) {
    if (error instanceof CatalogLoadError) {
      throw new CatalogLoadError(error.message, layoutsFile, error);
    }
    throw error;
  }

  emit(TelemetryEvents.CatalogLoaded, {
    ontology_dir: ontologyDir,
    layouts: catalog.listLayoutIds().length,
    speakers: catalog.listSpeakerIds().length,
  });
  return catalog;
}
