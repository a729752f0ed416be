import fs from 'fs/promises';
import path from 'path';
import { SLICE_FILE_PATTERN, SOURCE_EXT } from '@firetiles/config';
import { SourceCollection, SourceFeature, type FireGeometry, type FireProperties } from '@firetiles/schema';
import { buildTransformer, crsNameOf, transformGeometry } from './crs.js';
import { MissingInputDirError } from './errors.js';
import { isoFromEpoch, resolveTimestamp } from './time.js';
import { errorMessage } from './utils.js';

export type FireFeature = {
  file: string;
  properties: FireProperties;
  geometry: FireGeometry | null;
};

export type FileTimeRange = { minIso: string; minTs: number; maxIso: string; maxTs: number };

export async function listSourceFiles(dir: string): Promise<string[]> {
  let ents: string[];
  try { ents = await fs.readdir(dir); } catch (e) {
    throw new MissingInputDirError(dir, e);
  }
  return ents.filter(e => e.endsWith(SOURCE_EXT)).sort();
}

/** `gdf_<digits>.geojson` slices carry their fire event id in the name. */
export function fileEntityId(name: string): string | undefined {
  return SLICE_FILE_PATTERN.exec(name)?.[1];
}

export function fileTimeRange(features: SourceFeature[]): FileTimeRange | undefined {
  let minTs: number | undefined;
  let maxTs: number | undefined;
  for (const f of features) {
    const { epoch } = resolveTimestamp(f.properties);
    if (epoch === undefined) continue;
    if (minTs === undefined || epoch < minTs) minTs = epoch;
    if (maxTs === undefined || epoch > maxTs) maxTs = epoch;
  }
  if (minTs === undefined || maxTs === undefined) return undefined;
  return { minIso: isoFromEpoch(minTs), minTs, maxIso: isoFromEpoch(maxTs), maxTs };
}

function withFileIdentity(props: FireProperties, fileId: string | undefined, range: FileTimeRange | undefined): FireProperties {
  if (!fileId || props.id_fire_event !== undefined) return props;
  if (!range) return { ...props, id_fire_event: fileId };
  return {
    ...props,
    id_fire_event: fileId,
    time_min: range.minIso,
    time_max: range.maxIso,
    time_min_ts: range.minTs,
    time_max_ts: range.maxTs
  };
}

async function loadCollection(file: string): Promise<SourceCollection> {
  return SourceCollection.parse(JSON.parse(await fs.readFile(file, 'utf8')));
}

/**
 * Every feature of every slice in `dir`, in filename then file order. Files
 * that fail to read, parse or reproject are reported on stderr and skipped.
 */
export async function* readFeatures(dir: string): AsyncGenerator<FireFeature> {
  const files = await listSourceFiles(dir);
  for (const name of files) {
    let collection: SourceCollection;
    let transformer: ReturnType<typeof buildTransformer>;
    try {
      collection = await loadCollection(path.join(dir, name));
      transformer = buildTransformer(crsNameOf(collection.crs));
    } catch (e) {
      console.warn(`Skipping ${name}: ${errorMessage(e)}`);
      continue;
    }
    const features: SourceFeature[] = [];
    for (const raw of collection.features) {
      const parsed = SourceFeature.safeParse(raw);
      if (parsed.success) features.push(parsed.data);
    }
    const fileId = fileEntityId(name);
    const range = fileId ? fileTimeRange(features) : undefined;
    for (const f of features) {
      yield {
        file: name,
        properties: withFileIdentity(f.properties, fileId, range),
        geometry: f.geometry && transformGeometry(f.geometry, transformer)
      };
    }
  }
}
