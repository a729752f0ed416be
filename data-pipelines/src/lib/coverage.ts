import { COVERAGE_SAMPLE_SIZE } from '@firetiles/config';
import { HexRecord } from '@firetiles/schema';
import { cellFor, toObservation } from './aggregate.js';
import { representativeLonLat, type LonLat } from './geometry.js';
import type { FireFeature } from './readers.js';
import { dayBucket, inWindow, resolveTimestamp, type DateWindow } from './time.js';

export type CoverageSets = {
  // buckets at least one emitted raw feature falls in
  raw: Set<string>;
  // buckets the aggregator would create
  eligible: Set<string>;
};

export type CoverageReport = { missing: number; sample: string[] };

export function bucketKey(res: number, day: string, cell: string): string {
  return `${res}|${day}|${cell}`;
}

export function coverageKeys(lonLat: LonLat, epoch: number, resolutions: number[]): string[] {
  const day = dayBucket(epoch).label;
  const keys: string[] = [];
  for (const res of resolutions) {
    const cell = cellFor(lonLat, res);
    if (cell) keys.push(bucketKey(res, day, cell));
  }
  return keys;
}

export async function collectCoverage(
  features: AsyncIterable<FireFeature>,
  resolutions: number[],
  window: DateWindow = {}
): Promise<CoverageSets> {
  const sets: CoverageSets = { raw: new Set(), eligible: new Set() };
  for await (const feature of features) {
    if (feature.properties.id_fire_event === undefined) continue;
    const time = resolveTimestamp(feature.properties);
    if (time.epoch === undefined || !inWindow(time.epoch, window)) continue;
    const lonLat = representativeLonLat(feature.geometry);
    if (!lonLat) continue;
    const keys = coverageKeys(lonLat, time.epoch, resolutions);
    for (const k of keys) sets.raw.add(k);
    if (toObservation(feature, time)) {
      for (const k of keys) sets.eligible.add(k);
    }
  }
  return sets;
}

/** Bucket keys of the hexagon records in an emitted NDJSON stream; raw records are ignored. */
export function aggregateKeysFromNdjson(text: string): { keys: Set<string>; resolutions: number[]; invalid: number } {
  const keys = new Set<string>();
  const resolutions = new Set<number>();
  let invalid = 0;
  for (const line of text.split(/\r?\n/).filter(Boolean)) {
    let rec: unknown;
    try { rec = JSON.parse(line); } catch {
      invalid++;
      continue;
    }
    const hex = HexRecord.safeParse(rec);
    if (!hex.success) continue;
    const { res, day_label, cell } = hex.data.properties;
    keys.add(bucketKey(res, day_label, cell));
    resolutions.add(res);
  }
  return { keys, resolutions: [...resolutions].sort((a, b) => a - b), invalid };
}

export function findUncovered(eligible: Set<string>, raw: Set<string>, sampleSize = COVERAGE_SAMPLE_SIZE): CoverageReport {
  const missing = [...eligible].filter(k => !raw.has(k));
  return { missing: missing.length, sample: missing.slice(0, sampleSize) };
}
