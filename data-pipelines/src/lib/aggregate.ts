import { latLngToCell } from 'h3-js';
import { FRE_INTERVAL_SECONDS, FROS_MISSING_THRESHOLD } from '@firetiles/config';
import { representativeLonLat, type LonLat } from './geometry.js';
import type { FireFeature } from './readers.js';
import { dayBucket, type ResolvedTime } from './time.js';

export type Aggregate = {
  res: number;
  cell: string;
  dayLabel: string;
  dayStart: number;
  dayEnd: number;
  count: number;
  frpSum: number;
  frpMax: number;
  freSum: number;
  frosSum: number;
  frosMax: number | null;
  frosCount: number;
  lastTime: string | null;
  // Ids already counted in this bucket; never emitted.
  fireIds: Set<string>;
};

export type Observation = {
  fireId: string;
  lonLat: LonLat;
  epoch: number;
  rawTime?: string;
  frp: number;
  fros?: number;
};

export function aggregateKey(res: number, cell: string, dayStart: number): string {
  return `${res}|${cell}|${dayStart}`;
}

export function normalizeFros(value: number | null | undefined): number | undefined {
  if (value === null || value === undefined) return undefined;
  return value <= FROS_MISSING_THRESHOLD ? undefined : value;
}

export function cellFor([lon, lat]: LonLat, res: number): string | undefined {
  if (!Number.isFinite(lon) || !Number.isFinite(lat) || Math.abs(lat) > 90) return undefined;
  return latLngToCell(lat, lon, res);
}

/**
 * What a feature contributes to aggregation, or undefined when it cannot be
 * aggregated: no fire id, an FRP that is not a number, an unresolved
 * timestamp or a geometry with no usable coordinate.
 */
export function toObservation(feature: FireFeature, time: ResolvedTime): Observation | undefined {
  const { id_fire_event: fireId, frp, fros } = feature.properties;
  if (fireId === undefined || frp === null || time.epoch === undefined) return undefined;
  const lonLat = representativeLonLat(feature.geometry);
  if (!lonLat) return undefined;
  return {
    fireId,
    lonLat,
    epoch: time.epoch,
    rawTime: time.raw,
    frp: frp ?? 0,
    fros: normalizeFros(fros)
  };
}

/**
 * Running per (resolution, cell, UTC day) statistics. Count and sums move at
 * most once per fire id per bucket; maxima and the last seen time move on
 * every observation.
 */
export class HexAggregator {
  private readonly table = new Map<string, Aggregate>();

  constructor(readonly res: number) {}

  get size(): number {
    return this.table.size;
  }

  observe(obs: Observation): Aggregate | undefined {
    const cell = cellFor(obs.lonLat, this.res);
    if (!cell) return undefined;
    const day = dayBucket(obs.epoch);
    const key = aggregateKey(this.res, cell, day.start);
    let agg = this.table.get(key);
    if (!agg) {
      agg = {
        res: this.res,
        cell,
        dayLabel: day.label,
        dayStart: day.start,
        dayEnd: day.end,
        count: 0,
        frpSum: 0,
        frpMax: 0,
        freSum: 0,
        frosSum: 0,
        frosMax: null,
        frosCount: 0,
        lastTime: null,
        fireIds: new Set<string>()
      };
      this.table.set(key, agg);
    }
    if (!agg.fireIds.has(obs.fireId)) {
      agg.fireIds.add(obs.fireId);
      agg.count += 1;
      agg.frpSum += obs.frp;
      agg.freSum += obs.frp * FRE_INTERVAL_SECONDS;
      if (obs.fros !== undefined) {
        agg.frosSum += obs.fros;
        agg.frosCount += 1;
      }
    }
    agg.frpMax = Math.max(agg.frpMax, obs.frp);
    if (obs.fros !== undefined) agg.frosMax = agg.frosMax === null ? obs.fros : Math.max(agg.frosMax, obs.fros);
    agg.lastTime = obs.rawTime ?? agg.lastTime;
    return agg;
  }

  buckets(): IterableIterator<Aggregate> {
    return this.table.values();
  }
}
