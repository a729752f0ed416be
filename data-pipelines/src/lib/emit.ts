import type { Writable } from 'stream';
import { polygon } from '@turf/helpers';
import { cellToBoundary } from 'h3-js';
import { ROUND_DIGITS } from '@firetiles/config';
import type { FireGeometry, FireProperties, HexProperties, RawProperties } from '@firetiles/schema';
import type { Feature, Polygon, Position } from 'geojson';
import type { Aggregate } from './aggregate.js';
import type { FireFeature } from './readers.js';
import { applyStatsOverride, type StatsEntry } from './stats.js';
import { dayBucket, type ResolvedTime } from './time.js';

export type RawRecord = { type: 'Feature'; properties: RawProperties; geometry: FireGeometry | null };
export type HexFeature = Feature<Polygon, HexProperties>;
export type OutputRecord = RawRecord | HexFeature;

const round = (n: number) => Number(n.toFixed(ROUND_DIGITS));

function allowedProperties(fireId: string, props: FireProperties, time: ResolvedTime): RawProperties {
  const out: RawProperties = { id_fire_event: fireId };
  if (typeof props.frp === 'number') out.frp = props.frp;
  if (typeof props.fros === 'number') out.fros = props.fros;
  if (props.duration !== undefined) out.duration = props.duration;
  if (props.time) out.time = props.time;
  if (props.timestamp) out.timestamp = props.timestamp;
  if (time.epoch !== undefined) {
    const day = dayBucket(time.epoch);
    // the floored slot time is what the map filters on
    if (time.field === 'time_floor') out.time = time.raw;
    out.time_ts = time.epoch;
    out.day_start_ts = day.start;
    out.day_end_ts = day.end;
  }
  if (props.time_min) out.time_min = props.time_min;
  if (props.time_max) out.time_max = props.time_max;
  if (props.time_min_ts !== undefined) out.time_min_ts = props.time_min_ts;
  if (props.time_max_ts !== undefined) out.time_max_ts = props.time_max_ts;
  return out;
}

/** Raw feature for the high zooms, tagged with a tippecanoe minzoom. */
export function toRawFeature(
  feature: FireFeature,
  fireId: string,
  time: ResolvedTime,
  minzoom: number,
  stats?: StatsEntry
): RawRecord {
  const props = allowedProperties(fireId, applyStatsOverride(feature.properties, stats), time);
  return { type: 'Feature', properties: { ...props, tippecanoe: { minzoom } }, geometry: feature.geometry };
}

export function toPlainFeature(feature: FireFeature, fireId: string, time: ResolvedTime): RawRecord {
  return { type: 'Feature', properties: allowedProperties(fireId, feature.properties, time), geometry: feature.geometry };
}

/** Closed [lng, lat] ring for an H3 cell. */
export function hexRing(cell: string): Position[] {
  const ring: Position[] = cellToBoundary(cell).map(([lat, lng]) => [lng, lat]);
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (first && last && (first[0] !== last[0] || first[1] !== last[1])) ring.push([first[0], first[1]]);
  return ring;
}

export function toHexFeature(agg: Aggregate, maxzoom: number): HexFeature {
  const frpAvg = agg.count ? agg.frpSum / agg.count : 0;
  const freMean = agg.count ? agg.freSum / agg.count : 0;
  const frosAvg = agg.frosCount ? agg.frosSum / agg.frosCount : null;
  const properties: HexProperties = {
    cell: agg.cell,
    res: agg.res,
    count: agg.count,
    frp_sum: round(agg.frpSum),
    frp_max: round(agg.frpMax),
    frp_avg: round(frpAvg),
    fre_sum_mj: round(agg.freSum),
    fre_mean_mj: round(freMean),
    last_time: agg.lastTime,
    // one aggregate per day, so the range is the day itself
    time_min: agg.dayLabel,
    time_max: agg.dayLabel,
    time_min_ts: agg.dayStart,
    time_max_ts: agg.dayEnd,
    day_start_ts: agg.dayStart,
    day_end_ts: agg.dayEnd,
    day_label: agg.dayLabel,
    fros_sum: round(agg.frosSum),
    fros_max: agg.frosMax === null ? null : round(agg.frosMax),
    fros_avg: frosAvg === null ? null : round(frosAvg),
    fros_count: agg.frosCount,
    tippecanoe: { minzoom: 0, maxzoom }
  };
  return polygon([hexRing(agg.cell)], properties);
}

function isBrokenPipe(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false;
  return err.code === 'EPIPE' || err.code === 'ERR_STREAM_DESTROYED';
}

/**
 * One compact JSON record per line. A consumer that hangs up (EPIPE) closes
 * the sink instead of failing it; `write` then resolves false.
 */
export class NdjsonSink {
  written = 0;
  private closed = false;
  private failure: Error | undefined;

  constructor(private readonly out: Writable) {
    out.on('error', err => {
      if (isBrokenPipe(err)) this.closed = true;
      else this.failure = err;
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async write(record: OutputRecord): Promise<boolean> {
    if (this.failure) throw this.failure;
    if (this.closed || this.out.destroyed) {
      this.closed = true;
      return false;
    }
    const ok = this.out.write(`${JSON.stringify(record)}\n`);
    if (!ok) {
      try {
        await this.drained();
      } catch (e) {
        if (!isBrokenPipe(e)) throw e;
        this.closed = true;
      }
    }
    if (this.closed) return false;
    this.written++;
    return true;
  }

  private drained(): Promise<void> {
    return new Promise((resolve, reject) => {
      const cleanup = () => {
        this.out.off('drain', onDrain);
        this.out.off('close', onClose);
        this.out.off('error', onError);
      };
      const onDrain = () => { cleanup(); resolve(); };
      const onClose = () => { cleanup(); this.closed = true; resolve(); };
      const onError = (err: Error) => { cleanup(); reject(err); };
      this.out.on('drain', onDrain);
      this.out.on('close', onClose);
      this.out.on('error', onError);
    });
  }
}
