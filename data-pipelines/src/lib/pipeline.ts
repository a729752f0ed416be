import { HexAggregator, toObservation } from './aggregate.js';
import { toHexFeature, toPlainFeature, toRawFeature, type NdjsonSink, type OutputRecord, type RawRecord } from './emit.js';
import { readFeatures } from './readers.js';
import type { StatsMap } from './stats.js';
import { inWindow, resolveTimestamp, type DateWindow } from './time.js';

export type StreamH3Options = {
  dataDir: string;
  h3Res: number;
  lowZoomMax: number;
  highZoomMin: number;
  includeRaw: boolean;
  window?: DateWindow;
  stats?: StatsMap;
};

export type StreamRawOptions = {
  dataDir: string;
  window?: DateWindow;
};

/**
 * Raw features (source file order) followed by one hexagon per
 * (cell, day) bucket once every file has been read. Features without a fire
 * id are dropped; features with a timestamp outside the window are dropped
 * from both layers.
 */
export async function* streamH3(opts: StreamH3Options): AsyncGenerator<OutputRecord> {
  const aggregator = new HexAggregator(opts.h3Res);
  const window = opts.window ?? {};
  for await (const feature of readFeatures(opts.dataDir)) {
    const fireId = feature.properties.id_fire_event;
    if (fireId === undefined) continue;
    const time = resolveTimestamp(feature.properties);
    if (time.epoch !== undefined && !inWindow(time.epoch, window)) continue;
    const obs = toObservation(feature, time);
    if (obs) aggregator.observe(obs);
    if (opts.includeRaw) {
      yield toRawFeature(feature, fireId, time, opts.highZoomMin, opts.stats?.get(fireId));
    }
  }
  for (const agg of aggregator.buckets()) {
    yield toHexFeature(agg, opts.lowZoomMax);
  }
}

export async function* streamRaw(opts: StreamRawOptions): AsyncGenerator<RawRecord> {
  const window = opts.window ?? {};
  for await (const feature of readFeatures(opts.dataDir)) {
    const fireId = feature.properties.id_fire_event;
    if (fireId === undefined) continue;
    const time = resolveTimestamp(feature.properties);
    if (time.epoch !== undefined && !inWindow(time.epoch, window)) continue;
    yield toPlainFeature(feature, fireId, time);
  }
}

export type RunResult = { written: number; stoppedEarly: boolean };

/** Drain `records` into the sink; stops reading input as soon as the sink closes. */
export async function runToSink(records: AsyncIterable<OutputRecord>, sink: NdjsonSink): Promise<RunResult> {
  for await (const record of records) {
    if (!(await sink.write(record))) return { written: sink.written, stoppedEarly: true };
  }
  return { written: sink.written, stoppedEarly: false };
}
