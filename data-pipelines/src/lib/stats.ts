import fs from 'fs/promises';
import { z } from 'zod';
import { StatsRow, type FireProperties } from '@firetiles/schema';
import { parseTimestamp } from './time.js';
import { errorMessage } from './utils.js';

export type StatsEntry = {
  timeStart?: string;
  timeEnd?: string;
  timeStartTs?: number;
  timeEndTs?: number;
};

export type StatsMap = Map<string, StatsEntry>;

const StatsCollection = z.object({ features: z.array(z.unknown()) });

/**
 * Per fire event start/end overrides from a stats GeoJSON. A missing or
 * malformed file only warns; the run carries on without overrides.
 */
export async function loadStatsMap(file: string | undefined): Promise<StatsMap> {
  const mapping: StatsMap = new Map();
  if (!file) return mapping;
  let features: unknown[];
  try {
    features = StatsCollection.parse(JSON.parse(await fs.readFile(file, 'utf8'))).features;
  } catch (e) {
    console.warn(`Warning: failed to read stats file ${file}: ${errorMessage(e)}`);
    return mapping;
  }
  for (const raw of features) {
    const row = StatsRow.safeParse(raw);
    if (!row.success) continue;
    const props = row.data.properties;
    const id = props.fire_event_id ?? props.id_fire_event;
    if (id === undefined) continue;
    const start = parseTimestamp(props.time_start);
    const end = parseTimestamp(props.time_end);
    mapping.set(id, {
      timeStart: start.raw,
      timeEnd: end.raw,
      timeStartTs: start.epoch,
      timeEndTs: end.epoch
    });
  }
  return mapping;
}

/** Fill time range fields the feature lacks from its stats entry; never overwrites. */
export function applyStatsOverride(props: FireProperties, entry: StatsEntry | undefined): FireProperties {
  if (!entry) return props;
  const out = { ...props };
  if (out.time_min_ts === undefined && entry.timeStartTs !== undefined) out.time_min_ts = entry.timeStartTs;
  if (out.time_max_ts === undefined && entry.timeEndTs !== undefined) out.time_max_ts = entry.timeEndTs;
  if (out.time_min === undefined && entry.timeStart) out.time_min = entry.timeStart;
  if (out.time_max === undefined && entry.timeEnd) out.time_max = entry.timeEnd;
  return out;
}
