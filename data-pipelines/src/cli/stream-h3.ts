#!/usr/bin/env node
import { Command } from 'commander';
import { DEFAULTS, PATHS } from '@firetiles/config';
import { NdjsonSink } from '../lib/emit.js';
import { resolveStreamH3Settings } from '../lib/options.js';
import { runToSink, streamH3 } from '../lib/pipeline.js';
import { loadStatsMap } from '../lib/stats.js';

// Usually piped straight into tippecanoe:
//   stream-h3 --h3-res 4 --low-zoom-max 4 | tippecanoe -o fires.pmtiles -Z0 -z10 -
async function main(): Promise<void> {
  const program = new Command()
    .name('stream-h3')
    .description('Stream raw fire features and daily H3 aggregates as NDJSON')
    .option('--data-dir <dir>', 'directory of GeoJSON slices', PATHS.dataDir)
    .option('--h3-res <n>', 'H3 resolution of the low zoom layer', String(DEFAULTS.h3Res))
    .option('--low-zoom-max <n>', 'highest zoom showing the H3 layer', String(DEFAULTS.lowZoomMax))
    .option('--high-zoom-min <n>', 'lowest zoom showing raw features (default: low-zoom-max + 1)')
    .option('--omit-raw', 'emit only H3 aggregates')
    .option('--start-date <date>', 'YYYY-MM-DD, inclusive (UTC)')
    .option('--end-date <date>', 'YYYY-MM-DD, inclusive (UTC)')
    .option('--stats-gdf <file>', 'GeoJSON with time_start/time_end per fire_event_id');
  program.parse(process.argv);

  const settings = resolveStreamH3Settings(program.opts());
  const stats = await loadStatsMap(settings.statsGdf);
  const sink = new NdjsonSink(process.stdout);
  const { written, stoppedEarly } = await runToSink(streamH3({ ...settings, stats }), sink);
  // a closed pipe is how head/tippecanoe say they have had enough
  if (!stoppedEarly) console.error('Streamed', written, 'features from', settings.dataDir);
}

main().catch(e => { console.error(e); process.exit(1); });
