#!/usr/bin/env node
import { Command } from 'commander';
import { PATHS } from '@firetiles/config';
import { NdjsonSink } from '../lib/emit.js';
import { resolveStreamRawSettings } from '../lib/options.js';
import { runToSink, streamRaw } from '../lib/pipeline.js';

async function main(): Promise<void> {
  const program = new Command()
    .name('stream-raw')
    .description('Stream every fire feature as NDJSON with allow-listed properties')
    .option('--data-dir <dir>', 'directory of GeoJSON slices', PATHS.dataDir)
    .option('--start-date <date>', 'YYYY-MM-DD, inclusive (UTC)')
    .option('--end-date <date>', 'YYYY-MM-DD, inclusive (UTC)');
  program.parse(process.argv);

  const settings = resolveStreamRawSettings(program.opts());
  const { written, stoppedEarly } = await runToSink(streamRaw(settings), new NdjsonSink(process.stdout));
  if (!stoppedEarly) console.error('Streamed', written, 'raw features from', settings.dataDir);
}

main().catch(e => { console.error(e); process.exit(1); });
