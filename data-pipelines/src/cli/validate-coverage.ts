#!/usr/bin/env node
import fs from 'fs/promises';
import { Command } from 'commander';
import { PATHS, VALIDATION_RESOLUTIONS } from '@firetiles/config';
import { aggregateKeysFromNdjson, collectCoverage, findUncovered } from '../lib/coverage.js';
import { resolveValidateSettings } from '../lib/options.js';
import { readFeatures } from '../lib/readers.js';

// Every H3 aggregate (per day, per resolution) should have at least one raw
// feature in the same cell and day, or zooming in shows an empty map.
async function main(): Promise<void> {
  const program = new Command()
    .name('validate-coverage')
    .description('Check that every H3 aggregate is backed by a raw feature')
    .option('--data-dir <dir>', 'directory of GeoJSON slices', PATHS.dataDir)
    .option('--resolutions <list>', 'comma separated H3 resolutions', VALIDATION_RESOLUTIONS.join(','))
    .option('--start-date <date>', 'YYYY-MM-DD, inclusive (UTC)')
    .option('--end-date <date>', 'YYYY-MM-DD, inclusive (UTC)')
    .option('--ndjson <file>', 'check the hexagons of a previous stream-h3 run instead');
  program.parse(process.argv);

  const settings = resolveValidateSettings(program.opts());
  let emitted: Set<string> | undefined;
  let resolutions = settings.resolutions;
  if (settings.ndjson) {
    const parsed = aggregateKeysFromNdjson(await fs.readFile(settings.ndjson, 'utf8'));
    if (parsed.invalid) console.warn(`Ignored ${parsed.invalid} unparseable lines in ${settings.ndjson}`);
    emitted = parsed.keys;
    resolutions = parsed.resolutions;
  }

  const sets = await collectCoverage(readFeatures(settings.dataDir), resolutions, settings.window);
  const aggregates = emitted ?? sets.eligible;
  const report = findUncovered(aggregates, sets.raw);
  if (report.missing) {
    console.error(
      `Validation failed: ${report.missing} H3 aggregates have no raw feature coverage.`,
      `Examples: ${report.sample.join(', ')}`
    );
    process.exitCode = 1;
    return;
  }
  console.log(`Validation passed: all ${aggregates.size} H3 aggregates have at least one raw feature.`);
}

main().catch(e => { console.error(e); process.exit(1); });
