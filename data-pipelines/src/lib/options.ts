import { z } from 'zod';
import { DEFAULTS, PATHS, VALIDATION_RESOLUTIONS } from '@firetiles/config';
import { dateWindow, type DateWindow } from './time.js';

const zoom = z.coerce.number().int().min(0).max(24);
const h3Res = z.coerce.number().int().min(0).max(15);

const DateRange = z.object({
  startDate: z.string().optional(),
  endDate: z.string().optional()
});

export const StreamH3Args = DateRange.extend({
  dataDir: z.string().min(1).default(PATHS.dataDir),
  h3Res: h3Res.default(DEFAULTS.h3Res),
  lowZoomMax: zoom.default(DEFAULTS.lowZoomMax),
  highZoomMin: zoom.optional(),
  omitRaw: z.boolean().default(false),
  statsGdf: z.string().optional()
});

export const StreamRawArgs = DateRange.extend({
  dataDir: z.string().min(1).default(PATHS.dataDir)
});

export const ValidateArgs = DateRange.extend({
  dataDir: z.string().min(1).default(PATHS.dataDir),
  resolutions: z.string()
    .transform(s => s.split(',').map(p => p.trim()).filter(Boolean))
    .pipe(z.array(h3Res).min(1))
    .optional(),
  ndjson: z.string().optional()
});

export type StreamH3Settings = {
  dataDir: string;
  h3Res: number;
  lowZoomMax: number;
  highZoomMin: number;
  includeRaw: boolean;
  window: DateWindow;
  statsGdf?: string;
};

export type StreamRawSettings = { dataDir: string; window: DateWindow };

export type ValidateSettings = {
  dataDir: string;
  resolutions: number[];
  window: DateWindow;
  ndjson?: string;
};

/** Validate commander's option bag; throws on bad values (fatal for the run). */
export function resolveStreamH3Settings(raw: unknown): StreamH3Settings {
  const args = StreamH3Args.parse(raw);
  return {
    dataDir: args.dataDir,
    h3Res: args.h3Res,
    lowZoomMax: args.lowZoomMax,
    highZoomMin: args.highZoomMin ?? args.lowZoomMax + 1,
    includeRaw: !args.omitRaw,
    window: dateWindow(args.startDate, args.endDate),
    statsGdf: args.statsGdf
  };
}

export function resolveStreamRawSettings(raw: unknown): StreamRawSettings {
  const args = StreamRawArgs.parse(raw);
  return { dataDir: args.dataDir, window: dateWindow(args.startDate, args.endDate) };
}

export function resolveValidateSettings(raw: unknown): ValidateSettings {
  const args = ValidateArgs.parse(raw);
  return {
    dataDir: args.dataDir,
    resolutions: args.resolutions ?? VALIDATION_RESOLUTIONS,
    window: dateWindow(args.startDate, args.endDate),
    ndjson: args.ndjson
  };
}
