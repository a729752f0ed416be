import proj4 from 'proj4';
import { CRS_PATTERN, EXTRA_CRS_DEFS, WGS84_EPSG } from '@firetiles/config';
import type { FireGeometry, Position } from '@firetiles/schema';
import { UnsupportedCrsError } from './errors.js';
import { mapPositions } from './geometry.js';

export type Transformer = (x: number, y: number) => [number, number];

/** CRS name from a GeoJSON `crs` member: `{ properties: { name } }`, `{ name }` or a bare string. */
export function crsNameOf(crs: unknown): string | undefined {
  if (typeof crs === 'string') return crs;
  if (!crs || typeof crs !== 'object') return undefined;
  const props = 'properties' in crs ? crs.properties : undefined;
  if (props && typeof props === 'object' && 'name' in props && typeof props.name === 'string') return props.name;
  if ('name' in crs && typeof crs.name === 'string') return crs.name;
  return undefined;
}

export function parseEpsgCode(name: string | undefined): number | undefined {
  const m = name?.match(CRS_PATTERN);
  return m ? Number(m[1]) : undefined;
}

function utmDef(epsg: number): string | undefined {
  const zone = epsg % 100;
  if (zone < 1 || zone > 60) return undefined;
  if (epsg - zone === 32600) return `+proj=utm +zone=${zone} +datum=WGS84 +units=m +no_defs`;
  if (epsg - zone === 32700) return `+proj=utm +zone=${zone} +south +datum=WGS84 +units=m +no_defs`;
  return undefined;
}

function ensureDefinition(epsg: number): string {
  const code = `EPSG:${epsg}`;
  if (proj4.defs(code)) return code;
  const def = EXTRA_CRS_DEFS[epsg] ?? utmDef(epsg);
  if (!def) throw new UnsupportedCrsError(epsg);
  proj4.defs(code, def);
  return code;
}

/**
 * Transformer from the declared CRS to EPSG:4326 (lon, lat), or undefined when
 * nothing needs to change. Build once per file.
 */
export function buildTransformer(crsName: string | undefined): Transformer | undefined {
  const epsg = parseEpsgCode(crsName);
  if (epsg === undefined || epsg === WGS84_EPSG) return undefined;
  const converter = proj4(ensureDefinition(epsg), `EPSG:${WGS84_EPSG}`);
  return (x, y) => {
    const [lon, lat] = converter.forward([x, y]);
    return [lon, lat];
  };
}

export function transformPosition(position: Position, transformer: Transformer): Position {
  const [x, y, ...tail] = position;
  const [lon, lat] = transformer(x, y);
  return [lon, lat, ...tail];
}

export function transformGeometry(geometry: FireGeometry, transformer: Transformer | undefined): FireGeometry {
  if (!transformer) return geometry;
  return mapPositions(geometry, p => transformPosition(p, transformer));
}
