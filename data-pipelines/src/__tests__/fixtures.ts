import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { Writable } from 'stream';
import type { FireGeometry, FireProperties } from '@firetiles/schema';
import type { FireFeature } from '../lib/readers.js';

export async function sliceDir(files: Record<string, unknown>): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'firetiles-'));
  for (const [name, content] of Object.entries(files)) {
    const text = typeof content === 'string' ? content : JSON.stringify(content);
    await fs.writeFile(path.join(dir, name), text);
  }
  return dir;
}

export function collection(features: unknown[], crs?: string): Record<string, unknown> {
  const fc: Record<string, unknown> = { type: 'FeatureCollection', features };
  if (crs) fc.crs = { type: 'name', properties: { name: crs } };
  return fc;
}

export function pointFeature(coordinates: number[], properties: Record<string, unknown>): Record<string, unknown> {
  return { type: 'Feature', properties, geometry: { type: 'Point', coordinates } };
}

export function fireFeature(properties: FireProperties, geometry: FireGeometry | null): FireFeature {
  return { file: 'gdf_1.geojson', properties, geometry };
}

export async function* fromArray<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) yield item;
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of source) out.push(item);
  return out;
}

export function memoryStream(): { out: Writable; lines: () => string[] } {
  const chunks: string[] = [];
  const out = new Writable({
    write(chunk, _enc, cb) {
      chunks.push(String(chunk));
      cb();
    }
  });
  return { out, lines: () => chunks.join('').split('\n').filter(Boolean) };
}

// Accepts `accept` writes, then fails like a reader that hung up.
export function hangingUpStream(accept: number): Writable {
  let writes = 0;
  return new Writable({
    write(_chunk, _enc, cb) {
      writes++;
      if (writes > accept) {
        cb(Object.assign(new Error('write EPIPE'), { code: 'EPIPE' }));
        return;
      }
      cb();
    }
  });
}

export const utc = (y: number, mo: number, d: number, h = 0, mi = 0, s = 0) => Date.UTC(y, mo - 1, d, h, mi, s) / 1000;
