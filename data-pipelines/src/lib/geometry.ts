import type { FireGeometry, Position } from '@firetiles/schema';

export type LonLat = [number, number];

// Nesting never goes deeper than MultiPolygon (position arrays three levels down).
export function leafPositions(geometry: FireGeometry): Position[] {
  switch (geometry.type) {
    case 'Point':
      return [geometry.coordinates];
    case 'MultiPoint':
    case 'LineString':
      return geometry.coordinates;
    case 'MultiLineString':
    case 'Polygon':
      return geometry.coordinates.flat();
    case 'MultiPolygon':
      return geometry.coordinates.flat(2);
  }
}

/**
 * A single coordinate to bin a feature by. Points use their coordinate; every
 * other geometry uses the mean of all its positions, which is close enough to
 * a centroid at H3 resolutions used for low zooms.
 */
export function representativeLonLat(geometry: FireGeometry | null): LonLat | undefined {
  if (!geometry) return undefined;
  if (geometry.type === 'Point') {
    const [lon, lat] = geometry.coordinates;
    return [lon, lat];
  }
  const pairs = leafPositions(geometry);
  if (!pairs.length) return undefined;
  let lon = 0, lat = 0;
  for (const [x, y] of pairs) { lon += x; lat += y; }
  return [lon / pairs.length, lat / pairs.length];
}

export function mapPositions(geometry: FireGeometry, fn: (p: Position) => Position): FireGeometry {
  switch (geometry.type) {
    case 'Point':
      return { type: 'Point', coordinates: fn(geometry.coordinates) };
    case 'MultiPoint':
      return { type: 'MultiPoint', coordinates: geometry.coordinates.map(fn) };
    case 'LineString':
      return { type: 'LineString', coordinates: geometry.coordinates.map(fn) };
    case 'MultiLineString':
      return { type: 'MultiLineString', coordinates: geometry.coordinates.map(line => line.map(fn)) };
    case 'Polygon':
      return { type: 'Polygon', coordinates: geometry.coordinates.map(ring => ring.map(fn)) };
    case 'MultiPolygon':
      return { type: 'MultiPolygon', coordinates: geometry.coordinates.map(poly => poly.map(ring => ring.map(fn))) };
  }
}
