export const PATHS = {
  dataDir: 'GeoJson'
};

export const DEFAULTS = {
  h3Res: 4,
  lowZoomMax: 4
};

// A streaming run bins at one resolution; the validator checks several.
export const VALIDATION_RESOLUTIONS = [1, 2, 3, 4];

export const DAY_SECONDS = 86_400;

// FRP (MW) integrated over a fixed 10 minute interval gives FRE in MJ.
export const FRE_INTERVAL_SECONDS = 600;

// -999 marks missing rate of spread in the source slices.
export const FROS_MISSING_THRESHOLD = -900;

export const ROUND_DIGITS = 3;

// Earlier entries win.
export const TIME_FIELDS = ['time_floor', 'time', 'timestamp'] as const;
export type TimeField = typeof TIME_FIELDS[number];

export const SLICE_FILE_PATTERN = /^gdf_(\d+)\.geojson$/;
export const SOURCE_EXT = '.geojson';
export const CRS_PATTERN = /EPSG::?(\d+)/;
export const WGS84_EPSG = 4326;

// proj4 already knows 4326, 4269 and 3857; WGS84 UTM zones are generated.
export const EXTRA_CRS_DEFS: Record<number, string> = {
  2100: '+proj=tmerc +lat_0=0 +lon_0=24 +k=0.9996 +x_0=500000 +y_0=0 +ellps=GRS80 +towgs84=-199.87,74.79,246.62,0,0,0,0 +units=m +no_defs',
  3035: '+proj=laea +lat_0=52 +lon_0=10 +x_0=4321000 +y_0=3210000 +ellps=GRS80 +towgs84=0,0,0,0,0,0,0 +units=m +no_defs',
  3395: '+proj=merc +lon_0=0 +k=1 +x_0=0 +y_0=0 +datum=WGS84 +units=m +no_defs',
  4258: '+proj=longlat +ellps=GRS80 +towgs84=0,0,0,0,0,0,0 +no_defs'
};

export const COVERAGE_SAMPLE_SIZE = 5;
