import { ConfigurationError } from "../errors";

export type BoundingBox = {
  north: number;
  south: number;
  east: number;
  west: number;
};

export type MercatorBounds = {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
};

export const EARTH_RADIUS_METERS = 6378137;
export const MAX_MERCATOR_LATITUDE = 85.0511287798066;

const toRadians = (degrees: number) => (degrees * Math.PI) / 180;

export const lonToMercatorX = (lon: number): number => EARTH_RADIUS_METERS * toRadians(lon);

export const latToMercatorY = (lat: number): number => {
  const clamped = Math.max(-MAX_MERCATOR_LATITUDE, Math.min(MAX_MERCATOR_LATITUDE, lat));
  return EARTH_RADIUS_METERS * Math.log(Math.tan(Math.PI / 4 + toRadians(clamped) / 2));
};

/** EPSG:4326 box to EPSG:3857 bounds, for `gdalwarp -te`. */
export const bboxToWebMercator = (bbox: BoundingBox): MercatorBounds => ({
  minX: lonToMercatorX(bbox.west),
  minY: latToMercatorY(bbox.south),
  maxX: lonToMercatorX(bbox.east),
  maxY: latToMercatorY(bbox.north)
});

export const validateBoundingBox = (bbox: BoundingBox): BoundingBox => {
  const { north, south, east, west } = bbox;
  for (const [name, value] of Object.entries(bbox)) {
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(`bbox.${name} must be a finite number. Received: ${String(value)}`);
    }
  }
  if (north > 90 || south < -90) {
    throw new ConfigurationError(`bbox latitudes must lie within [-90..90]. Received: north=${north}, south=${south}`);
  }
  if (east > 180 || west < -180) {
    throw new ConfigurationError(`bbox longitudes must lie within [-180..180]. Received: west=${west}, east=${east}`);
  }
  if (north <= south) {
    throw new ConfigurationError(`bbox.north must be greater than bbox.south. Received: north=${north}, south=${south}`);
  }
  if (east <= west) {
    throw new ConfigurationError(`bbox.east must be greater than bbox.west. Received: west=${west}, east=${east}`);
  }
  return bbox;
};
