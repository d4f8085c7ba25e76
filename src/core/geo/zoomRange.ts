import { ConfigurationError } from "../errors";

export type ZoomRange = {
  min: number;
  max: number;
};

export const zoomCaps = { min: 0, max: 24 } as const;

const ZOOM_RANGE_PATTERN = /^(\d{1,2})-(\d{1,2})$/;

export const validateZoomRange = (range: ZoomRange): ZoomRange => {
  const { min, max } = range;
  if (!Number.isInteger(min) || !Number.isInteger(max) || min < zoomCaps.min || max > zoomCaps.max || min > max) {
    throw new ConfigurationError(
      `zoom range ${min}-${max} is out of allowed range [${zoomCaps.min}..${zoomCaps.max}] or inverted`
    );
  }
  return range;
};

/** Parses the `min-max` form gdal2tiles takes, e.g. `1-6`. A single level `5` means `5-5`. */
export const parseZoomRange = (raw: string): ZoomRange => {
  const normalized = raw.trim();
  if (/^\d{1,2}$/.test(normalized)) {
    const level = Number(normalized);
    return validateZoomRange({ min: level, max: level });
  }

  const match = ZOOM_RANGE_PATTERN.exec(normalized);
  if (!match) {
    throw new ConfigurationError(`zoom range must look like "min-max" (e.g. 1-6). Received: ${raw}`);
  }
  return validateZoomRange({ min: Number(match[1]), max: Number(match[2]) });
};

export const formatZoomRange = (range: ZoomRange): string => `${range.min}-${range.max}`;
