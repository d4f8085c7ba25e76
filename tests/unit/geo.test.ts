import {
  bboxToWebMercator,
  latToMercatorY,
  lonToMercatorX,
  validateBoundingBox
} from "../../src/core/geo/webMercator";
import { formatZoomRange, parseZoomRange } from "../../src/core/geo/zoomRange";

describe("web mercator", () => {
  it("projects longitudes linearly", () => {
    expect(lonToMercatorX(0)).toBe(0);
    expect(lonToMercatorX(180)).toBeCloseTo(20037508.342789, 5);
    expect(lonToMercatorX(-180)).toBeCloseTo(-20037508.342789, 5);
  });

  it("clamps latitudes to the square mercator world", () => {
    expect(latToMercatorY(0)).toBeCloseTo(0, 5);
    expect(latToMercatorY(90)).toBeCloseTo(lonToMercatorX(180), 2);
    expect(latToMercatorY(-90)).toBeCloseTo(-lonToMercatorX(180), 2);
  });

  it("maps a bounding box to EPSG:3857 bounds", () => {
    const bounds = bboxToWebMercator({ north: 10, south: -10, west: -20, east: 20 });
    expect(bounds.minX).toBeCloseTo(-bounds.maxX, 5);
    expect(bounds.minY).toBeCloseTo(-bounds.maxY, 5);
    expect(bounds.maxX).toBeCloseTo(lonToMercatorX(20), 5);
  });

  it("rejects inverted or out of range boxes", () => {
    expect(() => validateBoundingBox({ north: -10, south: 10, west: 0, east: 10 })).toThrow(
      "bbox.north must be greater than bbox.south. Received: north=-10, south=10"
    );
    expect(() => validateBoundingBox({ north: 10, south: -10, west: -190, east: 10 })).toThrow(
      "bbox longitudes must lie within [-180..180]. Received: west=-190, east=10"
    );
    expect(() => validateBoundingBox({ north: Number.NaN, south: -10, west: 0, east: 10 })).toThrow(
      "bbox.north must be a finite number. Received: NaN"
    );
  });
});

describe("zoom range", () => {
  it("parses ranges and single levels", () => {
    expect(parseZoomRange("1-6")).toEqual({ min: 1, max: 6 });
    expect(parseZoomRange(" 5 ")).toEqual({ min: 5, max: 5 });
    expect(formatZoomRange({ min: 2, max: 8 })).toBe("2-8");
  });

  it("rejects malformed and inverted ranges", () => {
    expect(() => parseZoomRange("a-b")).toThrow('zoom range must look like "min-max" (e.g. 1-6). Received: a-b');
    expect(() => parseZoomRange("6-1")).toThrow("zoom range 6-1 is out of allowed range [0..24] or inverted");
    expect(() => parseZoomRange("1-30")).toThrow("zoom range 1-30 is out of allowed range [0..24] or inverted");
  });
});
