import { isLocalNoon } from "../../src/core/tiles/retention";

describe("isLocalNoon", () => {
  it.each([
    ["20250301040000", 8, true],
    ["20250301041500", 8, false],
    ["20250301120000", 0, true],
    ["20250301120000", 8, false],
    ["20250228170000", -5, true],
    ["20250228233000", 12, false]
  ])("%s at UTC offset %d is noon: %s", (timestamp, offset, expected) => {
    expect(isLocalNoon(timestamp, offset)).toBe(expected);
  });
});
