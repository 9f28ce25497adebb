import { describe, it, expect } from "vitest";
import { formBbox, POINT_BUFFER_DEG } from "./bbox.js";

describe("formBbox", () => {
  it("uses min/max of the coordinate sequences", () => {
    const bbox = formBbox([-117.23, -117.43], [32.75, 32.55]);
    expect(bbox).toEqual({ minLng: -117.43, minLat: 32.55, maxLng: -117.23, maxLat: 32.75 });
  });

  it("handles more than two values per axis", () => {
    const bbox = formBbox([10, -5, 3], [1, 7, -2]);
    expect(bbox).toEqual({ minLng: -5, minLat: -2, maxLng: 10, maxLat: 7 });
  });

  it("handles long tracks with hundreds of thousands of values", () => {
    const lngs = Array.from({ length: 500_000 }, (_, i) => (i % 1000) - 500);
    const lats = Array.from({ length: 500_000 }, (_, i) => (i % 180) - 90);
    expect(formBbox(lngs, lats)).toEqual({ minLng: -500, minLat: -90, maxLng: 499, maxLat: 89 });
  });

  it("expands a single point by 0.001° on each side", () => {
    const bbox = formBbox(-117.33, 32.65, true);
    expect(POINT_BUFFER_DEG).toBe(0.001);
    expect(bbox.minLng).toBe(-117.33 - 0.001);
    expect(bbox.maxLng).toBe(-117.33 + 0.001);
    expect(bbox.minLat).toBe(32.65 - 0.001);
    expect(bbox.maxLat).toBe(32.65 + 0.001);
    expect(bbox.minLng).toBeCloseTo(-117.331, 10);
    expect(bbox.maxLat).toBeCloseTo(32.651, 10);
  });

  it("accepts one-element arrays in single-point mode", () => {
    expect(formBbox([1], [2], true)).toEqual(formBbox(1, 2, true));
  });

  it("treats scalars as one-element sequences in area mode", () => {
    expect(formBbox(1, [2, 4])).toEqual({ minLng: 1, minLat: 2, maxLng: 1, maxLat: 4 });
  });

  it("rejects empty sequences", () => {
    expect(() => formBbox([], [1, 2])).toThrow(RangeError);
  });

  it("rejects several values in single-point mode", () => {
    expect(() => formBbox([1, 2], 3, true)).toThrow(RangeError);
  });
});
