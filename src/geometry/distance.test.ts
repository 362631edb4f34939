import { describe, it, expect } from "vitest";
import { haversineMeters, roundToCentimeters } from "./distance.js";

describe("haversineMeters", () => {
  const paulista = { lat: -23.5614, lng: -46.6559 };
  const se = { lat: -23.5503, lng: -46.6339 };

  it("is zero for identical points", () => {
    expect(haversineMeters(paulista, paulista)).toBe(0);
  });

  it("is symmetric", () => {
    expect(haversineMeters(paulista, se)).toBe(haversineMeters(se, paulista));
  });

  it("measures one hundredth of a degree of latitude as ~1111.95 m", () => {
    const d = haversineMeters({ lat: -23.54, lng: -46.63 }, { lat: -23.55, lng: -46.63 });
    expect(d).toBeCloseTo(1111.95, 1);
  });

  it("shrinks longitude distances by cos(latitude)", () => {
    const atEquator = haversineMeters({ lat: 0, lng: 0 }, { lat: 0, lng: 0.01 });
    const at60 = haversineMeters({ lat: 60, lng: 0 }, { lat: 60, lng: 0.01 });
    expect(at60 / atEquator).toBeCloseTo(0.5, 4);
  });

  it("returns half the circumference for antipodal points", () => {
    const d = haversineMeters({ lat: 0, lng: 0 }, { lat: 0, lng: 180 });
    expect(d).toBeCloseTo(Math.PI * 6_371_000, 3);
  });
});

describe("roundToCentimeters", () => {
  it("keeps two decimal places", () => {
    expect(roundToCentimeters(1111.94926)).toBe(1111.95);
    expect(roundToCentimeters(0.004)).toBe(0);
    expect(roundToCentimeters(12)).toBe(12);
  });
});
