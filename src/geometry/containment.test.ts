import { describe, it, expect } from "vitest";
import {
  contains,
  nearestBoundaryDistanceMeters,
  nearestBoundaryPoint,
} from "./containment.js";
import { buildGeometry } from "./geometry-builder.js";
import type { PolygonRings } from "../types/index.js";

// ---- shared fixtures ----

const square: PolygonRings = {
  shell: [
    [-46.64, -23.55],
    [-46.62, -23.55],
    [-46.62, -23.56],
    [-46.64, -23.56],
  ],
  holes: [],
};

const island: PolygonRings = {
  shell: [
    [10, 10],
    [11, 10],
    [11, 11],
    [10, 11],
  ],
  holes: [],
};

const donut: PolygonRings = {
  shell: [
    [0, 0],
    [1, 0],
    [1, 1],
    [0, 1],
  ],
  holes: [
    [
      [0.4, 0.4],
      [0.6, 0.4],
      [0.6, 0.6],
      [0.4, 0.6],
    ],
  ],
};

describe("contains", () => {
  const geometry = buildGeometry([square]);

  it("is true for a point strictly inside the shell", () => {
    expect(contains(geometry, { lat: -23.555, lng: -46.63 })).toBe(true);
  });

  it("is true for a point on a shell vertex", () => {
    expect(contains(geometry, { lat: -23.55, lng: -46.64 })).toBe(true);
  });

  it("is true for a point on a shell edge", () => {
    expect(contains(geometry, { lat: -23.56, lng: -46.63 })).toBe(true);
  });

  it("is false for a point north of the shell", () => {
    expect(contains(geometry, { lat: -23.54, lng: -46.63 })).toBe(false);
  });

  it("checks every polygon of a multi-polygon", () => {
    const islands = buildGeometry([square, island]);
    expect(contains(islands, { lat: 10.5, lng: 10.5 })).toBe(true);
    expect(contains(islands, { lat: 5, lng: 5 })).toBe(false);
  });

  it("excludes points inside a hole", () => {
    const holed = buildGeometry([donut]);
    expect(contains(holed, { lat: 0.5, lng: 0.5 })).toBe(false);
    expect(contains(holed, { lat: 0.2, lng: 0.2 })).toBe(true);
  });

  it("counts a point on a hole ring as inside", () => {
    const holed = buildGeometry([donut]);
    expect(contains(holed, { lat: 0.5, lng: 0.4 })).toBe(true);
  });
});

describe("nearestBoundaryPoint", () => {
  it("projects orthogonally onto the closest edge", () => {
    const nearest = nearestBoundaryPoint(buildGeometry([square]), {
      lat: -23.54,
      lng: -46.63,
    });
    expect(nearest.lat).toBe(-23.55);
    expect(nearest.lng).toBeCloseTo(-46.63, 10);
  });

  it("clamps to the vertex when the projection falls past a segment end", () => {
    const nearest = nearestBoundaryPoint(buildGeometry([square]), {
      lat: -23.54,
      lng: -46.61,
    });
    expect(nearest.lat).toBeCloseTo(-23.55, 10);
    expect(nearest.lng).toBeCloseTo(-46.62, 10);
  });

  it("measures against the hole ring for a point inside the hole", () => {
    const nearest = nearestBoundaryPoint(buildGeometry([donut]), {
      lat: 0.45,
      lng: 0.5,
    });
    expect(nearest.lat).toBe(0.4);
    expect(nearest.lng).toBeCloseTo(0.5, 10);
  });

  it("picks the closer of two islands", () => {
    const nearest = nearestBoundaryPoint(buildGeometry([square, island]), {
      lat: 10.5,
      lng: 12,
    });
    expect(nearest.lng).toBe(11);
    expect(nearest.lat).toBeCloseTo(10.5, 10);
  });
});

describe("nearestBoundaryDistanceMeters", () => {
  it("is ~1111.95 m for a point 0.01° north of the square", () => {
    const d = nearestBoundaryDistanceMeters(buildGeometry([square]), {
      lat: -23.54,
      lng: -46.63,
    });
    expect(d).toBe(1111.95);
  });

  it("measures from inside a hole to the hole's edge, not the shell", () => {
    const d = nearestBoundaryDistanceMeters(buildGeometry([donut]), {
      lat: 0.45,
      lng: 0.5,
    });
    expect(d).toBe(5559.75);
  });

  it("rounds to centimeters", () => {
    const d = nearestBoundaryDistanceMeters(buildGeometry([square]), {
      lat: -23.5,
      lng: -46.7,
    });
    expect(Math.round(d * 100) / 100).toBe(d);
  });
});
