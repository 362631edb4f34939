import type { Feature, MultiPolygon } from "geojson";

// Position — [lng, lat] in degrees. Altitude is dropped on input.
export type Position = [number, number];

// Ring — closed loop of positions; closure may be implicit
export type Ring = Position[];

// PolygonRings — canonical internal polygon: exterior shell plus holes
export interface PolygonRings {
  shell: Ring;
  holes: Ring[];
}

// GeoJSON polygon as stored and accepted on the wire (positions may carry altitude)
export interface GeoJSONPolygon {
  type: "Polygon";
  coordinates: number[][][];
}

// Legacy polygon encoding: a single ring of [lat, lng] pairs
export interface LegacyPointsPolygon {
  points: number[][];
}

export type RawPolygon = GeoJSONPolygon | LegacyPointsPolygon;

// Point — a lat/lng coordinate
export interface Point {
  lat: number;
  lng: number;
}

// Area — the core entity; `polygons` is always in GeoJSON form
export interface Area {
  slug: string;
  name: string;
  agency: string;
  relevance: number;
  polygons: GeoJSONPolygon[];
}

// AreaPatch — explicit optional fields merged over an existing Area
export interface AreaPatch {
  slug?: string;
  name?: string;
  agency?: string;
  relevance?: number;
  polygons?: GeoJSONPolygon[];
}

// AreaRecord — JSON representation kept in durable storage
export interface AreaRecord {
  name: string;
  slug: string;
  agencia: string;
  relevancia: number;
  polygons: GeoJSONPolygon[];
}

// CompiledGeometry — derived from Area.polygons, never mutated after build
export interface CompiledGeometry {
  readonly polygons: readonly PolygonRings[];
  readonly feature: Feature<MultiPolygon>;
}

// AreaSummary — returned by listAll
export interface AreaSummary {
  name: string;
  slug: string;
  polygonCount: number;
  totalPoints: number;
}

// AnalysisRequest — batch containment query
export interface AnalysisRequest {
  target: Point;
  slugs: string[];
  agencies: string[];
}

export interface AreaAnalysis {
  slug: string;
  name: string;
  isIn: boolean;
  nearestBorderDistanceMeters: number;
  agency: string;
  relevance: number;
}

export interface AnalysisOutcome {
  results: AreaAnalysis[];
  errors: string[];
}

// AreaStorage — external persistence interface
export interface AreaStorage {
  load(): Promise<Record<string, unknown>>;
  save(records: Record<string, AreaRecord>): Promise<void>;
}
