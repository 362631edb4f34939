import { z } from "zod";
import type {
  AnalysisOutcome,
  AnalysisRequest,
  Area,
  AreaPatch,
  AreaRecord,
  GeoJSONPolygon,
  RawPolygon,
} from "../types/index.js";
import { extractRings, toGeoJSONPolygon } from "../geometry/geometry-builder.js";
import { InvalidRequestError } from "../errors.js";

// ============================================================
// Schemas
// ============================================================

const positionSchema = z.array(z.number()).min(2);

const geoJSONPolygonSchema = z.object({
  type: z.literal("Polygon").default("Polygon"),
  coordinates: z.array(z.array(positionSchema)),
});

const legacyPointsPolygonSchema = z.object({
  points: z.array(positionSchema),
});

const rawPolygonSchema = z.union([
  geoJSONPolygonSchema,
  legacyPointsPolygonSchema,
]);

export const slugSchema = z
  .string()
  .regex(/^[a-z0-9_]+$/, "slug must match ^[a-z0-9_]+$");

export const relevanceSchema = z.number().int().min(1).max(10);

export const areaInputSchema = z.object({
  name: z.string(),
  slug: slugSchema,
  agencia: z.string().default(""),
  relevancia: relevanceSchema.default(1),
  polygons: z.array(rawPolygonSchema),
});

/** Fields a record must satisfy before it may be stored. */
const areaIdentitySchema = z.object({
  slug: slugSchema,
  relevance: relevanceSchema,
});

/** Stored records are keyed by slug, so the inner `slug` may be missing. */
const storedAreaSchema = areaInputSchema.extend({
  slug: slugSchema.optional(),
});

export const areaPatchSchema = z.object({
  name: z.string().optional(),
  slug: slugSchema.optional(),
  agencia: z.string().optional(),
  relevancia: relevanceSchema.optional(),
  polygons: z.array(rawPolygonSchema).optional(),
});

export const analysisRequestSchema = z.object({
  target: z.object({
    lat: z.number().min(-90).max(90),
    lng: z.number().min(-180).max(180),
  }),
  areas: z.array(z.string()).default([]),
  agencias: z.array(z.string()).default([]),
});

// ============================================================
// Response shapes
// ============================================================

export interface AreaResultBody {
  slug: string;
  name: string;
  is_in: boolean;
  nearest_border_distance_meters: number;
  agencia: string;
  relevancia: number;
}

export interface AnalysisResponseBody {
  results: AreaResultBody[];
  errors?: string[];
}

// ============================================================
// Parsers
// ============================================================

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function parseWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  what: string,
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new InvalidRequestError(`Invalid ${what}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/** Legacy `points` polygons become GeoJSON; altitude is dropped. */
function normalizePolygons(polygons: RawPolygon[]): GeoJSONPolygon[] {
  return polygons.map((polygon) => toGeoJSONPolygon(extractRings(polygon)));
}

/** Parses an area payload into the canonical Area shape. */
export function parseAreaInput(input: unknown): Area {
  const parsed = parseWith(areaInputSchema, input, "area");
  return {
    slug: parsed.slug,
    name: parsed.name,
    agency: parsed.agencia,
    relevance: parsed.relevancia,
    polygons: normalizePolygons(parsed.polygons),
  };
}

/**
 * Parses a record loaded from storage. The storage key is the slug; records
 * written before `agencia`/`relevancia` existed get "" and 1.
 */
export function parseStoredArea(key: string, record: unknown): Area {
  const slug = parseWith(slugSchema, key, "storage key");
  const parsed = parseWith(storedAreaSchema, record, `stored area '${slug}'`);
  return {
    slug,
    name: parsed.name,
    agency: parsed.agencia,
    relevance: parsed.relevancia,
    polygons: normalizePolygons(parsed.polygons),
  };
}

/**
 * Rejects an area whose slug or relevance would fail `parseStoredArea` on the
 * next load.
 *
 * @throws InvalidRequestError
 */
export function assertStorableArea(area: Pick<Area, "slug" | "relevance">): void {
  parseWith(
    areaIdentitySchema,
    { slug: area.slug, relevance: area.relevance },
    `area '${area.slug}'`,
  );
}

/** Parses a partial update. Only the fields present in the payload are set. */
export function parseAreaPatch(input: unknown): AreaPatch {
  const parsed = parseWith(areaPatchSchema, input, "area patch");
  const patch: AreaPatch = {};
  if (parsed.slug !== undefined) patch.slug = parsed.slug;
  if (parsed.name !== undefined) patch.name = parsed.name;
  if (parsed.agencia !== undefined) patch.agency = parsed.agencia;
  if (parsed.relevancia !== undefined) patch.relevance = parsed.relevancia;
  if (parsed.polygons !== undefined) {
    patch.polygons = normalizePolygons(parsed.polygons);
  }
  return patch;
}

export function parseAnalysisRequest(input: unknown): AnalysisRequest {
  const parsed = parseWith(analysisRequestSchema, input, "analysis request");
  return {
    target: parsed.target,
    slugs: parsed.areas,
    agencies: parsed.agencias,
  };
}

// ============================================================
// Serializers
// ============================================================

export function toAreaRecord(area: Area): AreaRecord {
  return {
    name: area.name,
    slug: area.slug,
    agencia: area.agency,
    relevancia: area.relevance,
    polygons: area.polygons,
  };
}

export function toAnalysisResponse(outcome: AnalysisOutcome): AnalysisResponseBody {
  const body: AnalysisResponseBody = {
    results: outcome.results.map((result) => ({
      slug: result.slug,
      name: result.name,
      is_in: result.isIn,
      nearest_border_distance_meters: result.nearestBorderDistanceMeters,
      agencia: result.agency,
      relevancia: result.relevance,
    })),
  };
  if (outcome.errors.length > 0) {
    body.errors = outcome.errors;
  }
  return body;
}
