// Core types
export type {
  Position,
  Ring,
  PolygonRings,
  GeoJSONPolygon,
  LegacyPointsPolygon,
  RawPolygon,
  Point,
  Area,
  AreaPatch,
  AreaRecord,
  CompiledGeometry,
  AreaSummary,
  AnalysisRequest,
  AreaAnalysis,
  AnalysisOutcome,
  AreaStorage,
} from "./types/index.js";

// Error classes
export {
  InvalidGeometryError,
  AreaNotFoundError,
  AreaConflictError,
  InvalidRequestError,
  StorageError,
  HydrationError,
  PersistenceError,
} from "./errors.js";

// Geometry (pure functions)
export {
  extractRings,
  toGeoJSONPolygon,
  countPositions,
  buildGeometry,
  buildAreaGeometry,
} from "./geometry/geometry-builder.js";
export {
  contains,
  nearestBoundaryPoint,
  nearestBoundaryDistanceMeters,
} from "./geometry/containment.js";
export {
  EARTH_RADIUS_METERS,
  haversineMeters,
  roundToCentimeters,
} from "./geometry/distance.js";

// Repository
export { AreaRepository } from "./area-store/area-repository.js";
export type {
  AreaRepositoryConfig,
  AreaReadView,
} from "./area-store/area-repository.js";
export { SerialLock } from "./area-store/serial-lock.js";

// Analysis
export { AreaAnalyzer } from "./analysis/area-analyzer.js";

// Storage
export { FileAreaStorage } from "./storage/file-area-storage.js";
export { MemoryAreaStorage } from "./storage/memory-area-storage.js";

// Wire format
export {
  parseAreaInput,
  parseStoredArea,
  parseAreaPatch,
  assertStorableArea,
  parseAnalysisRequest,
  toAreaRecord,
  toAnalysisResponse,
} from "./wire/schemas.js";
export type { AreaResultBody, AnalysisResponseBody } from "./wire/schemas.js";

// Ambient
export { loadConfig } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";
export { createAreaContext } from "./context.js";
export type { AreaContext, AreaContextOverrides } from "./context.js";
