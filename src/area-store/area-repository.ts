import type {
  Area,
  AreaPatch,
  AreaRecord,
  AreaStorage,
  AreaSummary,
  CompiledGeometry,
} from "../types/index.js";
import { buildAreaGeometry, countPositions } from "../geometry/geometry-builder.js";
import {
  assertStorableArea,
  parseStoredArea,
  toAreaRecord,
} from "../wire/schemas.js";
import {
  AreaConflictError,
  AreaNotFoundError,
  HydrationError,
  PersistenceError,
} from "../errors.js";
import { SerialLock } from "./serial-lock.js";
import { silentLogger, type Logger } from "../logger.js";

export interface AreaRepositoryConfig {
  storage: AreaStorage;
  logger?: Logger;
}

/** Synchronous lookups available inside `AreaRepository.read`. */
export interface AreaReadView {
  getGeometry(slug: string): CompiledGeometry | null;
  getRaw(slug: string): Area | null;
  findByAgency(names: Iterable<string>): string[];
}

function normalizeAgency(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Owns every area and its compiled geometry.
 *
 * Invariants:
 * - `raw` and `geometries` always have the same key set
 * - a geometry is installed only after it was built from the current raw record
 * - every public operation runs under one `SerialLock`, including hydration,
 *   geometry builds and persistence
 *
 * Hydration is lazy: the first operation loads all records from storage.
 */
export class AreaRepository {
  private raw: Map<string, Area> = new Map();
  private geometries: Map<string, CompiledGeometry> = new Map();
  private hydrated = false;

  private readonly storage: AreaStorage;
  private readonly logger: Logger;
  private readonly lock = new SerialLock();

  constructor(config: AreaRepositoryConfig) {
    this.storage = config.storage;
    this.logger = config.logger ?? silentLogger();
  }

  // ============================================================
  // Hydration
  // ============================================================

  /**
   * Loads and compiles every stored area on first call; later calls are
   * no-ops. A failed hydration leaves the repository empty and unhydrated so
   * the next call retries.
   *
   * @throws HydrationError
   */
  ensureHydrated(): Promise<void> {
    return this.lock.run(() => this.hydrate());
  }

  private async hydrate(): Promise<void> {
    if (this.hydrated) return;

    let stored: Record<string, unknown>;
    try {
      stored = await this.storage.load();
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new HydrationError(`load() failed: ${msg}`);
    }

    const raw = new Map<string, Area>();
    const geometries = new Map<string, CompiledGeometry>();
    for (const [slug, record] of Object.entries(stored)) {
      try {
        const area = parseStoredArea(slug, record);
        geometries.set(slug, buildAreaGeometry(area.polygons));
        raw.set(slug, area);
      } catch (e) {
        const msg = e instanceof Error ? e.message : String(e);
        throw new HydrationError(`Area '${slug}' could not be loaded: ${msg}`);
      }
    }

    this.raw = raw;
    this.geometries = geometries;
    this.hydrated = true;
    this.logger.info({ areas: raw.size }, "areas hydrated");
  }

  // ============================================================
  // Query API
  // ============================================================

  private readonly view: AreaReadView = {
    getGeometry: (slug) => this.geometries.get(slug) ?? null,
    getRaw: (slug) => {
      const area = this.raw.get(slug);
      return area === undefined ? null : structuredClone(area);
    },
    findByAgency: (names) => {
      const wanted = new Set(Array.from(names, normalizeAgency));
      const slugs: string[] = [];
      for (const [slug, area] of this.raw) {
        if (wanted.has(normalizeAgency(area.agency))) slugs.push(slug);
      }
      return slugs;
    },
  };

  /**
   * Runs `fn` against a consistent snapshot: no mutation can interleave
   * while it executes.
   */
  read<T>(fn: (view: AreaReadView) => T): Promise<T> {
    return this.lock.run(async () => {
      await this.hydrate();
      return fn(this.view);
    });
  }

  /** Compiled geometry for `slug`, or null when unknown. */
  getGeometry(slug: string): Promise<CompiledGeometry | null> {
    return this.read((view) => view.getGeometry(slug));
  }

  /** Stored area for `slug`, or null when unknown. */
  getRaw(slug: string): Promise<Area | null> {
    return this.read((view) => view.getRaw(slug));
  }

  /**
   * Slugs whose agency matches any of `names`, ignoring case and surrounding
   * whitespace. Order is unspecified.
   */
  findByAgency(names: Iterable<string>): Promise<string[]> {
    return this.read((view) => view.findByAgency(names));
  }

  exists(slug: string): Promise<boolean> {
    return this.read((view) => view.getRaw(slug) !== null);
  }

  /** Name, slug and size of every area, in insertion order. */
  listAll(): Promise<AreaSummary[]> {
    return this.lock.run(async () => {
      await this.hydrate();
      return Array.from(this.raw.values(), (area) => ({
        name: area.name,
        slug: area.slug,
        polygonCount: area.polygons.length,
        totalPoints: area.polygons.reduce(
          (sum, polygon) => sum + countPositions(polygon),
          0,
        ),
      }));
    });
  }

  // ============================================================
  // Mutation API
  // ============================================================

  /**
   * Inserts or replaces an area. The record is validated and its geometry
   * built before any state changes, so an invalid area leaves the repository
   * untouched.
   *
   * @throws InvalidRequestError for a malformed slug or relevance
   * @throws InvalidGeometryError
   */
  upsert(area: Area): Promise<void> {
    return this.lock.run(async () => {
      await this.hydrate();
      assertStorableArea(area);
      const geometry = buildAreaGeometry(area.polygons);
      this.install(area, geometry);
      await this.persist();
    });
  }

  /**
   * Merges `changes` over the stored area. A slug change removes the old
   * entry and installs the new one in the same step.
   *
   * @throws AreaNotFoundError when `slug` is unknown
   * @throws AreaConflictError when renaming onto an existing slug
   * @throws InvalidRequestError for a malformed slug or relevance
   * @throws InvalidGeometryError
   */
  patch(slug: string, changes: AreaPatch): Promise<Area> {
    return this.lock.run(async () => {
      await this.hydrate();
      const current = this.raw.get(slug);
      if (current === undefined) {
        throw new AreaNotFoundError(`Area '${slug}' not found.`);
      }

      const nextSlug = changes.slug ?? current.slug;
      if (nextSlug !== slug && this.raw.has(nextSlug)) {
        throw new AreaConflictError(`Area '${nextSlug}' already exists.`);
      }

      const merged: Area = {
        slug: nextSlug,
        name: changes.name ?? current.name,
        agency: changes.agency ?? current.agency,
        relevance: changes.relevance ?? current.relevance,
        polygons: changes.polygons ?? current.polygons,
      };
      assertStorableArea(merged);
      const geometry = buildAreaGeometry(merged.polygons);

      if (nextSlug !== slug) {
        this.raw.delete(slug);
        this.geometries.delete(slug);
      }
      this.install(merged, geometry);
      await this.persist();
      return structuredClone(merged);
    });
  }

  /** Removes an area. Returns false (and writes nothing) when it did not exist. */
  delete(slug: string): Promise<boolean> {
    return this.lock.run(async () => {
      await this.hydrate();
      if (!this.raw.has(slug)) return false;
      this.raw.delete(slug);
      this.geometries.delete(slug);
      await this.persist();
      return true;
    });
  }

  // ============================================================
  // Private helpers
  // ============================================================

  /** Stores a private copy so callers cannot change raw behind the geometry. */
  private install(area: Area, geometry: CompiledGeometry): void {
    this.raw.set(area.slug, structuredClone(area));
    this.geometries.set(area.slug, geometry);
  }

  /**
   * Writes the full mapping. Failures are logged and swallowed: in-memory
   * state stays authoritative for the rest of the process.
   */
  private async persist(): Promise<void> {
    const records: Record<string, AreaRecord> = {};
    for (const [slug, area] of this.raw) {
      records[slug] = toAreaRecord(area);
    }
    try {
      await this.storage.save(records);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      const err = new PersistenceError(`save() failed: ${msg}`);
      this.logger.warn({ err }, "area changes kept in memory only");
    }
  }
}
