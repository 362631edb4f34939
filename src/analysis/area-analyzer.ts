import type {
  AnalysisOutcome,
  AnalysisRequest,
  AreaAnalysis,
} from "../types/index.js";
import type { AreaRepository } from "../area-store/area-repository.js";
import { contains, nearestBoundaryDistanceMeters } from "../geometry/containment.js";
import { InvalidRequestError } from "../errors.js";

/**
 * Answers "is the target inside each requested area, and how far from its
 * border?" for a batch of areas.
 *
 * Unknown slugs are reported in `errors` and never abort the batch. The batch
 * runs against a single repository snapshot.
 */
export class AreaAnalyzer {
  constructor(private readonly repository: AreaRepository) {}

  /**
   * @throws InvalidRequestError when neither slugs nor agencies are given
   * @throws HydrationError when the repository cannot be loaded
   */
  async analyze(request: AnalysisRequest): Promise<AnalysisOutcome> {
    if (request.slugs.length === 0 && request.agencies.length === 0) {
      throw new InvalidRequestError("Provide at least one area slug or agency.");
    }

    return this.repository.read((view) => {
      // Explicit slugs first, then agency matches; first occurrence wins.
      const candidates = [
        ...new Set([...request.slugs, ...view.findByAgency(request.agencies)]),
      ];

      const results: AreaAnalysis[] = [];
      const errors: string[] = [];

      for (const slug of candidates) {
        const geometry = view.getGeometry(slug);
        const area = view.getRaw(slug);
        if (geometry === null || area === null) {
          errors.push(`Area '${slug}' not found.`);
          continue;
        }

        const isIn = contains(geometry, request.target);
        results.push({
          slug,
          name: area.name,
          isIn,
          nearestBorderDistanceMeters: isIn
            ? 0
            : nearestBoundaryDistanceMeters(geometry, request.target),
          agency: area.agency,
          relevance: area.relevance,
        });
      }

      return { results, errors };
    });
  }
}
