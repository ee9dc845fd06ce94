import { Inject, Injectable, Logger } from '@nestjs/common';
import { angularDifference } from '../../geo/utils/angle.util';
import { haversineDistance } from '../../geo/utils/geodesic.util';
import { describeError } from '../gateway/gateway.errors';
import {
  METERS_PER_HEADING_DEGREE,
  PANORAMA_PROVIDERS,
  PanoramaProviderId,
} from './constants/panorama.constants';
import {
  PanoramaCandidate,
  PanoramaProvider,
  PanoramaQuery,
  PanoramaSelection,
} from './interfaces/panorama-provider.interface';

/**
 * Lower is better: heading mismatch in degrees plus distance from the target
 * in units of 5 m. Candidates without a compass angle cannot be ranked and
 * score Infinity.
 */
export function scoreCandidate(
  candidate: PanoramaCandidate,
  target: PanoramaQuery,
): number {
  if (candidate.compassAngle === null) {
    return Number.POSITIVE_INFINITY;
  }

  const headingDelta = angularDifference(target.bearingDeg, candidate.compassAngle);
  const distance = haversineDistance(
    target.lat,
    target.lon,
    candidate.lat,
    candidate.lon,
  );

  return headingDelta + distance / METERS_PER_HEADING_DEGREE;
}

/**
 * Lowest-scoring candidate; ties keep the earlier one.
 */
export function pickBestCandidate(
  candidates: PanoramaCandidate[],
  target: PanoramaQuery,
): PanoramaCandidate | null {
  let best: PanoramaCandidate | null = null;
  let bestScore = Number.POSITIVE_INFINITY;

  for (const candidate of candidates) {
    const score = scoreCandidate(candidate, target);
    if (best === null || score < bestScore) {
      best = candidate;
      bestScore = score;
    }
  }

  return best;
}

@Injectable()
export class PanoramaSelectorService {
  private readonly logger = new Logger(PanoramaSelectorService.name);
  private readonly registry: Map<PanoramaProviderId, PanoramaProvider>;

  constructor(
    @Inject(PANORAMA_PROVIDERS) providers: PanoramaProvider[],
  ) {
    this.registry = new Map(providers.map((provider) => [provider.id, provider]));
  }

  /**
   * Walk the providers in `priority` order and return the best panorama of
   * the first one that has any. Unconfigured or failing providers are
   * passed over.
   */
  async select(
    query: PanoramaQuery,
    priority: PanoramaProviderId[],
    signal?: AbortSignal,
  ): Promise<PanoramaSelection> {
    for (const id of priority) {
      signal?.throwIfAborted();

      const provider = this.registry.get(id);
      if (!provider || !provider.isConfigured()) {
        this.logger.debug(`Skipping panorama provider "${id}" (not configured)`);
        continue;
      }

      let candidates: PanoramaCandidate[];
      try {
        candidates = await provider.findNearby(query, signal);
      } catch (error) {
        signal?.throwIfAborted();
        this.logger.warn(
          `Panorama provider "${id}" failed, trying next: ${describeError(error)}`,
        );
        continue;
      }

      const best = pickBestCandidate(candidates, query);
      if (best) {
        this.logger.log(
          `Selected ${id} panorama out of ${candidates.length} candidate(s)`,
        );
        return {
          provider: best.provider,
          meta: best.meta,
          thumbnailUrl: best.thumbnailUrl,
        };
      }
    }

    return { provider: null, meta: {}, thumbnailUrl: null };
  }
}
