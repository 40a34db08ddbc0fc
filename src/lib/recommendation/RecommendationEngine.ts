import {
  formatReference,
  type ExistingImageRecommendation,
  type ImageReference,
  type LanguageRuntime,
  type RankedImage,
  type Requirements,
} from '../../types';
import { config } from '../config';
import type { ImageStore } from '../db/ImageStore';
import { RequirementsError } from '../errors';
import { logger } from '../logger';
import { parseImageReference } from '../registry/image-reference';
import { recommend, type SizeThresholds } from './ranking';
import { parseRequirements, type RequirementsInput } from './requirements';
import { isValidConstraint } from './version-match';

// Packages of the source image carried into derived requirements
const MAX_DERIVED_PACKAGES = 20;

const MIB = 1024 * 1024;

export function thresholdsFromConfig(): SizeThresholds {
  return {
    minimalMaxBytes: config.sizeMinimalMaxMb * MIB,
    balancedMaxBytes: config.sizeBalancedMaxMb * MIB,
  };
}

export class RecommendationEngine {
  constructor(
    private readonly store: ImageStore,
    private readonly thresholds: SizeThresholds = thresholdsFromConfig(),
  ) {}

  /**
   * Validate raw requirements, load matching images from the store and rank
   * them.
   */
  recommend(input: unknown, limit = 5): RankedImage[] {
    checkLimit(limit);

    const requirements = parseRequirements(input);
    const candidates = this.store.listCandidates(requirements.language);
    const ranked = recommend(requirements, candidates, limit, { thresholds: this.thresholds });

    logger.recommend(
      `${requirements.language}${requirements.version ? ` ${requirements.version}` : ''}: ` +
        `${candidates.length} candidates, returning ${ranked.length}`,
    );
    return ranked;
  }

  /**
   * Recommend alternatives to an image that is already in the store. The
   * requirements are read off the image (primary runtime, its version and up
   * to 20 of its packages); `overrides` replace any of them. When nothing
   * matches the exact runtime version the search widens to its major.minor
   * and then to any version. The image itself is never recommended.
   */
  recommendFromImage(
    reference: string | ImageReference,
    overrides: Partial<RequirementsInput> = {},
    limit = 5,
  ): ExistingImageRecommendation {
    checkLimit(limit);

    const target = typeof reference === 'string' ? parseImageReference(reference) : reference;
    const source = this.store.findByReference(target.registry, target.repository, target.tag);
    if (!source) {
      logger.recommend(`${formatReference(target)} is not in the store`);
      return { source: null, requirements: null, recommendations: [] };
    }

    const runtime: LanguageRuntime | undefined = source.languages[0];
    const language = overrides.language ?? runtime?.language;
    if (!language) {
      logger.recommend(`${formatReference(target)} has no detected language runtime`);
      return { source, requirements: null, recommendations: [] };
    }

    const derived = [...new Set([runtime?.version, runtime?.majorMinor ?? undefined])].filter(
      (version): version is string => version !== undefined && isValidConstraint(version),
    );
    const versions: (string | undefined)[] = overrides.version !== undefined ? [overrides.version] : [...derived, undefined];
    const base: RequirementsInput = {
      packages: source.packages.slice(0, MAX_DERIVED_PACKAGES).map(pkg => pkg.name),
      ...overrides,
      language,
    };
    const candidates = this.store.listCandidates(parseRequirements(base).language).filter(image => image.digest !== source.digest);

    let requirements: Requirements = parseRequirements(base);
    let recommendations: RankedImage[] = [];
    for (const version of versions) {
      requirements = parseRequirements({ ...base, version });
      recommendations = recommend(requirements, candidates, limit, { thresholds: this.thresholds });
      if (recommendations.length > 0) break;
    }

    logger.recommend(
      `${formatReference(target)}: ${candidates.length} alternatives, returning ${recommendations.length}` +
        `${requirements.version ? ` for version ${requirements.version}` : ''}`,
    );
    return { source, requirements, recommendations };
  }
}

function checkLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RequirementsError([`limit must be a positive integer, got ${limit}`]);
  }
}
