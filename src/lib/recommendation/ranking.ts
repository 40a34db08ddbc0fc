import {
  formatDigestReference,
  formatReference,
  type FilterCheck,
  type ImageRecord,
  type ImageReference,
  type LanguageRuntime,
  type PackageCoverage,
  type RankedImage,
  type Requirements,
  type ScoreBreakdown,
  type SizePreference,
} from '../../types';
import { hasPlatformKeyword } from '../registry/image-reference';
import { canonicalLanguage } from './requirements';
import { satisfiesVersion } from './version-match';

const MIB = 1024 * 1024;

export interface SizeThresholds {
  minimalMaxBytes: number;
  balancedMaxBytes: number;
}

export const DEFAULT_SIZE_THRESHOLDS: SizeThresholds = {
  minimalMaxBytes: 50 * MIB,
  balancedMaxBytes: 200 * MIB,
};

export interface RecommendOptions {
  thresholds?: SizeThresholds;
}

const SIZE_ORDINAL: Record<SizePreference, number> = {
  minimal: 0,
  balanced: 1,
  full: 2,
};

export function sizeCategory(sizeBytes: number | null, thresholds: SizeThresholds = DEFAULT_SIZE_THRESHOLDS): SizePreference | 'unknown' {
  if (sizeBytes === null || sizeBytes <= 0) return 'unknown';
  if (sizeBytes <= thresholds.minimalMaxBytes) return 'minimal';
  if (sizeBytes <= thresholds.balancedMaxBytes) return 'balanced';
  return 'full';
}

function formatSize(sizeBytes: number | null): string {
  return sizeBytes && sizeBytes > 0 ? `${(sizeBytes / MIB).toFixed(1)} MB` : 'unknown size';
}

interface Candidate {
  image: ImageRecord;
  reference: string;
  runtime: LanguageRuntime;
  checks: FilterCheck[];
  coverage: PackageCoverage;
  breakdown: ScoreBreakdown;
}

function runtimeVersion(runtime: LanguageRuntime): string {
  return /^\d/.test(runtime.version) ? runtime.version : runtime.majorMinor ?? runtime.version;
}

function packageCoverage(image: ImageRecord, required: string[]): PackageCoverage {
  const names = new Set(image.packages.map(pkg => pkg.name.toLowerCase()));
  const present: string[] = [];
  const missing: string[] = [];
  for (const name of required) {
    (names.has(name.toLowerCase()) ? present : missing).push(name);
  }
  return { required: required.length, present, missing };
}

function sameReference(a: ImageReference, b: ImageReference): boolean {
  return a.registry === b.registry && a.repository === b.repository && a.tag === b.tag;
}

/**
 * The name an image is recommended under. Tags move, so only a tag that
 * still points at the digest is usable; the scanned tag comes first. An
 * image no tag points at any more is named by digest. Returns null when
 * platform tags are excluded and every current tag names an architecture.
 */
function chooseReference(image: ImageRecord, excludePlatformTags: boolean): string | null {
  if (image.currentTags.length === 0) {
    if (excludePlatformTags && hasPlatformKeyword(image.tag)) return null;
    return formatDigestReference(image);
  }

  const scanned = image.currentTags.filter(tag => sameReference(tag, image));
  const others = image.currentTags.filter(tag => !sameReference(tag, image));
  const usable = [...scanned, ...others].filter(tag => !excludePlatformTags || !hasPlatformKeyword(tag.tag));
  return usable.length > 0 ? formatReference(usable[0]) : null;
}

/**
 * Run every filter against one image. Returns null as soon as a hard
 * constraint fails.
 */
function evaluate(image: ImageRecord, requirements: Requirements, thresholds: SizeThresholds): Candidate | null {
  const checks: FilterCheck[] = [];
  const wanted = canonicalLanguage(requirements.language);

  const sameLanguage = image.languages.filter(runtime => canonicalLanguage(runtime.language) === wanted);
  if (sameLanguage.length === 0) return null;
  checks.push({
    check: 'language',
    passed: true,
    detail: `${wanted} runtime from ${sameLanguage.map(runtime => runtime.packageName).join(', ')}`,
  });

  const constraint = requirements.version;
  const runtime = constraint
    ? sameLanguage.find(candidate => satisfiesVersion(constraint, runtimeVersion(candidate)))
    : sameLanguage[0];
  if (!runtime) return null;
  checks.push({
    check: 'version',
    passed: true,
    detail: constraint ? `${runtimeVersion(runtime)} satisfies ${constraint}` : `no constraint (found ${runtimeVersion(runtime)})`,
  });

  const counts = image.severityCounts;
  const ceilings: [string, number, number | undefined][] = [
    ['critical', counts.critical, requirements.maxCritical],
    ['high', counts.high, requirements.maxHigh],
    ['total', counts.total, requirements.maxTotal],
  ];
  if (ceilings.some(([, value, max]) => max !== undefined && value > max)) return null;
  checks.push({
    check: 'ceilings',
    passed: true,
    detail: ceilings.map(([label, value, max]) => `${label} ${value}/${max ?? 'any'}`).join(', '),
  });

  const category = sizeCategory(image.sizeBytes, thresholds);
  const coverage = packageCoverage(image, requirements.packages ?? []);
  if (coverage.missing.length > 0 && category !== 'full') return null;
  checks.push({
    check: 'packages',
    passed: true,
    detail:
      coverage.required === 0
        ? 'no packages requested'
        : coverage.missing.length === 0
          ? `all ${coverage.required} requested packages present`
          : `${coverage.present.length}/${coverage.required} present, missing ${coverage.missing.join(', ')} (full-size image, not rejected)`,
  });

  const reference = chooseReference(image, requirements.excludePlatformTags === true);
  if (reference === null) return null;
  if (requirements.excludePlatformTags) {
    checks.push({ check: 'platform', passed: true, detail: `${reference} names no CPU architecture` });
  }

  // Unknown sizes are ranked as balanced images but sort last among equals
  const ordinal = category === 'unknown' ? SIZE_ORDINAL.balanced : SIZE_ORDINAL[category];
  return {
    image,
    reference,
    runtime,
    checks,
    coverage,
    breakdown: {
      critical: counts.critical,
      high: counts.high,
      total: counts.total,
      sizeCategory: category,
      sizeDistance: Math.abs(ordinal - SIZE_ORDINAL[requirements.sizePreference]),
      sizeBytes: image.sizeBytes,
    },
  };
}

function compareCandidates(a: Candidate, b: Candidate): number {
  const keysA = [a.breakdown.critical, a.breakdown.high, a.breakdown.total, a.breakdown.sizeDistance, a.breakdown.sizeBytes || Infinity];
  const keysB = [b.breakdown.critical, b.breakdown.high, b.breakdown.total, b.breakdown.sizeDistance, b.breakdown.sizeBytes || Infinity];
  for (let i = 0; i < keysA.length; i++) {
    if (keysA[i] !== keysB[i]) return keysA[i] < keysB[i] ? -1 : 1;
  }
  if (a.reference !== b.reference) return a.reference < b.reference ? -1 : 1;
  if (a.image.digest !== b.image.digest) return a.image.digest < b.image.digest ? -1 : 1;
  return 0;
}

/**
 * Filter candidates against the requirements and rank the survivors:
 * fewest critical, then high, then total findings, then closest size
 * category, then smallest image.
 */
export function recommend(
  requirements: Requirements,
  candidates: ImageRecord[],
  limit: number,
  options: RecommendOptions = {},
): RankedImage[] {
  const thresholds = options.thresholds ?? DEFAULT_SIZE_THRESHOLDS;

  const survivors = candidates
    .map(image => evaluate(image, requirements, thresholds))
    .filter((candidate): candidate is Candidate => candidate !== null)
    .sort(compareCandidates);

  return survivors.slice(0, Math.max(0, limit)).map((candidate, index) => {
    const { breakdown, runtime } = candidate;
    const zeroCriticalAndHigh = breakdown.critical === 0 && breakdown.high === 0;
    return {
      rank: index + 1,
      reference: candidate.reference,
      digest: candidate.image.digest,
      scoreBreakdown: breakdown,
      reasoning: {
        checks: candidate.checks,
        matchedRuntime: runtime,
        packageCoverage: candidate.coverage,
        ...(requirements.securityLevel === 'maximum' ? { zeroCriticalAndHigh } : {}),
        summary:
          `${runtime.language} ${runtimeVersion(runtime)}; ` +
          `${breakdown.critical} critical, ${breakdown.high} high, ${breakdown.total} total; ` +
          `${formatSize(breakdown.sizeBytes)} (${breakdown.sizeCategory})`,
      },
    };
  });
}
