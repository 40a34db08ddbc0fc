export const SEVERITIES = ['critical', 'high', 'medium', 'low', 'unknown'] as const;
export type Severity = (typeof SEVERITIES)[number];

// Higher rank wins when tools disagree
export const SEVERITY_RANK: Record<Severity, number> = {
  unknown: 0,
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

export const ECOSYSTEMS = [
  'deb',
  'rpm',
  'apk',
  'pypi',
  'npm',
  'go',
  'maven',
  'gem',
  'nuget',
  'cargo',
  'composer',
  'binary',
  'other',
] as const;
export type Ecosystem = (typeof ECOSYSTEMS)[number];

export const SIZE_PREFERENCES = ['minimal', 'balanced', 'full'] as const;
export type SizePreference = (typeof SIZE_PREFERENCES)[number];

export const SECURITY_LEVELS = ['basic', 'high', 'maximum'] as const;
export type SecurityLevel = (typeof SECURITY_LEVELS)[number];

export const SECURITY_FILTERS = ['all', 'secure', 'safe', 'vulnerable'] as const;
export type SecurityFilter = (typeof SECURITY_FILTERS)[number];

export interface ImageReference {
  registry: string;
  repository: string;
  tag: string;
}

export interface Package {
  name: string;
  version: string;
  ecosystem: Ecosystem;
  purl: string;
}

export interface AffectedPackage {
  name: string;
  version: string;
  ecosystem: Ecosystem;
}

export interface Vulnerability {
  id: string;
  severity: Severity;
  affectedPackage: AffectedPackage;
  sourceTools: string[];
  fixedVersion: string | null;
}

// `runtime` marks a version read from the runtime binary inside the image
export const LANGUAGE_SOURCES = ['package', 'image-name', 'runtime'] as const;
export type LanguageSource = (typeof LANGUAGE_SOURCES)[number];

export interface LanguageRuntime {
  language: string;
  version: string;
  majorMinor: string | null;
  packageName: string;
  source: LanguageSource;
}

export const SOURCE_STATUS_KINDS = ['ok', 'ToolNotInstalled', 'ToolTimeout', 'ToolNonZeroExit', 'MalformedOutput'] as const;
export type SourceStatusKind = (typeof SOURCE_STATUS_KINDS)[number];

export interface SourceStatus {
  tool: string;
  toolVersion: string;
  status: SourceStatusKind;
  message?: string;
}

export interface SeverityCounts {
  critical: number;
  high: number;
  medium: number;
  low: number;
  unknown: number;
  total: number;
}

export interface OperatingSystem {
  name: string;
  version: string;
}

export interface PackageManager {
  name: string;
  version: string;
  language: string;
  ecosystem: Ecosystem;
}

export interface ImageRecord extends ImageReference {
  digest: string;
  // Tag pointers that resolve to this digest right now
  currentTags: ImageReference[];
  sizeBytes: number | null;
  createdAt: string | null;
  scannedAt: string;
  comprehensive: boolean;
  os: OperatingSystem | null;
  packages: Package[];
  vulnerabilities: Vulnerability[];
  languages: LanguageRuntime[];
  packageManagers: PackageManager[];
  capabilities: string[];
  severityCounts: SeverityCounts;
  sources: SourceStatus[];
}

export interface Requirements {
  language: string;
  version?: string;
  packages?: string[];
  sizePreference: SizePreference;
  securityLevel: SecurityLevel;
  maxCritical?: number;
  maxHigh?: number;
  maxTotal?: number;
  excludePlatformTags?: boolean;
}

export interface FilterCheck {
  check: 'language' | 'version' | 'ceilings' | 'packages' | 'platform';
  passed: boolean;
  detail: string;
}

export interface ScoreBreakdown {
  critical: number;
  high: number;
  total: number;
  sizeCategory: SizePreference | 'unknown';
  sizeDistance: number;
  sizeBytes: number | null;
}

export interface PackageCoverage {
  required: number;
  present: string[];
  missing: string[];
}

export interface Reasoning {
  checks: FilterCheck[];
  matchedRuntime: LanguageRuntime | null;
  packageCoverage: PackageCoverage;
  zeroCriticalAndHigh?: boolean;
  summary: string;
}

export interface RankedImage {
  rank: number;
  reference: string;
  digest: string;
  scoreBreakdown: ScoreBreakdown;
  reasoning: Reasoning;
}

/**
 * Alternatives for an image already in the store. `requirements` is the
 * derived request that produced `recommendations`, after any relaxation of
 * the version constraint.
 */
export interface ExistingImageRecommendation {
  source: ImageRecord | null;
  requirements: Requirements | null;
  recommendations: RankedImage[];
}

export interface ImageQueryFilter {
  language?: string;
  securityFilter?: SecurityFilter;
  maxVulnerabilities?: number;
  textSearch?: string;
}

export interface PagedResult<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
}

export interface StoreStatistics {
  totalImages: number;
  totalPackages: number;
  avgVulnerabilitiesPerImage: number;
  zeroVulnerabilityCount: number;
  languageDistribution: Record<string, number>;
}

export function formatReference(ref: ImageReference): string {
  return `${ref.registry}/${ref.repository}:${ref.tag}`;
}

export function formatDigestReference(ref: { registry: string; repository: string; digest: string }): string {
  return `${ref.registry}/${ref.repository}@${ref.digest}`;
}
