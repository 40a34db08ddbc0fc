export { RecommendationEngine, thresholdsFromConfig } from './RecommendationEngine';
export { recommend, sizeCategory, DEFAULT_SIZE_THRESHOLDS } from './ranking';
export type { RecommendOptions, SizeThresholds } from './ranking';
export { parseRequirements, canonicalLanguage, RequirementsSchema } from './requirements';
export type { RequirementsInput } from './requirements';
export { satisfiesVersion, isValidConstraint, parseVersion } from './version-match';
export { formatRecommendations } from './format';
