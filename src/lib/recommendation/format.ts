import type { RankedImage } from '../../types';

/**
 * Plain-text rendering of a ranking, one block per image.
 */
export function formatRecommendations(ranked: RankedImage[]): string {
  if (ranked.length === 0) {
    return 'No suitable images found for your requirements.';
  }

  const lines: string[] = ['Recommended base images:', ''];
  for (const image of ranked) {
    const { scoreBreakdown: score, reasoning } = image;
    lines.push(`${image.rank}. ${image.reference}`);
    lines.push(`   Digest: ${image.digest}`);
    if (reasoning.matchedRuntime) {
      lines.push(`   Language: ${reasoning.matchedRuntime.language} ${reasoning.matchedRuntime.version}`);
    }
    lines.push(
      score.total === 0
        ? '   Security: no known vulnerabilities'
        : `   Security: ${score.total} total, ${score.critical} critical, ${score.high} high`,
    );
    if (score.sizeBytes) {
      lines.push(`   Size: ${(score.sizeBytes / (1024 * 1024)).toFixed(1)} MB (${score.sizeCategory})`);
    }
    if (reasoning.packageCoverage.missing.length > 0) {
      lines.push(`   Missing packages: ${reasoning.packageCoverage.missing.join(', ')}`);
    }
    lines.push('');
  }
  return lines.join('\n').trimEnd();
}
