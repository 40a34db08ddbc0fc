import { SEVERITY_RANK, type Severity, type SeverityCounts, type Vulnerability } from '../../types';

/**
 * Map a tool's severity label onto the five-level scale. Grype reports
 * "Negligible" for issues Trivy calls low.
 */
export function mapSeverity(label: string | null | undefined): Severity {
  switch ((label ?? '').trim().toUpperCase()) {
    case 'CRITICAL':
      return 'critical';
    case 'HIGH':
      return 'high';
    case 'MEDIUM':
    case 'MODERATE':
      return 'medium';
    case 'LOW':
    case 'NEGLIGIBLE':
      return 'low';
    default:
      return 'unknown';
  }
}

export function maxSeverity(a: Severity, b: Severity): Severity {
  return SEVERITY_RANK[a] >= SEVERITY_RANK[b] ? a : b;
}

export function countSeverities(vulnerabilities: Vulnerability[]): SeverityCounts {
  const counts: SeverityCounts = { critical: 0, high: 0, medium: 0, low: 0, unknown: 0, total: 0 };
  for (const vuln of vulnerabilities) {
    counts[vuln.severity]++;
    counts.total++;
  }
  return counts;
}
