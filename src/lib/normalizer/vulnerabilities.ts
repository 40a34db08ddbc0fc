import { SEVERITY_RANK, type Ecosystem, type Package, type Severity, type Vulnerability } from '../../types';
import type { ScanResult } from '../scanner/types';
import { ecosystemFromSyft, ecosystemFromTrivy } from './ecosystems';
import { mapSeverity, maxSeverity } from './severity';

interface Finding {
  id: string;
  severity: Severity;
  name: string;
  version: string;
  ecosystem: Ecosystem;
  fixedVersion: string | null;
  tool: string;
}

function findingsOf(result: ScanResult): Finding[] {
  switch (result.tool) {
    case 'grype':
      return result.data.matches.map(match => ({
        id: match.vulnerability.id,
        severity: mapSeverity(match.vulnerability.severity),
        name: match.artifact.name,
        version: match.artifact.version,
        ecosystem: ecosystemFromSyft(match.artifact.type, match.artifact.purl),
        fixedVersion: match.vulnerability.fix?.versions?.[0] ?? null,
        tool: result.tool,
      }));
    case 'trivy':
      return (result.data.Results ?? []).flatMap(target =>
        (target.Vulnerabilities ?? []).map(vuln => ({
          id: vuln.VulnerabilityID,
          severity: mapSeverity(vuln.Severity),
          name: vuln.PkgName,
          version: vuln.InstalledVersion,
          ecosystem: ecosystemFromTrivy(target.Type, vuln.PkgIdentifier?.PURL),
          fixedVersion: vuln.FixedVersion || null,
          tool: result.tool,
        })),
      );
    default:
      return [];
  }
}

function compareVulnerabilities(a: Vulnerability, b: Vulnerability): number {
  const bySeverity = SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity];
  if (bySeverity !== 0) return bySeverity;
  if (a.id !== b.id) return a.id < b.id ? -1 : 1;
  if (a.affectedPackage.name !== b.affectedPackage.name) return a.affectedPackage.name < b.affectedPackage.name ? -1 : 1;
  if (a.affectedPackage.version !== b.affectedPackage.version) return a.affectedPackage.version < b.affectedPackage.version ? -1 : 1;
  if (a.affectedPackage.ecosystem !== b.affectedPackage.ecosystem) return a.affectedPackage.ecosystem < b.affectedPackage.ecosystem ? -1 : 1;
  return 0;
}

/**
 * Ecosystem a finding is filed under. A scanner that could not tell
 * (`other`) takes the SBOM's ecosystem when the SBOM has exactly one package
 * by that name and version.
 */
function resolveEcosystem(finding: Finding, sbomEcosystems: Map<string, Set<Ecosystem>>): Ecosystem {
  if (finding.ecosystem !== 'other') return finding.ecosystem;
  const known = sbomEcosystems.get(`${finding.name}\u0000${finding.version}`);
  if (known && known.size === 1) {
    const [only] = known;
    if (only) return only;
  }
  return finding.ecosystem;
}

/**
 * Merge findings from all vulnerability scanners. Reports of the same
 * advisory against the same package version in the same ecosystem collapse
 * into one entry with the highest severity and every reporting tool. The
 * same name and version in two ecosystems (an npm and a PyPI `requests`)
 * stay separate.
 */
export function mergeVulnerabilities(results: ScanResult[], packages: Package[]): Vulnerability[] {
  const sbomEcosystems = new Map<string, Set<Ecosystem>>();
  for (const pkg of packages) {
    const key = `${pkg.name}\u0000${pkg.version}`;
    const known = sbomEcosystems.get(key) ?? new Set<Ecosystem>();
    known.add(pkg.ecosystem);
    sbomEcosystems.set(key, known);
  }

  const merged = new Map<string, Vulnerability>();

  for (const result of results) {
    for (const finding of findingsOf(result)) {
      const ecosystem = resolveEcosystem(finding, sbomEcosystems);
      const key = `${finding.id}\u0000${finding.name}\u0000${finding.version}\u0000${ecosystem}`;
      const existing = merged.get(key);

      if (!existing) {
        merged.set(key, {
          id: finding.id,
          severity: finding.severity,
          affectedPackage: {
            name: finding.name,
            version: finding.version,
            ecosystem,
          },
          sourceTools: [finding.tool],
          fixedVersion: finding.fixedVersion,
        });
        continue;
      }

      existing.severity = maxSeverity(existing.severity, finding.severity);
      if (!existing.sourceTools.includes(finding.tool)) {
        existing.sourceTools = [...existing.sourceTools, finding.tool].sort();
      }
      existing.fixedVersion = existing.fixedVersion ?? finding.fixedVersion;
    }
  }

  return [...merged.values()].sort(compareVulnerabilities);
}
