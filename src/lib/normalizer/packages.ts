import type { Ecosystem, Package } from '../../types';
import type { ScanResult } from '../scanner/types';
import { ecosystemFromSyft, ecosystemFromTrivy, synthesizePurl } from './ecosystems';

export function packageKey(name: string, version: string, ecosystem: Ecosystem): string {
  return `${ecosystem}\u0000${name}\u0000${version}`;
}

function comparePackages(a: Package, b: Package): number {
  if (a.ecosystem !== b.ecosystem) return a.ecosystem < b.ecosystem ? -1 : 1;
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  if (a.version !== b.version) return a.version < b.version ? -1 : 1;
  return 0;
}

function packagesOf(result: ScanResult): Package[] {
  switch (result.tool) {
    case 'syft':
      return result.data.artifacts.map(artifact => {
        const ecosystem = ecosystemFromSyft(artifact.type, artifact.purl);
        return {
          name: artifact.name,
          version: artifact.version,
          ecosystem,
          purl: artifact.purl || synthesizePurl(ecosystem, artifact.name, artifact.version),
        };
      });
    case 'trivy':
      return (result.data.Results ?? []).flatMap(target =>
        (target.Packages ?? []).map(pkg => {
          const purl = pkg.Identifier?.PURL;
          const ecosystem = ecosystemFromTrivy(target.Type, purl);
          return {
            name: pkg.Name,
            version: pkg.Version,
            ecosystem,
            purl: purl || synthesizePurl(ecosystem, pkg.Name, pkg.Version),
          };
        }),
      );
    default:
      return [];
  }
}

/**
 * Union of the packages reported by SBOM-capable results. Results must
 * already be in tool priority order: the first purl seen for a package wins.
 */
export function mergePackages(results: ScanResult[]): Package[] {
  const merged = new Map<string, Package>();

  for (const result of results) {
    for (const pkg of packagesOf(result)) {
      const key = packageKey(pkg.name, pkg.version, pkg.ecosystem);
      if (!merged.has(key)) {
        merged.set(key, pkg);
      }
    }
  }

  return [...merged.values()].sort(comparePackages);
}
