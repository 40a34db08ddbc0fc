import type { ImageRecord, ImageReference, OperatingSystem, SourceStatus } from '../../types';
import { NormalizationError } from '../errors';
import type { AdapterOutcome, ScanResult, ToolName, VerifiedRuntime } from '../scanner/types';
import { extractCapabilities, extractPackageManagers } from './capabilities';
import { detectLanguages } from './languages';
import { mergePackages } from './packages';
import { countSeverities } from './severity';
import { mergeVulnerabilities } from './vulnerabilities';

export { mapSeverity, maxSeverity, countSeverities } from './severity';
export { detectLanguages } from './languages';
export { extractCapabilities, extractPackageManagers } from './capabilities';
export { upstreamVersion, majorMinorOf } from './versions';

const TOOL_PRIORITY: Record<ToolName, number> = {
  inspect: 0,
  syft: 1,
  trivy: 2,
  grype: 3,
  runtime: 4,
};

const VULNERABILITY_TOOLS: ReadonlySet<ToolName> = new Set<ToolName>(['grype', 'trivy']);

export interface NormalizeOptions {
  now?: Date;
}

function byPriority<T extends { tool: ToolName }>(items: T[]): T[] {
  return [...items].sort((a, b) => TOOL_PRIORITY[a.tool] - TOOL_PRIORITY[b.tool]);
}

function digestFromRepoDigests(repoDigests: readonly string[] | null | undefined, reference: ImageReference): string | undefined {
  if (!repoDigests || repoDigests.length === 0) return undefined;

  // docker.io library images show up as "python@sha256:..." in RepoDigests
  const shortRepository = reference.repository.replace(/^library\//, '');
  const names = new Set([
    `${reference.registry}/${reference.repository}`,
    reference.repository,
    shortRepository,
  ]);

  for (const entry of repoDigests) {
    const at = entry.lastIndexOf('@');
    if (at > 0 && names.has(entry.slice(0, at))) {
      return entry.slice(at + 1);
    }
  }
  return undefined;
}

/**
 * Manifest digests first, image ids after, in tool priority order.
 */
function resolveDigest(results: ScanResult[], reference: ImageReference): string {
  const manifestDigests: (string | null | undefined)[] = [];
  const imageIds: (string | null | undefined)[] = [];

  for (const result of results) {
    switch (result.tool) {
      case 'inspect':
        manifestDigests.push(digestFromRepoDigests(result.data.RepoDigests, reference));
        imageIds.push(result.data.Id);
        break;
      case 'syft':
        manifestDigests.push(
          digestFromRepoDigests(result.data.source?.metadata?.repoDigests, reference),
          result.data.source?.metadata?.manifestDigest,
        );
        imageIds.push(result.data.source?.metadata?.imageID);
        break;
      case 'trivy':
        manifestDigests.push(digestFromRepoDigests(result.data.Metadata?.RepoDigests, reference));
        imageIds.push(result.data.Metadata?.ImageID);
        break;
      case 'grype':
      case 'runtime':
        break;
    }
  }

  const digest = [...manifestDigests, ...imageIds].find(
    (value): value is string => typeof value === 'string' && value.length > 0,
  );
  return digest ?? `ref:${reference.registry}/${reference.repository}:${reference.tag}`;
}

function resolveSize(results: ScanResult[]): number | null {
  for (const result of results) {
    const size =
      result.tool === 'inspect' ? result.data.Size
        : result.tool === 'syft' ? result.data.source?.metadata?.imageSize
          : result.tool === 'trivy' ? result.data.Metadata?.Size
            : undefined;
    if (typeof size === 'number' && size > 0) return size;
  }
  return null;
}

function resolveCreatedAt(results: ScanResult[]): string | null {
  for (const result of results) {
    if (result.tool === 'inspect' && result.data.Created) {
      const created = new Date(result.data.Created);
      if (!Number.isNaN(created.getTime())) return created.toISOString();
    }
  }
  return null;
}

function resolveOs(results: ScanResult[]): OperatingSystem | null {
  for (const result of results) {
    if (result.tool === 'syft' && result.data.distro) {
      const name = result.data.distro.id || result.data.distro.name;
      if (name) {
        return { name, version: result.data.distro.versionID || result.data.distro.version || '' };
      }
    }
    if (result.tool === 'trivy' && result.data.Metadata?.OS?.Family) {
      return { name: result.data.Metadata.OS.Family, version: result.data.Metadata.OS.Name ?? '' };
    }
  }
  return null;
}

function verifiedRuntimes(results: ScanResult[]): VerifiedRuntime[] {
  return results.flatMap(result => (result.tool === 'runtime' ? result.data.runtimes : []));
}

function sourceStatus(outcome: AdapterOutcome): SourceStatus {
  if (outcome.ok) {
    return { tool: outcome.tool, toolVersion: outcome.toolVersion, status: 'ok' };
  }
  return { tool: outcome.tool, toolVersion: 'unknown', status: outcome.kind, message: outcome.message };
}

/**
 * Merge the outcomes of every adapter run against one image into a single
 * record. Failed adapters only show up in `sources`. Pure apart from the
 * `scannedAt` clock.
 */
export function normalize(
  reference: ImageReference,
  outcomes: AdapterOutcome[],
  options: NormalizeOptions = {},
): ImageRecord {
  const ordered = byPriority(outcomes);
  const results = ordered.filter((outcome): outcome is ScanResult => outcome.ok);

  // Runtime verification only annotates what the other tools found
  if (!results.some(result => result.tool !== 'runtime')) {
    throw new NormalizationError(
      `No scanner produced usable output for ${reference.registry}/${reference.repository}:${reference.tag}`,
    );
  }

  const packages = mergePackages(results);
  const comprehensive = results.some(result => VULNERABILITY_TOOLS.has(result.tool));
  const vulnerabilities = comprehensive ? mergeVulnerabilities(results, packages) : [];

  return {
    registry: reference.registry,
    repository: reference.repository,
    tag: reference.tag,
    digest: resolveDigest(results, reference),
    currentTags: [{ registry: reference.registry, repository: reference.repository, tag: reference.tag }],
    sizeBytes: resolveSize(results),
    createdAt: resolveCreatedAt(results),
    scannedAt: (options.now ?? new Date()).toISOString(),
    comprehensive,
    os: resolveOs(results),
    packages,
    vulnerabilities,
    languages: detectLanguages(packages, reference, verifiedRuntimes(results)),
    packageManagers: extractPackageManagers(packages),
    capabilities: extractCapabilities(packages),
    severityCounts: countSeverities(vulnerabilities),
    sources: ordered.map(sourceStatus),
  };
}
