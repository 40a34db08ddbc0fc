import { extractCapabilities, extractPackageManagers } from '../normalizer/capabilities';
import { countSeverities } from '../normalizer/severity';
import { DockerInspectSchema, GrypeReportSchema, SyftReportSchema, TrivyReportSchema } from '../scanner/schemas';
import type { AdapterFailure, ScanResult, ToolName, VerifiedRuntime } from '../scanner/types';
import type {
  ImageRecord,
  ImageReference,
  LanguageRuntime,
  Package,
  Severity,
  Vulnerability,
} from '../../types';

export const pythonRef: ImageReference = {
  registry: 'docker.io',
  repository: 'library/python',
  tag: '3.12-slim',
};

export interface ArtifactInput {
  name: string;
  version: string;
  type: string;
  purl?: string;
}

export function syftResult(
  artifacts: ArtifactInput[],
  options: { manifestDigest?: string; imageSize?: number; distro?: { id: string; versionID: string } } = {},
): ScanResult {
  return {
    ok: true,
    tool: 'syft',
    toolVersion: 'syft 1.4.1',
    data: SyftReportSchema.parse({
      artifacts,
      source: {
        type: 'image',
        metadata: { manifestDigest: options.manifestDigest, imageSize: options.imageSize },
      },
      distro: options.distro,
    }),
  };
}

export interface FindingInput {
  id: string;
  severity?: string;
  name: string;
  version: string;
  type?: string;
  fix?: string;
}

export function grypeResult(findings: FindingInput[]): ScanResult {
  return {
    ok: true,
    tool: 'grype',
    toolVersion: 'grype 0.74.0',
    data: GrypeReportSchema.parse({
      matches: findings.map(finding => ({
        vulnerability: {
          id: finding.id,
          severity: finding.severity,
          fix: { versions: finding.fix ? [finding.fix] : [], state: finding.fix ? 'fixed' : 'not-fixed' },
        },
        artifact: { name: finding.name, version: finding.version, type: finding.type ?? 'deb' },
      })),
    }),
  };
}

export function trivyResult(
  findings: FindingInput[],
  options: { type?: string; packages?: { name: string; version: string }[]; repoDigests?: string[] } = {},
): ScanResult {
  return {
    ok: true,
    tool: 'trivy',
    toolVersion: 'Version: 0.50.1',
    data: TrivyReportSchema.parse({
      Metadata: { RepoDigests: options.repoDigests },
      Results: [
        {
          Target: 'test-image (debian 12.5)',
          Class: 'os-pkgs',
          Type: options.type ?? 'debian',
          Vulnerabilities: findings.map(finding => ({
            VulnerabilityID: finding.id,
            PkgName: finding.name,
            InstalledVersion: finding.version,
            FixedVersion: finding.fix,
            Severity: finding.severity,
          })),
          Packages: (options.packages ?? []).map(pkg => ({ Name: pkg.name, Version: pkg.version })),
        },
      ],
    }),
  };
}

export function inspectResult(options: { id: string; repoDigests?: string[]; size?: number; created?: string }): ScanResult {
  return {
    ok: true,
    tool: 'inspect',
    toolVersion: '24.0.7',
    data: DockerInspectSchema.parse([
      { Id: options.id, RepoDigests: options.repoDigests, Size: options.size, Created: options.created },
    ])[0],
  };
}

export function runtimeResult(runtimes: VerifiedRuntime[]): ScanResult {
  return { ok: true, tool: 'runtime', toolVersion: '24.0.7', data: { runtimes } };
}

export function notInstalled(tool: ToolName): AdapterFailure {
  return { ok: false, tool, kind: 'ToolNotInstalled', message: `${tool} is not installed or not on PATH` };
}

export function timedOut(tool: ToolName, timeoutMs = 1000): AdapterFailure {
  return { ok: false, tool, kind: 'ToolTimeout', timeoutMs, message: `${tool} exceeded ${timeoutMs}ms` };
}

export function malformedOutput(tool: ToolName): AdapterFailure {
  return { ok: false, tool, kind: 'MalformedOutput', message: `${tool} produced invalid JSON: Unexpected token` };
}

const MIB = 1024 * 1024;

export interface RecordInput {
  repository?: string;
  tag?: string;
  digest?: string;
  sizeMb?: number | null;
  critical?: number;
  high?: number;
  medium?: number;
  languages?: Partial<LanguageRuntime>[];
  packages?: string[];
  scannedAt?: string;
}

function findings(count: number, severity: Severity, prefix: string): Vulnerability[] {
  return Array.from({ length: count }, (_, i) => ({
    id: `CVE-2024-${prefix}${String(i).padStart(3, '0')}`,
    severity,
    affectedPackage: { name: 'libexample', version: '1.0.0-1', ecosystem: 'deb' },
    sourceTools: ['grype', 'trivy'],
    fixedVersion: null,
  }));
}

/**
 * A stored-looking record with the given counts. Vulnerabilities are
 * generated so that severityCounts stays consistent.
 */
export function makeRecord(input: RecordInput = {}): ImageRecord {
  const repository = input.repository ?? 'library/python';
  const tag = input.tag ?? '3.12';
  const vulnerabilities = [
    ...findings(input.critical ?? 0, 'critical', '1'),
    ...findings(input.high ?? 0, 'high', '2'),
    ...findings(input.medium ?? 0, 'medium', '3'),
  ];
  const packages: Package[] = (input.packages ?? ['python3.12']).map(name => ({
    name,
    version: '1.0.0',
    ecosystem: 'deb',
    purl: `pkg:deb/debian/${name}@1.0.0`,
  }));
  const languages: LanguageRuntime[] = (input.languages ?? [{}]).map(runtime => ({
    language: runtime.language ?? 'python',
    version: runtime.version ?? '3.12.4',
    majorMinor: runtime.majorMinor === undefined ? '3.12' : runtime.majorMinor,
    packageName: runtime.packageName ?? 'python3.12',
    source: runtime.source ?? 'package',
  }));
  const sizeMb = input.sizeMb === undefined ? 100 : input.sizeMb;

  return {
    registry: 'docker.io',
    repository,
    tag,
    digest: input.digest ?? `sha256:${repository.replace(/\W/g, '')}${tag.replace(/\W/g, '')}`,
    currentTags: [{ registry: 'docker.io', repository, tag }],
    sizeBytes: sizeMb === null ? null : sizeMb * MIB,
    createdAt: null,
    scannedAt: input.scannedAt ?? '2024-05-01T00:00:00.000Z',
    comprehensive: true,
    os: { name: 'debian', version: '12' },
    packages,
    vulnerabilities,
    languages,
    packageManagers: extractPackageManagers(packages),
    capabilities: extractCapabilities(packages),
    severityCounts: countSeverities(vulnerabilities),
    sources: [
      { tool: 'syft', toolVersion: 'syft 1.4.1', status: 'ok' },
      { tool: 'grype', toolVersion: 'grype 0.74.0', status: 'ok' },
    ],
  };
}
