import type { Ecosystem } from '../../types';

// Syft artifact types
const SYFT_TYPES: Record<string, Ecosystem> = {
  deb: 'deb',
  rpm: 'rpm',
  apk: 'apk',
  python: 'pypi',
  npm: 'npm',
  'go-module': 'go',
  'java-archive': 'maven',
  'jenkins-plugin': 'maven',
  gem: 'gem',
  dotnet: 'nuget',
  'rust-crate': 'cargo',
  'php-composer': 'composer',
  binary: 'binary',
};

// Trivy result types (Results[].Type)
const TRIVY_TYPES: Record<string, Ecosystem> = {
  debian: 'deb',
  ubuntu: 'deb',
  redhat: 'rpm',
  centos: 'rpm',
  rocky: 'rpm',
  alma: 'rpm',
  fedora: 'rpm',
  amazon: 'rpm',
  oracle: 'rpm',
  photon: 'rpm',
  'cbl-mariner': 'rpm',
  azurelinux: 'rpm',
  suse: 'rpm',
  'opensuse.leap': 'rpm',
  alpine: 'apk',
  wolfi: 'apk',
  chainguard: 'apk',
  'python-pkg': 'pypi',
  pip: 'pypi',
  pipenv: 'pypi',
  poetry: 'pypi',
  'node-pkg': 'npm',
  npm: 'npm',
  yarn: 'npm',
  pnpm: 'npm',
  gobinary: 'go',
  gomod: 'go',
  jar: 'maven',
  pom: 'maven',
  gradle: 'maven',
  gemspec: 'gem',
  bundler: 'gem',
  'dotnet-core': 'nuget',
  'dotnet-deps': 'nuget',
  nuget: 'nuget',
  'rust-binary': 'cargo',
  cargo: 'cargo',
  composer: 'composer',
};

// purl types (pkg:<type>/...)
const PURL_TYPES: Record<string, Ecosystem> = {
  deb: 'deb',
  rpm: 'rpm',
  apk: 'apk',
  pypi: 'pypi',
  npm: 'npm',
  golang: 'go',
  maven: 'maven',
  gem: 'gem',
  nuget: 'nuget',
  cargo: 'cargo',
  composer: 'composer',
  generic: 'binary',
};

function lookup(table: Record<string, Ecosystem>, key: string | null | undefined): Ecosystem | undefined {
  if (!key) return undefined;
  const normalized = key.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(table, normalized) ? table[normalized] : undefined;
}

export function ecosystemFromPurl(purl: string | null | undefined): Ecosystem | undefined {
  const match = /^pkg:([a-z0-9.+-]+)\//i.exec(purl ?? '');
  return match ? lookup(PURL_TYPES, match[1]) : undefined;
}

export function ecosystemFromSyft(type: string, purl?: string | null): Ecosystem {
  return lookup(SYFT_TYPES, type) ?? ecosystemFromPurl(purl) ?? 'other';
}

export function ecosystemFromTrivy(type: string | null | undefined, purl?: string | null): Ecosystem {
  return ecosystemFromPurl(purl) ?? lookup(TRIVY_TYPES, type) ?? 'other';
}

export function synthesizePurl(ecosystem: Ecosystem, name: string, version: string): string {
  const purlType = ecosystem === 'go' ? 'golang' : ecosystem === 'binary' || ecosystem === 'other' ? 'generic' : ecosystem;
  const versionPart = version ? `@${encodeURIComponent(version)}` : '';
  return `pkg:${purlType}/${encodeURIComponent(name)}${versionPart}`;
}
