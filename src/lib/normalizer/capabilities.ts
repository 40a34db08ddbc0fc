import type { Package, PackageManager } from '../../types';

// Exact package names, lower-cased
const PACKAGE_MANAGERS: Record<string, string> = {
  pip: 'python',
  npm: 'node',
  yarn: 'node',
  composer: 'php',
  gem: 'ruby',
  cargo: 'rust',
  mvn: 'java',
  gradle: 'java',
};

// A capability applies when any keyword is a substring of a package name
const CAPABILITY_RULES: [string, string[]][] = [
  ['ssl', ['ssl', 'tls']],
  ['http-client', ['curl']],
  ['version-control', ['git']],
  ['database', ['sqlite', 'postgres', 'mysql']],
  ['compression', ['zlib', 'gzip']],
  ['xml', ['xml']],
  ['json', ['json']],
];

/**
 * Language package managers installed in the image, in package order.
 */
export function extractPackageManagers(packages: Package[]): PackageManager[] {
  const managers: PackageManager[] = [];
  const seen = new Set<string>();

  for (const pkg of packages) {
    const language = PACKAGE_MANAGERS[pkg.name.toLowerCase()];
    const key = `${pkg.name}\u0000${pkg.version}`;
    if (!language || seen.has(key)) continue;
    seen.add(key);
    managers.push({ name: pkg.name, version: pkg.version, language, ecosystem: pkg.ecosystem });
  }

  return managers;
}

/**
 * Coarse capabilities (TLS, HTTP client, compression, ...) implied by the
 * installed packages, sorted by name.
 */
export function extractCapabilities(packages: Package[]): string[] {
  const capabilities = new Set<string>();

  for (const pkg of packages) {
    const name = pkg.name.toLowerCase();
    for (const [capability, keywords] of CAPABILITY_RULES) {
      if (keywords.some(keyword => name.includes(keyword))) {
        capabilities.add(capability);
      }
    }
  }

  return [...capabilities].sort();
}
