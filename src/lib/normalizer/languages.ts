import type { ImageReference, LanguageRuntime, Package } from '../../types';
import type { VerifiedRuntime } from '../scanner/types';
import { majorMinorOf, upstreamVersion } from './versions';

interface LanguageRule {
  language: string;
  patterns: RegExp[];
  // Extra weight for the most specific runtime package names
  bonus?: (name: string) => number;
}

const LANGUAGE_RULES: LanguageRule[] = [
  {
    language: 'python',
    patterns: [/^python3?$/, /^python3\.\d+$/, /^python3\.\d+-.*/],
    bonus: name => (/^python3\.\d+$/.test(name) ? 80 : name === 'python3' ? 70 : name === 'python' ? 60 : 0),
  },
  {
    language: 'node',
    patterns: [/^nodejs?$/],
    bonus: name => (name === 'nodejs' ? 80 : name === 'node' ? 70 : 0),
  },
  {
    language: 'java',
    patterns: [/^openjdk.*/, /^java$/, /^jre.*/, /^jdk.*/],
    bonus: name => (name.includes('openjdk') ? 80 : name === 'java' ? 70 : 0),
  },
  { language: 'go', patterns: [/^golang?$/] },
  { language: 'ruby', patterns: [/^ruby$/, /^ruby\d+.*/] },
  { language: 'php', patterns: [/^php$/, /^php\d+.*/] },
  {
    language: 'dotnet',
    patterns: [
      /^dotnet.*/,
      /^aspnetcore.*/,
      /^netstandard.*/,
      /^microsoft\.netcore\.app.*/,
      /^microsoft\.aspnetcore\.app.*/,
    ],
  },
  { language: 'rust', patterns: [/^rust$/, /^cargo$/] },
  { language: 'perl', patterns: [/^perl$/] },
  { language: 'lua', patterns: [/^lua$/, /^lua\d+.*/] },
];

const DOTNET_IMAGE_PATTERNS: RegExp[] = [
  /mcr\.microsoft\.com\/dotnet\/(?:aspnet|runtime):(\d+\.\d+(?:\.\d+)?)/,
  /microsoft\/dotnet:(\d+\.\d+)-(?:aspnetcore-)?runtime/,
  /microsoft\/aspnetcore:(\d+\.\d+)/,
];

const SYSTEM_ECOSYSTEMS = new Set(['deb', 'rpm', 'apk']);

function packagePriority(pkg: Package, rule: LanguageRule): number {
  const name = pkg.name.toLowerCase();
  let priority = 0;
  if (name === rule.language) priority += 100;
  if (SYSTEM_ECOSYSTEMS.has(pkg.ecosystem)) priority += 50;
  priority += rule.bonus ? rule.bonus(name) : 0;
  if (['-dev', '-devel', '-lib', '-common'].some(suffix => name.includes(suffix))) {
    priority -= 20;
  }
  return priority;
}

function runtimeMajorMinor(language: string, packageName: string, version: string, reference: ImageReference): string | null {
  if (language === 'python') {
    const fromName = /python3\.(\d+)/.exec(packageName);
    if (fromName) return `3.${fromName[1]}`;
  }
  if (language === 'dotnet') {
    const fromTag = /(\d+\.\d+)/.exec(reference.tag);
    if (fromTag) return fromTag[1];
  }
  return majorMinorOf(version);
}

function detectDotnetFromImageName(reference: ImageReference): LanguageRuntime | null {
  const fullName = `${reference.registry}/${reference.repository}:${reference.tag}`.toLowerCase();
  for (const pattern of DOTNET_IMAGE_PATTERNS) {
    const match = pattern.exec(fullName);
    if (match) {
      const version = match[1].split('.').length === 2 ? `${match[1]}.0` : match[1];
      return {
        language: 'dotnet',
        version,
        majorMinor: majorMinorOf(version),
        packageName: 'Microsoft .NET Runtime',
        source: 'image-name',
      };
    }
  }
  return null;
}

/**
 * A version read from the runtime binary replaces the package-derived one
 * and keeps the package name that matched. Languages no package revealed
 * are added under the binary's name.
 */
function applyVerified(runtimes: LanguageRuntime[], verified: VerifiedRuntime[]): LanguageRuntime[] {
  const result = [...runtimes];

  for (const runtime of verified) {
    const replacement: LanguageRuntime = {
      language: runtime.language,
      version: runtime.version,
      majorMinor: majorMinorOf(runtime.version),
      packageName: runtime.command,
      source: 'runtime',
    };
    const index = result.findIndex(existing => existing.language === runtime.language);
    if (index < 0) {
      result.push(replacement);
      continue;
    }
    const existing = result[index];
    result[index] = existing.source === 'runtime' ? existing : { ...replacement, packageName: existing.packageName };
  }

  return result;
}

/**
 * Detect language runtimes from the package list. For each language the
 * highest-priority matching package wins; ties go to the smaller name, then
 * version, so the result does not depend on package order. Runtimes
 * confirmed inside the image take precedence.
 */
export function detectLanguages(
  packages: Package[],
  reference: ImageReference,
  verified: VerifiedRuntime[] = [],
): LanguageRuntime[] {
  const runtimes: LanguageRuntime[] = [];

  for (const rule of LANGUAGE_RULES) {
    let best: { pkg: Package; priority: number } | undefined;

    for (const pkg of packages) {
      const name = pkg.name.toLowerCase();
      if (!rule.patterns.some(pattern => pattern.test(name))) continue;

      const priority = packagePriority(pkg, rule);
      if (
        !best ||
        priority > best.priority ||
        (priority === best.priority && (pkg.name < best.pkg.name || (pkg.name === best.pkg.name && pkg.version < best.pkg.version)))
      ) {
        best = { pkg, priority };
      }
    }

    if (best) {
      const version = upstreamVersion(best.pkg.version);
      runtimes.push({
        language: rule.language,
        version,
        majorMinor: runtimeMajorMinor(rule.language, best.pkg.name.toLowerCase(), version, reference),
        packageName: best.pkg.name,
        source: 'package',
      });
    }
  }

  if (!runtimes.some(runtime => runtime.language === 'dotnet')) {
    const dotnet = detectDotnetFromImageName(reference);
    if (dotnet) runtimes.push(dotnet);
  }

  return applyVerified(runtimes, verified);
}
