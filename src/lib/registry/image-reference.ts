/**
 * Image reference parsing and tag selection
 */

import type { ImageReference } from '../../types';
import { config } from '../config';
import { ScoutError } from '../errors';

// Hostnames that all mean Docker Hub
const DOCKER_HUB_ALIASES = ['docker.io', 'registry-1.docker.io', 'index.docker.io', 'registry.hub.docker.com'];

const SKIP_TAGS = new Set(['latest', 'dev', 'nightly', 'edge', 'rc', 'beta', 'alpha']);
const SKIP_TAG_KEYWORDS = ['debug', 'test', 'experimental'];

const PLATFORM_KEYWORDS = new Set([
  'arm', 'amd', 'x86', 'aarch64', 'arm64', 'armhf', 'armv7', 'armv6',
  'i386', 'i686', 'x64', 'amd64', 'intel', 'apple', 'm1', 'm2',
]);

export class InvalidReferenceError extends ScoutError {
  constructor(input: string, reason: string) {
    super('INVALID_REFERENCE', `Invalid image reference "${input}": ${reason}`);
  }
}

/**
 * A first path segment names a registry when it looks like a host.
 */
export function looksLikeRegistry(segment: string): boolean {
  return segment.includes('.') || segment.includes(':') || segment === 'localhost';
}

export function normalizeRegistryHost(registry: string): string {
  const host = registry.trim().toLowerCase().replace(/^https?:\/\//, '').replace(/\/+$/, '');
  return DOCKER_HUB_ALIASES.includes(host) ? 'docker.io' : host;
}

function normalizeRepository(registry: string, repository: string): string {
  // Official Docker Hub images live under library/
  if (registry === 'docker.io' && !repository.includes('/')) {
    return `library/${repository}`;
  }
  return repository;
}

/**
 * Parse `[registry/]repository[:tag]`. Unqualified references resolve
 * against the default registry and a missing tag becomes `latest`.
 */
export function parseImageReference(input: string, defaultRegistry: string = config.defaultRegistry): ImageReference {
  const value = input.trim();
  if (!value) {
    throw new InvalidReferenceError(input, 'reference is empty');
  }
  if (/\s/.test(value)) {
    throw new InvalidReferenceError(input, 'reference contains whitespace');
  }
  if (value.includes('@')) {
    throw new InvalidReferenceError(input, 'digest references are not supported, use a tag');
  }

  let remainder = value;
  let registry = normalizeRegistryHost(defaultRegistry);

  const slash = remainder.indexOf('/');
  if (slash > 0 && looksLikeRegistry(remainder.slice(0, slash))) {
    registry = normalizeRegistryHost(remainder.slice(0, slash));
    remainder = remainder.slice(slash + 1);
  }

  let tag = 'latest';
  const colon = remainder.lastIndexOf(':');
  if (colon > remainder.lastIndexOf('/')) {
    tag = remainder.slice(colon + 1);
    remainder = remainder.slice(0, colon);
  }

  const repository = remainder.replace(/^\/+|\/+$/g, '').toLowerCase();
  if (!repository) {
    throw new InvalidReferenceError(input, 'repository is missing');
  }
  if (!tag) {
    throw new InvalidReferenceError(input, 'tag is empty');
  }

  return { registry, repository: normalizeRepository(registry, repository), tag };
}

/**
 * Parse a repository without a tag. A trailing `:tag` and trailing slashes
 * are dropped.
 */
export function parseRepository(input: string, defaultRegistry: string = config.defaultRegistry): { registry: string; repository: string } {
  const { registry, repository } = parseImageReference(input.trim().replace(/\/+$/, ''), defaultRegistry);
  return { registry, repository };
}

/**
 * Compare tags run by run, digit runs by value, so `3.12` sorts after `3.9`.
 */
export function compareTagVersions(a: string, b: string): number {
  const runsA = a.match(/\d+|\D+/g) ?? [];
  const runsB = b.match(/\d+|\D+/g) ?? [];
  for (let i = 0; i < Math.min(runsA.length, runsB.length); i++) {
    const left = runsA[i];
    const right = runsB[i];
    if (left === right) continue;
    const bothNumeric = /^\d/.test(left) && /^\d/.test(right);
    if (bothNumeric && Number(left) !== Number(right)) return Number(left) - Number(right);
    return left < right ? -1 : 1;
  }
  if (runsA.length !== runsB.length) return runsA.length - runsB.length;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Keep version-like tags, newest-looking first.
 */
export function filterTags(tags: string[]): string[] {
  const kept = tags.filter(tag => {
    const lower = tag.toLowerCase();
    if (SKIP_TAGS.has(lower)) return false;
    if (SKIP_TAG_KEYWORDS.some(keyword => lower.includes(keyword))) return false;
    if (hasPlatformKeyword(lower)) return false;
    return /\d/.test(tag);
  });
  return [...new Set(kept)].sort((a, b) => compareTagVersions(b, a));
}

/**
 * True when a tag or reference names a CPU architecture as one of its
 * separator-delimited words, e.g. `3.12-arm64`.
 */
export function hasPlatformKeyword(value: string): boolean {
  return value
    .toLowerCase()
    .split(/[-_.:/]+/)
    .some(word => PLATFORM_KEYWORDS.has(word));
}
