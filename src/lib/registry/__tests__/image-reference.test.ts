jest.mock('../../config', () => ({
  config: {
    defaultRegistry: 'docker.io',
  },
}));

import {
  InvalidReferenceError,
  compareTagVersions,
  filterTags,
  hasPlatformKeyword,
  normalizeRegistryHost,
  parseImageReference,
  parseRepository,
} from '../image-reference';

describe('parseImageReference', () => {
  it('should resolve official images under library/', () => {
    expect(parseImageReference('python:3.12')).toEqual({
      registry: 'docker.io',
      repository: 'library/python',
      tag: '3.12',
    });
  });

  it('should default the tag to latest', () => {
    expect(parseImageReference('bitnami/redis').tag).toBe('latest');
  });

  it('should keep nested repositories on other registries', () => {
    expect(parseImageReference('mcr.microsoft.com/azurelinux/base/python:3.12')).toEqual({
      registry: 'mcr.microsoft.com',
      repository: 'azurelinux/base/python',
      tag: '3.12',
    });
  });

  it('should not mistake a registry port for a tag', () => {
    expect(parseImageReference('localhost:5000/team/app')).toEqual({
      registry: 'localhost:5000',
      repository: 'team/app',
      tag: 'latest',
    });
  });

  it('should fold Docker Hub aliases and repository case', () => {
    expect(parseImageReference('index.docker.io/Library/Node:20')).toEqual({
      registry: 'docker.io',
      repository: 'library/node',
      tag: '20',
    });
  });

  it('should resolve unqualified references against the given default registry', () => {
    expect(parseImageReference('team/app:1.0', 'registry.example.com')).toEqual({
      registry: 'registry.example.com',
      repository: 'team/app',
      tag: '1.0',
    });
  });

  it.each([
    ['', 'reference is empty'],
    ['python 3.12', 'reference contains whitespace'],
    ['python@sha256:abc123', 'digest references are not supported, use a tag'],
    ['python:', 'tag is empty'],
  ])('should reject %j', (input, reason) => {
    expect(() => parseImageReference(input)).toThrow(InvalidReferenceError);
    expect(() => parseImageReference(input)).toThrow(`Invalid image reference "${input}": ${reason}`);
  });
});

describe('parseRepository', () => {
  it('should drop trailing slashes', () => {
    expect(parseRepository('mcr.microsoft.com/azurelinux/base/python/')).toEqual({
      registry: 'mcr.microsoft.com',
      repository: 'azurelinux/base/python',
    });
  });
});

describe('normalizeRegistryHost', () => {
  it('should strip the scheme and trailing slash', () => {
    expect(normalizeRegistryHost('https://ghcr.io/')).toBe('ghcr.io');
    expect(normalizeRegistryHost('registry-1.docker.io')).toBe('docker.io');
  });
});

describe('filterTags', () => {
  it('should keep versioned tags, newest first', () => {
    const tags = ['latest', '3.12', '3.11', '3.12-debug', '3.12-arm64', 'edge', '3.13-rc1', 'slim', '3.12'];

    expect(filterTags(tags)).toEqual(['3.13-rc1', '3.12', '3.11']);
  });

  it('should return an empty list when nothing qualifies', () => {
    expect(filterTags(['latest', 'nightly', 'bookworm'])).toEqual([]);
  });

  it('should order version numbers by value', () => {
    expect(filterTags(['3.9', '3.12', '3.10'])).toEqual(['3.12', '3.10', '3.9']);
    expect(filterTags(['1.9.2', '1.10', '3.12', '3.12-slim'])).toEqual(['3.12-slim', '3.12', '1.10', '1.9.2']);
  });
});

describe('compareTagVersions', () => {
  it('should compare digit runs numerically and the rest as text', () => {
    expect(compareTagVersions('3.9', '3.12')).toBeLessThan(0);
    expect(compareTagVersions('20-alpine', '20-bookworm')).toBeLessThan(0);
    expect(compareTagVersions('3.12', '3.12')).toBe(0);
    expect(compareTagVersions('3.012', '3.12')).toBeLessThan(0);
  });
});

describe('hasPlatformKeyword', () => {
  it('should match whole separator-delimited words only', () => {
    expect(hasPlatformKeyword('3.12-slim-amd64')).toBe(true);
    expect(hasPlatformKeyword('docker.io/library/python:3.12-arm64')).toBe(true);
    expect(hasPlatformKeyword('3.12-armada')).toBe(false);
  });
});
