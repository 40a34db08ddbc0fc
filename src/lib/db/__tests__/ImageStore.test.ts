import fs from 'fs/promises';
import os from 'os';
import path from 'path';

jest.mock('../../logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    database: jest.fn(),
  },
}));

import { StoreError } from '../../errors';
import type { ImageRecord } from '../../../types';
import { makeRecord } from '../../__tests__/fixtures';
import { ImageStore } from '../ImageStore';

describe('ImageStore', () => {
  let store: ImageStore;

  beforeEach(async () => {
    store = await ImageStore.open(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  describe('upsert', () => {
    it('should insert a new digest and read it back unchanged', () => {
      const record = makeRecord({ critical: 1, high: 2 });

      const result = store.upsert(record, false);

      expect(result.status).toBe('inserted');
      expect(result.record).toEqual(record);
      expect(store.findByDigest(record.digest)).toEqual(record);
    });

    it('should leave an existing record alone unless asked to update', () => {
      const record = makeRecord();
      store.upsert(record, false);

      const rescan = { ...makeRecord({ packages: ['python3.12', 'git'] }), scannedAt: '2024-06-01T00:00:00.000Z' };
      const result = store.upsert(rescan, false);

      expect(result.status).toBe('unchanged');
      expect(result.record.packages.map(pkg => pkg.name)).toEqual(['python3.12']);
      expect(result.record.scannedAt).toBe('2024-05-01T00:00:00.000Z');
    });

    it('should replace the record contents when updating', () => {
      store.upsert(makeRecord({ high: 3 }), false);

      const rescan = { ...makeRecord({ packages: ['python3.12', 'git'], high: 1 }), scannedAt: '2024-06-01T00:00:00.000Z' };
      const result = store.upsert(rescan, true);

      expect(result.status).toBe('updated');
      expect(result.record.packages.map(pkg => pkg.name)).toEqual(['python3.12', 'git']);
      expect(result.record.severityCounts.high).toBe(1);
      expect(result.record.scannedAt).toBe('2024-06-01T00:00:00.000Z');
    });

    it('should never move scannedAt backwards', () => {
      store.upsert(makeRecord({ scannedAt: '2024-06-01T00:00:00.000Z' }), false);

      const result = store.upsert(makeRecord({ scannedAt: '2024-05-01T00:00:00.000Z' }), true);

      expect(result.record.scannedAt).toBe('2024-06-01T00:00:00.000Z');
    });

    it('should give the same catalogue when the same scan is stored twice', () => {
      const record = makeRecord({ critical: 1, high: 2, medium: 1, packages: ['python3.12', 'git', 'libssl3'] });
      const withoutScanTime = (records: ImageRecord[]) => records.map(({ scannedAt: _scannedAt, ...rest }) => rest);

      store.upsert(record, true);
      const first = store.listCandidates();
      const second = store.upsert({ ...record, scannedAt: '2024-06-01T00:00:00.000Z' }, true);

      expect(second.status).toBe('updated');
      expect(withoutScanTime(store.listCandidates())).toEqual(withoutScanTime(first));
      expect(store.aggregateStatistics()).toMatchObject({ totalImages: 1, totalPackages: 3 });
    });

    it('should share advisories between images', () => {
      store.upsert(makeRecord({ tag: '3.11', high: 1 }), false);
      store.upsert(makeRecord({ tag: '3.12', high: 1 }), false);

      const ids = store.listCandidates().map(record => record.vulnerabilities.map(vuln => vuln.id));
      expect(ids).toEqual([['CVE-2024-2000'], ['CVE-2024-2000']]);
    });
  });

  describe('tags', () => {
    it('should move a tag to the newest digest and keep the old record', () => {
      store.upsert(makeRecord({ digest: 'sha256:old' }), false);
      store.upsert(makeRecord({ digest: 'sha256:new' }), false);

      expect(store.findByReference('docker.io', 'library/python', '3.12')?.digest).toBe('sha256:new');
      expect(store.findByDigest('sha256:old')).not.toBeNull();
    });

    it('should report the requested tag for a digest stored under another tag', () => {
      store.upsert(makeRecord({ digest: 'sha256:same', tag: '3.12' }), false);
      const result = store.upsert(makeRecord({ digest: 'sha256:same', tag: '3' }), false);

      expect(result.status).toBe('unchanged');
      expect(store.findByReference('docker.io', 'library/python', '3')).toMatchObject({ tag: '3', digest: 'sha256:same' });
      expect(store.findByDigest('sha256:same')?.tag).toBe('3.12');
    });

    it('should list the tags that currently point at each digest', () => {
      store.upsert(makeRecord({ digest: 'sha256:old', tag: '3.12' }), false);
      store.upsert(makeRecord({ digest: 'sha256:old', tag: '3.12.4' }), false);
      store.upsert(makeRecord({ digest: 'sha256:new', tag: '3.12' }), false);

      const pointer = (tag: string) => ({ registry: 'docker.io', repository: 'library/python', tag });
      expect(store.findByDigest('sha256:old')?.currentTags).toEqual([pointer('3.12.4')]);
      expect(store.findByDigest('sha256:new')?.currentTags).toEqual([pointer('3.12')]);
    });

    it('should return null for an unknown reference', () => {
      expect(store.findByReference('docker.io', 'library/python', '2.7')).toBeNull();
    });
  });

  describe('query', () => {
    beforeEach(() => {
      store.upsert(makeRecord({ tag: '3.11', critical: 1, high: 2, scannedAt: '2024-05-01T00:00:00.000Z' }), false);
      store.upsert(
        makeRecord({
          repository: 'library/node',
          tag: '20',
          packages: ['nodejs'],
          languages: [{ language: 'node', version: '20.11.0', majorMinor: '20.11', packageName: 'nodejs' }],
          scannedAt: '2024-05-02T00:00:00.000Z',
        }),
        false,
      );
      store.upsert(makeRecord({ tag: '3.12', medium: 1, scannedAt: '2024-05-03T00:00:00.000Z' }), false);
    });

    const tags = (filter: Parameters<ImageStore['query']>[0]): string[] =>
      store.query(filter).items.map(record => record.tag);

    it('should list newest scans first', () => {
      expect(tags({})).toEqual(['3.12', '20', '3.11']);
    });

    it('should filter by language case-insensitively', () => {
      expect(tags({ language: 'Python' })).toEqual(['3.12', '3.11']);
    });

    it.each([
      ['secure', ['20']],
      ['safe', ['3.12', '20']],
      ['vulnerable', ['3.12', '3.11']],
      ['all', ['3.12', '20', '3.11']],
    ] as const)('should apply the %s security filter', (securityFilter, expected) => {
      expect(tags({ securityFilter })).toEqual(expected);
    });

    it('should cap the vulnerability total', () => {
      expect(tags({ maxVulnerabilities: 1 })).toEqual(['3.12', '20']);
    });

    it('should search repository and tag text', () => {
      expect(tags({ textSearch: ' NODE ' })).toEqual(['20']);
      expect(tags({ textSearch: '3.1' })).toEqual(['3.12', '3.11']);
    });

    it('should find a digest through any tag that points at it', () => {
      const stored = store.findByReference('docker.io', 'library/python', '3.12');
      expect(stored).not.toBeNull();
      store.upsert({ ...makeRecord({ tag: '3.12-bookworm', medium: 1 }), digest: stored?.digest ?? '' }, false);

      expect(tags({ textSearch: 'bookworm' })).toEqual(['3.12']);
      expect(tags({ textSearch: 'alpine' })).toEqual([]);
    });

    it('should paginate with a total count', () => {
      const result = store.query({}, 2, 2);

      expect(result.total).toBe(3);
      expect(result.page).toBe(2);
      expect(result.pageSize).toBe(2);
      expect(result.items.map(record => record.tag)).toEqual(['3.11']);
    });

    it('should reject invalid pages', () => {
      expect(() => store.query({}, 0)).toThrow(StoreError);
      expect(() => store.query({}, 1, 501)).toThrow('pageSize must be between 1 and 500, got 501');
    });

    it('should aggregate statistics', () => {
      expect(store.aggregateStatistics()).toEqual({
        totalImages: 3,
        totalPackages: 3,
        avgVulnerabilitiesPerImage: 1.33,
        zeroVulnerabilityCount: 1,
        languageDistribution: { node: 1, python: 2 },
      });
    });

    it('should list candidates for one language', () => {
      expect(store.listCandidates('node').map(record => record.repository)).toEqual(['library/node']);
    });
  });

  describe('deleteImage and reset', () => {
    it('should delete a record with its tags', () => {
      const record = makeRecord({ high: 1 });
      store.upsert(record, false);

      expect(store.deleteImage(record.digest)).toBe(true);
      expect(store.findByReference('docker.io', 'library/python', '3.12')).toBeNull();
      expect(store.deleteImage(record.digest)).toBe(false);
    });

    it('should empty the store on reset', () => {
      store.upsert(makeRecord({ high: 1 }), false);

      store.reset();

      expect(store.aggregateStatistics().totalImages).toBe(0);
      expect(store.query().total).toBe(0);
    });
  });
});

describe('ImageStore.open', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'image-store-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should fall back to memory for a Git LFS pointer and leave the file alone', async () => {
    const file = path.join(dir, 'images.db');
    const pointer = 'version https://git-lfs.github.com/spec/v1\noid sha256:0000\nsize 123\n';
    await fs.writeFile(file, pointer);

    const store = await ImageStore.open(file);
    store.upsert(makeRecord(), false);

    expect(store.degraded).toBe(true);
    expect(store.location).toBe(':memory:');
    expect(store.warnings.map(warning => warning.kind)).toEqual(['lfs-pointer']);
    expect(await fs.readFile(file, 'utf8')).toBe(pointer);
    store.close();
  });

  it('should fall back to memory for any other non-database file', async () => {
    const file = path.join(dir, 'images.db');
    await fs.writeFile(file, 'not a database');

    const store = await ImageStore.open(file);

    expect(store.warnings.map(warning => warning.kind)).toEqual(['not-sqlite']);
    store.close();
  });

  it('should write a new database file as soon as it is opened', async () => {
    const file = path.join(dir, 'images.db');

    const store = await ImageStore.open(file);

    expect(store.location).toBe(file);
    expect(store.degraded).toBe(false);
    expect((await fs.readFile(file)).subarray(0, 15).toString('latin1')).toBe('SQLite format 3');
    store.close();
  });

  it('should create a missing database and keep its contents across opens', async () => {
    const file = path.join(dir, 'nested', 'images.db');
    const record = makeRecord({ high: 1 });

    const first = await ImageStore.open(file);
    first.upsert(record, false);
    first.close();

    const second = await ImageStore.open(file);
    expect(second.degraded).toBe(false);
    expect(second.findByDigest(record.digest)).toEqual(record);
    second.close();
  });
});
