import { renameSync, writeFileSync } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { and, asc, count, desc, eq, exists, gt, inArray, lte, or, sql, sum, type AnyColumn, type SQL } from 'drizzle-orm';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import { drizzle } from 'drizzle-orm/sql-js';
import initSqlJs, { type Database, type SqlJsStatic } from 'sql.js';
import { z } from 'zod';
import {
  SOURCE_STATUS_KINDS,
  type ImageQueryFilter,
  type ImageRecord,
  type ImageReference,
  type PagedResult,
  type StoreStatistics,
} from '../../types';
import { StoreError, errorMessage, hasErrorCode } from '../errors';
import { logger } from '../logger';
import { extractCapabilities, extractPackageManagers } from '../normalizer/capabilities';
import { countSeverities } from '../normalizer/severity';
import { migrate } from './migrate';
import * as schema from './schema';
import { advisories, imageTags, imageVulnerabilities, images, languages, packages } from './schema';

type Db = BaseSQLiteDatabase<'sync', void, typeof schema>;

export type UpsertStatus = 'inserted' | 'updated' | 'unchanged';

export interface UpsertResult {
  status: UpsertStatus;
  record: ImageRecord;
}

export interface StoreWarning {
  kind: 'lfs-pointer' | 'not-sqlite';
  path: string;
  message: string;
}

const SQLITE_HEADER = 'SQLite format 3\u0000';
const LFS_POINTER_PREFIX = 'version https://git-lfs.github.com/spec/v1';
const INSERT_CHUNK = 500;
const MAX_PAGE_SIZE = 500;

const SourcesSchema = z.array(
  z.object({
    tool: z.string(),
    toolVersion: z.string(),
    status: z.enum(SOURCE_STATUS_KINDS),
    message: z.string().optional(),
  }),
);

const SourceToolsSchema = z.array(z.string());

function parseJsonColumn<T>(value: string, schema: z.ZodType<T>, column: string): T {
  const parsed = schema.safeParse(JSON.parse(value));
  if (!parsed.success) {
    throw new StoreError(`Stored ${column} column is corrupt: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

function chunks<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

function containsText(column: AnyColumn, needle: string): SQL {
  return sql`instr(lower(${column}), ${needle}) > 0`;
}

let sqlJs: Promise<SqlJsStatic> | undefined;

// The WebAssembly module is compiled once per process
function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJs) {
    sqlJs = initSqlJs().catch(error => {
      sqlJs = undefined;
      throw new StoreError(`Cannot load the SQLite engine: ${errorMessage(error)}`, { cause: error });
    });
  }
  return sqlJs;
}

async function readDatabaseFile(filePath: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return null;
    }
    throw new StoreError(`Cannot read database file ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Persistent catalogue of scanned images. One row per digest; tags are
 * mutable pointers onto those rows.
 */
export class ImageStore {
  private readonly db: Db;
  private closed = false;

  private constructor(
    private readonly sqlite: Database,
    readonly location: string,
    readonly warnings: StoreWarning[],
    // File the in-memory database is written back to after every change
    private readonly filePath: string | null,
  ) {
    this.db = drizzle(sqlite, { schema });
  }

  /**
   * Open the store at `filePath`, creating it when missing. A file that is
   * not a SQLite database (a Git LFS pointer for instance) is left alone and
   * the store runs in memory instead.
   */
  static async open(filePath: string): Promise<ImageStore> {
    const SQL = await loadSqlJs();

    if (filePath === ':memory:') {
      return ImageStore.create(new SQL.Database(), ':memory:', [], null);
    }

    const contents = await readDatabaseFile(filePath);

    if (contents && contents.length > 0 && !contents.subarray(0, SQLITE_HEADER.length).toString('latin1').startsWith(SQLITE_HEADER)) {
      const isLfsPointer = contents.subarray(0, 100).toString('utf8').startsWith(LFS_POINTER_PREFIX);
      const warning: StoreWarning = isLfsPointer
        ? { kind: 'lfs-pointer', path: filePath, message: `${filePath} is a Git LFS pointer, not a database; using an empty in-memory store` }
        : { kind: 'not-sqlite', path: filePath, message: `${filePath} is not a SQLite database; using an empty in-memory store` };
      logger.warn(`[DB] ${warning.message}`);
      return ImageStore.create(new SQL.Database(), ':memory:', [warning], null);
    }

    if (!contents) {
      await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
    }

    let sqlite: Database;
    try {
      sqlite = new SQL.Database(contents && contents.length > 0 ? contents : undefined);
    } catch (error) {
      throw new StoreError(`Cannot open database ${filePath}: ${errorMessage(error)}`, { cause: error });
    }
    const store = ImageStore.create(sqlite, filePath, [], filePath);
    if (!contents) store.persist();
    return store;
  }

  private static create(sqlite: Database, location: string, warnings: StoreWarning[], filePath: string | null): ImageStore {
    try {
      migrate(sqlite);
    } catch (error) {
      sqlite.close();
      throw new StoreError(`Database schema could not be applied at ${location}: ${errorMessage(error)}`, { cause: error });
    }
    logger.database(`Opened image store at ${location}`);
    return new ImageStore(sqlite, location, warnings, filePath);
  }

  /**
   * Write the database image to disk through a temporary file. Exporting
   * reopens the connection, which resets its pragmas.
   */
  private persist(): void {
    if (!this.filePath) return;
    const tmpPath = `${this.filePath}.tmp`;
    try {
      writeFileSync(tmpPath, Buffer.from(this.sqlite.export()));
      renameSync(tmpPath, this.filePath);
    } catch (error) {
      throw new StoreError(`Cannot write database file ${this.filePath}: ${errorMessage(error)}`, { cause: error });
    } finally {
      this.sqlite.run('PRAGMA foreign_keys = ON');
    }
  }

  get degraded(): boolean {
    return this.warnings.length > 0;
  }

  /**
   * Insert or replace the record for `record.digest` in one transaction. The
   * tag pointer always moves to this digest, even when the stored record is
   * kept as-is.
   */
  upsert(record: ImageRecord, updateExisting: boolean): UpsertResult {
    let result: UpsertResult;
    try {
      result = this.db.transaction(tx => {
        const existing = tx.select().from(images).where(eq(images.digest, record.digest)).get();
        const counts = countSeverities(record.vulnerabilities);
        const row = {
          digest: record.digest,
          registry: record.registry,
          repository: record.repository,
          tag: record.tag,
          sizeBytes: record.sizeBytes,
          createdAt: record.createdAt,
          scannedAt: record.scannedAt,
          comprehensive: record.comprehensive,
          osName: record.os?.name ?? null,
          osVersion: record.os?.version ?? null,
          criticalCount: counts.critical,
          highCount: counts.high,
          mediumCount: counts.medium,
          lowCount: counts.low,
          unknownCount: counts.unknown,
          totalCount: counts.total,
          sources: JSON.stringify(record.sources),
        };

        let imageId: number;
        let status: UpsertStatus;

        if (!existing) {
          const inserted = tx.insert(images).values(row).returning({ id: images.id }).all()[0];
          if (!inserted) {
            throw new StoreError(`Image ${record.digest} was not inserted`);
          }
          imageId = inserted.id;
          this.writeChildren(tx, imageId, record);
          status = 'inserted';
        } else if (updateExisting) {
          imageId = existing.id;
          const scannedAt = record.scannedAt > existing.scannedAt ? record.scannedAt : existing.scannedAt;
          tx.update(images).set({ ...row, scannedAt }).where(eq(images.id, imageId)).run();
          tx.delete(packages).where(eq(packages.imageId, imageId)).run();
          tx.delete(imageVulnerabilities).where(eq(imageVulnerabilities.imageId, imageId)).run();
          tx.delete(languages).where(eq(languages.imageId, imageId)).run();
          this.writeChildren(tx, imageId, record);
          status = 'updated';
        } else {
          imageId = existing.id;
          status = 'unchanged';
        }

        tx.insert(imageTags)
          .values({
            registry: record.registry,
            repository: record.repository,
            tag: record.tag,
            imageId,
            updatedAt: record.scannedAt,
          })
          .onConflictDoUpdate({
            target: [imageTags.registry, imageTags.repository, imageTags.tag],
            set: { imageId, updatedAt: record.scannedAt },
          })
          .run();

        const stored = this.loadRecord(tx, imageId);
        if (!stored) {
          throw new StoreError(`Image ${record.digest} vanished during upsert`);
        }
        return { status, record: stored };
      });
    } catch (error) {
      if (error instanceof StoreError) throw error;
      throw new StoreError(`Failed to store ${record.digest}: ${errorMessage(error)}`, { cause: error });
    }
    this.persist();
    return result;
  }

  private writeChildren(tx: Db, imageId: number, record: ImageRecord): void {
    for (const batch of chunks(record.packages.map((pkg, position) => ({ ...pkg, imageId, position })), INSERT_CHUNK)) {
      tx.insert(packages).values(batch).run();
    }

    const advisoryIds = [...new Set(record.vulnerabilities.map(vuln => vuln.id))];
    for (const batch of chunks(advisoryIds, INSERT_CHUNK)) {
      tx.insert(advisories).values(batch.map(advisoryId => ({ advisoryId }))).onConflictDoNothing().run();
    }

    const advisoryRefs = new Map<string, number>();
    for (const batch of chunks(advisoryIds, INSERT_CHUNK)) {
      const rows = tx
        .select({ id: advisories.id, advisoryId: advisories.advisoryId })
        .from(advisories)
        .where(inArray(advisories.advisoryId, batch))
        .all();
      for (const advisory of rows) advisoryRefs.set(advisory.advisoryId, advisory.id);
    }

    const vulnerabilityRows = record.vulnerabilities.map((vuln, position) => {
      const advisoryRef = advisoryRefs.get(vuln.id);
      if (advisoryRef === undefined) {
        throw new StoreError(`Advisory ${vuln.id} was not recorded`);
      }
      return {
        imageId,
        advisoryRef,
        position,
        severity: vuln.severity,
        packageName: vuln.affectedPackage.name,
        packageVersion: vuln.affectedPackage.version,
        packageEcosystem: vuln.affectedPackage.ecosystem,
        sourceTools: JSON.stringify(vuln.sourceTools),
        fixedVersion: vuln.fixedVersion,
      };
    });
    for (const batch of chunks(vulnerabilityRows, INSERT_CHUNK)) {
      tx.insert(imageVulnerabilities).values(batch).run();
    }

    if (record.languages.length > 0) {
      tx.insert(languages)
        .values(record.languages.map((runtime, position) => ({ ...runtime, imageId, position })))
        .run();
    }
  }

  private loadRecord(db: Db, imageId: number): ImageRecord | null {
    const row = db.select().from(images).where(eq(images.id, imageId)).get();
    if (!row) return null;

    const packageRows = db
      .select()
      .from(packages)
      .where(eq(packages.imageId, imageId))
      .orderBy(asc(packages.position))
      .all();

    const vulnerabilityRows = db
      .select({ vuln: imageVulnerabilities, advisoryId: advisories.advisoryId })
      .from(imageVulnerabilities)
      .innerJoin(advisories, eq(imageVulnerabilities.advisoryRef, advisories.id))
      .where(eq(imageVulnerabilities.imageId, imageId))
      .orderBy(asc(imageVulnerabilities.position))
      .all();

    const languageRows = db
      .select()
      .from(languages)
      .where(eq(languages.imageId, imageId))
      .orderBy(asc(languages.position))
      .all();

    const tagRows = db
      .select({ registry: imageTags.registry, repository: imageTags.repository, tag: imageTags.tag })
      .from(imageTags)
      .where(eq(imageTags.imageId, imageId))
      .orderBy(asc(imageTags.registry), asc(imageTags.repository), asc(imageTags.tag))
      .all();

    const vulnerabilities = vulnerabilityRows.map(({ vuln, advisoryId }) => ({
      id: advisoryId,
      severity: vuln.severity,
      affectedPackage: {
        name: vuln.packageName,
        version: vuln.packageVersion,
        ecosystem: vuln.packageEcosystem,
      },
      sourceTools: parseJsonColumn(vuln.sourceTools, SourceToolsSchema, 'source_tools'),
      fixedVersion: vuln.fixedVersion,
    }));

    const packageList = packageRows.map(pkg => ({
      name: pkg.name,
      version: pkg.version,
      ecosystem: pkg.ecosystem,
      purl: pkg.purl,
    }));
    const currentTags: ImageReference[] = tagRows.map(pointer => ({ ...pointer }));

    return {
      registry: row.registry,
      repository: row.repository,
      tag: row.tag,
      digest: row.digest,
      currentTags,
      sizeBytes: row.sizeBytes,
      createdAt: row.createdAt,
      scannedAt: row.scannedAt,
      comprehensive: row.comprehensive,
      os: row.osName ? { name: row.osName, version: row.osVersion ?? '' } : null,
      packages: packageList,
      vulnerabilities,
      languages: languageRows.map(runtime => ({
        language: runtime.language,
        version: runtime.version,
        majorMinor: runtime.majorMinor,
        packageName: runtime.packageName,
        source: runtime.source,
      })),
      packageManagers: extractPackageManagers(packageList),
      capabilities: extractCapabilities(packageList),
      severityCounts: countSeverities(vulnerabilities),
      sources: parseJsonColumn(row.sources, SourcesSchema, 'sources'),
    };
  }

  /**
   * Resolve a tag pointer. The returned record carries the requested
   * reference even when the digest was first stored under another tag.
   */
  findByReference(registry: string, repository: string, tag: string): ImageRecord | null {
    const pointer = this.db
      .select({ imageId: imageTags.imageId })
      .from(imageTags)
      .where(and(eq(imageTags.registry, registry), eq(imageTags.repository, repository), eq(imageTags.tag, tag)))
      .get();
    if (!pointer) return null;

    const record = this.loadRecord(this.db, pointer.imageId);
    return record ? { ...record, registry, repository, tag } : null;
  }

  findByDigest(digest: string): ImageRecord | null {
    const row = this.db.select({ id: images.id }).from(images).where(eq(images.digest, digest)).get();
    return row ? this.loadRecord(this.db, row.id) : null;
  }

  private buildConditions(filter: ImageQueryFilter): SQL | undefined {
    const conditions: SQL[] = [];

    if (filter.language) {
      conditions.push(
        inArray(
          images.id,
          this.db
            .select({ id: languages.imageId })
            .from(languages)
            .where(sql`lower(${languages.language}) = ${filter.language.toLowerCase()}`),
        ),
      );
    }

    switch (filter.securityFilter ?? 'all') {
      case 'secure':
        conditions.push(eq(images.totalCount, 0));
        break;
      case 'safe': {
        const safe = and(eq(images.criticalCount, 0), eq(images.highCount, 0));
        if (safe) conditions.push(safe);
        break;
      }
      case 'vulnerable':
        conditions.push(gt(images.totalCount, 0));
        break;
      case 'all':
        break;
    }

    if (filter.maxVulnerabilities !== undefined) {
      conditions.push(lte(images.totalCount, filter.maxVulnerabilities));
    }

    if (filter.textSearch && filter.textSearch.trim()) {
      const needle = filter.textSearch.trim().toLowerCase();
      // A digest is also found through any tag that points at it
      const viaTags = exists(
        this.db
          .select({ one: sql`1` })
          .from(imageTags)
          .where(
            and(
              eq(imageTags.imageId, images.id),
              or(containsText(imageTags.repository, needle), containsText(imageTags.tag, needle)),
            ),
          ),
      );
      const match = or(containsText(images.repository, needle), containsText(images.tag, needle), viaTags);
      if (match) conditions.push(match);
    }

    return conditions.length > 0 ? and(...conditions) : undefined;
  }

  /**
   * Filtered, paginated listing, newest scans first. `page` starts at 1.
   */
  query(filter: ImageQueryFilter = {}, page = 1, pageSize = 20): PagedResult<ImageRecord> {
    if (!Number.isInteger(page) || page < 1) {
      throw new StoreError(`page must be a positive integer, got ${page}`);
    }
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
      throw new StoreError(`pageSize must be between 1 and ${MAX_PAGE_SIZE}, got ${pageSize}`);
    }

    const where = this.buildConditions(filter);
    const total = this.db.select({ value: count() }).from(images).where(where).get()?.value ?? 0;

    const rows = this.db
      .select({ id: images.id })
      .from(images)
      .where(where)
      .orderBy(desc(images.scannedAt), asc(images.id))
      .limit(pageSize)
      .offset((page - 1) * pageSize)
      .all();

    const items = rows.flatMap(row => {
      const record = this.loadRecord(this.db, row.id);
      return record ? [record] : [];
    });

    return { items, total, page, pageSize };
  }

  /**
   * Every stored record, optionally only those with a runtime for `language`.
   */
  listCandidates(language?: string): ImageRecord[] {
    const where = language ? this.buildConditions({ language }) : undefined;
    const rows = this.db.select({ id: images.id }).from(images).where(where).orderBy(asc(images.id)).all();
    return rows.flatMap(row => {
      const record = this.loadRecord(this.db, row.id);
      return record ? [record] : [];
    });
  }

  aggregateStatistics(): StoreStatistics {
    const imageTotals = this.db
      .select({ images: count(), vulnerabilities: sum(images.totalCount) })
      .from(images)
      .get();
    const totalImages = imageTotals?.images ?? 0;
    const totalVulnerabilities = Number(imageTotals?.vulnerabilities ?? 0);

    const totalPackages = this.db.select({ value: count() }).from(packages).get()?.value ?? 0;
    const zeroVulnerabilityCount =
      this.db.select({ value: count() }).from(images).where(eq(images.totalCount, 0)).get()?.value ?? 0;

    const languageRows = this.db
      .select({ language: languages.language, images: sql<number>`count(distinct ${languages.imageId})` })
      .from(languages)
      .groupBy(languages.language)
      .orderBy(asc(languages.language))
      .all();

    const languageDistribution: Record<string, number> = {};
    for (const row of languageRows) {
      languageDistribution[row.language] = Number(row.images);
    }

    return {
      totalImages,
      totalPackages,
      avgVulnerabilitiesPerImage: totalImages > 0 ? Math.round((totalVulnerabilities / totalImages) * 100) / 100 : 0,
      zeroVulnerabilityCount,
      languageDistribution,
    };
  }

  /**
   * Remove a record, its entities and every tag pointing at it.
   */
  deleteImage(digest: string): boolean {
    const deleted = this.db.delete(images).where(eq(images.digest, digest)).returning({ id: images.id }).all();
    if (deleted.length === 0) return false;
    this.persist();
    logger.database(`Deleted image ${digest}`);
    return true;
  }

  reset(): void {
    this.db.transaction(tx => {
      tx.delete(imageTags).run();
      tx.delete(imageVulnerabilities).run();
      tx.delete(packages).run();
      tx.delete(languages).run();
      tx.delete(images).run();
      tx.delete(advisories).run();
    });
    this.persist();
    logger.database('Image store reset');
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.sqlite.close();
  }
}
