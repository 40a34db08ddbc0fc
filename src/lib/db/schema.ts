import { relations } from 'drizzle-orm';
import { index, integer, primaryKey, sqliteTable, text, uniqueIndex } from 'drizzle-orm/sqlite-core';
import { ECOSYSTEMS, LANGUAGE_SOURCES, SEVERITIES } from '../../types';

export const images = sqliteTable('images', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  digest: text('digest').notNull(),
  registry: text('registry').notNull(), // where the digest was first seen
  repository: text('repository').notNull(),
  tag: text('tag').notNull(),
  sizeBytes: integer('size_bytes'),
  createdAt: text('created_at'),
  scannedAt: text('scanned_at').notNull(),
  comprehensive: integer('comprehensive', { mode: 'boolean' }).notNull().default(false),
  osName: text('os_name'),
  osVersion: text('os_version'),
  criticalCount: integer('critical_count').notNull().default(0),
  highCount: integer('high_count').notNull().default(0),
  mediumCount: integer('medium_count').notNull().default(0),
  lowCount: integer('low_count').notNull().default(0),
  unknownCount: integer('unknown_count').notNull().default(0),
  totalCount: integer('total_count').notNull().default(0),
  sources: text('sources').notNull().default('[]'), // JSON SourceStatus[]
}, table => ({
  digestIdx: uniqueIndex('images_digest_idx').on(table.digest),
}));

export const imageTags = sqliteTable('image_tags', {
  registry: text('registry').notNull(),
  repository: text('repository').notNull(),
  tag: text('tag').notNull(),
  imageId: integer('image_id')
    .notNull()
    .references(() => images.id, { onDelete: 'cascade' }),
  updatedAt: text('updated_at').notNull(),
}, table => ({
  pk: primaryKey({ columns: [table.registry, table.repository, table.tag] }),
  imageIdx: index('image_tags_image_idx').on(table.imageId),
}));

export const packages = sqliteTable('packages', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  imageId: integer('image_id')
    .notNull()
    .references(() => images.id, { onDelete: 'cascade' }),
  position: integer('position').notNull(),
  name: text('name').notNull(),
  version: text('version').notNull(),
  ecosystem: text('ecosystem', { enum: ECOSYSTEMS }).notNull(),
  purl: text('purl').notNull(),
}, table => ({
  imageIdx: index('packages_image_idx').on(table.imageId),
  nameIdx: index('packages_name_idx').on(table.name),
}));

export const advisories = sqliteTable('advisories', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  advisoryId: text('advisory_id').notNull(), // e.g. CVE-2024-1234
}, table => ({
  advisoryIdx: uniqueIndex('advisories_advisory_id_idx').on(table.advisoryId),
}));

export const imageVulnerabilities = sqliteTable('image_vulnerabilities', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  imageId: integer('image_id')
    .notNull()
    .references(() => images.id, { onDelete: 'cascade' }),
  advisoryRef: integer('advisory_ref')
    .notNull()
    .references(() => advisories.id),
  position: integer('position').notNull(),
  severity: text('severity', { enum: SEVERITIES }).notNull(),
  packageName: text('package_name').notNull(),
  packageVersion: text('package_version').notNull(),
  packageEcosystem: text('package_ecosystem', { enum: ECOSYSTEMS }).notNull(),
  sourceTools: text('source_tools').notNull(), // JSON string[]
  fixedVersion: text('fixed_version'),
}, table => ({
  imageIdx: index('image_vulnerabilities_image_idx').on(table.imageId),
}));

export const languages = sqliteTable('languages', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  imageId: integer('image_id')
    .notNull()
    .references(() => images.id, { onDelete: 'cascade' }),
  position: integer('position').notNull(),
  language: text('language').notNull(),
  version: text('version').notNull(),
  majorMinor: text('major_minor'),
  packageName: text('package_name').notNull(),
  source: text('source', { enum: LANGUAGE_SOURCES }).notNull(),
}, table => ({
  imageIdx: index('languages_image_idx').on(table.imageId),
  languageIdx: index('languages_language_idx').on(table.language),
}));

export const imagesRelations = relations(images, ({ many }) => ({
  tags: many(imageTags),
  packages: many(packages),
  vulnerabilities: many(imageVulnerabilities),
  languages: many(languages),
}));

export const imageTagsRelations = relations(imageTags, ({ one }) => ({
  image: one(images, { fields: [imageTags.imageId], references: [images.id] }),
}));

export const packagesRelations = relations(packages, ({ one }) => ({
  image: one(images, { fields: [packages.imageId], references: [images.id] }),
}));

export const imageVulnerabilitiesRelations = relations(imageVulnerabilities, ({ one }) => ({
  image: one(images, { fields: [imageVulnerabilities.imageId], references: [images.id] }),
  advisory: one(advisories, { fields: [imageVulnerabilities.advisoryRef], references: [advisories.id] }),
}));

export const languagesRelations = relations(languages, ({ one }) => ({
  image: one(images, { fields: [languages.imageId], references: [images.id] }),
}));

export type ImageRow = typeof images.$inferSelect;
export type NewImageRow = typeof images.$inferInsert;
