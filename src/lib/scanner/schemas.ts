import { z } from 'zod';

/**
 * Output schemas for the scanning tools. Only the fields the normalizer reads
 * are declared; everything else passes through untouched.
 */

const optionalString = z.string().nullish();

export const SyftArtifactSchema = z
  .object({
    name: z.string(),
    version: z.string().default(''),
    type: z.string().default(''),
    purl: optionalString,
    language: optionalString,
  })
  .passthrough();

export const SyftReportSchema = z
  .object({
    artifacts: z.array(SyftArtifactSchema).default([]),
    source: z
      .object({
        type: optionalString,
        metadata: z
          .object({
            imageID: optionalString,
            manifestDigest: optionalString,
            imageSize: z.number().nullish(),
            repoDigests: z.array(z.string()).nullish(),
          })
          .passthrough()
          .nullish(),
      })
      .passthrough()
      .nullish(),
    distro: z
      .object({
        name: optionalString,
        id: optionalString,
        version: optionalString,
        versionID: optionalString,
      })
      .passthrough()
      .nullish(),
    descriptor: z
      .object({ name: optionalString, version: optionalString })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export const GrypeMatchSchema = z
  .object({
    vulnerability: z
      .object({
        id: z.string(),
        severity: optionalString,
        fix: z
          .object({
            versions: z.array(z.string()).nullish(),
            state: optionalString,
          })
          .passthrough()
          .nullish(),
      })
      .passthrough(),
    artifact: z
      .object({
        name: z.string(),
        version: z.string().default(''),
        type: z.string().default(''),
        purl: optionalString,
      })
      .passthrough(),
  })
  .passthrough();

export const GrypeReportSchema = z
  .object({
    matches: z.array(GrypeMatchSchema).default([]),
    descriptor: z
      .object({ name: optionalString, version: optionalString })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export const TrivyVulnerabilitySchema = z
  .object({
    VulnerabilityID: z.string(),
    PkgName: z.string(),
    InstalledVersion: z.string().default(''),
    FixedVersion: optionalString,
    Severity: optionalString,
    PkgIdentifier: z.object({ PURL: optionalString }).passthrough().nullish(),
  })
  .passthrough();

export const TrivyPackageSchema = z
  .object({
    Name: z.string(),
    Version: z.string().default(''),
    Identifier: z.object({ PURL: optionalString }).passthrough().nullish(),
  })
  .passthrough();

export const TrivyResultSchema = z
  .object({
    Target: z.string().default(''),
    Class: optionalString,
    Type: optionalString,
    Vulnerabilities: z.array(TrivyVulnerabilitySchema).nullish(),
    Packages: z.array(TrivyPackageSchema).nullish(),
  })
  .passthrough();

export const TrivyReportSchema = z
  .object({
    ArtifactName: optionalString,
    Metadata: z
      .object({
        ImageID: optionalString,
        RepoDigests: z.array(z.string()).nullish(),
        OS: z.object({ Family: optionalString, Name: optionalString }).passthrough().nullish(),
        Size: z.number().nullish(),
      })
      .passthrough()
      .nullish(),
    Results: z.array(TrivyResultSchema).nullish(),
  })
  .passthrough();

// docker inspect prints an array with one entry per requested image
export const DockerInspectSchema = z
  .array(
    z
      .object({
        Id: z.string(),
        RepoDigests: z.array(z.string()).nullish(),
        Created: optionalString,
        Size: z.number().nullish(),
        Os: optionalString,
        Architecture: optionalString,
      })
      .passthrough(),
  )
  .min(1);

export type SyftArtifact = z.infer<typeof SyftArtifactSchema>;
export type SyftReport = z.infer<typeof SyftReportSchema>;
export type GrypeMatch = z.infer<typeof GrypeMatchSchema>;
export type GrypeReport = z.infer<typeof GrypeReportSchema>;
export type TrivyResult = z.infer<typeof TrivyResultSchema>;
export type TrivyReport = z.infer<typeof TrivyReportSchema>;
export type DockerInspect = z.infer<typeof DockerInspectSchema>[number];
