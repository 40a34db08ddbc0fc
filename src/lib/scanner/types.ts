import type { ImageReference, SourceStatusKind } from '../../types';
import type { DockerInspect, GrypeReport, SyftReport, TrivyReport } from './schemas';

export type ScannerRole = 'sbom' | 'vulnerability' | 'metadata' | 'runtime';

/**
 * A language runtime confirmed by running its binary inside the image.
 */
export interface VerifiedRuntime {
  language: string;
  version: string;
  command: string;
}

export interface RuntimeReport {
  runtimes: VerifiedRuntime[];
}

export type ScanResult =
  | { ok: true; tool: 'syft'; toolVersion: string; data: SyftReport }
  | { ok: true; tool: 'grype'; toolVersion: string; data: GrypeReport }
  | { ok: true; tool: 'trivy'; toolVersion: string; data: TrivyReport }
  | { ok: true; tool: 'inspect'; toolVersion: string; data: DockerInspect }
  | { ok: true; tool: 'runtime'; toolVersion: string; data: RuntimeReport };

export type ToolName = ScanResult['tool'];

export type AdapterFailure =
  | { ok: false; tool: ToolName; kind: 'ToolNotInstalled'; message: string }
  | { ok: false; tool: ToolName; kind: 'ToolTimeout'; timeoutMs: number; message: string }
  | { ok: false; tool: ToolName; kind: 'ToolNonZeroExit'; code: number; stderr: string; message: string }
  | { ok: false; tool: ToolName; kind: 'MalformedOutput'; message: string };

export type AdapterOutcome = ScanResult | AdapterFailure;

export type FailureKind = Exclude<SourceStatusKind, 'ok'>;

export interface AnalyzeContext {
  timeoutMs: number;
  workDir: string;
  env?: NodeJS.ProcessEnv;
}

export interface IScannerAdapter {
  readonly name: ToolName;
  readonly role: ScannerRole;
  analyze(reference: ImageReference, context: AnalyzeContext): Promise<AdapterOutcome>;
  getVersion(): Promise<string>;
}

export interface ScannerVersions {
  [scannerName: string]: string;
}

export interface ToolRunResult {
  stdout: string;
  stderr: string;
}

/**
 * Process runner contract. Resolves with the tool output or with a failure
 * value; it never rejects.
 */
export type ToolRunner = (
  command: string,
  args: string[],
  options: { timeoutMs: number; env?: NodeJS.ProcessEnv },
) => Promise<{ ok: true; output: ToolRunResult } | { ok: false; failure: ToolFailure }>;

export type ToolFailure =
  | { kind: 'ToolNotInstalled'; message: string }
  | { kind: 'ToolTimeout'; timeoutMs: number; message: string }
  | { kind: 'ToolNonZeroExit'; code: number; stderr: string; message: string };
