import fs from 'fs/promises';
import path from 'path';
import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../../logger';
import type { AdapterFailure, ToolFailure, ToolName, ToolRunner } from '../types';

/**
 * Create a private report directory under workDir, hand its report path to
 * the callback and remove the directory afterwards.
 */
export async function withReportFile<T>(
  workDir: string,
  tool: ToolName,
  fn: (reportPath: string) => Promise<T>,
): Promise<T> {
  await fs.mkdir(workDir, { recursive: true });
  const reportDir = await fs.mkdtemp(path.join(workDir, `${tool}-`));
  try {
    return await fn(path.join(reportDir, 'report.json'));
  } finally {
    await fs.rm(reportDir, { recursive: true, force: true });
  }
}

export function toAdapterFailure(tool: ToolName, failure: ToolFailure): AdapterFailure {
  switch (failure.kind) {
    case 'ToolNotInstalled':
      return { ok: false, tool, kind: 'ToolNotInstalled', message: failure.message };
    case 'ToolTimeout':
      return { ok: false, tool, kind: 'ToolTimeout', timeoutMs: failure.timeoutMs, message: failure.message };
    case 'ToolNonZeroExit':
      return {
        ok: false,
        tool,
        kind: 'ToolNonZeroExit',
        code: failure.code,
        stderr: failure.stderr,
        message: failure.message,
      };
  }
}

export function malformed(tool: ToolName, message: string): AdapterFailure {
  return { ok: false, tool, kind: 'MalformedOutput', message };
}

/**
 * Decode JSON text and validate it against a tool schema.
 */
export function decodeReport<T>(
  tool: ToolName,
  text: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): { ok: true; data: T } | { ok: false; failure: AdapterFailure } {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, failure: malformed(tool, `${tool} produced invalid JSON: ${reason}`) };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return {
      ok: false,
      failure: malformed(tool, `${tool} output failed validation${where}: ${issue?.message ?? 'unknown issue'}`),
    };
  }
  return { ok: true, data: parsed.data };
}

/**
 * Read a report file written by a tool. A missing or empty file is malformed
 * output, not a crash.
 */
export async function readReport(tool: ToolName, reportPath: string): Promise<{ ok: true; text: string } | { ok: false; failure: AdapterFailure }> {
  try {
    const text = await fs.readFile(reportPath, 'utf8');
    if (text.trim().length === 0) {
      return { ok: false, failure: malformed(tool, `${tool} wrote an empty report`) };
    }
    return { ok: true, text };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, failure: malformed(tool, `${tool} report could not be read: ${reason}`) };
  }
}

/**
 * Run `<command> <args>` once and cache the first line of its output.
 */
export function versionProbe(runner: ToolRunner, command: string, args: string[]): () => Promise<string> {
  let cached: Promise<string> | undefined;
  return () => {
    if (!cached) {
      cached = runner(command, args, { timeoutMs: 10000 }).then(result => {
        if (!result.ok) {
          logger.debug(`Version probe for ${command} failed: ${result.failure.message}`);
          return 'unknown';
        }
        const firstLine = result.output.stdout.trim().split('\n')[0];
        return firstLine || 'unknown';
      });
    }
    return cached;
  };
}
