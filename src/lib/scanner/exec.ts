import { execFile } from 'child_process';
import { promisify } from 'util';
import type { ToolFailure, ToolRunner } from './types';

const execFileAsync = promisify(execFile);

// Reports from large images easily exceed the default 1MB stdout buffer
const MAX_BUFFER = 256 * 1024 * 1024;

interface ExecError {
  code?: unknown;
  killed?: unknown;
  signal?: unknown;
  stderr?: unknown;
  message: string;
}

function isExecError(error: unknown): error is ExecError {
  return typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string';
}

function asText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf8');
  return '';
}

/**
 * Map a child process error onto the adapter failure taxonomy.
 */
export function classifyExecError(command: string, error: unknown, timeoutMs: number): ToolFailure {
  if (!isExecError(error)) {
    return { kind: 'ToolNonZeroExit', code: -1, stderr: '', message: String(error) };
  }

  if (error.code === 'ENOENT') {
    return { kind: 'ToolNotInstalled', message: `${command} is not installed or not on PATH` };
  }

  if (error.killed === true || error.signal === 'SIGTERM' || error.code === 'ETIMEDOUT') {
    return { kind: 'ToolTimeout', timeoutMs, message: `${command} exceeded ${timeoutMs}ms` };
  }

  const stderr = asText(error.stderr).trim();
  const code = typeof error.code === 'number' ? error.code : -1;
  return {
    kind: 'ToolNonZeroExit',
    code,
    stderr,
    message: `${command} exited with code ${code}${stderr ? `: ${stderr.split('\n')[0]}` : ''}`,
  };
}

/**
 * Run a tool without a shell and with an enforced timeout.
 */
export const runTool: ToolRunner = async (command, args, options) => {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      env: options.env ?? process.env,
      timeout: options.timeoutMs,
      maxBuffer: MAX_BUFFER,
      killSignal: 'SIGTERM',
    });
    return { ok: true, output: { stdout, stderr } };
  } catch (error) {
    return { ok: false, failure: classifyExecError(command, error, options.timeoutMs) };
  }
};
