import { formatReference, type ImageReference } from '../../../types';
import { logger } from '../../logger';
import { runTool } from '../exec';
import type { AdapterOutcome, AnalyzeContext, IScannerAdapter, ToolRunner, VerifiedRuntime } from '../types';
import { toAdapterFailure, versionProbe } from './report';

interface RuntimeCheck {
  language: string;
  command: string;
  args: string[];
  pattern: RegExp;
}

const RUNTIME_CHECKS: RuntimeCheck[] = [
  { language: 'python', command: 'python3', args: ['--version'], pattern: /Python (\d+\.\d+\.\d+)/ },
  { language: 'python', command: 'python', args: ['--version'], pattern: /Python (\d+\.\d+\.\d+)/ },
  { language: 'node', command: 'node', args: ['--version'], pattern: /v(\d+\.\d+\.\d+)/ },
  { language: 'java', command: 'java', args: ['-version'], pattern: /version "(\d+\.\d+\.\d+)/ },
  { language: 'go', command: 'go', args: ['version'], pattern: /go version go(\d+\.\d+\.\d+)/ },
  { language: 'ruby', command: 'ruby', args: ['--version'], pattern: /ruby (\d+\.\d+\.\d+)/ },
  { language: 'php', command: 'php', args: ['--version'], pattern: /PHP (\d+\.\d+\.\d+)/ },
  { language: 'dotnet', command: 'dotnet', args: ['--info'], pattern: /Version:\s*(\d+\.\d+\.\d+)/ },
  { language: 'perl', command: 'perl', args: ['--version'], pattern: /v(\d+\.\d+\.\d+)/ },
  { language: 'lua', command: 'lua', args: ['-v'], pattern: /Lua (\d+\.\d+\.\d+)/ },
];

const CHECK_TIMEOUT_MS = 30000;

/**
 * Confirms language runtimes by running each interpreter's version command
 * in a throwaway container. The first command that answers wins for its
 * language. Binaries missing from the image are skipped.
 */
export class RuntimeScanner implements IScannerAdapter {
  readonly name = 'runtime';
  readonly role = 'runtime';
  readonly getVersion: () => Promise<string>;

  constructor(
    private readonly runner: ToolRunner = runTool,
    private readonly clock: () => number = Date.now,
  ) {
    this.getVersion = versionProbe(runner, 'docker', ['version', '--format', '{{.Client.Version}}']);
  }

  async analyze(reference: ImageReference, context: AnalyzeContext): Promise<AdapterOutcome> {
    const toolVersion = await this.getVersion();
    const image = formatReference(reference);
    const deadline = this.clock() + context.timeoutMs;
    const runtimes: VerifiedRuntime[] = [];

    for (const check of RUNTIME_CHECKS) {
      if (runtimes.some(runtime => runtime.language === check.language)) continue;

      const remaining = deadline - this.clock();
      if (remaining <= 0) {
        logger.debug(`Runtime verification for ${image} ran out of time after ${runtimes.length} runtimes`);
        break;
      }

      const run = await this.runner(
        'docker',
        ['run', '--rm', '--network', 'none', '--entrypoint', check.command, image, ...check.args],
        { timeoutMs: Math.min(CHECK_TIMEOUT_MS, remaining), env: context.env },
      );

      if (!run.ok) {
        // Without docker nothing else can be checked
        if (run.failure.kind === 'ToolNotInstalled') return toAdapterFailure(this.name, run.failure);
        continue;
      }

      // java -version writes to stderr
      const match = check.pattern.exec(`${run.output.stdout}\n${run.output.stderr}`);
      if (match) {
        runtimes.push({ language: check.language, version: match[1], command: check.command });
      }
    }

    return { ok: true, tool: this.name, toolVersion, data: { runtimes } };
  }
}
