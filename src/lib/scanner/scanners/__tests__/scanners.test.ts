import fs from 'fs/promises';
import os from 'os';
import path from 'path';

jest.mock('../../../logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import type { ImageReference } from '../../../../types';
import type { AnalyzeContext, ToolFailure, ToolRunner } from '../../types';
import {
  GrypeScanner,
  InspectScanner,
  RuntimeScanner,
  SyftScanner,
  TrivyScanner,
  getEnabledScanners,
  getScannerByName,
  getScannerVersions,
} from '..';

type RunnerMock = jest.Mock<ReturnType<ToolRunner>, Parameters<ToolRunner>>;

interface FakeRun {
  // Written to the report file the tool was asked for
  report?: string;
  stdout?: string;
  failure?: ToolFailure;
}

function reportPathOf(args: string[]): string | undefined {
  const json = args.find(arg => arg.startsWith('json='));
  if (json) return json.slice('json='.length);
  for (const flag of ['--file', '--output']) {
    const index = args.indexOf(flag);
    if (index >= 0) return args[index + 1];
  }
  return undefined;
}

function fakeRunner(run: FakeRun, version = 'tool 1.0.0'): RunnerMock {
  return jest.fn<ReturnType<ToolRunner>, Parameters<ToolRunner>>(async (_command, args) => {
    if (args.includes('--version') || args.includes('{{.Client.Version}}')) {
      return { ok: true as const, output: { stdout: `${version}\n`, stderr: '' } };
    }
    if (run.failure) {
      return { ok: false as const, failure: run.failure };
    }
    const reportPath = reportPathOf(args);
    if (reportPath && run.report !== undefined) {
      await fs.writeFile(reportPath, run.report);
    }
    return { ok: true as const, output: { stdout: run.stdout ?? '', stderr: '' } };
  });
}

const reference: ImageReference = { registry: 'docker.io', repository: 'library/python', tag: '3.12' };

describe('scanner adapters', () => {
  let workDir: string;
  let context: AnalyzeContext;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'adapters-'));
    context = { timeoutMs: 30000, workDir };
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  describe('SyftScanner', () => {
    it('should run syft against the reference and decode its report', async () => {
      const runner = fakeRunner(
        {
          report: JSON.stringify({
            artifacts: [{ name: 'bash', version: '5.2.15-2', type: 'deb' }],
            source: { type: 'image', metadata: { manifestDigest: 'sha256:abc' } },
          }),
        },
        'syft 1.4.1',
      );

      const outcome = await new SyftScanner(runner).analyze(reference, context);

      expect(outcome.ok && outcome.tool === 'syft' ? outcome.data.artifacts.map(a => a.name) : []).toEqual(['bash']);
      expect(outcome).toMatchObject({ ok: true, tool: 'syft', toolVersion: 'syft 1.4.1' });
      expect(runner).toHaveBeenLastCalledWith(
        'syft',
        ['docker.io/library/python:3.12', '-o', expect.stringMatching(/^json=.*report\.json$/), '-q'],
        { timeoutMs: 30000, env: undefined },
      );
    });

    it('should clean up its report directory', async () => {
      const runner = fakeRunner({ report: '{"artifacts":[]}' });

      await new SyftScanner(runner).analyze(reference, context);

      expect(await fs.readdir(workDir)).toEqual([]);
    });

    it('should report a missing binary', async () => {
      const runner = fakeRunner({
        failure: { kind: 'ToolNotInstalled', message: 'syft is not installed or not on PATH' },
      });

      expect(await new SyftScanner(runner).analyze(reference, context)).toEqual({
        ok: false,
        tool: 'syft',
        kind: 'ToolNotInstalled',
        message: 'syft is not installed or not on PATH',
      });
    });

    it('should treat a report that was never written as malformed', async () => {
      const outcome = await new SyftScanner(fakeRunner({})).analyze(reference, context);

      expect(outcome).toMatchObject({ ok: false, kind: 'MalformedOutput' });
      expect(outcome.ok ? '' : outcome.message).toMatch(/^syft report could not be read: /);
    });

    it('should ask for the version only once', async () => {
      const runner = fakeRunner({ report: '{"artifacts":[]}' });
      const scanner = new SyftScanner(runner);

      await scanner.analyze(reference, context);
      await scanner.analyze(reference, context);

      expect(runner.mock.calls.filter(([, args]) => args.includes('--version'))).toHaveLength(1);
    });
  });

  describe('GrypeScanner', () => {
    it('should write its report to a file', async () => {
      const runner = fakeRunner({ report: '{"matches":[]}' });

      const outcome = await new GrypeScanner(runner).analyze(reference, context);

      expect(outcome).toMatchObject({ ok: true, tool: 'grype', data: { matches: [] } });
      expect(runner.mock.calls[1][1].slice(0, 4)).toEqual(['docker.io/library/python:3.12', '-o', 'json', '--file']);
    });

    it('should reject output that is not JSON', async () => {
      const outcome = await new GrypeScanner(fakeRunner({ report: 'Error: db update failed' })).analyze(reference, context);

      expect(outcome).toMatchObject({ ok: false, tool: 'grype', kind: 'MalformedOutput' });
      expect(outcome.ok ? '' : outcome.message).toMatch(/^grype produced invalid JSON: /);
    });

    it('should reject JSON that does not match the report shape', async () => {
      const report = JSON.stringify({ matches: [{ vulnerability: {}, artifact: { name: 'bash' } }] });

      const outcome = await new GrypeScanner(fakeRunner({ report })).analyze(reference, context);

      expect(outcome).toEqual({
        ok: false,
        tool: 'grype',
        kind: 'MalformedOutput',
        message: 'grype output failed validation at matches.0.vulnerability.id: Required',
      });
    });
  });

  describe('TrivyScanner', () => {
    it('should list packages as well as vulnerabilities', async () => {
      const runner = fakeRunner({ report: '{"Results":[]}' });

      await new TrivyScanner(runner).analyze(reference, context);

      const args = runner.mock.calls[1][1];
      expect(args.slice(0, 7)).toEqual(['image', '--format', 'json', '--scanners', 'vuln', '--list-all-pkgs', '--quiet']);
      expect(args[args.length - 1]).toBe('docker.io/library/python:3.12');
    });

    it('should treat an empty report as malformed', async () => {
      const outcome = await new TrivyScanner(fakeRunner({ report: '  \n' })).analyze(reference, context);

      expect(outcome).toEqual({ ok: false, tool: 'trivy', kind: 'MalformedOutput', message: 'trivy wrote an empty report' });
    });

    it('should pass timeouts through', async () => {
      const runner = fakeRunner({ failure: { kind: 'ToolTimeout', timeoutMs: 30000, message: 'trivy exceeded 30000ms' } });

      expect(await new TrivyScanner(runner).analyze(reference, context)).toEqual({
        ok: false,
        tool: 'trivy',
        kind: 'ToolTimeout',
        timeoutMs: 30000,
        message: 'trivy exceeded 30000ms',
      });
    });
  });

  describe('InspectScanner', () => {
    it('should read the inspect output from stdout', async () => {
      const runner = fakeRunner({ stdout: '[{"Id":"sha256:img","RepoDigests":["python@sha256:abc"],"Size":1234}]' }, '24.0.7');

      const outcome = await new InspectScanner(runner).analyze(reference, context);

      expect(outcome).toMatchObject({ ok: true, tool: 'inspect', toolVersion: '24.0.7', data: { Id: 'sha256:img', Size: 1234 } });
      expect(runner).toHaveBeenLastCalledWith('docker', ['image', 'inspect', 'docker.io/library/python:3.12'], {
        timeoutMs: 30000,
        env: undefined,
      });
    });

    it('should reject an empty result list', async () => {
      const outcome = await new InspectScanner(fakeRunner({ stdout: '[]' })).analyze(reference, context);

      expect(outcome).toEqual({
        ok: false,
        tool: 'inspect',
        kind: 'MalformedOutput',
        message: 'inspect output failed validation: Array must contain at least 1 element(s)',
      });
    });
  });

  describe('RuntimeScanner', () => {
    type Answer = { stdout?: string; stderr?: string } | ToolFailure;

    const notFound: ToolFailure = {
      kind: 'ToolNonZeroExit',
      code: 127,
      stderr: 'executable file not found in $PATH',
      message: 'docker exited with code 127',
    };

    function runtimeRunner(answers: Record<string, Answer>, onRun: () => void = () => undefined): RunnerMock {
      return jest.fn<ReturnType<ToolRunner>, Parameters<ToolRunner>>(async (_command, args) => {
        if (args.includes('{{.Client.Version}}')) {
          return { ok: true as const, output: { stdout: '24.0.7\n', stderr: '' } };
        }
        onRun();
        const answer: Answer = answers[args[args.indexOf('--entrypoint') + 1]] ?? notFound;
        if ('kind' in answer) return { ok: false as const, failure: answer };
        return { ok: true as const, output: { stdout: answer.stdout ?? '', stderr: answer.stderr ?? '' } };
      });
    }

    const entrypoints = (runner: RunnerMock) =>
      runner.mock.calls.filter(([, args]) => args[0] === 'run').map(([, args]) => args[args.indexOf('--entrypoint') + 1]);

    it('should record the runtimes whose binaries answer', async () => {
      const runner = runtimeRunner({
        python3: { stdout: 'Python 3.12.4\n' },
        java: { stderr: 'openjdk version "17.0.10" 2024-01-16\nOpenJDK Runtime Environment\n' },
      });

      const outcome = await new RuntimeScanner(runner).analyze(reference, context);

      expect(outcome).toEqual({
        ok: true,
        tool: 'runtime',
        toolVersion: '24.0.7',
        data: {
          runtimes: [
            { language: 'python', version: '3.12.4', command: 'python3' },
            { language: 'java', version: '17.0.10', command: 'java' },
          ],
        },
      });
      expect(entrypoints(runner)).toEqual(['python3', 'node', 'java', 'go', 'ruby', 'php', 'dotnet', 'perl', 'lua']);
      expect(runner).toHaveBeenCalledWith(
        'docker',
        ['run', '--rm', '--network', 'none', '--entrypoint', 'python3', 'docker.io/library/python:3.12', '--version'],
        { timeoutMs: 30000, env: undefined },
      );
    });

    it('should fail when docker itself is missing', async () => {
      const missing: ToolFailure = { kind: 'ToolNotInstalled', message: 'docker is not installed or not on PATH' };

      const outcome = await new RuntimeScanner(runtimeRunner({ python3: missing })).analyze(reference, context);

      expect(outcome).toEqual({
        ok: false,
        tool: 'runtime',
        kind: 'ToolNotInstalled',
        message: 'docker is not installed or not on PATH',
      });
    });

    it('should stop checking once the time budget is spent', async () => {
      let now = 0;
      const runner = runtimeRunner(
        { python3: { stdout: 'Python 3.11.9' }, node: { stdout: 'v20.11.0' }, java: { stderr: 'openjdk version "21.0.2"' } },
        () => {
          now += 20000;
        },
      );

      const outcome = await new RuntimeScanner(runner, () => now).analyze(reference, { ...context, timeoutMs: 30000 });

      expect(outcome.ok && outcome.tool === 'runtime' ? outcome.data.runtimes.map(runtime => runtime.language) : []).toEqual([
        'python',
        'node',
      ]);
      expect(
        runner.mock.calls.filter(([, args]) => args[0] === 'run').map(([, , options]) => options.timeoutMs),
      ).toEqual([30000, 10000]);
    });
  });

  describe('registry', () => {
    it('should return enabled scanners in run order', () => {
      expect(getEnabledScanners(['grype', 'syft']).map(scanner => scanner.name)).toEqual(['syft', 'grype']);
    });

    it('should find scanners by name', () => {
      expect(getScannerByName('trivy')?.role).toBe('vulnerability');
      expect(getScannerByName('runtime')?.role).toBe('runtime');
      expect(getScannerByName('clair')).toBeUndefined();
    });

    it('should collect versions and fall back to unknown', async () => {
      const failing = fakeRunner({}, 'unused');
      failing.mockResolvedValue({ ok: false, failure: { kind: 'ToolNotInstalled', message: 'grype is not installed or not on PATH' } });

      const versions = await getScannerVersions([new SyftScanner(fakeRunner({}, 'syft 1.4.1')), new GrypeScanner(failing)]);

      expect(versions).toEqual({ syft: 'syft 1.4.1', grype: 'unknown' });
    });
  });
});
