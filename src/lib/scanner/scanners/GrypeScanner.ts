import { formatReference, type ImageReference } from '../../../types';
import { runTool } from '../exec';
import { GrypeReportSchema } from '../schemas';
import type { AdapterOutcome, AnalyzeContext, IScannerAdapter, ToolRunner } from '../types';
import { decodeReport, readReport, toAdapterFailure, versionProbe, withReportFile } from './report';

export class GrypeScanner implements IScannerAdapter {
  readonly name = 'grype';
  readonly role = 'vulnerability';
  readonly getVersion: () => Promise<string>;

  constructor(private readonly runner: ToolRunner = runTool) {
    this.getVersion = versionProbe(runner, 'grype', ['--version']);
  }

  async analyze(reference: ImageReference, context: AnalyzeContext): Promise<AdapterOutcome> {
    const toolVersion = await this.getVersion();

    return withReportFile<AdapterOutcome>(context.workDir, this.name, async reportPath => {
      const run = await this.runner(
        'grype',
        [formatReference(reference), '-o', 'json', '--file', reportPath, '-q'],
        { timeoutMs: context.timeoutMs, env: context.env },
      );
      if (!run.ok) return toAdapterFailure(this.name, run.failure);

      const report = await readReport(this.name, reportPath);
      if (!report.ok) return report.failure;

      const decoded = decodeReport(this.name, report.text, GrypeReportSchema);
      if (!decoded.ok) return decoded.failure;

      return { ok: true, tool: this.name, toolVersion, data: decoded.data };
    });
  }
}
