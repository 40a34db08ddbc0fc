import { formatReference, type ImageReference } from '../../../types';
import { runTool } from '../exec';
import { SyftReportSchema } from '../schemas';
import type { AdapterOutcome, AnalyzeContext, IScannerAdapter, ToolRunner } from '../types';
import { decodeReport, readReport, toAdapterFailure, versionProbe, withReportFile } from './report';

export class SyftScanner implements IScannerAdapter {
  readonly name = 'syft';
  readonly role = 'sbom';
  readonly getVersion: () => Promise<string>;

  constructor(private readonly runner: ToolRunner = runTool) {
    this.getVersion = versionProbe(runner, 'syft', ['--version']);
  }

  async analyze(reference: ImageReference, context: AnalyzeContext): Promise<AdapterOutcome> {
    const toolVersion = await this.getVersion();

    return withReportFile<AdapterOutcome>(context.workDir, this.name, async reportPath => {
      const run = await this.runner(
        'syft',
        [formatReference(reference), '-o', `json=${reportPath}`, '-q'],
        { timeoutMs: context.timeoutMs, env: context.env },
      );
      if (!run.ok) return toAdapterFailure(this.name, run.failure);

      const report = await readReport(this.name, reportPath);
      if (!report.ok) return report.failure;

      const decoded = decodeReport(this.name, report.text, SyftReportSchema);
      if (!decoded.ok) return decoded.failure;

      return { ok: true, tool: this.name, toolVersion, data: decoded.data };
    });
  }
}
