import { formatReference, type ImageReference } from '../../../types';
import { runTool } from '../exec';
import { TrivyReportSchema } from '../schemas';
import type { AdapterOutcome, AnalyzeContext, IScannerAdapter, ToolRunner } from '../types';
import { decodeReport, readReport, toAdapterFailure, versionProbe, withReportFile } from './report';

export class TrivyScanner implements IScannerAdapter {
  readonly name = 'trivy';
  readonly role = 'vulnerability';
  readonly getVersion: () => Promise<string>;

  constructor(private readonly runner: ToolRunner = runTool) {
    this.getVersion = versionProbe(runner, 'trivy', ['--version']);
  }

  async analyze(reference: ImageReference, context: AnalyzeContext): Promise<AdapterOutcome> {
    const toolVersion = await this.getVersion();

    return withReportFile<AdapterOutcome>(context.workDir, this.name, async reportPath => {
      // --list-all-pkgs makes Trivy report packages as well as findings
      const run = await this.runner(
        'trivy',
        [
          'image',
          '--format', 'json',
          '--scanners', 'vuln',
          '--list-all-pkgs',
          '--quiet',
          '--output', reportPath,
          formatReference(reference),
        ],
        { timeoutMs: context.timeoutMs, env: context.env },
      );
      if (!run.ok) return toAdapterFailure(this.name, run.failure);

      const report = await readReport(this.name, reportPath);
      if (!report.ok) return report.failure;

      const decoded = decodeReport(this.name, report.text, TrivyReportSchema);
      if (!decoded.ok) return decoded.failure;

      return { ok: true, tool: this.name, toolVersion, data: decoded.data };
    });
  }
}
