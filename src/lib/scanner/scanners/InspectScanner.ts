import { formatReference, type ImageReference } from '../../../types';
import { runTool } from '../exec';
import { DockerInspectSchema } from '../schemas';
import type { AdapterOutcome, AnalyzeContext, IScannerAdapter, ToolRunner } from '../types';
import { decodeReport, toAdapterFailure, versionProbe } from './report';

/**
 * Low-level image metadata (digest, size, creation time) from the local
 * Docker daemon. Needs the image to have been pulled first.
 */
export class InspectScanner implements IScannerAdapter {
  readonly name = 'inspect';
  readonly role = 'metadata';
  readonly getVersion: () => Promise<string>;

  constructor(private readonly runner: ToolRunner = runTool) {
    this.getVersion = versionProbe(runner, 'docker', ['version', '--format', '{{.Client.Version}}']);
  }

  async analyze(reference: ImageReference, context: AnalyzeContext): Promise<AdapterOutcome> {
    const toolVersion = await this.getVersion();

    const run = await this.runner(
      'docker',
      ['image', 'inspect', formatReference(reference)],
      { timeoutMs: context.timeoutMs, env: context.env },
    );
    if (!run.ok) return toAdapterFailure(this.name, run.failure);

    const decoded = decodeReport(this.name, run.output.stdout, DockerInspectSchema);
    if (!decoded.ok) return decoded.failure;

    return { ok: true, tool: this.name, toolVersion, data: decoded.data[0] };
  }
}
