import { execFile } from 'child_process';
import { promisify } from 'util';
import { errorMessage } from './errors';
import { logger } from './logger';

const execFileAsync = promisify(execFile);

export interface DockerInfo {
  hasAccess: boolean;
  version?: string;
  error?: string;
}

/**
 * Docker operations the orchestrator needs around a scan.
 */
export interface DockerClient {
  checkAccess(): Promise<DockerInfo>;
  pull(imageName: string, timeoutMs: number): Promise<void>;
  remove(imageName: string): Promise<void>;
}

/**
 * Check if Docker socket is accessible and Docker daemon is running
 */
export async function checkDockerAccess(): Promise<DockerInfo> {
  try {
    const { stdout } = await execFileAsync('docker', ['version', '--format', '{{.Server.Version}}'], {
      timeout: 5000,
    });

    return {
      hasAccess: true,
      version: stdout.trim(),
    };
  } catch (error) {
    return {
      hasAccess: false,
      error: errorMessage(error),
    };
  }
}

/**
 * Pull an image so the inspector and the scanners read it from the daemon
 */
export async function pullImage(imageName: string, timeoutMs: number): Promise<void> {
  try {
    await execFileAsync('docker', ['pull', '--quiet', imageName], { timeout: timeoutMs });
  } catch (error) {
    throw new Error(`Failed to pull Docker image ${imageName}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Remove a pulled image. Failures are logged, not raised.
 */
export async function removeDockerImage(imageName: string): Promise<void> {
  try {
    await execFileAsync('docker', ['rmi', imageName], { timeout: 60000 });
    logger.debug(`Removed Docker image ${imageName}`);
  } catch (error) {
    logger.warn(`Failed to remove Docker image ${imageName}: ${errorMessage(error)}`);
  }
}

export const dockerClient: DockerClient = {
  checkAccess: checkDockerAccess,
  pull: pullImage,
  remove: removeDockerImage,
};
