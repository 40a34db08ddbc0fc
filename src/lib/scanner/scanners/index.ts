import { config, type ScannerName } from '../../config';
import { GrypeScanner } from './GrypeScanner';
import { InspectScanner } from './InspectScanner';
import { RuntimeScanner } from './RuntimeScanner';
import { SyftScanner } from './SyftScanner';
import { TrivyScanner } from './TrivyScanner';
import type { IScannerAdapter, ScannerVersions } from '../types';

export const AVAILABLE_SCANNERS: IScannerAdapter[] = [
  new InspectScanner(),
  new SyftScanner(),
  new TrivyScanner(),
  new GrypeScanner(),
  new RuntimeScanner(),
];

export function getScannerByName(name: string): IScannerAdapter | undefined {
  return AVAILABLE_SCANNERS.find(scanner => scanner.name === name);
}

/**
 * Adapters switched on through ENABLED_SCANNERS, in run order.
 */
export function getEnabledScanners(enabled: readonly ScannerName[] = config.enabledScanners): IScannerAdapter[] {
  return AVAILABLE_SCANNERS.filter(scanner => enabled.includes(scanner.name));
}

export async function getScannerVersions(
  scanners: IScannerAdapter[] = AVAILABLE_SCANNERS,
): Promise<ScannerVersions> {
  const versions: ScannerVersions = {};

  for (const scanner of scanners) {
    versions[scanner.name] = await scanner.getVersion();
  }

  return versions;
}

export {
  InspectScanner,
  SyftScanner,
  TrivyScanner,
  GrypeScanner,
  RuntimeScanner,
};
