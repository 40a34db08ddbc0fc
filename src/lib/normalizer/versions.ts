/**
 * Reduce a distro package version to its upstream part:
 * `1:3.12.4-1.azl3` -> `3.12.4`, `17.0.9+9-1~deb12u1` -> `17.0.9`, `go1.22.1` -> `1.22.1`.
 */
export function upstreamVersion(raw: string): string {
  let version = raw.trim();
  version = version.replace(/^\d+:/, '');
  version = version.replace(/^go(?=\d)/, '');
  version = version.replace(/^v(?=\d)/, '');
  const cut = version.search(/[-+~]/);
  if (cut > 0) {
    version = version.slice(0, cut);
  }
  return version;
}

export function majorMinorOf(version: string): string | null {
  const pair = /^(\d+\.\d+)/.exec(version);
  if (pair) return pair[1];
  const major = /^(\d+)$/.exec(version);
  return major ? major[1] : null;
}
