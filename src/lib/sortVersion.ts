const SEMVER = /^v?(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+[0-9A-Za-z.-]+)?$/;

/**
 * Encodes a version so that plain string comparison follows semver precedence.
 *
 * Numbers are prefixed with their digit count, a release ends in "~" so it sorts after its
 * pre-releases, and numeric pre-release identifiers sort before alphanumeric ones.
 * Strings that are not semver sort before every valid version.
 */
export function sortVersion(version: string): string {
  const m = SEMVER.exec(version);
  if (!m) return "!" + version;
  const [, major, minor, patch, prerelease] = m;
  const core = [major, minor, patch].map(encodeNumber).join(",");
  if (!prerelease) return core + "~";
  const ids = prerelease.split(".").map((id) => (/^\d+$/.test(id) ? "#" + encodeNumber(id) : id));
  return core + "-" + ids.join(",");
}

function encodeNumber(digits: string): string {
  const trimmed = digits.replace(/^0+(?=\d)/, "");
  return String.fromCharCode(0x30 + trimmed.length) + trimmed;
}
