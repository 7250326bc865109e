import { CatalogError } from "../errors.js";

const NUMERIC = "0|[1-9]\\d*";
const PRERELEASE_ID = `(?:${NUMERIC}|\\d*[A-Za-z-][0-9A-Za-z-]*)`;
const SEMVER = new RegExp(
  `^(${NUMERIC})\\.(${NUMERIC})\\.(${NUMERIC})` +
    `(?:-(${PRERELEASE_ID}(?:\\.${PRERELEASE_ID})*))?` +
    `(?:\\+[0-9A-Za-z-]+(?:\\.[0-9A-Za-z-]+)*)?$`
);

/**
 * Next catalog version.
 *
 * A pre-release is finalized (`1.0.0-rc.1` → `1.0.0`); otherwise the patch
 * number increments. Build metadata is dropped.
 *
 * @throws CatalogError if `version` is not a semantic version.
 */
export function bumpVersion(version: string): string {
  const match = SEMVER.exec(version);
  if (!match) {
    throw new CatalogError(`Invalid semantic version: ${JSON.stringify(version)}`);
  }

  const [, major, minor, patch, prerelease] = match;
  if (prerelease !== undefined) {
    return `${major}.${minor}.${patch}`;
  }

  return `${major}.${minor}.${BigInt(patch) + 1n}`;
}
