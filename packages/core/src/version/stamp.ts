/**
 * Version field handling for DEBIAN/control files
 *
 * The field must start a line and carry at least two numeric groups:
 * everything up to the last dot is kept, the final group is the patch.
 * Anything after the patch (a "-1" revision, trailing spaces) is left alone.
 */
import { MalformedVersionError } from '../errors.js';
import type { VersionBump } from '../types.js';

const VERSION_FIELD = /^(Version: )((?:\d+\.)+)(\d+)/m;

interface VersionMatch {
  index: number;
  length: number;
  label: string;
  prefix: string;
  patch: string;
}

function matchVersion(content: string): VersionMatch | undefined {
  const match = VERSION_FIELD.exec(content);
  if (!match) {
    return undefined;
  }

  const [whole, label, prefix, patch] = match;
  if (whole === undefined || label === undefined || prefix === undefined || patch === undefined) {
    return undefined;
  }

  return { index: match.index, length: whole.length, label, prefix, patch };
}

export function parseVersion(content: string): string | undefined {
  const match = matchVersion(content);
  return match ? `${match.prefix}${match.patch}` : undefined;
}

/**
 * Increment the patch component of the Version field by one.
 *
 * @throws MalformedVersionError when no Version field is present
 */
export function bumpVersion(content: string): VersionBump {
  const match = matchVersion(content);
  if (!match) {
    throw new MalformedVersionError('no "Version: <major>.<minor>.<patch>" line found');
  }

  // bigint keeps long patch numbers exact
  const nextPatch = (BigInt(match.patch) + 1n).toString();
  const previousVersion = `${match.prefix}${match.patch}`;
  const nextVersion = `${match.prefix}${nextPatch}`;

  return {
    previousVersion,
    nextVersion,
    content:
      content.slice(0, match.index) +
      match.label +
      nextVersion +
      content.slice(match.index + match.length),
  };
}
