/**
 * Version utilities
 *
 * Thin wrapper over the semver package. Bundle versions are strict semver:
 * no "v" prefix, no loose forms.
 */

import semver from "semver";

/**
 * Check if a string is a valid semver version.
 * Rejects versions with 'v' prefix (e.g., "v1.0.0" is invalid, "1.0.0" is valid).
 */
export function isValidSemver(version: string): boolean {
  // Reject v prefix - semver package accepts it but we want strict format
  if (version.startsWith("v") || version.startsWith("V")) {
    return false;
  }
  return semver.valid(version) !== null;
}
