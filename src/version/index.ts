/**
 * Version module
 *
 * Semver validation for bundle versions.
 */

export { isValidSemver } from "./version";
