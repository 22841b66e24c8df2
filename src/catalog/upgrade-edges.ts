/**
 * Upgrade-edge expansion
 *
 * Authors declare upgrades between versions; bundles exist per
 * (version, release). Each release may upgrade to every later release of
 * its own version and to the newest release of each declared target
 * version. Target lists are in reverse lexical order of "version-release".
 */

import type { BundleMetadata, UpgradeEdges } from "#/schemas";
import { fullVersion } from "./catalog";
import { CatalogError } from "./errors";

/**
 * @param declared - version -> versions reachable from it
 * @param bundles - the (version, release) pairs present
 * @returns "version-release" -> targets, one key per present release
 */
export function expandUpgradeEdges(
  declared: Record<string, string[]>,
  bundles: ReadonlyArray<Pick<BundleMetadata, "version" | "release">>
): UpgradeEdges {
  const byVersion = new Map<string, string[]>();
  const releases = new Map<string, number[]>();
  for (const bundle of bundles) {
    const list = releases.get(bundle.version) ?? [];
    if (!list.includes(bundle.release)) list.push(bundle.release);
    releases.set(bundle.version, list);
  }
  for (const [version, list] of releases) {
    list.sort((a, b) => a - b);
    byVersion.set(
      version,
      list.map((release) => fullVersion({ version, release }))
    );
  }

  const expanded: UpgradeEdges = {};
  for (const [version, ordered] of byVersion) {
    const targets = declared[version] ?? [];
    ordered.forEach((from, i) => {
      const to = ordered.slice(i + 1);
      for (const target of targets) {
        const newest = byVersion.get(target)?.at(-1);
        if (newest === undefined) {
          throw new CatalogError(`upgrade edge ${version} -> ${target}: no bundles found with version ${JSON.stringify(target)}`);
        }
        to.push(newest);
      }
      expanded[from] = to.sort().reverse();
    });
  }
  return expanded;
}

/**
 * True when at least one release has somewhere to upgrade to.
 */
export function hasUpgradeEdges(edges: UpgradeEdges): boolean {
  return Object.values(edges).some((targets) => targets.length > 0);
}
