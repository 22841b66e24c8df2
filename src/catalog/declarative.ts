/**
 * Projection of a catalog tree onto file-based catalog entries.
 *
 * Bundle image references embed the bundle's artifact digest, computed by
 * building the bundle into a throwaway MemoryStore.
 */

import { MemoryStore } from "#/content";
import { buildGraph, type BuildOptions } from "#/graph";
import type { TypeValue } from "#/schemas";
import { Catalog, type Bundle, type Package } from "./catalog";
import type {
  DeclarativeBundle,
  DeclarativeChannel,
  DeclarativeChannelEntry,
  DeclarativeConfig,
  DeclarativePackage,
  DeclarativeProperty,
} from "./catalog.types";
import { CatalogError } from "./errors";
import { hasUpgradeEdges } from "./upgrade-edges";

export const PROPERTY_TYPES = {
  bundleMediaType: "olm.bundle.mediatype",
  package: "olm.package",
} as const;

export async function toDeclarativeConfig(
  node: Catalog | Package,
  repository: string,
  options: BuildOptions = {}
): Promise<DeclarativeConfig> {
  if (node instanceof Catalog) {
    const out: DeclarativeConfig = { packages: [], channels: [], bundles: [] };
    for (const pkg of node.packages) {
      const fbc = await packageToDeclarativeConfig(pkg, repository, options);
      out.packages.push(...fbc.packages);
      out.channels.push(...fbc.channels);
      out.bundles.push(...fbc.bundles);
    }
    return out;
  }
  return packageToDeclarativeConfig(node, repository, options);
}

async function packageToDeclarativeConfig(
  pkg: Package,
  repository: string,
  options: BuildOptions
): Promise<DeclarativeConfig> {
  const packageName = pkg.metadata.name;
  const bundleName = (fullVersion: string) => `${packageName}.v${fullVersion}`;

  const declarativePackage: DeclarativePackage = {
    schema: "olm.package",
    name: packageName,
    ...(pkg.description !== "" && { description: pkg.description }),
    ...(pkg.icon && { icon: { base64data: pkg.icon.data.toString("base64"), mediatype: pkg.icon.mediaType } }),
    properties: toProperties(pkg.properties),
  };

  const withEdges = hasUpgradeEdges(pkg.upgradeEdges);
  const channels: DeclarativeChannel[] = [];
  const bundles = new Map<string, DeclarativeBundle>();

  for (const channel of pkg.channels) {
    const inChannel = new Set(channel.bundles.map((bundle) => bundle.fullVersion));

    const entries: DeclarativeChannelEntry[] = [];
    for (const bundle of channel.bundles) {
      const from = bundle.fullVersion;
      if (!withEdges) {
        entries.push({ name: bundleName(from) });
        continue;
      }
      for (const to of pkg.upgradeEdges[from] ?? []) {
        if (!inChannel.has(to)) continue;
        entries.push({ name: bundleName(to), replaces: bundleName(from) });
      }
    }

    channels.push({
      schema: "olm.channel",
      package: packageName,
      name: channel.metadata.name,
      entries,
      properties: toProperties(channel.properties),
    });

    for (const bundle of channel.bundles) {
      if (bundles.has(bundle.fullVersion)) continue;
      const digest = await bundleDigest(bundle, options);
      bundles.set(bundle.fullVersion, {
        schema: "olm.bundle",
        package: packageName,
        name: bundleName(bundle.fullVersion),
        image: `oci://${repository}@${digest}`,
        properties: [
          ...toProperties(bundle.properties),
          { type: PROPERTY_TYPES.bundleMediaType, value: bundle.contentMediaType },
          {
            type: PROPERTY_TYPES.package,
            value: {
              packageName: bundle.metadata.package,
              version: bundle.metadata.version,
              release: bundle.metadata.release,
            },
          },
          ...toProperties(bundle.constraints),
        ],
      });
    }
  }

  return {
    packages: [declarativePackage],
    channels,
    bundles: [...bundles.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0)),
  };
}

/**
 * Digest of the bundle's artifact manifest. A sparse bundle has no
 * content to build from, so its recorded digest is used as is.
 */
export async function bundleDigest(bundle: Bundle, options: BuildOptions = {}): Promise<string> {
  if (bundle.sparse) {
    if (bundle.digest) return bundle.digest;
    throw new CatalogError(`cannot compute digest for sparse bundle ${bundle.fullVersion}`);
  }
  const desc = await buildGraph(bundle, new MemoryStore(), options);
  return desc.digest;
}

function toProperties(values: TypeValue[]): DeclarativeProperty[] {
  return values.map((tv) => ({ type: tv.type, value: tv.value ?? null }));
}
