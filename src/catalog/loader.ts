/**
 * Catalog loader
 *
 * Reads a package source directory into the domain model:
 *
 * ```
 * <package>/
 *   package.yaml          name, displayName, keywords, urls, maintainers
 *   README.md             description
 *   icon.svg | icon.png   optional
 *   upgrade-edges.yaml    upgradeEdges: { "<version>": ["<version>", ...] }
 *   properties.yaml       optional
 *   bundles/<any>/        one bundle per directory
 *   channels/<any>/       channel.yaml, entries.yaml, properties.yaml
 * ```
 *
 * A bundle directory is its own content: the whole tree is packed into the
 * bundle content blob. Its metadata comes from metadata/annotations.yaml,
 * or for registry+v1 bundles from the ClusterServiceVersion in manifests/.
 */

import { join, relative } from "path";
import { parse as parseYaml } from "yaml";
import type { ZodType, ZodTypeDef } from "zod";
import type { FileSystem, TarFile } from "#/core";
import {
  BUNDLE_FORMATS,
  CATALOG_ANNOTATIONS,
  LEGACY_BUNDLE_ANNOTATIONS,
  PLAIN_MEDIA_TYPES,
} from "#/constants";
import { errorMessage } from "#/errors";
import { formatFriendlyError, safeParseYaml } from "#/friendly-errors";
import {
  BundleAnnotationsFileSchema,
  ChannelEntriesFileSchema,
  ChannelMetadataSchema,
  ClusterServiceVersionSchema,
  ConstraintsFileSchema,
  PackageMetadataSchema,
  PropertiesFileSchema,
  RelatedImagesFileSchema,
  UpgradeEdgesFileSchema,
  type BundleMetadata,
  type ClusterServiceVersion,
  type RelatedImage,
  type TypeValue,
} from "#/schemas";
import { isValidSemver } from "#/version";
import { Bundle, Catalog, Channel, Package } from "./catalog";
import type { Icon } from "./catalog.types";
import { CatalogError } from "./errors";
import { expandUpgradeEdges } from "./upgrade-edges";

/**
 * Load every package directory under `catalogDir`.
 */
export function loadCatalog(fs: FileSystem, catalogDir: string): Catalog {
  const packages = subdirectories(fs, catalogDir).map((dir) => {
    try {
      return loadPackage(fs, dir);
    } catch (err) {
      throw wrap(`load package ${relative(catalogDir, dir)}`, err, dir);
    }
  });
  return new Catalog(packages);
}

export function loadPackage(fs: FileSystem, packageDir: string): Package {
  const metadata = step("metadata", () =>
    readYamlFile(fs, join(packageDir, "package.yaml"), PackageMetadataSchema)
  );
  const description = step("description", () => readRequired(fs, join(packageDir, "README.md")));
  const icon = step("icon", () => loadIcon(fs, packageDir));

  const bundles = step("bundles", () =>
    subdirectories(fs, join(packageDir, "bundles")).map((dir) => loadBundle(fs, dir))
  );
  const upgradeEdges = step("upgrade edges", () => {
    const declared = readYamlFile(fs, join(packageDir, "upgrade-edges.yaml"), UpgradeEdgesFileSchema);
    return expandUpgradeEdges(
      declared.upgradeEdges,
      bundles.map((bundle) => bundle.metadata)
    );
  });
  const properties = step("properties", () => loadProperties(fs, join(packageDir, "properties.yaml")));
  const channels = step("channels", () =>
    subdirectories(fs, join(packageDir, "channels")).map((dir) => loadChannel(fs, dir, bundles))
  );

  return new Package({ metadata, description, icon, upgradeEdges, properties, channels });
}

export function loadChannel(fs: FileSystem, channelDir: string, bundles: Bundle[]): Channel {
  try {
    const metadata = step("metadata", () =>
      readYamlFile(fs, join(channelDir, "channel.yaml"), ChannelMetadataSchema)
    );
    const members = step("entries", () => {
      const { entries } = readYamlFile(fs, join(channelDir, "entries.yaml"), ChannelEntriesFileSchema);
      return entries.flatMap((version) => {
        const matching = bundles.filter((bundle) => bundle.metadata.version === version);
        if (matching.length === 0) {
          throw new CatalogError(`no bundles found with version ${JSON.stringify(version)}`);
        }
        return matching;
      });
    });
    const properties = step("properties", () => loadProperties(fs, join(channelDir, "properties.yaml")));
    return new Channel({ metadata, properties, bundles: members });
  } catch (err) {
    throw wrap(`load channel ${channelDir}`, err, channelDir);
  }
}

export function loadBundle(fs: FileSystem, bundleDir: string): Bundle {
  try {
    const annotations = step("metadata annotations", () => loadBundleAnnotations(fs, bundleDir));
    const contentMediaType = annotations[CATALOG_ANNOTATIONS.bundleContentMediaType];
    if (contentMediaType === undefined) {
      throw new CatalogError("could not detect bundle content media type");
    }

    const { metadata, relatedImages } = step("metadata", () =>
      loadBundleMetadata(fs, bundleDir, contentMediaType, annotations)
    );
    const properties = step("properties", () =>
      loadProperties(fs, join(bundleDir, "metadata", "properties.yaml"))
    );
    const constraints = step("constraints", () => {
      const path = join(bundleDir, "metadata", "constraints.yaml");
      return fs.exists(path) ? readYamlFile(fs, path, ConstraintsFileSchema).constraints : [];
    });
    const content = step("content", () => readTree(fs, bundleDir));

    return new Bundle({ metadata, properties, constraints, relatedImages, contentMediaType, content });
  } catch (err) {
    throw wrap(`load bundle ${bundleDir}`, err, bundleDir);
  }
}

/**
 * metadata/annotations.yaml with the legacy registry+v1 keys mapped onto
 * their current names.
 */
function loadBundleAnnotations(fs: FileSystem, bundleDir: string): Record<string, string> {
  const { annotations } = readYamlFile(fs, join(bundleDir, "metadata", "annotations.yaml"), BundleAnnotationsFileSchema);
  const mapped = { ...annotations };

  const legacyPackage = mapped[LEGACY_BUNDLE_ANNOTATIONS.package];
  if (legacyPackage !== undefined) mapped[CATALOG_ANNOTATIONS.bundlePackage] = legacyPackage;
  const legacyMediaType = mapped[LEGACY_BUNDLE_ANNOTATIONS.mediaType];
  if (legacyMediaType !== undefined) mapped[CATALOG_ANNOTATIONS.bundleContentMediaType] = legacyMediaType;

  for (const key of [LEGACY_BUNDLE_ANNOTATIONS.package, LEGACY_BUNDLE_ANNOTATIONS.mediaType, ...LEGACY_BUNDLE_ANNOTATIONS.dropped]) {
    delete mapped[key];
  }
  return mapped;
}

function loadBundleMetadata(
  fs: FileSystem,
  bundleDir: string,
  contentMediaType: string,
  annotations: Record<string, string>
): { metadata: BundleMetadata; relatedImages: RelatedImage[] } {
  const packageName = annotations[CATALOG_ANNOTATIONS.bundlePackage];
  if (packageName === undefined) {
    throw new CatalogError(`missing bundle package annotation ${JSON.stringify(CATALOG_ANNOTATIONS.bundlePackage)}`);
  }

  if (contentMediaType === BUNDLE_FORMATS.registryV1) {
    const csv = findClusterServiceVersion(fs, join(bundleDir, "manifests"));
    return {
      metadata: { package: packageName, version: parseVersion(csv.spec.version), release: 0 },
      relatedImages: csvRelatedImages(csv),
    };
  }

  const version = annotations[CATALOG_ANNOTATIONS.bundleVersion];
  if (version === undefined) {
    throw new CatalogError(`missing bundle version annotation ${JSON.stringify(CATALOG_ANNOTATIONS.bundleVersion)}`);
  }

  let release = 0;
  const releaseValue = annotations[CATALOG_ANNOTATIONS.bundleRelease];
  if (releaseValue !== undefined) {
    if (!/^\d+$/.test(releaseValue)) {
      throw new CatalogError(`invalid bundle release ${JSON.stringify(releaseValue)}`);
    }
    release = Number(releaseValue);
  }

  const relatedImagesPath = join(bundleDir, "metadata", "relatedImages.yaml");
  const relatedImages = fs.exists(relatedImagesPath)
    ? readYamlFile(fs, relatedImagesPath, RelatedImagesFileSchema).relatedImages
    : [];

  return {
    metadata: { package: packageName, version: parseVersion(version), release },
    relatedImages,
  };
}

function findClusterServiceVersion(fs: FileSystem, manifestsDir: string): ClusterServiceVersion {
  for (const entry of fs.exists(manifestsDir) ? fs.readdir(manifestsDir) : []) {
    if (!/\.(ya?ml|json)$/.test(entry)) continue;
    const path = join(manifestsDir, entry);
    let raw: unknown;
    try {
      raw = parseYaml(fs.readFile(path));
    } catch (err) {
      throw new CatalogError(`parse ${entry}: ${errorMessage(err)}`, { path, cause: err });
    }
    if (!isRecord(raw) || raw["kind"] !== "ClusterServiceVersion") continue;

    const result = ClusterServiceVersionSchema.safeParse(raw);
    if (!result.success) {
      throw new CatalogError(`invalid ClusterServiceVersion in ${entry}: ${result.error.issues[0]?.message ?? "invalid"}`, {
        path,
      });
    }
    return result.data;
  }
  throw new CatalogError("no ClusterServiceVersion found in manifests");
}

/**
 * spec.relatedImages plus every deployment container image not already
 * listed, sorted by image then name.
 */
function csvRelatedImages(csv: ClusterServiceVersion): RelatedImage[] {
  const images: RelatedImage[] = [...csv.spec.relatedImages];
  const seen = new Set(images.map((ri) => ri.image));

  for (const deployment of csv.spec.install.spec.deployments) {
    const podSpec = deployment.spec.template.spec;
    for (const container of [...podSpec.containers, ...podSpec.initContainers]) {
      if (seen.has(container.image)) continue;
      seen.add(container.image);
      images.push({ image: container.image });
    }
  }

  return images.sort((a, b) => {
    if (a.image !== b.image) return a.image < b.image ? -1 : 1;
    const an = a.name ?? "";
    const bn = b.name ?? "";
    return an < bn ? -1 : an > bn ? 1 : 0;
  });
}

function loadIcon(fs: FileSystem, packageDir: string): Icon | undefined {
  const candidates = [
    { file: "icon.svg", mediaType: PLAIN_MEDIA_TYPES.svg },
    { file: "icon.png", mediaType: PLAIN_MEDIA_TYPES.png },
  ];
  for (const { file, mediaType } of candidates) {
    const path = join(packageDir, file);
    if (fs.exists(path)) {
      return { data: fs.readFileBinary(path), mediaType };
    }
  }
  return undefined;
}

function loadProperties(fs: FileSystem, path: string): TypeValue[] {
  if (!fs.exists(path)) return [];
  return readYamlFile(fs, path, PropertiesFileSchema).properties;
}

/**
 * Every regular file below `root`, with paths relative to it.
 */
function readTree(fs: FileSystem, root: string): TarFile[] {
  const files: TarFile[] = [];

  function walkDir(currentDir: string): void {
    for (const entry of fs.readdir(currentDir)) {
      const fullPath = join(currentDir, entry);
      const stat = fs.stat(fullPath);
      if (stat.isDirectory) {
        walkDir(fullPath);
      } else if (stat.isFile) {
        files.push({
          path: relative(root, fullPath).split("\\").join("/"),
          content: fs.readFileBinary(fullPath),
          mode: stat.mode,
        });
      }
    }
  }

  walkDir(root);
  return files;
}

function subdirectories(fs: FileSystem, dir: string): string[] {
  if (!fs.exists(dir)) {
    throw new CatalogError(`directory not found: ${dir}`, { path: dir });
  }
  return fs
    .readdir(dir)
    .map((entry) => join(dir, entry))
    .filter((path) => fs.stat(path).isDirectory);
}

function readRequired(fs: FileSystem, path: string): string {
  if (!fs.exists(path)) {
    throw new CatalogError(`file not found: ${path}`, { path });
  }
  return fs.readFile(path);
}

function readYamlFile<Output, Input>(
  fs: FileSystem,
  path: string,
  schema: ZodType<Output, ZodTypeDef, Input>
): Output {
  const result = safeParseYaml(readRequired(fs, path), schema, path);
  if (!result.success) {
    throw new CatalogError(formatFriendlyError(result.error), { path });
  }
  return result.data;
}

function parseVersion(version: string): string {
  if (!isValidSemver(version)) {
    throw new CatalogError(`invalid bundle version ${JSON.stringify(version)}`);
  }
  return version;
}

function step<T>(what: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw wrap(`load ${what}`, err);
  }
}

function wrap(context: string, err: unknown, path?: string): CatalogError {
  const inner = err instanceof CatalogError ? err : undefined;
  return new CatalogError(`${context}: ${errorMessage(err)}`, { path: path ?? inner?.path, cause: err });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
