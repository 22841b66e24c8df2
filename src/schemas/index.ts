import { z } from "zod";
import { isValidSemver } from "#/version";

// Semver validation schema
export const SemverSchema = z.string().refine(isValidSemver, {
  message: "Invalid semver version. Must be valid semver (e.g., 1.0.0, 2.1.0-beta.1)",
});

// ---------------------------------------------------------------------------
// OCI documents
// ---------------------------------------------------------------------------

export const PlatformSchema = z.object({
  architecture: z.string(),
  os: z.string(),
  "os.version": z.string().optional(),
  "os.features": z.array(z.string()).optional(),
  variant: z.string().optional(),
});

export const DescriptorSchema = z.object({
  mediaType: z.string().min(1),
  digest: z.string().min(1),
  size: z.number().int().nonnegative(),
  urls: z.array(z.string()).optional(),
  annotations: z.record(z.string(), z.string()).optional(),
  platform: PlatformSchema.optional(),
  artifactType: z.string().optional(),
});

// Parent node of every catalog graph
export const ArtifactManifestSchema = z.object({
  mediaType: z.string(),
  artifactType: z.string(),
  blobs: z.array(DescriptorSchema).default([]),
  subject: DescriptorSchema.optional(),
  annotations: z.record(z.string(), z.string()).optional(),
});
export type ArtifactManifest = z.infer<typeof ArtifactManifestSchema>;

// Also covers index.json of an OCI layout and Docker manifest lists
export const ImageIndexSchema = z.object({
  schemaVersion: z.number().int(),
  mediaType: z.string().optional(),
  artifactType: z.string().optional(),
  manifests: z.array(DescriptorSchema).default([]),
  annotations: z.record(z.string(), z.string()).optional(),
});
export type ImageIndex = z.infer<typeof ImageIndexSchema>;

// Also covers Docker schema2 manifests
export const ImageManifestSchema = z.object({
  schemaVersion: z.number().int(),
  mediaType: z.string().optional(),
  artifactType: z.string().optional(),
  config: DescriptorSchema,
  layers: z.array(DescriptorSchema).default([]),
  annotations: z.record(z.string(), z.string()).optional(),
});
export type ImageManifest = z.infer<typeof ImageManifestSchema>;

export const ImageConfigSchema = z.object({
  created: z.string().optional(),
  author: z.string().default(""),
  architecture: z.string().default(""),
  os: z.string().default(""),
  "os.version": z.string().optional(),
  "os.features": z.array(z.string()).optional(),
  config: z
    .object({
      User: z.string().default(""),
      ExposedPorts: z.record(z.string(), z.unknown()).optional(),
      Env: z.array(z.string()).default([]),
      Entrypoint: z.array(z.string()).nullable().default([]),
      Cmd: z.array(z.string()).nullable().default([]),
      Volumes: z.record(z.string(), z.unknown()).optional(),
      WorkingDir: z.string().default(""),
      Labels: z.record(z.string(), z.string()).optional(),
      StopSignal: z.string().optional(),
    })
    .default({}),
  rootfs: z
    .object({
      type: z.string().default(""),
      diff_ids: z.array(z.string()).default([]),
    })
    .default({}),
});
export type ImageConfig = z.infer<typeof ImageConfigSchema>;

export const OciLayoutSchema = z.object({
  imageLayoutVersion: z.string(),
});

// ---------------------------------------------------------------------------
// Catalog metadata blobs
// ---------------------------------------------------------------------------

export const MaintainerSchema = z.object({
  email: z.string(),
  name: z.string().optional(),
});
export type Maintainer = z.infer<typeof MaintainerSchema>;

export const PackageMetadataSchema = z.object({
  name: z.string().min(1),
  displayName: z.string().optional(),
  keywords: z.array(z.string()).optional(),
  urls: z.array(z.string()).optional(),
  maintainers: z.array(MaintainerSchema).optional(),
});
export type PackageMetadata = z.infer<typeof PackageMetadataSchema>;

export const ChannelMetadataSchema = z.object({
  name: z.string().min(1),
});
export type ChannelMetadata = z.infer<typeof ChannelMetadataSchema>;

export const BundleMetadataSchema = z.object({
  package: z.string().min(1),
  version: SemverSchema,
  release: z.number().int().nonnegative().default(0),
});
export type BundleMetadata = z.infer<typeof BundleMetadataSchema>;

// "<version>-<release>" -> ["<version>-<release>", ...]
export const UpgradeEdgesSchema = z.record(z.string(), z.array(z.string()));
export type UpgradeEdges = z.infer<typeof UpgradeEdgesSchema>;

export const RelatedImageSchema = z.object({
  image: z.string().min(1),
  name: z.string().optional(),
});
export const RelatedImagesSchema = z.array(RelatedImageSchema);
export type RelatedImage = z.infer<typeof RelatedImageSchema>;

export const TypeValueSchema = z.object({
  type: z.string().min(1),
  value: z.unknown(),
});
export const TypeValuesSchema = z.array(TypeValueSchema);
export type TypeValue = z.infer<typeof TypeValueSchema>;

// ---------------------------------------------------------------------------
// Source files read by the loader
// ---------------------------------------------------------------------------

// upgrade-edges.yaml: declared "<version>" -> ["<version>", ...]
export const UpgradeEdgesFileSchema = z.object({
  upgradeEdges: UpgradeEdgesSchema.default({}),
});

export const PropertiesFileSchema = z.object({
  properties: TypeValuesSchema.default([]),
});

export const ConstraintsFileSchema = z.object({
  constraints: TypeValuesSchema.default([]),
});

export const RelatedImagesFileSchema = z.object({
  relatedImages: RelatedImagesSchema.default([]),
});

// metadata/annotations.yaml of a bundle directory
export const BundleAnnotationsFileSchema = z.object({
  annotations: z.record(z.string(), z.string()).default({}),
});

// entries.yaml of a channel directory: bundle versions in the channel
export const ChannelEntriesFileSchema = z.object({
  entries: z.array(z.string()).default([]),
});

// Fields of a ClusterServiceVersion read from a registry+v1 bundle
export const ClusterServiceVersionSchema = z.object({
  kind: z.literal("ClusterServiceVersion"),
  spec: z.object({
    version: z.string(),
    relatedImages: RelatedImagesSchema.default([]),
    install: z
      .object({
        spec: z
          .object({
            deployments: z
              .array(
                z.object({
                  spec: z.object({
                    template: z.object({
                      spec: z.object({
                        containers: z.array(z.object({ image: z.string() })).default([]),
                        initContainers: z.array(z.object({ image: z.string() })).default([]),
                      }),
                    }),
                  }),
                })
              )
              .default([]),
          })
          .default({}),
      })
      .default({}),
  }),
});
export type ClusterServiceVersion = z.infer<typeof ClusterServiceVersionSchema>;
