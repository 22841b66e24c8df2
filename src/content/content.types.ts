/**
 * Content-addressed storage types
 *
 * @see https://github.com/opencontainers/image-spec/blob/main/descriptor.md
 */

export interface Platform {
  architecture: string;
  os: string;
  "os.version"?: string;
  "os.features"?: string[];
  variant?: string;
}

/**
 * Identifies one node of a graph: equal digests mean identical bytes.
 */
export interface Descriptor {
  mediaType: string;
  /** `<algorithm>:<hex>`, e.g. sha256:abc123... */
  digest: string;
  size: number;
  annotations?: Record<string, string>;
  platform?: Platform;
  artifactType?: string;
  urls?: string[];
}

/**
 * Content-addressed storage. Implementations must make `push` of an
 * already-present descriptor a no-op and verify digest and size of what
 * they accept.
 */
export interface ContentStore {
  exists(desc: Descriptor): Promise<boolean>;
  fetch(desc: Descriptor): Promise<Buffer>;
  push(desc: Descriptor, content: Buffer): Promise<void>;
  /** Point `reference` at a descriptor already in the store */
  tag(desc: Descriptor, reference: string): Promise<void>;
  resolve?(reference: string): Promise<Descriptor>;
  /** Push and tag in one round trip, where the backend allows it */
  pushReference?(desc: Descriptor, content: Buffer, reference: string): Promise<void>;
}
