/**
 * Content-addressed storage: descriptors and the stores graphs live in.
 */

export type { Descriptor, Platform, ContentStore } from "./content.types";
export {
  digestOf,
  descriptorFromBytes,
  compareByDigest,
  verifyContent,
  parseDigest,
  shortDigest,
  type ParsedDigest,
} from "./descriptor";
export { MemoryStore } from "./memory";
export { ArchiveStore } from "./archive";
export { RemoteStore } from "./remote";
