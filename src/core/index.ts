export type { FileSystem, HttpClient, LineWriter } from "./interfaces";
export {
  createTarball,
  listTarball,
  readTarball,
  validateTarEntries,
  type TarEntry,
  type TarFile,
  type TarValidationResult,
} from "./tar-utils";
export { createNodeFileSystem, createFetchHttpClient } from "./node";
