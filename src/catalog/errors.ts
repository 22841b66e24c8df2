/**
 * Malformed or inconsistent catalog content: a source directory that does
 * not load, edges naming absent versions, an artifact of the wrong type.
 */
export class CatalogError extends Error {
  readonly path?: string;

  constructor(message: string, options: { path?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "CatalogError";
    this.path = options.path;
  }
}
