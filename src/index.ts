/**
 * oci-catalog-engine
 *
 * Build, copy and inspect content-addressed artifact graphs, and the
 * catalog domain model that rides on them.
 * Portable, testable, dependency-injected.
 */

// Core interfaces and tarball helpers
export * from '#/core';

// Error taxonomy
export * from '#/errors';

// Logging (winston)
export * from '#/logging';

// Engine configuration
export * from '#/config';

// Schemas (Zod validation)
export * from '#/schemas';

// Parse helpers with readable errors
export * from '#/friendly-errors';

// Formatters (pure utilities)
export * from '#/formatters';

// Version utilities (semver validation)
export * from '#/version';

// Content-addressed stores
export * from '#/content';

// OCI Distribution Spec client
export * from '#/oci';

// Graph engine: build, push, copy, inspect
export * from '#/graph';

// Catalog > Package > Channel > Bundle
export * from '#/catalog';
