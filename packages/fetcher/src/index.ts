/**
 * @model-bootstrap/fetcher - Idempotent model fetch and bootstrap run
 */

export { FetchStatus, isSuccessfulOutcome, silentReporter } from './types.js';
export type { ArtifactSpec, FetchOutcome, FetchReporter } from './types.js';
export { destinationNameOf, resolveDestination } from './destination.js';
export { ensureLocal, fetchArtifact, classifyFailure, copyPreservingMetadata } from './ensure-local.js';
export type { FetchContext } from './ensure-local.js';
export {
  DEFAULT_CATALOG_URL,
  catalogSchema,
  loadCatalog,
  parseCatalog,
  selectGroups,
  toArtifactSpec,
} from './catalog.js';
export type { Catalog, CatalogGroup, CatalogArtifact } from './catalog.js';
export { MODEL_SUBDIRS, modelsDirOf, prepareLayout } from './layout.js';
export type { ModelSubdir } from './layout.js';
export {
  MODEL_FILE_EXTENSIONS,
  collectInventory,
  formatInventory,
  inventoryContains,
} from './inventory.js';
export type { Inventory, InventoryFile, InventorySection } from './inventory.js';
export { runBootstrap } from './bootstrap.js';
export type { BootstrapOptions, BootstrapSummary, SkippedGroup } from './bootstrap.js';
