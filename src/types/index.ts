/**
 * Central type exports
 */

// Configuration
export type {
  Config,
  PartialConfig,
  ApiConfig,
  DownloadConfig,
  CleanupConfig,
  StorageConfig,
  MarkdownConfig,
  LoggingConfig,
  LogLevel,
} from "./config";
export { ConfigSchema, PartialConfigSchema } from "./config";

// Catalog
export type {
  EntityType,
  CatalogEntity,
  CatalogFilters,
  CatalogResponse,
  RawCatalogItem,
} from "./catalog";
export {
  ENTITY_TYPES,
  CatalogResponseSchema,
  RawCatalogItemSchema,
} from "./catalog";

// Content
export type {
  ImageRef,
  ContentRecord,
  ModuleContent,
  ImageMapping,
} from "./content";

// Context
export type {
  DownloadContext,
  OutputFormat,
  ProgressEvent,
  ProgressListener,
  ProgressStage,
} from "./context";

