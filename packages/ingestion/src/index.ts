// Pipeline
export {
  runIngestion,
  type IngestionDependencies,
  type IngestionPool,
  type IngestionRunConfig,
} from "./pipeline.js";

// Configuration
export {
  DEFAULT_PAGE_SIZE,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_WINDOW_DAYS,
  loadIngestionConfig,
  resolveWindow,
  windowFilter,
  type IngestionConfig,
  type IngestionConfigOverrides,
} from "./config.js";

// Store
export {
  SCHEMA_PATH,
  applySchema,
  countDimensionRows,
  countOrphanedReferences,
  countServiceRequests,
  findDimensionId,
  insertDimensionLabel,
  upsertServiceRequest,
  withTransaction,
  type Queryable,
} from "./db.js";

// Loaders
export {
  DEFAULT_SOCRATA_URL,
  SocrataClient,
  SocrataFetchError,
  isTransientFetchError,
  type ServiceRequestSource,
  type SocrataClientOptions,
} from "./loaders/socrataClient.js";

// Services
export {
  DimensionResolver,
  type DimensionResolverOptions,
  type DimensionResolverStats,
} from "./services/dimensionResolver.js";
export {
  DEFAULT_LABEL_CACHE_CAPACITY,
  LabelCache,
} from "./services/labelCache.js";

// Transformers
export { normalizeTimestamp } from "./transformers/timestamp.js";
export {
  parseCoordinate,
  parseNaturalKey,
  toServiceRequestRow,
} from "./transformers/serviceRequest.js";

export * from "./types.js";
