/**
 * Azure Cosmos DB Services Module
 */

export { ResourceRequestor, type ResourceRequest } from "./requestor.js";
export { DatabaseService } from "./databases.js";
export {
  CollectionService,
  type CollectionRequestOptions,
  type CreateCollectionOptions,
} from "./collections.js";
export {
  DocumentService,
  DELETE_BATCH_SIZE,
  type CollectionTarget,
  type DocumentRequestOptions,
  type DocumentQueryOptions,
  type UpsertManyOptions,
  type PredicateOptions,
} from "./documents.js";
export {
  OfferService,
  validateThroughput,
  MIN_THROUGHPUT,
  SINGLE_PARTITION_MAX_THROUGHPUT,
  THROUGHPUT_STEP,
} from "./offers.js";
