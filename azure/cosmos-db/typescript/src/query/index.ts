/**
 * Azure Cosmos DB Query Module
 */

export { QueryExecutor, type QueryRequest } from "./executor.js";
export { RecordAccumulator, mergeRecords, toRecord, UNNAMED_FIELD } from "./merge.js";
export { escapeTextForJson, buildQueryBody } from "./escape.js";
