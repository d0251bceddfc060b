/**
 * Outer-join style merge of result pages whose records differ in shape.
 */

import type { DocumentRecord } from "../types/index.js";

/** Field name given to items that are not objects (`SELECT VALUE ...`). */
export const UNNAMED_FIELD = "$1";

/**
 * Normalize one result item to a field/value map.
 */
export function toRecord(item: unknown): DocumentRecord {
  if (typeof item === "object" && item !== null && !Array.isArray(item)) {
    return Object.fromEntries(Object.entries(item));
  }
  return { [UNNAMED_FIELD]: item };
}

/**
 * Accumulates records across pages and tracks the union of their fields.
 */
export class RecordAccumulator {
  private readonly records: DocumentRecord[] = [];
  private readonly fieldSet = new Set<string>();
  private readonly fieldOrder: string[] = [];

  add(items: readonly unknown[]): void {
    for (const item of items) {
      const record = toRecord(item);
      for (const field of Object.keys(record)) {
        if (!this.fieldSet.has(field)) {
          this.fieldSet.add(field);
          this.fieldOrder.push(field);
        }
      }
      this.records.push(record);
    }
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * Records padded with null for every field they lack.
   */
  result(): { documents: DocumentRecord[]; fields: string[] } {
    const fields = [...this.fieldOrder];
    // fromEntries defines own properties, so a "__proto__" field stays a field
    const documents = this.records.map(
      (record): DocumentRecord =>
        Object.fromEntries(
          fields.map((field) => [field, Object.hasOwn(record, field) ? record[field] : null])
        )
    );
    return { documents, fields };
  }
}

/**
 * Merge pages of records into one field-complete sequence.
 */
export function mergeRecords(pages: ReadonlyArray<readonly unknown[]>): {
  documents: DocumentRecord[];
  fields: string[];
} {
  const accumulator = new RecordAccumulator();
  for (const page of pages) {
    accumulator.add(page);
  }
  return accumulator.result();
}
