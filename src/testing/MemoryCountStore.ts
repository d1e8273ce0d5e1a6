import { DocumentCountStore } from '../storage.js';
import { recordDocumentSchema, referenceDocumentSchema, type RecordDocument, type ReferenceDocument } from '../schemas.js';
import type { CountHeader } from '../types.js';

/**
 * In-process count store for tests. Records are cloned on the way in and out, so a test
 * only sees what was saved.
 */
export class MemoryCountStore extends DocumentCountStore {
  private readonly records = new Map<number, RecordDocument>();
  private reference: ReferenceDocument;

  constructor(reference: Partial<ReferenceDocument> = {}) {
    super();
    this.reference = referenceDocumentSchema.parse(reference);
  }

  /**
   * Seed a record with a header, filling unset header fields with null
   */
  addHeader(header: Partial<CountHeader> & Pick<CountHeader, 'recordnum' | 'countKind'>): CountHeader {
    const record = recordDocumentSchema.parse({ header });
    this.records.set(header.recordnum, record);
    return record.header;
  }

  setReference(reference: Partial<ReferenceDocument>): void {
    this.reference = referenceDocumentSchema.parse(reference);
  }

  protected async loadRecord(recordnum: number): Promise<RecordDocument | null> {
    const record = this.records.get(recordnum);
    return record ? structuredClone(record) : null;
  }

  protected async saveRecord(record: RecordDocument): Promise<void> {
    this.records.set(record.header.recordnum, structuredClone(record));
  }

  protected async loadReference(): Promise<ReferenceDocument> {
    return this.reference;
  }
}
