import { createHash } from "node:crypto";
import type { Document } from "@docguard/types";

/** Case-insensitive fingerprint used to spot duplicate documents. */
export function contentHash(text: string): string {
  return createHash("sha256").update(text.toLowerCase()).digest("hex");
}

/** Holds each ingested document's full text alongside its index entries. */
export interface IDocumentStore {
  get(documentId: string): Promise<Document | undefined>;
  put(document: Document): Promise<void>;
  /** Returns false when the document was not stored. */
  delete(documentId: string): Promise<boolean>;
  findByContentHash(hash: string): Promise<Document[]>;
  list(): Promise<Document[]>;
}

export class InMemoryDocumentStore implements IDocumentStore {
  private documents = new Map<string, Document>();

  async get(documentId: string): Promise<Document | undefined> {
    return this.documents.get(documentId);
  }

  async put(document: Document): Promise<void> {
    this.documents.set(document.id, document);
  }

  async delete(documentId: string): Promise<boolean> {
    return this.documents.delete(documentId);
  }

  async findByContentHash(hash: string): Promise<Document[]> {
    return [...this.documents.values()].filter((doc) => doc.contentHash === hash);
  }

  async list(): Promise<Document[]> {
    return [...this.documents.values()];
  }
}
