export interface DocumentMetadata {
  filename?: string;
  contentType?: string;
  uploadedAt?: string;
  [key: string]: unknown;
}

export interface Document {
  id: string;
  text: string;
  metadata: DocumentMetadata;
  contentHash: string;
  ingestedAt: Date;
}

export interface DocumentInput {
  documentId: string;
  text: string;
  metadata?: DocumentMetadata;
}
