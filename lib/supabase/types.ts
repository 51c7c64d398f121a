/**
 * Database types for Supabase writes.
 *
 * Tables:
 * - documents: id, title, content, file_path, file_type, source_url, metadata (jsonb), created_at, updated_at
 * - document_chunks: id, document_id, chunk_index, chunk_text, word_count, char_count,
 *   embedding (vector), embedding_model, metadata (jsonb), created_at
 *
 * Rows read back are parsed with the zod schemas in lib/rag/supabase-store.ts.
 */

/** Insert types */
export interface DocumentInsert {
  id: string;
  title: string;
  content: string;
  file_path?: string | null;
  file_type: string;
  source_url?: string | null;
  metadata?: Record<string, unknown>;
}

export interface DocumentChunkInsert {
  document_id: string;
  chunk_index: number;
  chunk_text: string;
  word_count: number;
  char_count: number;
  embedding: number[];
  embedding_model: string;
  metadata?: Record<string, unknown>;
}

/** Arguments of the write_document_with_chunks RPC */
export interface WriteDocumentArgs {
  p_document: DocumentInsert | null;
  p_delete_chunks_for: string[];
  p_chunks: DocumentChunkInsert[];
}
