/**
 * Core types for the SaaS API
 * Stored record shapes live in ../schemas; these are the shapes that cross layers
 */

// ============================================
// Documents
// ============================================

/** Scalar values a document filter can match on (top-level field equality only) */
export type FilterValue = string | number | boolean | null;

export type DocumentFilter = Record<string, FilterValue>;

/** Record fields plus `created_at`/`updated_at` (ISO-8601, set on insert) */
export interface StoredDocument {
  /** Store-generated key (UUID v4) */
  _id: string;
  [field: string]: unknown;
}

/** A stored document as returned over HTTP: `_id` is exposed as `id` */
export interface PublicDocument {
  id: string;
  [field: string]: unknown;
}

export type CollectionName = 'user' | 'blogpost' | 'contactmessage';

// ============================================
// Plans
// ============================================

export interface Plan {
  id: string;
  name: string;
  /** Display price, e.g. "$19" */
  price: string;
  features: string[];
  highlighted: boolean;
}

// ============================================
// Responses
// ============================================

export interface CreatedResponse {
  ok: true;
  id: string;
}

export interface LoginResponse {
  ok: true;
  message: string;
}

export interface ErrorResponse {
  error: string;
  details?: Array<{ path: string; message: string }>;
}

export interface DiagnosticReport {
  backend: string;
  database: string;
  database_url: string | null;
  database_name: string | null;
  connection_status: 'Connected' | 'Not Connected';
  collections: string[];
}
