/**
 * Shared constants used across the codebase.
 *
 * Centralizes magic numbers so they can be tuned in one place
 * and carry semantic meaning at every call site.
 */

// ---------------------------------------------------------------------------
// Chunking
// ---------------------------------------------------------------------------

/** Default maximum chunk length (characters) */
export const DEFAULT_CHUNK_MAX_SIZE = 300;

/** Default overlap between consecutive chunks (characters) */
export const DEFAULT_CHUNK_OVERLAP = 30;

// ---------------------------------------------------------------------------
// Retrieval
// ---------------------------------------------------------------------------

/** Number of nearest chunks requested from the index */
export const DEFAULT_RETRIEVAL_TOP_K = 3;

/** Cosine similarity a chunk must reach to count as relevant */
export const DEFAULT_RETRIEVAL_MIN_SCORE = 0.7;

// ---------------------------------------------------------------------------
// Agent turn budgets (milliseconds)
// ---------------------------------------------------------------------------

/** Retrieval path budget (query embedding + search) */
export const TIMEOUT_RETRIEVAL_MS = 15_000;

/** Per tool invocation budget */
export const TIMEOUT_TOOL_MS = 10_000;

/** Generation budget for one synthesis call */
export const TIMEOUT_GENERATION_MS = 120_000;

/** Conversation turns fed back to the model as history */
export const DEFAULT_HISTORY_TURNS = 5;

// ---------------------------------------------------------------------------
// Embedding
// ---------------------------------------------------------------------------

/** Texts sent per embedding request */
export const DEFAULT_EMBEDDING_BATCH_SIZE = 32;

/** Dimension of the offline hashing embedder */
export const HASHING_EMBEDDING_DIMENSIONS = 512;

// ---------------------------------------------------------------------------
// Persisted state
// ---------------------------------------------------------------------------

/** Default state directory, relative to the working directory */
export const DEFAULT_STATE_DIR = ".ragagent";

/** Vector index file name inside the state directory */
export const INDEX_FILE_NAME = "index.db";

/** Ingestion cache directory inside the state directory */
export const CACHE_DIR_NAME = "cache";

/** Conversation turn log inside the state directory */
export const HISTORY_FILE_NAME = "history.jsonl";

/** On-disk vector index format version */
export const INDEX_FORMAT_VERSION = 1;

// ---------------------------------------------------------------------------
// File lock retry configuration
// ---------------------------------------------------------------------------

/** Maximum retry attempts for file lock acquisition */
export const MAX_FILE_LOCK_RETRIES = 5;

/** Minimum delay between lock retries (milliseconds) */
export const FILE_LOCK_MIN_DELAY_MS = 50;

/** Maximum delay between lock retries (milliseconds) */
export const FILE_LOCK_MAX_DELAY_MS = 1000;

/** Exponential backoff multiplier for lock retries */
export const FILE_LOCK_BACKOFF_FACTOR = 2;

/** Stale lock threshold (milliseconds) */
export const FILE_LOCK_STALE_MS = 30_000;
