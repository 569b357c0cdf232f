// Chunking
const DEFAULT_CHUNK_SIZE = 25000;

// Provider request policy
const SAMPLING_TEMPERATURE = 0.4;
const SAMPLING_TOP_P = 0.95;
const GEMINI_TOP_K = 40;
const OPENAI_MAX_TOKENS = 8192;
const REQUEST_TIMEOUT_MS = 60000;

export const RETRY_POLICY = {
  gemini: {
    maxAttempts: 4,
    delayMs: 3000,
    retryableStatuses: [503, 504],
  },
  openaiCompatible: {
    maxAttempts: 2,
    rateLimitDelayMs: 5000,
  },
} as const;

// Connectivity probe
const CONNECTIVITY_PROBE_HOST = '8.8.8.8';
const CONNECTIVITY_PROBE_PORT = 53;
const CONNECTIVITY_PROBE_TIMEOUT_MS = 3000;

// Cache layout
const SNAPSHOT_VERSION = 1;
const MAIN_CACHE_FILE = 'analysis.json';
const SNAPSHOT_DIR = 'snapshots';

export {
  DEFAULT_CHUNK_SIZE,
  SAMPLING_TEMPERATURE,
  SAMPLING_TOP_P,
  GEMINI_TOP_K,
  OPENAI_MAX_TOKENS,
  REQUEST_TIMEOUT_MS,
  CONNECTIVITY_PROBE_HOST,
  CONNECTIVITY_PROBE_PORT,
  CONNECTIVITY_PROBE_TIMEOUT_MS,
  SNAPSHOT_VERSION,
  MAIN_CACHE_FILE,
  SNAPSHOT_DIR,
};
