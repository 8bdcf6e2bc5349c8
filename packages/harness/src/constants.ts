/**
 * Centralized constants for the cluster test kit.
 *
 * Timing values are defaults only; every one of them can be overridden
 * through the environment (see config.ts) or per node/fixture options.
 */

// =============================================================================
// PROCESS SUPERVISION
// =============================================================================

export const PROCESS = {
  /** How long a freshly spawned node has to report healthy */
  STARTUP_TIMEOUT: 10_000,

  /** Interval between two health checks during startup */
  HEALTH_POLL_INTERVAL: 500,

  /**
   * Delay after a node exited before stop() returns. Slow hosts sometimes
   * keep the listening port bound for a moment after the process is gone,
   * which breaks a test starting right after on the same port.
   */
  STOP_COOLDOWN: 2_000,

  /** Grace period between SIGINT and SIGKILL */
  SHUTDOWN_TIMEOUT: 10_000,

  /** Signal used for graceful shutdown */
  STOP_SIGNAL: 'SIGINT',
} as const;

// =============================================================================
// HTTP
// =============================================================================

export const HTTP_STATUS = {
  OK: 200,
  TEMPORARY_REDIRECT: 307,
} as const;

export const HEADERS = {
  AUTHORIZATION: 'authorization',
  BLOB_META: 'x-blob-meta',
  CONTENT_TYPE: 'content-type',
  LOCATION: 'location',
} as const;

export const ENDPOINTS = {
  HEALTH: '/health',
  BLOB: '/blob',
  QUERY: '/query',
  METADATA: '/metadata',
  STORAGE_NODES: '/node/storage',
} as const;

export const TRANSFER = {
  /** Redirect hops followed before a push/delete gives up */
  MAX_REDIRECTS: 5,

  /** Multipart field carrying the blob bytes */
  FILE_FIELD: 'src',

  /** Content type of the multipart file part */
  FILE_CONTENT_TYPE: 'application/octet-stream',

  /** Blob type used when the caller does not name one */
  DEFAULT_BLOB_TYPE: 'File',
} as const;

// =============================================================================
// CLUSTER
// =============================================================================

export const CLUSTER = {
  /** Interval between two storage registration checks */
  REGISTRATION_POLL_INTERVAL: 100,

  /** How long a storage node has to show up in the directory */
  REGISTRATION_TIMEOUT: 2_000,

  /** Default page size for queries */
  QUERY_PAGE_SIZE: 30,

  /** Subnet mask written into storage node configs */
  SUBNET_MASK: '255.255.255.0',

  /** Name of the generated config file inside a node's data directory */
  CONFIG_FILE: 'config.json',
} as const;

// =============================================================================
// PORT ALLOCATION
// =============================================================================

export const PORTS = {
  /** Lowest port handed out by the allocator (random offset added) */
  BASE_PORT: 30_000,

  /** Width of the random offset window */
  PORT_RANGE: 20_000,
} as const;
