/**
 * Wire types exchanged with the directory node, plus the runtime guards used
 * to validate parsed response bodies.
 */

/**
 * Metadata sent alongside a blob upload
 */
export interface BlobDescriptor {
  tags: string[];
  metadata: Record<string, string>;
  parents: string[];
  /** Byte length of the uploaded file. Not re-verified by the harness. */
  size: number;
  name: string;
  blobType: string;
}

/**
 * BlobDescriptor as serialized into the x-blob-meta header
 */
export interface WireBlobMeta {
  tags: string[];
  metadata: Record<string, string>;
  parents: string[];
  size: number;
  name: string;
  blob_type: string;
}

export interface PushResponse {
  id: string;
}

export interface DeleteResponse {
  id?: string;
  message?: string;
}

export interface Hit {
  id: string;
  meta: WireBlobMeta;
  url: string;
}

export interface FacetResponse {
  tags: Record<string, number>;
  meta: Record<string, Record<string, number>>;
}

export interface QueryRequest {
  expression: string | null;
  from: number;
  size: number;
  sign_urls: boolean;
  facets?: boolean;
}

export interface QueryResponse {
  count: number;
  total: number;
  hits: Hit[];
  facets?: FacetResponse | null;
}

export interface ListMetadataRequest {
  tags: string[] | null;
  meta_keys: string[] | null;
}

export type MetadataListing = FacetResponse;

export interface StorageNodeInfo {
  id: string;
  port: number;
  [key: string]: unknown;
}

export interface StorageNodeListing {
  storage_nodes: StorageNodeInfo[];
}

export interface HealthResponse {
  message: string;
}

// =============================================================================
// GUARDS
// =============================================================================

export type Guard<T> = (value: unknown) => value is T;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCountMap(value: unknown): value is Record<string, number> {
  return isRecord(value) && Object.values(value).every((v) => typeof v === 'number');
}

function isNestedCountMap(value: unknown): value is Record<string, Record<string, number>> {
  return isRecord(value) && Object.values(value).every(isCountMap);
}

export function isHealthResponse(value: unknown): value is HealthResponse {
  return isRecord(value) && typeof value['message'] === 'string';
}

export function isPushResponse(value: unknown): value is PushResponse {
  return isRecord(value) && typeof value['id'] === 'string';
}

export function isDeleteResponse(value: unknown): value is DeleteResponse {
  return isRecord(value);
}

export function isHit(value: unknown): value is Hit {
  return (
    isRecord(value) &&
    typeof value['id'] === 'string' &&
    typeof value['url'] === 'string' &&
    isRecord(value['meta'])
  );
}

export function isQueryResponse(value: unknown): value is QueryResponse {
  return (
    isRecord(value) &&
    typeof value['count'] === 'number' &&
    typeof value['total'] === 'number' &&
    Array.isArray(value['hits']) &&
    value['hits'].every(isHit)
  );
}

export function isMetadataListing(value: unknown): value is MetadataListing {
  return isRecord(value) && isCountMap(value['tags']) && isNestedCountMap(value['meta']);
}

export function isStorageNodeListing(value: unknown): value is StorageNodeListing {
  return (
    isRecord(value) &&
    Array.isArray(value['storage_nodes']) &&
    value['storage_nodes'].every(
      (node) => isRecord(node) && typeof node['id'] === 'string' && typeof node['port'] === 'number'
    )
  );
}

/**
 * Convert a descriptor into its wire representation
 */
export function toWireMeta(descriptor: BlobDescriptor): WireBlobMeta {
  return {
    tags: descriptor.tags,
    metadata: descriptor.metadata,
    parents: descriptor.parents,
    size: descriptor.size,
    name: descriptor.name,
    blob_type: descriptor.blobType,
  };
}
