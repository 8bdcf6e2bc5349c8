/**
 * Directory Node
 *
 * Facade over a running directory (coordinator) server. Clients always talk
 * to the directory; uploads and deletions are handed off to storage nodes
 * through redirects (see transport/transfer.ts).
 */

import { stat } from 'node:fs/promises';
import { basename } from 'node:path';
import { config as harnessConfig } from '../config.js';
import { CLUSTER, ENDPOINTS, TRANSFER } from '../constants.js';
import { deleteBlob, pushBlob } from '../transport/transfer.js';
import {
  isMetadataListing,
  isQueryResponse,
  isStorageNodeListing,
  type DeleteResponse,
  type ListMetadataRequest,
  type MetadataListing,
  type PushResponse,
  type QueryRequest,
  type QueryResponse,
  type StorageNodeListing,
} from '../types.js';
import { ClusterNode, type ClusterNodeOptions } from './cluster-node.js';
import { buildDirectoryConfig, type DirectoryNodeConfig } from './node-config.js';

export type DirectoryNodeOptions = ClusterNodeOptions & {
  /** Redirect hops followed by push/delete */
  maxRedirects?: number;
};

export interface PushOptions {
  /** Declared byte length (default: the file's size on disk) */
  size?: number;
  /** Display name (default: the file's base name) */
  name?: string;
  tags?: string[];
  meta?: Record<string, string>;
  parents?: string[];
  blobType?: string;
  /**
   * Follow the directory's redirect to the storage node (default: true).
   * Disabling it makes the push fail with UnexpectedStatusError(307).
   */
  allowRedirects?: boolean;
}

export interface QueryOptions {
  expression?: string | null;
  from?: number;
  size?: number;
  signUrls?: boolean;
  facets?: boolean;
}

export interface ListMetadataOptions {
  tags?: string[];
  metaKeys?: string[];
}

export class DirectoryNode extends ClusterNode<DirectoryNodeConfig> {
  private readonly maxRedirects: number;

  constructor(options: DirectoryNodeOptions) {
    super('directory', options, (dataDir, port) => buildDirectoryConfig(dataDir, port, options.secrets));
    this.maxRedirects = options.maxRedirects ?? harnessConfig.transfer.maxRedirects;
  }

  /**
   * Construct a directory node and wait until it is healthy
   */
  static async launch(options: DirectoryNodeOptions): Promise<DirectoryNode> {
    const node = new DirectoryNode(options);
    try {
      await node.start();
    } catch (error) {
      await node.stop();
      throw error;
    }
    return node;
  }

  /**
   * Upload a file. Resolves with the id the cluster assigned to the blob.
   */
  async push(filePath: string, options: PushOptions = {}): Promise<PushResponse> {
    this.assertHealthy('push');

    const size = options.size ?? (await stat(filePath)).size;

    return pushBlob(
      this.session,
      this.url,
      filePath,
      {
        tags: options.tags ?? [],
        metadata: options.meta ?? {},
        parents: options.parents ?? [],
        size,
        name: options.name ?? basename(filePath),
        blobType: options.blobType ?? TRANSFER.DEFAULT_BLOB_TYPE,
      },
      {
        followRedirects: options.allowRedirects ?? true,
        maxRedirects: this.maxRedirects,
      }
    );
  }

  async query(options: QueryOptions = {}): Promise<QueryResponse> {
    this.assertHealthy('query');

    const body: QueryRequest = {
      expression: options.expression ?? null,
      from: options.from ?? 0,
      size: options.size ?? CLUSTER.QUERY_PAGE_SIZE,
      sign_urls: options.signUrls ?? true,
    };
    if (options.facets !== undefined) {
      body.facets = options.facets;
    }

    return this.session.request('POST', `${this.url}${ENDPOINTS.QUERY}`, isQueryResponse, { json: body });
  }

  async delete(blobId: string): Promise<DeleteResponse> {
    this.assertHealthy('delete');
    return deleteBlob(this.session, this.url, blobId, { maxRedirects: this.maxRedirects });
  }

  /**
   * Tag and key/value counts across every indexed blob
   */
  async listMetadata(options: ListMetadataOptions = {}): Promise<MetadataListing> {
    this.assertHealthy('list metadata');

    const body: ListMetadataRequest = {
      tags: options.tags ?? null,
      meta_keys: options.metaKeys ?? null,
    };

    return this.session.request('GET', `${this.url}${ENDPOINTS.METADATA}`, isMetadataListing, { json: body });
  }

  async listStorageNodes(): Promise<StorageNodeListing> {
    this.assertHealthy('list storage nodes');
    return this.session.request('GET', `${this.url}${ENDPOINTS.STORAGE_NODES}`, isStorageNodeListing);
  }
}
