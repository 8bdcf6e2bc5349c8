/**
 * Blob Index
 *
 * The directory stand-in's in-memory view of every committed blob and the
 * storage node holding it.
 *
 * Query expressions are whitespace-separated terms, all of which must match:
 * `key=value` matches a metadata entry, any other term matches a tag.
 */

import type { FacetResponse, WireBlobMeta } from '@clusterkit/harness';

export interface IndexedBlob {
  id: string;
  meta: WireBlobMeta;
  storageId: string;
}

function matchesTerm(meta: WireBlobMeta, term: string): boolean {
  const eq = term.indexOf('=');
  if (eq > 0) {
    const key = term.slice(0, eq);
    return Object.hasOwn(meta.metadata, key) && meta.metadata[key] === term.slice(eq + 1);
  }
  return meta.tags.includes(term);
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

export class BlobIndex {
  private readonly blobs = new Map<string, IndexedBlob>();

  put(blob: IndexedBlob): void {
    this.blobs.set(blob.id, blob);
  }

  get(id: string): IndexedBlob | undefined {
    return this.blobs.get(id);
  }

  remove(id: string): boolean {
    return this.blobs.delete(id);
  }

  get size(): number {
    return this.blobs.size;
  }

  /**
   * Every blob matching `expression` (all blobs when null), in commit order
   */
  match(expression: string | null): IndexedBlob[] {
    const terms = (expression ?? '').split(/\s+/).filter((term) => term.length > 0);
    return [...this.blobs.values()].filter((blob) => terms.every((term) => matchesTerm(blob.meta, term)));
  }

  /**
   * Tag and key/value counts over `blobs`, optionally restricted to the
   * given tags and metadata keys
   */
  static facets(blobs: IndexedBlob[], tags: string[] | null = null, metaKeys: string[] | null = null): FacetResponse {
    // Keys are user data; count in Maps, not object literals
    const tagCounts = new Map<string, number>();
    const metaCounts = new Map<string, Map<string, number>>();

    for (const { meta } of blobs) {
      for (const tag of meta.tags) {
        if (tags === null || tags.includes(tag)) {
          increment(tagCounts, tag);
        }
      }
      for (const [key, value] of Object.entries(meta.metadata)) {
        if (metaKeys === null || metaKeys.includes(key)) {
          let counts = metaCounts.get(key);
          if (counts === undefined) {
            counts = new Map<string, number>();
            metaCounts.set(key, counts);
          }
          increment(counts, value);
        }
      }
    }

    return {
      tags: Object.fromEntries(tagCounts),
      meta: Object.fromEntries(
        [...metaCounts].map(([key, counts]): [string, Record<string, number>] => [key, Object.fromEntries(counts)])
      ),
    };
  }
}
