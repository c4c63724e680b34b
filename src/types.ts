import type { AttributeNode } from './tree/attribute-node.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type ParamValue = string | number | boolean;

export type QueryParams = Record<string, ParamValue>;

export interface QueryOptions {
  method?: HttpMethod;
  headers?: Record<string, string>;
  params?: QueryParams;
}

/**
 * Everything the object graph needs from the network: one request, one
 * parsed response. Resolves `null` for an empty body. Rejects with
 * NotFoundError on a 404 and TransportError on any other failure.
 */
export interface Transport {
  query(path: string, options?: QueryOptions): Promise<AttributeNode | null>;
}

export type EditValue = string | number | boolean;

/**
 * Field edits keyed by the server's dotted convention, e.g.
 * `title.value`, `title.locked`, `genre[0].tag.tag`.
 */
export type EditFields = Record<string, EditValue>;

export interface EditTarget {
  readonly key: string | null;
  readonly ratingKey: number | null;
  readonly librarySectionID: number | null;
}

export interface EditSink {
  applyEdits(targets: readonly EditTarget[], fields: Readonly<EditFields>): Promise<void>;
}
