import type { MediaClient } from '../client/media-client.js';
import { BadRequestError, NotFoundError } from '../errors.js';
import type { Filters } from '../query/types.js';
import { AttributeNode } from '../tree/attribute-node.js';
import { toInt } from '../tree/casts.js';
import type { QueryParams } from '../types.js';
import { ResultContainer } from './container.js';
import { findItems } from './finder.js';
import type { FindOptions } from './finder.js';
import type { TypedObject } from './types.js';

export const CONTAINER_START_HEADER = 'X-Plex-Container-Start';
export const CONTAINER_SIZE_HEADER = 'X-Plex-Container-Size';

const METADATA_PATH = '/library/metadata';

/** A path, a single rating key, or a list of rating keys. */
export type FetchPath = string | number | readonly number[];

export interface FetchOptions extends Omit<FindOptions, 'sourcePath'> {
  /** Offset of the first item to request. Default 0. */
  containerStart?: number;
  /** Items per request. Default: the client's configured page size. */
  containerSize?: number;
  /** Stop once this many items have been collected. */
  maxResults?: number | null;
  params?: QueryParams;
}

export function resolvePath(path: FetchPath): string {
  if (typeof path === 'number') return `${METADATA_PATH}/${path}`;
  if (typeof path !== 'string') {
    if (path.length === 0) throw new BadRequestError('No rating keys were provided');
    return `${METADATA_PATH}/${path.join(',')}`;
  }
  if (path === '') throw new BadRequestError('A path was not provided');
  return path;
}

/** `totalSize`, else `size`, else the number of matches; empty and zero values fall through. */
function reportedTotal(data: AttributeNode, matched: number): number {
  const raw = data.attr('totalSize') || data.attr('size');
  const total = toInt(raw || null);
  return total !== null && !Number.isNaN(total) && total !== 0 ? total : matched;
}

function describeFilters(filters: Readonly<Filters>): string {
  return `{${Object.entries(filters).map(([key, value]) => `${key}=${String(value)}`).join(', ')}}`;
}

/**
 * Requests `path` page by page and merges every page's matches into one
 * container. Stops once the next page would start past the reported total
 * or `maxResults` items have been collected. Any failed request rejects
 * the whole fetch.
 */
export async function fetchItems(
  client: MediaClient,
  path: FetchPath,
  options: FetchOptions = {},
): Promise<ResultContainer> {
  const sourcePath = resolvePath(path);
  const maxResults = options.maxResults ?? null;
  const offset = options.containerStart ?? 0;
  let containerStart = offset;
  let containerSize = options.containerSize !== undefined && options.containerSize > 0
    ? options.containerSize
    : client.config.containerSize;
  if (maxResults !== null) containerSize = Math.min(containerSize, maxResults);

  const results = new ResultContainer(client, AttributeNode.empty(ResultContainer.TAG), sourcePath);

  for (;;) {
    const headers = {
      [CONTAINER_START_HEADER]: String(containerStart),
      [CONTAINER_SIZE_HEADER]: String(containerSize),
    };
    const data = await client.query(sourcePath, {
      headers,
      ...(options.params !== undefined ? { params: options.params } : {}),
    }) ?? AttributeNode.empty();

    const page = findItems(client, data, { ...options, sourcePath });
    const matches: readonly TypedObject[] = page instanceof ResultContainer ? page.toArray() : page;
    const totalSize = reportedTotal(data, matches.length);

    if (matches.length === 0 && offset > totalSize) {
      client.logger.info({ path: sourcePath, containerStart: offset, totalSize }, 'containerStart is greater than the number of items');
    }

    const librarySectionID = toInt(data.attr('librarySectionID'));
    if (librarySectionID) {
      for (const item of matches) item.setLibrarySectionID(librarySectionID);
    }

    results.extend(page);

    containerStart += containerSize;
    if (containerStart > totalSize) break;

    let wanted = totalSize - offset;
    if (maxResults !== null) {
      wanted = Math.min(maxResults, wanted);
      containerSize = Math.min(containerSize, wanted - results.length);
    }
    if (wanted <= results.length) break;
  }

  return results;
}

/** First result of `fetchItems`; rejects with NotFoundError when there is none. */
export async function fetchItem(
  client: MediaClient,
  path: FetchPath,
  options: FetchOptions = {},
): Promise<TypedObject> {
  const results = await fetchItems(client, path, options);
  const item = results.first();
  if (item === null) {
    const variantName = options.variant?.name ?? null;
    const filters = options.filters ?? {};
    throw new NotFoundError(
      `Unable to find elem: variant=${variantName ?? 'None'}, attrs=${describeFilters(filters)}`,
      variantName,
      filters,
    );
  }
  return item;
}
