import type { MediaClient } from '../client/media-client.js';
import { extractValues, matchesFilters } from '../query/evaluator.js';
import type { Filters } from '../query/types.js';
import { AttributeNode } from '../tree/attribute-node.js';
import { ResultContainer } from './container.js';
import { buildItemOrNone } from './factory.js';
import type { BuildContext, TypedObject, Variant } from './types.js';

export interface FindOptions {
  /** Build every match as this variant; also restricts matches to its TAG and TYPE. */
  variant?: Variant | null;
  /** Path the node was fetched from; defaults to the parent's. */
  sourcePath?: string | null;
  parent?: TypedObject | null;
  /** Descend breadth-first to the first node with this tag before matching. */
  rootTag?: string | null;
  filters?: Readonly<Filters>;
}

export interface ListAttrsOptions {
  rootTag?: string | null;
  filters?: Readonly<Filters>;
}

function descend(node: AttributeNode, rootTag: string): AttributeNode | null {
  for (const match of node.bfs(rootTag)) return match;
  return null;
}

/** Caller filters plus the `etag`/`type` predicates implied by the variant. */
function variantFilters(variant: Variant | null, filters: Readonly<Filters>): Filters {
  const combined: Filters = { ...filters };
  if (variant?.TAG && !('etag' in combined)) combined['etag'] = variant.TAG;
  if (variant?.TYPE && !('type' in combined)) combined['type'] = variant.TYPE;
  return combined;
}

/**
 * Builds every direct child of `node` (or of the `rootTag` descendant)
 * matching the filters. Children of unknown variant are skipped. Matches
 * under a `MediaContainer` envelope come back in a container seeded from
 * it, otherwise in an array.
 */
export function findItems(
  client: MediaClient,
  node: AttributeNode,
  options: FindOptions = {},
): ResultContainer | TypedObject[] {
  const variant = options.variant ?? null;
  const parent = options.parent ?? null;
  const context: BuildContext = {
    variant,
    sourcePath: options.sourcePath ?? parent?.sourcePath ?? null,
    parent,
  };
  const filters = variantFilters(variant, options.filters ?? {});
  const data = options.rootTag
    ? descend(node, options.rootTag) ?? AttributeNode.empty()
    : node;

  const items: TypedObject[] = [];
  for (const child of data.children) {
    if (!matchesFilters(child, filters)) continue;
    const item = buildItemOrNone(client, child, context);
    if (item !== null) items.push(item);
  }

  if (data.tag !== ResultContainer.TAG) return items;
  const container = new ResultContainer(client, data, context.sourcePath);
  container.push(...items);
  return container;
}

export function findItem(client: MediaClient, node: AttributeNode, options: FindOptions = {}): TypedObject | null {
  const items = findItems(client, node, options);
  return (items instanceof ResultContainer ? items.first() : items[0]) ?? null;
}

/** Value of `attribute` on every child that carries it and matches the filters. */
export function listAttrs(node: AttributeNode, attribute: string, options: ListAttrsOptions = {}): string[] {
  const data = options.rootTag ? descend(node, options.rootTag) : node;
  if (data === null) return [];

  const filters: Filters = { ...options.filters, [`${attribute}__exists`]: true };
  const values: string[] = [];
  for (const child of data.children) {
    const value = extractValues(child, [], attribute)[0] ?? null;
    if (value !== null && matchesFilters(child, filters)) values.push(value);
  }
  return values;
}
