import { UnknownVariantError } from '../errors.js';
import type { AttributeNode } from '../tree/attribute-node.js';
import type { MediaClient } from '../client/media-client.js';
import { discriminator, dispatchKey } from './registry.js';
import type { BuildContext, TypedObject } from './types.js';

/**
 * Materializes one node. An explicit variant is instantiated as is;
 * otherwise the client's registry is consulted by dispatch key, then by
 * bare tag. The source path defaults to the parent's.
 */
export function buildItem(client: MediaClient, node: AttributeNode, context: BuildContext): TypedObject {
  const sourcePath = context.sourcePath ?? context.parent?.sourcePath ?? null;
  if (context.variant !== null) {
    return new context.variant(client, node, sourcePath, context.parent);
  }

  const key = dispatchKey(node, sourcePath);
  const variant = client.registry.resolve(key, node.tag);
  if (variant === null) {
    throw new UnknownVariantError(node.tag, discriminator(node), key);
  }
  return new variant(client, node, sourcePath, context.parent);
}

/** `buildItem`, with unknown variants reported as null. */
export function buildItemOrNone(client: MediaClient, node: AttributeNode, context: BuildContext): TypedObject | null {
  try {
    return buildItem(client, node, context);
  } catch (err) {
    if (err instanceof UnknownVariantError) return null;
    throw err;
  }
}
