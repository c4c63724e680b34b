import type { AttributeNode } from '../tree/attribute-node.js';
import type { Variant } from './types.js';

export const SESSION_LISTING_PATH = '/status/sessions';
export const HISTORY_LISTING_PATH = '/status/sessions/history';

/** First of `streamType`, `tagType` and `type` present on the node. */
export function discriminator(node: AttributeNode): string | null {
  return node.attr('streamType') ?? node.attr('tagType') ?? node.attr('type');
}

/** `TAG[.TYPE][.LISTING]`, the key a variant is registered under. */
export function registrationKey(variant: Variant): string {
  if (!variant.TAG) {
    throw new Error(`Variant ${variant.name} must declare a TAG to be registered`);
  }
  const parts = [variant.TAG];
  if (variant.TYPE) parts.push(variant.TYPE);
  if (variant.LISTING !== null) parts.push(variant.LISTING);
  return parts.join('.');
}

/**
 * Key a node is dispatched on: its tag plus discriminator, suffixed when
 * the node came from a live-session or history listing.
 */
export function dispatchKey(node: AttributeNode, sourcePath: string | null): string {
  const variantType = discriminator(node);
  const key = variantType ? `${node.tag}.${variantType}` : node.tag;
  if (sourcePath === SESSION_LISTING_PATH) return `${key}.session`;
  if (sourcePath?.startsWith(HISTORY_LISTING_PATH)) return `${key}.history`;
  return key;
}

/**
 * Immutable table of dispatch key → variant. Built once with `of()` and
 * extended with `with()`, which returns a new registry.
 */
export class VariantRegistry {
  private constructor(private readonly table: ReadonlyMap<string, Variant>) {}

  static of(...variants: Variant[]): VariantRegistry {
    return new VariantRegistry(new Map()).with(...variants);
  }

  with(...variants: Variant[]): VariantRegistry {
    const table = new Map(this.table);
    for (const variant of variants) {
      const key = registrationKey(variant);
      const existing = table.get(key);
      if (existing !== undefined) {
        throw new Error(`Ambiguous variant definition: ${key} is claimed by ${existing.name} and ${variant.name}`);
      }
      table.set(key, variant);
    }
    return new VariantRegistry(table);
  }

  /** Variant for `key`, else the one registered under the bare tag. */
  resolve(key: string, fallbackTag: string): Variant | null {
    return this.table.get(key) ?? this.table.get(fallbackTag) ?? null;
  }

  has(key: string): boolean {
    return this.table.has(key);
  }

  get size(): number {
    return this.table.size;
  }

  keys(): string[] {
    return [...this.table.keys()];
  }
}
