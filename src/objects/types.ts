import type { MediaClient } from '../client/media-client.js';
import type { Filters } from '../query/types.js';
import type { AttributeNode } from '../tree/attribute-node.js';

/** Listing a variant is specialised for; selects the `.session`/`.history` registry suffix. */
export type ListingKind = 'session' | 'history';

/**
 * How a population pass treats `null`:
 * - `strict`: a `null` never overwrites a field that already holds a value
 * - `permissive`: every field takes the new node's value, `null` included
 */
export type PopulationMode = 'strict' | 'permissive';

/** Value accepted for an include/exclude detail parameter. */
export type DetailParam = string | number | boolean;

export interface ReloadOptions {
  /** Path to fetch instead of the details path. */
  key?: string;
  /** Include/exclude overrides; rebuild the details path for this reload only. */
  params?: Readonly<Record<string, DetailParam>>;
}

/**
 * Surface shared by every materialized object, independent of its field
 * shape. Parents, containers and the registry work against this.
 */
export interface TypedObject {
  readonly key: string | null;
  readonly ratingKey: number | null;
  readonly librarySectionID: number | null;
  readonly node: AttributeNode;
  readonly sourcePath: string | null;
  readonly detailsPath: string | null;
  /** Enclosing object, or null when there was none or it has been collected. */
  readonly parent: TypedObject | null;
  setLibrarySectionID(id: number): void;
  reload(options?: ReloadOptions): Promise<this>;
  isChildOf(filters: Readonly<Filters>): boolean;
}

/** A concrete object class the factory can instantiate for a node. */
export interface Variant<T extends TypedObject = TypedObject> {
  new (client: MediaClient, node: AttributeNode, sourcePath?: string | null, parent?: TypedObject | null): T;
  readonly name: string;
  readonly TAG: string | null;
  readonly TYPE: string | null;
  readonly LISTING: ListingKind | null;
}

/** Context handed to the factory for one node. */
export interface BuildContext {
  variant: Variant | null;
  sourcePath: string | null;
  parent: TypedObject | null;
}
