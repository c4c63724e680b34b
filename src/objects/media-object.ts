import type { MediaClient } from '../client/media-client.js';
import { NotFoundError, UnsupportedError } from '../errors.js';
import { matchesFilters } from '../query/evaluator.js';
import type { Filters } from '../query/types.js';
import type { AttributeNode } from '../tree/attribute-node.js';
import { toInt } from '../tree/casts.js';
import { CachedValue } from './cached-value.js';
import type { ResultContainer } from './container.js';
import type { FindOptions, ListAttrsOptions } from './finder.js';
import type { FetchOptions, FetchPath } from './pagination.js';
import type { DetailParam, ListingKind, PopulationMode, ReloadOptions, TypedObject, Variant } from './types.js';

/** Per-instance field storage: every field is unset, `null` or a value. */
export type FieldValues<F> = { [K in keyof F]?: F[K] | null };

interface Identity {
  key: string | null;
  ratingKey: number | null;
  librarySectionID: number | null;
}

const DISPLAY_ID_ATTRIBUTES = ['ratingKey', 'id', 'key', 'playQueueID', 'uri', 'type'];
const DISPLAY_NAME_ATTRIBUTES = ['title', 'name', 'username', 'product', 'tag', 'value'];

function clean(value: string | null): string | null {
  if (!value) return null;
  return value
    .replaceAll('/library/metadata/', '')
    .replaceAll('/children', '')
    .replaceAll('/accounts/', '')
    .replaceAll('/devices/', '')
    .replaceAll(' ', '-')
    .slice(0, 20);
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Base of every materialized object.
 *
 * Fields are populated from the backing node by `loadData`, once at
 * construction and again after every reload, and are written through
 * `setField` so the population mode decides whether a `null` may replace a
 * value. Subclasses must not declare class fields that `loadData` writes:
 * class field initializers run after this constructor and would reset them.
 */
export abstract class MediaObject<F extends object = Record<never, never>> implements TypedObject {
  static readonly TAG: string | null = null;
  static readonly TYPE: string | null = null;
  static readonly LISTING: ListingKind | null = null;

  /** Reload partial objects when an absent field is read through `get()`. */
  autoReload: boolean;

  protected readonly client: MediaClient;
  private currentNode: AttributeNode;
  private currentSourcePath: string | null;
  private currentDetailsPath: string | null;
  private readonly parentRef: WeakRef<TypedObject> | null;
  private readonly values: FieldValues<F> = {};
  private readonly identity: Identity = { key: null, ratingKey: null, librarySectionID: null };
  private readonly cells = new Map<string, CachedValue<unknown>>();
  private mode: PopulationMode = 'strict';

  constructor(
    client: MediaClient,
    node: AttributeNode,
    sourcePath: string | null = null,
    parent: TypedObject | null = null,
  ) {
    this.client = client;
    this.currentNode = node;
    this.parentRef = parent === null ? null : new WeakRef(parent);
    this.autoReload = client.config.autoReload;
    this.populate(node, 'strict');
    this.currentSourcePath = sourcePath ?? this.key;
    this.currentDetailsPath = this.buildDetailsPath();
  }

  /** Reads the variant's own fields from `node` via `setField`. */
  protected abstract loadData(node: AttributeNode): void;

  get key(): string | null {
    return this.identity.key;
  }

  get ratingKey(): number | null {
    return this.identity.ratingKey;
  }

  get librarySectionID(): number | null {
    return this.identity.librarySectionID;
  }

  get node(): AttributeNode {
    return this.currentNode;
  }

  get sourcePath(): string | null {
    return this.currentSourcePath;
  }

  get detailsPath(): string | null {
    return this.currentDetailsPath;
  }

  get parent(): TypedObject | null {
    return this.parentRef?.deref() ?? null;
  }

  setLibrarySectionID(id: number): void {
    this.identity.librarySectionID = id;
  }

  /** Current value of a field; never performs I/O. */
  peek<K extends keyof F>(name: K): F[K] | null {
    return this.values[name] ?? null;
  }

  /** First of the named node attributes that is present. */
  firstAttr(...names: string[]): string | null {
    for (const name of names) {
      const value = this.currentNode.attr(name);
      if (value !== null) return value;
    }
    return null;
  }

  /** Walks the parent chain for an ancestor whose node matches every filter. */
  isChildOf(filters: Readonly<Filters>): boolean {
    let ancestor = this.parent;
    while (ancestor !== null) {
      if (matchesFilters(ancestor.node, filters)) return true;
      ancestor = ancestor.parent;
    }
    return false;
  }

  /** Names of the cached derived fields registered on this instance. */
  cachedFieldNames(): string[] {
    return [...this.cells.keys()];
  }

  toString(): string {
    const parts = [
      this.constructor.name,
      clean(this.firstAttr(...DISPLAY_ID_ATTRIBUTES)),
      clean(this.firstAttr(...DISPLAY_NAME_ATTRIBUTES)),
    ].filter((part): part is string => part !== null && part !== '');
    return `<${parts.join(':')}>`;
  }

  // --- Reload ---

  /**
   * Re-fetches this object and repopulates every field, letting the server
   * clear values it no longer reports. Cached derived fields are dropped
   * when the response yields a new node.
   */
  reload(options: ReloadOptions = {}): Promise<this> {
    return this.performReload(options, 'permissive');
  }

  protected async performReload(options: ReloadOptions, mode: PopulationMode): Promise<this> {
    const params = options.params;
    const detailsPath = params !== undefined && Object.keys(params).length > 0
      ? this.buildDetailsPath(params)
      : this.currentDetailsPath;
    const target = options.key || detailsPath || this.key;
    if (!target) {
      throw new UnsupportedError('Cannot reload an object not built from a URL.');
    }

    const data = await this.client.query(target);
    const node = data?.children[0];
    if (node === undefined) {
      throw new NotFoundError(`No item returned from ${target}`, this.constructor.name);
    }
    this.currentSourcePath = target;
    this.replaceNode(node, mode);
    return this;
  }

  /** Swaps the backing node and repopulates; cached fields survive only when the node is unchanged. */
  protected replaceNode(node: AttributeNode, mode: PopulationMode): void {
    if (node !== this.currentNode) {
      for (const cell of this.cells.values()) cell.clear();
    }
    this.currentNode = node;
    this.populate(node, mode);
  }

  /** Loads every direct child of `data` matching the filters; the last match wins. */
  protected findAndLoadNode(data: AttributeNode, filters: Readonly<Filters>, mode: PopulationMode = 'strict'): void {
    for (const child of data.children) {
      if (matchesFilters(child, filters)) this.replaceNode(child, mode);
    }
  }

  // --- Fields ---

  protected setField<K extends keyof F>(name: K, value: F[K] | null): void {
    if (value === null && this.mode === 'strict' && this.peek(name) !== null) return;
    this.values[name] = value;
  }

  /**
   * Registers a value derived from the backing node. It is computed on
   * first read and cleared whenever the backing node is replaced.
   */
  protected cached<T>(name: string, compute: () => T): CachedValue<T> {
    const cell = new CachedValue(compute);
    this.cells.set(name, cell);
    return cell;
  }

  private populate(node: AttributeNode, mode: PopulationMode): void {
    this.mode = mode;
    try {
      this.assignIdentity('key', node.attr('key'));
      this.assignIdentity('ratingKey', toInt(node.attr('ratingKey')));
      this.assignIdentity('librarySectionID', toInt(node.attr('librarySectionID')));
      this.loadData(node);
    } finally {
      this.mode = 'strict';
    }
  }

  private assignIdentity<K extends keyof Identity>(name: K, value: Identity[K]): void {
    if (value === null && this.mode === 'strict' && this.identity[name] !== null) return;
    this.identity[name] = value;
  }

  // --- Details path ---

  /** Detail parameters sent by default; `false`, `0` or `'0'` disables one. */
  protected includeParams(): Readonly<Record<string, DetailParam>> {
    return {};
  }

  /** Detail parameters sent only when enabled by an override. */
  protected excludeParams(): Readonly<Record<string, DetailParam>> {
    return {};
  }

  /**
   * `key` plus the enabled include/exclude parameters, sorted by name.
   * An exclude parameter enabled with `true` takes its table value.
   */
  protected buildDetailsPath(overrides: Readonly<Record<string, DetailParam>> = {}): string | null {
    const key = this.key;
    if (!key) return key;

    const params: [string, string][] = [];
    for (const [name, fallback] of Object.entries(this.includeParams())) {
      const value = overrides[name] ?? fallback;
      if (value === false || value === 0 || value === '0') continue;
      params.push([name, value === true ? '1' : String(value)]);
    }
    for (const [name, tableValue] of Object.entries(this.excludeParams())) {
      const value = overrides[name];
      if (value === undefined || value === false || value === 0 || value === '0') continue;
      params.push([name, String(value === true ? tableValue : value)]);
    }

    if (params.length === 0) return key;
    params.sort(([a], [b]) => compareNames(a, b));
    return `${key}?${new URLSearchParams(params).toString()}`;
  }

  // --- Fetching and finding, with this object as parent ---

  fetchItems<T extends TypedObject>(
    path: FetchPath,
    options: Omit<FetchOptions, 'variant'> & { variant: Variant<T> },
  ): Promise<ResultContainer<T>>;
  fetchItems(path: FetchPath, options?: FetchOptions): Promise<ResultContainer>;
  fetchItems(path: FetchPath, options: FetchOptions = {}): Promise<ResultContainer> {
    return this.client.fetchItems(path, { ...options, parent: this });
  }

  fetchItem<T extends TypedObject>(
    path: FetchPath,
    options: Omit<FetchOptions, 'variant'> & { variant: Variant<T> },
  ): Promise<T>;
  fetchItem(path: FetchPath, options?: FetchOptions): Promise<TypedObject>;
  fetchItem(path: FetchPath, options: FetchOptions = {}): Promise<TypedObject> {
    return this.client.fetchItem(path, { ...options, parent: this });
  }

  findItems<T extends TypedObject>(
    data: AttributeNode,
    options: Omit<FindOptions, 'variant'> & { variant: Variant<T> },
  ): ResultContainer<T> | T[];
  findItems(data: AttributeNode, options?: FindOptions): ResultContainer | TypedObject[];
  findItems(data: AttributeNode, options: FindOptions = {}): ResultContainer | TypedObject[] {
    return this.client.findItems(data, { ...options, parent: this });
  }

  findItem<T extends TypedObject>(
    data: AttributeNode,
    options: Omit<FindOptions, 'variant'> & { variant: Variant<T> },
  ): T | null;
  findItem(data: AttributeNode, options?: FindOptions): TypedObject | null;
  findItem(data: AttributeNode, options: FindOptions = {}): TypedObject | null {
    return this.client.findItem(data, { ...options, parent: this });
  }

  listAttrs(data: AttributeNode, attribute: string, options: ListAttrsOptions = {}): string[] {
    return this.client.listAttrs(data, attribute, options);
  }

  /** Materializes a caller-supplied XML document with this object as parent. */
  loadXml<T extends TypedObject>(xml: string, variant: Variant<T>): T | null;
  loadXml(xml: string): TypedObject | null;
  loadXml(xml: string, variant: Variant | null = null): TypedObject | null {
    return this.client.loadXml(xml, { variant, parent: this });
  }
}
