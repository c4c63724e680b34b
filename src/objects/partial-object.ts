import { searchType } from '../edits/search-types.js';
import { BadRequestError, UnsupportedError } from '../errors.js';
import { toBool } from '../tree/casts.js';
import type { EditFields } from '../types.js';
import { MediaObject } from './media-object.js';
import type { DetailParam } from './types.js';

const DEFAULT_INCLUDES: Readonly<Record<string, DetailParam>> = {
  checkFiles: 0,
  includeAllConcerts: 0,
  includeBandwidths: 1,
  includeChapters: 1,
  includeChildren: 0,
  includeConcerts: 0,
  includeExternalMedia: 0,
  includeExtras: 0,
  includeFields: 'thumbBlurHash,artBlurHash',
  includeGeolocation: 1,
  includeLoudnessRamps: 1,
  includeMarkers: 1,
  includeOnDeck: 0,
  includePopularLeaves: 0,
  includePreferences: 0,
  includeRelated: 0,
  includeRelatedCount: 0,
  includeReviews: 0,
  includeStations: 0,
};

const DEFAULT_EXCLUDES: Readonly<Record<string, DetailParam>> = {
  excludeElements: 'Media,Genre,Country,Guid,Rating,Collection,Director,Writer,Role,Producer,Similar,Style,Mood,Format',
  excludeFields: 'summary,tagline',
  skipRefresh: 1,
};

// legitimately null on many objects; reading them never reloads
const NEVER_RELOAD_FOR = new Set(['key', 'sourceURI']);

function isAbsent(value: unknown): boolean {
  return value === null || (Array.isArray(value) && value.length === 0);
}

/**
 * An object that may have been built from a listing carrying only some of
 * its fields. Reading an absent field through `get()` fetches the full
 * object once; after that the object is full and reads stay local.
 */
export abstract class PartialObject<F extends object = Record<never, never>> extends MediaObject<F> {
  private pendingEdits: EditFields | null = null;

  protected override includeParams(): Readonly<Record<string, DetailParam>> {
    return DEFAULT_INCLUDES;
  }

  protected override excludeParams(): Readonly<Record<string, DetailParam>> {
    return DEFAULT_EXCLUDES;
  }

  /**
   * Value of a field, reloading first when it is absent (`null` or an empty
   * list) and this object is still partial.
   */
  async get<K extends keyof F>(name: K): Promise<F[K] | null> {
    const value = this.peek(name);
    if (!isAbsent(value) || !this.reloadsFor(String(name))) return value;

    const title = this.firstAttr('title', 'name');
    const objectName = title === null ? this.constructor.name : `${this.constructor.name} '${title}'`;
    const field = String(name);
    this.client.logger.debug({ field }, `Reloading ${objectName} for field '${field}'`);
    await this.performReload({}, 'strict');
    return this.peek(name);
  }

  /**
   * True when every default detail parameter was requested from this
   * object's own path, or when it has no key to fetch itself by.
   */
  isFullObject(): boolean {
    const key = this.key;
    if (!key) return true;

    const details = splitPath(this.detailsPath ?? key);
    const source = splitPath(this.sourcePath ?? '');
    return details.path === source.path
      && details.query.every(([name, value]) => source.query.some(([n, v]) => n === name && v === value));
  }

  isPartialObject(): boolean {
    return !this.isFullObject();
  }

  /** Whether the server reports `field` as locked against metadata agents. */
  isLocked(field: string): boolean {
    const entry = this.node.findAll('Field').find((f) => f.attr('name') === field);
    return entry !== undefined && toBool(entry.attr('locked')) === true;
  }

  /** Same remote entity: both objects have the same non-null key. */
  equals(other: { readonly key: string | null }): boolean {
    return this.key !== null && this.key === other.key;
  }

  // --- Editing ---

  /**
   * Applies field edits through the client's edit sink, or records them
   * when batch mode is on. `type` defaults to the variant's search type.
   */
  async edit(fields: Readonly<EditFields>): Promise<this> {
    if (this.pendingEdits !== null) {
      Object.assign(this.pendingEdits, fields);
      return this;
    }
    await this.applyEdits(fields);
    return this;
  }

  /** Starts collecting edits until `saveEdits()`. */
  batchEdits(): this {
    this.pendingEdits = {};
    return this;
  }

  /** Applies the collected edits in one call and leaves batch mode. The object is not reloaded. */
  async saveEdits(): Promise<this> {
    const edits = this.pendingEdits;
    if (edits === null) {
      throw new BadRequestError('Batch editing mode not enabled. Must call `batchEdits()` first.');
    }
    this.pendingEdits = null;
    await this.applyEdits(edits);
    return this;
  }

  get inBatchMode(): boolean {
    return this.pendingEdits !== null;
  }

  // --- Server actions ---

  /** Asks the server to refresh this item's metadata. */
  async refresh(): Promise<void> {
    await this.client.query(`${this.requireKey('refresh')}/refresh`, { method: 'PUT' });
  }

  /** Asks the server to analyze this item's media. */
  async analyze(): Promise<void> {
    const key = this.requireKey('analyze').replace(/^\/+/, '');
    await this.client.query(`/${key}/analyze`, { method: 'PUT' });
  }

  async delete(): Promise<void> {
    const key = this.requireKey('delete');
    try {
      await this.client.query(key, { method: 'DELETE' });
    } catch (err) {
      this.client.logger.error(
        { err, key },
        `Failed to delete ${key}. This could be because deleting media is not allowed in the server settings`,
      );
      throw err;
    }
  }

  // --- Hooks ---

  /** Session and history entries cannot be fetched on their own and never auto-reload. */
  protected isEphemeral(): boolean {
    return false;
  }

  /** Type name sent as the edit's search type; the variant's TYPE by default. */
  protected searchTypeName(): string | null {
    const type: unknown = Reflect.get(this.constructor, 'TYPE');
    return typeof type === 'string' ? type : null;
  }

  protected requireKey(action: string): string {
    const key = this.key;
    if (!key) {
      throw new UnsupportedError(`Cannot ${action} ${this.constructor.name} without a key.`);
    }
    return key;
  }

  private reloadsFor(name: string): boolean {
    if (NEVER_RELOAD_FOR.has(name) || this.client.config.dontReloadFor.has(name)) return false;
    return this.autoReload && !this.isEphemeral() && !this.isFullObject();
  }

  private async applyEdits(fields: Readonly<EditFields>): Promise<void> {
    const payload: EditFields = { ...fields };
    const typeName = this.searchTypeName();
    if (!('type' in payload) && typeName !== null) {
      payload['type'] = searchType(typeName);
    }
    await this.client.editSink.applyEdits([this], payload);
  }
}

function splitPath(path: string): { path: string; query: [string, string][] } {
  const index = path.indexOf('?');
  if (index === -1) return { path, query: [] };
  return {
    path: path.slice(0, index),
    query: [...new URLSearchParams(path.slice(index + 1))],
  };
}
