import type { AttributeNode } from '../tree/attribute-node.js';
import { toInt } from '../tree/casts.js';
import { MediaObject } from './media-object.js';
import type { TypedObject } from './types.js';

export interface ContainerFields {
  allowSync: number;
  augmentationKey: string;
  identifier: string;
  librarySectionTitle: string;
  librarySectionUUID: string;
  mediaTagPrefix: string;
  mediaTagVersion: string;
  offset: number;
  size: number;
  totalSize: number;
}

// filled from a merged container only while unset here
const PROVENANCE_FIELDS = [
  'allowSync',
  'augmentationKey',
  'identifier',
  'librarySectionTitle',
  'librarySectionUUID',
  'mediaTagPrefix',
  'mediaTagVersion',
] as const;

/**
 * Ordered result items plus the pagination metadata of the envelope they
 * came from. Merging another container with `extend` accumulates its
 * counts and fills unset provenance.
 */
export class ResultContainer<T extends TypedObject = TypedObject> extends MediaObject<ContainerFields> implements Iterable<T> {
  static override readonly TAG = 'MediaContainer';

  private readonly items: T[] = [];

  protected override loadData(node: AttributeNode): void {
    this.setField('allowSync', toInt(node.attr('allowSync')));
    this.setField('augmentationKey', node.attr('augmentationKey'));
    this.setField('identifier', node.attr('identifier'));
    this.setField('librarySectionTitle', node.attr('librarySectionTitle'));
    this.setField('librarySectionUUID', node.attr('librarySectionUUID'));
    this.setField('mediaTagPrefix', node.attr('mediaTagPrefix'));
    this.setField('mediaTagVersion', node.attr('mediaTagVersion'));
    this.setField('offset', toInt(node.attr('offset')));
    this.setField('size', toInt(node.attr('size')));
    this.setField('totalSize', toInt(node.attr('totalSize')));
  }

  get offset(): number | null {
    return this.peek('offset');
  }

  get size(): number | null {
    return this.peek('size');
  }

  get totalSize(): number | null {
    return this.peek('totalSize');
  }

  get length(): number {
    return this.items.length;
  }

  at(index: number): T | null {
    return this.items.at(index) ?? null;
  }

  first(): T | null {
    return this.at(0);
  }

  toArray(): T[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }

  push(...items: T[]): void {
    this.items.push(...items);
  }

  /**
   * Appends the items of `other`. When `other` is a container its metadata
   * is merged: sizes add up, the smaller offset is kept (the current one
   * when only it is set), the newer totalSize wins, and provenance fills
   * only the slots still unset here. The arithmetic does not check that
   * the two containers are contiguous pages.
   */
  extend(other: ResultContainer<T> | readonly T[]): this {
    const currentSize = this.size ?? this.items.length;
    if (!(other instanceof ResultContainer)) {
      this.items.push(...other);
      return this;
    }
    this.items.push(...other.items);

    const totalSize = other.totalSize;
    if (totalSize !== null) this.setField('totalSize', totalSize);

    this.setField('size', currentSize + (other.size ?? other.length));

    const offset = this.offset !== null && other.offset !== null
      ? Math.min(this.offset, other.offset)
      : this.offset ?? other.offset;
    this.setField('offset', offset);

    if (this.librarySectionID === null && other.librarySectionID !== null) {
      this.setLibrarySectionID(other.librarySectionID);
    }
    for (const name of PROVENANCE_FIELDS) {
      if (this.peek(name) === null) this.setField(name, other.peek(name));
    }
    return this;
  }
}
