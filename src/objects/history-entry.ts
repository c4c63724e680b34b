import { NotFoundError, UnsupportedError } from '../errors.js';
import { toDate, toInt } from '../tree/casts.js';
import { PartialObject } from './partial-object.js';
import type { ListingKind, TypedObject } from './types.js';

/** A play-history record for an item. */
export abstract class HistoryEntry<F extends object = Record<never, never>> extends PartialObject<F> {
  static override readonly LISTING: ListingKind | null = 'history';

  get accountID(): number | null {
    return toInt(this.node.attr('accountID'));
  }

  get deviceID(): number | null {
    return toInt(this.node.attr('deviceID'));
  }

  /** Path of this history record, e.g. `/status/sessions/history/12`. */
  get historyKey(): string | null {
    return this.node.attr('historyKey');
  }

  get viewedAt(): Date | null {
    return toDate(this.node.attr('viewedAt'));
  }

  /** The library item that was played, or null when it no longer exists. */
  async source(): Promise<TypedObject | null> {
    const path = this.detailsPath;
    if (!path) return null;
    try {
      return await this.fetchItem(path);
    } catch (err) {
      if (err instanceof NotFoundError) return null;
      throw err;
    }
  }

  /** Deletes this history record, not the item. */
  override async delete(): Promise<void> {
    const historyKey = this.historyKey;
    if (!historyKey) {
      throw new UnsupportedError(`Cannot delete ${this.constructor.name} without a historyKey.`);
    }
    await this.client.query(historyKey, { method: 'DELETE' });
  }

  protected override isEphemeral(): boolean {
    return true;
  }

  protected override performReload(): Promise<this> {
    return Promise.reject(new UnsupportedError(
      'History entries cannot be reloaded. Use source() to get the source media item.',
    ));
  }
}
