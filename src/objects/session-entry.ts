import { BadRequestError } from '../errors.js';
import { toBool, toInt } from '../tree/casts.js';
import { PartialObject } from './partial-object.js';
import { SESSION_LISTING_PATH } from './registry.js';
import type { ListingKind, PopulationMode, ReloadOptions, TypedObject } from './types.js';

/**
 * An item as reported in the live-session listing. Entries cannot be
 * fetched on their own: a reload re-reads the listing and picks the entry
 * with the same session key, and the object is left as is when the session
 * has ended.
 */
export abstract class SessionEntry<F extends object = Record<never, never>> extends PartialObject<F> {
  static override readonly LISTING: ListingKind | null = 'session';

  private readonly playerCell = this.cached('player', () => this.findItem(this.node, { filters: { etag: 'Player' } }));
  private readonly sessionCell = this.cached('session', () => this.findItem(this.node, { filters: { etag: 'Session' } }));
  private readonly transcodeSessionCell = this.cached(
    'transcodeSession',
    () => this.findItem(this.node, { filters: { etag: 'TranscodeSession' } }),
  );

  get sessionKey(): number | null {
    return toInt(this.node.attr('sessionKey'));
  }

  /** True for a live TV session. */
  get live(): boolean {
    return toBool(this.node.attr('live')) ?? false;
  }

  get username(): string | null {
    return this.node.find('User')?.attr('title') ?? null;
  }

  get userId(): number | null {
    return toInt(this.node.find('User')?.attr('id') ?? null);
  }

  /** Client playing this session. */
  get player(): TypedObject | null {
    return this.playerCell.value;
  }

  /** Bandwidth session, when the session is using bandwidth. */
  get session(): TypedObject | null {
    return this.sessionCell.value;
  }

  /** Transcode session, when the item is being transcoded. */
  get transcodeSession(): TypedObject | null {
    return this.transcodeSessionCell.value;
  }

  players(): TypedObject[] {
    return this.player === null ? [] : [this.player];
  }

  sessions(): TypedObject[] {
    return this.session === null ? [] : [this.session];
  }

  transcodeSessions(): TypedObject[] {
    return this.transcodeSession === null ? [] : [this.transcodeSession];
  }

  /** The library item being played. */
  source(): Promise<TypedObject> {
    const path = this.detailsPath;
    if (!path) {
      return Promise.reject(new BadRequestError(`${this.constructor.name} has no key to fetch its source by`));
    }
    return this.fetchItem(path);
  }

  protected override isEphemeral(): boolean {
    return true;
  }

  protected override async performReload(_options: ReloadOptions, mode: PopulationMode): Promise<this> {
    const sessionKey = this.sessionKey;
    const data = await this.client.query(this.sourcePath ?? SESSION_LISTING_PATH);
    if (data !== null && sessionKey !== null) {
      this.findAndLoadNode(data, { sessionKey: String(sessionKey) }, mode);
    }
    return this;
  }
}
