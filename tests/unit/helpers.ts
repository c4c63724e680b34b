import { vi } from 'vitest';
import { pino } from 'pino';
import { MediaClient } from '../../src/client/media-client.js';
import type { MediaClientOptions } from '../../src/client/media-client.js';
import { NotFoundError } from '../../src/errors.js';
import type { Logger } from '../../src/logger.js';
import { ResultContainer } from '../../src/objects/container.js';
import { HistoryEntry } from '../../src/objects/history-entry.js';
import { MediaObject } from '../../src/objects/media-object.js';
import { PartialObject } from '../../src/objects/partial-object.js';
import { VariantRegistry } from '../../src/objects/registry.js';
import { SessionEntry } from '../../src/objects/session-entry.js';
import { AttributeNode } from '../../src/tree/attribute-node.js';
import { toInt } from '../../src/tree/casts.js';
import type { QueryOptions, Transport } from '../../src/types.js';

export function el(tag: string, attributes: Record<string, string> = {}, ...children: AttributeNode[]): AttributeNode {
  return new AttributeNode(tag, attributes, children);
}

type Route = AttributeNode | null | ((options: QueryOptions) => AttributeNode | null);

/** In-process transport answering from a route table keyed by path. */
export class FakeTransport implements Transport {
  private readonly routes = new Map<string, Route>();

  readonly query = vi.fn(async (path: string, options: QueryOptions = {}): Promise<AttributeNode | null> => {
    const route = this.routes.get(path);
    if (route === undefined) throw new NotFoundError(`(404) not_found; ${path}`);
    return typeof route === 'function' ? route(options) : route;
  });

  on(path: string, route: Route): this {
    this.routes.set(path, route);
    return this;
  }

  /** Paths requested so far, in order. */
  paths(): string[] {
    return this.query.mock.calls.map(([path]) => path);
  }
}

// --- Test variants ---

interface MovieFields {
  title: string;
  year: number;
  summary: string;
  genres: string[];
}

function genreTags(node: AttributeNode): string[] {
  return node.findAll('Genre').map((genre) => genre.attr('tag') ?? '');
}

export class Movie extends PartialObject<MovieFields> {
  static override readonly TAG = 'Video';
  static override readonly TYPE = 'movie';

  private readonly genreCountCell = this.cached('genreCount', () => genreTags(this.node).length);

  get genreCount(): number {
    return this.genreCountCell.value;
  }

  protected override loadData(node: AttributeNode): void {
    this.setField('title', node.attr('title'));
    this.setField('year', toInt(node.attr('year')));
    this.setField('summary', node.attr('summary'));
    this.setField('genres', genreTags(node));
  }
}

export class Show extends PartialObject<{ title: string }> {
  static override readonly TAG = 'Directory';
  static override readonly TYPE = 'show';

  protected override loadData(node: AttributeNode): void {
    this.setField('title', node.attr('title'));
  }
}

/** Registered by bare tag: any `Genre` node, whatever its type. */
export class Genre extends MediaObject<{ tag: string }> {
  static override readonly TAG = 'Genre';

  protected override loadData(node: AttributeNode): void {
    this.setField('tag', node.attr('tag'));
  }
}

export class Player extends MediaObject<{ title: string }> {
  static override readonly TAG = 'Player';

  protected override loadData(node: AttributeNode): void {
    this.setField('title', node.attr('title'));
  }
}

export class MovieSession extends SessionEntry<MovieFields> {
  static override readonly TAG = 'Video';
  static override readonly TYPE = 'movie';

  protected override loadData(node: AttributeNode): void {
    this.setField('title', node.attr('title'));
    this.setField('year', toInt(node.attr('year')));
  }
}

export class MovieHistory extends HistoryEntry<MovieFields> {
  static override readonly TAG = 'Video';
  static override readonly TYPE = 'movie';

  protected override loadData(node: AttributeNode): void {
    this.setField('title', node.attr('title'));
  }
}

export const TEST_REGISTRY = VariantRegistry.of(
  ResultContainer,
  Movie,
  Show,
  Genre,
  Player,
  MovieSession,
  MovieHistory,
);

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export function makeClient(
  transport: Transport = new FakeTransport(),
  options: Omit<MediaClientOptions, 'transport'> = {},
): MediaClient {
  return new MediaClient({
    transport,
    registry: TEST_REGISTRY,
    logger: silentLogger(),
    autoReload: true,
    dontReloadFor: [],
    containerSize: 100,
    ...options,
  });
}
