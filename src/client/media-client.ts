import { resolveConfig } from '../config.js';
import type { ClientConfig, ResolvedConfig } from '../config.js';
import { SectionEditSink } from '../edits/section-edit-sink.js';
import { BadRequestError, XmlParseError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { ResultContainer } from '../objects/container.js';
import * as factory from '../objects/factory.js';
import * as finder from '../objects/finder.js';
import type { FindOptions, ListAttrsOptions } from '../objects/finder.js';
import * as pagination from '../objects/pagination.js';
import type { FetchOptions, FetchPath } from '../objects/pagination.js';
import { VariantRegistry } from '../objects/registry.js';
import type { BuildContext, TypedObject, Variant } from '../objects/types.js';
import type { AttributeNode } from '../tree/attribute-node.js';
import { parseXml } from '../tree/xml.js';
import type { EditSink, QueryOptions, Transport } from '../types.js';

/** Registry every client starts from: the container envelope itself. */
export const DEFAULT_REGISTRY = VariantRegistry.of(ResultContainer);

export interface MediaClientOptions extends ClientConfig {
  transport: Transport;
  /** Variants nodes are dispatched to. Default: DEFAULT_REGISTRY. */
  registry?: VariantRegistry;
  /** Where field edits go. Default: a SectionEditSink over this client. */
  editSink?: EditSink;
  /** Default: a pino logger at the resolved log level. */
  logger?: Logger;
}

export interface BuildOptions {
  variant?: Variant | null;
  sourcePath?: string | null;
  parent?: TypedObject | null;
}

type WithVariant<O, T extends TypedObject> = Omit<O, 'variant'> & { variant: Variant<T> };

function buildContext(options: BuildOptions): BuildContext {
  return {
    variant: options.variant ?? null,
    sourcePath: options.sourcePath ?? null,
    parent: options.parent ?? null,
  };
}

function parseCallerXml(xml: string): AttributeNode {
  try {
    return parseXml(xml);
  } catch (err) {
    if (err instanceof XmlParseError) throw new BadRequestError(err.message);
    throw err;
  }
}

/**
 * Entry point of the object graph. Owns the transport, the variant
 * registry, the edit sink and the resolved configuration; every
 * materialized object calls back into the client that built it.
 */
export class MediaClient implements Transport {
  readonly config: ResolvedConfig;
  readonly registry: VariantRegistry;
  readonly editSink: EditSink;
  readonly logger: Logger;
  private readonly transport: Transport;

  constructor(options: MediaClientOptions) {
    const { transport, registry, editSink, logger, ...config } = options;
    this.config = resolveConfig(config);
    this.transport = transport;
    this.registry = registry ?? DEFAULT_REGISTRY;
    this.editSink = editSink ?? new SectionEditSink(this);
    this.logger = logger ?? createLogger(this.config.logLevel);
  }

  /** One transport call, logged at debug level. */
  query(path: string, options: QueryOptions = {}): Promise<AttributeNode | null> {
    this.logger.debug({ method: options.method ?? 'GET', path }, `${options.method ?? 'GET'} ${path}`);
    return this.transport.query(path, options);
  }

  buildItem<T extends TypedObject>(node: AttributeNode, options: WithVariant<BuildOptions, T>): T;
  buildItem(node: AttributeNode, options?: BuildOptions): TypedObject;
  buildItem(node: AttributeNode, options: BuildOptions = {}): TypedObject {
    return factory.buildItem(this, node, buildContext(options));
  }

  buildItemOrNone<T extends TypedObject>(node: AttributeNode, options: WithVariant<BuildOptions, T>): T | null;
  buildItemOrNone(node: AttributeNode, options?: BuildOptions): TypedObject | null;
  buildItemOrNone(node: AttributeNode, options: BuildOptions = {}): TypedObject | null {
    return factory.buildItemOrNone(this, node, buildContext(options));
  }

  findItems<T extends TypedObject>(node: AttributeNode, options: WithVariant<FindOptions, T>): ResultContainer<T> | T[];
  findItems(node: AttributeNode, options?: FindOptions): ResultContainer | TypedObject[];
  findItems(node: AttributeNode, options: FindOptions = {}): ResultContainer | TypedObject[] {
    return finder.findItems(this, node, options);
  }

  findItem<T extends TypedObject>(node: AttributeNode, options: WithVariant<FindOptions, T>): T | null;
  findItem(node: AttributeNode, options?: FindOptions): TypedObject | null;
  findItem(node: AttributeNode, options: FindOptions = {}): TypedObject | null {
    return finder.findItem(this, node, options);
  }

  listAttrs(node: AttributeNode, attribute: string, options: ListAttrsOptions = {}): string[] {
    return finder.listAttrs(node, attribute, options);
  }

  fetchItems<T extends TypedObject>(path: FetchPath, options: WithVariant<FetchOptions, T>): Promise<ResultContainer<T>>;
  fetchItems(path: FetchPath, options?: FetchOptions): Promise<ResultContainer>;
  fetchItems(path: FetchPath, options: FetchOptions = {}): Promise<ResultContainer> {
    return pagination.fetchItems(this, path, options);
  }

  fetchItem<T extends TypedObject>(path: FetchPath, options: WithVariant<FetchOptions, T>): Promise<T>;
  fetchItem(path: FetchPath, options?: FetchOptions): Promise<TypedObject>;
  fetchItem(path: FetchPath, options: FetchOptions = {}): Promise<TypedObject> {
    return pagination.fetchItem(this, path, options);
  }

  /**
   * Materializes a caller-supplied XML document. Returns null when its root
   * is of an unknown variant; rejects malformed XML with BadRequestError.
   */
  loadXml<T extends TypedObject>(xml: string, options: WithVariant<BuildOptions, T>): T | null;
  loadXml(xml: string, options?: BuildOptions): TypedObject | null;
  loadXml(xml: string, options: BuildOptions = {}): TypedObject | null {
    return factory.buildItemOrNone(this, parseCallerXml(xml), buildContext(options));
  }
}
