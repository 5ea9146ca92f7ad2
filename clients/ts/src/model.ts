import { getDefaultClient } from './config';
import { MissingAttributeError } from './errors';
import { Manager } from './manager';
import { putProvisioned } from './provisioning';
import { formatTemplate } from './template';
import { DocumentData, IndexClient, IndexParams, Schema } from './types';

/** Names starting with this prefix are instance state, never document fields */
export const RESERVED_PREFIX = '_';

export function isReserved(name: string): boolean {
  return name.startsWith(RESERVED_PREFIX);
}

/**
 * Static description of a model kind
 */
export interface ModelDefinition {
  readonly modelName: string;
  readonly indexTemplate: string;
  readonly schema: Schema;
  readonly client: IndexClient;
}

export interface ModelClass<M extends BaseModel = BaseModel> extends ModelDefinition {
  new (data?: DocumentData | null, fields?: DocumentData): M;
}

/**
 * One document of a model kind
 *
 * Document fields live in a plain mapping and are read and written through
 * `get` and `set`. Reserved names (leading underscore) are kept as private
 * instance state so they are never sent on save.
 */
export abstract class BaseModel {
  private fields: DocumentData;
  private readonly privateState = new Map<string, unknown>();
  private params: IndexParams = {};

  constructor(data?: DocumentData | null, fields: DocumentData = {}) {
    this.fields = { ...(data ?? {}) };
    for (const [name, value] of Object.entries(fields)) {
      this.set(name, value);
    }
  }

  protected abstract get definition(): ModelDefinition;

  get modelName(): string {
    return this.definition.modelName;
  }

  /** Current document data */
  get data(): Readonly<DocumentData> {
    return this.fields;
  }

  /** Template values captured when the instance was created or fetched */
  get indexParams(): IndexParams {
    return this.params;
  }

  set indexParams(params: IndexParams) {
    this.params = { ...params };
  }

  has(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.fields, name);
  }

  /**
   * @throws MissingAttributeError when the document has no such field
   */
  get(name: string): unknown {
    if (!this.has(name)) {
      throw new MissingAttributeError(this.modelName, name);
    }
    return this.fields[name];
  }

  set(name: string, value: unknown): void {
    if (isReserved(name)) {
      this.privateState.set(name, value);
    } else {
      this.fields[name] = value;
    }
  }

  /** Read a reserved-name value stored with `set` */
  state(name: string): unknown {
    return this.privateState.get(name);
  }

  /**
   * Resolve this document's index path. Index parameters take precedence
   * over document fields of the same name.
   */
  resolveIndex(): string {
    return formatTemplate(this.definition.indexTemplate, { ...this.fields, ...this.params });
  }

  private documentId(): string | null {
    const id = this.fields.id;
    if (typeof id === 'string' || typeof id === 'number') {
      return String(id);
    }
    return null;
  }

  /**
   * Write the current data and replace it with the server's response
   */
  async save(): Promise<void> {
    const { client, schema } = this.definition;
    const index = this.resolveIndex();
    this.fields = await putProvisioned(client, index, this.fields, this.documentId(), schema);
  }

  /**
   * Delete this document from its index
   *
   * @throws MissingAttributeError when the document has no id
   */
  async delete(): Promise<void> {
    const id = this.documentId();
    if (id === null) {
      throw new MissingAttributeError(this.modelName, 'id');
    }
    await this.definition.client.delete(this.resolveIndex(), id);
  }

  toJSON(): DocumentData {
    return { ...this.fields };
  }

  toString(): string {
    return `${this.modelName}(${JSON.stringify(this.fields)})`;
  }
}

export type ManagerConstructor<M extends BaseModel> = new () => Manager<M>;

export interface ModelOptions {
  /** Class name used in messages and string output */
  name: string;
  indexTemplate: string;
  schema: Schema;
  /** Client for this kind; the default client is used when omitted */
  client?: IndexClient;
  /** Manager instance to attach instead of a new one */
  manager?: Manager;
  /** Class of the manager created when `manager` is omitted */
  managerClass?: ManagerConstructor<BaseModel>;
}

export type DefinedModel = ModelClass & { readonly objects: Manager };

/**
 * Declare a model kind and attach its manager as `objects`
 *
 * @example
 * const Product = defineModel({
 *   name: 'Product',
 *   indexTemplate: '/products/{category}',
 *   schema: { name: { _type: 'text' } },
 * });
 * const phone = await Product.objects.create({ category: 'electronics', name: 'Phone' });
 */
export function defineModel(options: ModelOptions): DefinedModel {
  const ManagerClass: ManagerConstructor<BaseModel> = options.managerClass ?? Manager;
  const manager = options.manager ?? new ManagerClass();

  class Model extends BaseModel {
    static readonly modelName = options.name;
    static readonly indexTemplate = options.indexTemplate;
    static readonly schema = options.schema;
    static readonly objects = manager;

    static get client(): IndexClient {
      return options.client ?? getDefaultClient();
    }

    protected get definition(): ModelDefinition {
      return Model;
    }
  }

  Object.defineProperty(Model, 'name', { value: options.name });
  manager.bind(Model);
  return Model;
}
