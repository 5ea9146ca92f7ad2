import { UnboundManagerError } from './errors';
import type { BaseModel, ModelClass } from './model';
import { putProvisioned } from './provisioning';
import { formatTemplate, templateFields } from './template';
import { DocumentData, IndexParams } from './types';

export type CreateArgs = { id?: string } & DocumentData;

export type GetArgs = { id: string; volatile?: boolean } & IndexParams;

export type FilterArgs = {
  query?: string;
  limit?: number;
  offset?: number;
  sort?: string;
  checkAtLeast?: number;
} & IndexParams;

/**
 * Search results wrapped into model instances
 */
export interface SearchResults<M extends BaseModel = BaseModel> {
  results: M[];
  /** Number of documents returned */
  totalCount: number;
  /** Estimated number of matching documents */
  matchesEstimated: number;
  aggregations: Record<string, unknown> | null;
}

/**
 * Query and persistence operations for one model kind
 *
 * A manager is bound to its model class once, when the class is defined.
 * Keyword arguments that name a placeholder of the model's index template
 * are used to resolve the index path and never sent as document fields.
 */
export class Manager<M extends BaseModel = BaseModel> {
  private modelClass?: ModelClass<M>;

  bind(model: ModelClass<M>): void {
    this.modelClass = model;
  }

  get model(): ModelClass<M> {
    if (!this.modelClass) {
      throw new UnboundManagerError();
    }
    return this.modelClass;
  }

  /**
   * Move template parameters out of `kwargs` and return them
   */
  extractIndexParams(kwargs: Record<string, unknown>): IndexParams {
    const params: IndexParams = {};
    for (const field of templateFields(this.model.indexTemplate)) {
      if (Object.prototype.hasOwnProperty.call(kwargs, field)) {
        params[field] = kwargs[field];
        delete kwargs[field];
      }
    }
    return params;
  }

  protected wrap(data: DocumentData, indexParams: IndexParams): M {
    const instance = new this.model(data);
    instance.indexParams = indexParams;
    return instance;
  }

  /**
   * Create a document, provisioning the index schema if needed
   */
  async create(args: CreateArgs = {}): Promise<M> {
    const { id, ...fields } = args;
    const indexParams = this.extractIndexParams(fields);
    const index = formatTemplate(this.model.indexTemplate, indexParams);

    const data = await putProvisioned(this.model.client, index, fields, id ?? null, this.model.schema);
    return this.wrap(data, indexParams);
  }

  /**
   * Fetch a single document by id
   */
  async get(args: GetArgs): Promise<M> {
    const { id, volatile = false, ...rest } = args;
    const indexParams = this.extractIndexParams(rest);
    const index = formatTemplate(this.model.indexTemplate, indexParams);

    const data = await this.model.client.get(index, id, { volatile });
    return this.wrap(data, indexParams);
  }

  /**
   * Search documents
   */
  async filter(args: FilterArgs = {}): Promise<SearchResults<M>> {
    const { query, limit, offset, sort, checkAtLeast, ...rest } = args;
    const indexParams = this.extractIndexParams(rest);
    const index = formatTemplate(this.model.indexTemplate, indexParams);

    const response = await this.model.client.search(index, {
      query,
      limit,
      offset,
      sort,
      checkAtLeast,
    });

    return {
      results: response.hits.map(hit => this.wrap(hit, indexParams)),
      totalCount: response.count,
      matchesEstimated: response.total,
      aggregations: response.aggregations ?? null,
    };
  }
}
