import { Injectable, Inject, Logger } from '@nestjs/common';
import {
  BaseModel,
  CreateArgs,
  DefinedModel,
  FilterArgs,
  GetArgs,
  IndexClient,
  SearchResults,
} from 'xapiand-model';
import { XAPIAND_CLIENT } from './constants';

/**
 * NestJS service for xapiand-model
 *
 * Runs model operations with logging.
 */
@Injectable()
export class XapiandModelService {
  private readonly logger = new Logger(XapiandModelService.name);

  constructor(
    @Inject(XAPIAND_CLIENT)
    private readonly client: IndexClient,
  ) {}

  /**
   * Get the underlying client instance
   */
  getClient(): IndexClient {
    return this.client;
  }

  /**
   * Create a document of the given model kind
   */
  async create(model: DefinedModel, args: CreateArgs): Promise<BaseModel> {
    try {
      const instance = await model.objects.create(args);
      this.logger.debug(`Created ${model.modelName} document: ${String(instance.data.id)}`);
      return instance;
    } catch (error) {
      this.logger.error(`Failed to create ${model.modelName} document`, error);
      throw error;
    }
  }

  /**
   * Fetch a document by id
   */
  async get(model: DefinedModel, args: GetArgs): Promise<BaseModel> {
    try {
      const instance = await model.objects.get(args);
      this.logger.debug(`Retrieved ${model.modelName} document: ${args.id}`);
      return instance;
    } catch (error) {
      this.logger.error(`Failed to get ${model.modelName} document: ${args.id}`, error);
      throw error;
    }
  }

  /**
   * Search documents of the given model kind
   */
  async filter(model: DefinedModel, args: FilterArgs = {}): Promise<SearchResults> {
    try {
      const result = await model.objects.filter(args);
      this.logger.debug(
        `Search completed for ${model.modelName}, found ${result.totalCount} results of ${result.matchesEstimated} estimated`
      );
      return result;
    } catch (error) {
      this.logger.error(`Search failed for ${model.modelName}`, error);
      throw error;
    }
  }

  /**
   * Persist an instance's current data
   */
  async save(instance: BaseModel): Promise<void> {
    try {
      await instance.save();
      this.logger.debug(`Saved ${instance.modelName} document: ${String(instance.data.id)}`);
    } catch (error) {
      this.logger.error(`Failed to save ${instance.modelName} document`, error);
      throw error;
    }
  }

  /**
   * Delete an instance's document
   */
  async delete(instance: BaseModel): Promise<void> {
    try {
      await instance.delete();
      this.logger.debug(`Deleted ${instance.modelName} document: ${String(instance.data.id)}`);
    } catch (error) {
      this.logger.error(`Failed to delete ${instance.modelName} document`, error);
      throw error;
    }
  }
}
