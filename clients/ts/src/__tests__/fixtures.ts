import { defineModel, DefinedModel } from '../model';
import { IndexClient, XapiandError } from '../types';

export const PRODUCT_SCHEMA = { name: { _type: 'text' }, price: { _type: 'floating' } };
export const SIMPLE_SCHEMA = { title: { _type: 'text' } };

export function createMockClient(): jest.Mocked<IndexClient> {
  return {
    put: jest.fn(),
    get: jest.fn(),
    search: jest.fn(),
    delete: jest.fn(),
  };
}

/** Model kind with a placeholder in its index template */
export function defineProduct(client: IndexClient): DefinedModel {
  return defineModel({
    name: 'Product',
    indexTemplate: '/products/{category}',
    schema: PRODUCT_SCHEMA,
    client,
  });
}

/** Model kind whose index path never varies */
export function defineSimpleModel(client: IndexClient): DefinedModel {
  return defineModel({
    name: 'SimpleModel',
    indexTemplate: '/items',
    schema: SIMPLE_SCHEMA,
    client,
  });
}

export function transportError(statusCode: number, message: string): XapiandError {
  return new XapiandError(message, { error: 'http_error', message, code: statusCode }, statusCode);
}
