import { DefinedModel, defineModel } from '../model';
import { Manager } from '../manager';
import { TemplateError, UnboundManagerError } from '../errors';
import { IndexClient } from '../types';
import {
  createMockClient,
  defineProduct,
  defineSimpleModel,
  PRODUCT_SCHEMA,
  transportError,
} from './fixtures';

describe('Manager', () => {
  let client: jest.Mocked<IndexClient>;
  let Product: DefinedModel;
  let SimpleModel: DefinedModel;

  beforeEach(() => {
    client = createMockClient();
    Product = defineProduct(client);
    SimpleModel = defineSimpleModel(client);
  });

  describe('extractIndexParams', () => {
    it('should move template fields out of the arguments', () => {
      const kwargs = { category: 'electronics', name: 'Phone' };

      const params = Product.objects.extractIndexParams(kwargs);

      expect(params).toEqual({ category: 'electronics' });
      expect(kwargs).toEqual({ name: 'Phone' });
    });

    it('should leave arguments untouched when no template field is present', () => {
      const kwargs = { name: 'Phone' };

      const params = Product.objects.extractIndexParams(kwargs);

      expect(params).toEqual({});
      expect(kwargs).toEqual({ name: 'Phone' });
    });

    it('should extract nothing for a template without placeholders', () => {
      const kwargs = { category: 'electronics', title: 'Old' };

      expect(SimpleModel.objects.extractIndexParams(kwargs)).toEqual({});
      expect(kwargs).toEqual({ category: 'electronics', title: 'Old' });
    });

    it('should ignore inherited properties named like a placeholder', () => {
      const Labelled = defineModel({
        name: 'Labelled',
        indexTemplate: '/labels/{toString}',
        schema: {},
        client,
      });
      const kwargs = { title: 'Old' };

      expect(Labelled.objects.extractIndexParams(kwargs)).toEqual({});
      expect(kwargs).toEqual({ title: 'Old' });
    });
  });

  describe('create', () => {
    it('should write the fields to the resolved index with a null id', async () => {
      const response = { id: '1', name: 'Phone', category: 'electronics' };
      client.put.mockResolvedValue(response);

      const product = await Product.objects.create({ category: 'electronics', name: 'Phone' });

      expect(client.put).toHaveBeenCalledTimes(1);
      expect(client.put).toHaveBeenCalledWith('/products/electronics', { name: 'Phone' }, null);
      expect(product).toBeInstanceOf(Product);
      expect(product.data).toEqual(response);
      expect(product.get('name')).toBe('Phone');
      expect(product.indexParams).toEqual({ category: 'electronics' });
    });

    it('should forward an explicit id', async () => {
      client.put.mockResolvedValue({ id: 'abc', name: 'Phone' });

      const product = await Product.objects.create({ id: 'abc', category: 'electronics', name: 'Phone' });

      expect(client.put).toHaveBeenCalledWith('/products/electronics', { name: 'Phone' }, 'abc');
      expect(product.get('id')).toBe('abc');
    });

    it('should not modify the caller arguments', async () => {
      client.put.mockResolvedValue({ id: '1' });
      const args = { category: 'electronics', name: 'Phone' };

      await Product.objects.create(args);

      expect(args).toEqual({ category: 'electronics', name: 'Phone' });
    });

    it('should retry once with the schema when the index has none', async () => {
      client.put
        .mockRejectedValueOnce(transportError(412, 'Precondition Failed'))
        .mockResolvedValueOnce({ id: '1', name: 'Phone' });

      const product = await Product.objects.create({ category: 'electronics', name: 'Phone' });

      expect(client.put).toHaveBeenCalledTimes(2);
      expect(client.put.mock.calls[0]).toEqual(['/products/electronics', { name: 'Phone' }, null]);
      expect(client.put.mock.calls[1]).toEqual([
        '/products/electronics',
        { name: 'Phone', _schema: PRODUCT_SCHEMA },
        null,
      ]);
      expect(product.data).toEqual({ id: '1', name: 'Phone' });
    });

    it('should rethrow other failures without retrying', async () => {
      const error = transportError(500, 'Internal Server Error');
      client.put.mockRejectedValue(error);

      await expect(Product.objects.create({ category: 'electronics', name: 'Phone' })).rejects.toBe(error);
      expect(client.put).toHaveBeenCalledTimes(1);
    });

    it('should propagate a failure of the retry', async () => {
      const error = transportError(400, 'Bad schema');
      client.put
        .mockRejectedValueOnce(transportError(412, 'Precondition Failed'))
        .mockRejectedValueOnce(error);

      await expect(Product.objects.create({ category: 'electronics', name: 'Phone' })).rejects.toBe(error);
      expect(client.put).toHaveBeenCalledTimes(2);
    });

    it('should fail before any request when a placeholder has no value', async () => {
      await expect(Product.objects.create({ name: 'Phone' })).rejects.toThrow(TemplateError);
      expect(client.put).not.toHaveBeenCalled();
    });

    it('should write to a fixed path for a template without placeholders', async () => {
      client.put.mockResolvedValue({ id: '9', title: 'New' });

      const item = await SimpleModel.objects.create({ title: 'New' });

      expect(client.put).toHaveBeenCalledWith('/items', { title: 'New' }, null);
      expect(item.indexParams).toEqual({});
    });
  });

  describe('filter', () => {
    it('should wrap every hit and report counts', async () => {
      client.search.mockResolvedValue({
        hits: [{ id: '1', name: 'A' }, { id: '2', name: 'B' }],
        count: 2,
        total: 100,
        aggregations: { avg: 5 },
      });

      const result = await Product.objects.filter({ category: 'electronics', query: '*', limit: 10 });

      expect(client.search).toHaveBeenCalledWith('/products/electronics', {
        query: '*',
        limit: 10,
        offset: undefined,
        sort: undefined,
        checkAtLeast: undefined,
      });
      expect(result.results).toHaveLength(2);
      expect(result.results[0]).toBeInstanceOf(Product);
      expect(result.results[1].get('name')).toBe('B');
      expect(result.results[1].indexParams).toEqual({ category: 'electronics' });
      expect(result.totalCount).toBe(2);
      expect(result.matchesEstimated).toBe(100);
      expect(result.aggregations).toEqual({ avg: 5 });
    });

    it('should report null aggregations when the response has none', async () => {
      client.search.mockResolvedValue({ hits: [], count: 0, total: 0 });

      const result = await Product.objects.filter({ category: 'electronics' });

      expect(result.results).toEqual([]);
      expect(result.aggregations).toBeNull();
    });

    it('should forward pagination, sort and estimation options', async () => {
      client.search.mockResolvedValue({ hits: [], count: 0, total: 0 });

      await SimpleModel.objects.filter({ offset: 20, sort: '-price', checkAtLeast: 1000, unrelated: 'x' });

      expect(client.search).toHaveBeenCalledWith('/items', {
        query: undefined,
        limit: undefined,
        offset: 20,
        sort: '-price',
        checkAtLeast: 1000,
      });
    });
  });

  describe('get', () => {
    it('should fetch by id from the resolved index', async () => {
      client.get.mockResolvedValue({ id: '42', name: 'Widget' });

      const product = await Product.objects.get({ id: '42', category: 'electronics' });

      expect(client.get).toHaveBeenCalledWith('/products/electronics', '42', { volatile: false });
      expect(product).toBeInstanceOf(Product);
      expect(product.get('name')).toBe('Widget');
      expect(product.indexParams).toEqual({ category: 'electronics' });
    });

    it('should forward the volatile flag', async () => {
      client.get.mockResolvedValue({ id: '42', name: 'Widget' });

      await Product.objects.get({ id: '42', category: 'electronics', volatile: true });

      expect(client.get).toHaveBeenCalledWith('/products/electronics', '42', { volatile: true });
    });

    it('should propagate not-found failures', async () => {
      const error = transportError(404, 'Not Found');
      client.get.mockRejectedValue(error);

      await expect(Product.objects.get({ id: 'missing', category: 'electronics' })).rejects.toBe(error);
    });
  });

  describe('unbound manager', () => {
    it('should refuse to operate before binding', async () => {
      const manager = new Manager();

      expect(() => manager.model).toThrow(UnboundManagerError);
      await expect(manager.create({ name: 'Phone' })).rejects.toThrow('Manager is not bound to a model class');
    });
  });
});
