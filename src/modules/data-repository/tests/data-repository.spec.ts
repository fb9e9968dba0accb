import type { Subscription } from 'rxjs';
import { DataRepository } from '../data-repository';
import {
  success,
  type DataClient,
  type PaginatedResponse,
  type ResponseMetadata,
  type SortOption,
  type SuccessApiResponse,
} from '../../../lib/data-client';
import {
  DataFormatError,
  NotFoundError,
  ServerError,
} from '../../../lib/errors/DataClientError';

/* -----------------------------
   Typed helpers & mock builders
   ----------------------------- */

interface TestItem {
  id: string;
  value: string;
}

type ClientMocks = {
  [K in keyof DataClient<TestItem>]: jest.MockedFunction<
    DataClient<TestItem>[K]
  >;
};

function makeClient(): ClientMocks {
  return {
    create: jest.fn(),
    read: jest.fn(),
    readAll: jest.fn(),
    update: jest.fn(),
    delete: jest.fn(),
    count: jest.fn(),
    aggregate: jest.fn(),
  };
}

const ENTITY = 'test-item';
const metadata: ResponseMetadata = {
  requestId: 'test-req-id',
  timestamp: new Date(0),
};

function ok<D>(data: D): SuccessApiResponse<D> {
  return success(data, metadata);
}

const item: TestItem = { id: 'x', value: 'v' };
const updatedItem: TestItem = { id: 'x', value: 'updated' };
const page: PaginatedResponse<TestItem> = {
  items: [
    { id: 'id1', value: 'Item 1' },
    { id: 'id2', value: 'Item 2' },
  ],
  cursor: null,
  hasMore: false,
};

const notFound = new NotFoundError('test-item not found: missing');
const badFormat = new DataFormatError('Invalid data format');

/* -----------------------------
   Test suite
   ----------------------------- */

describe('DataRepository', () => {
  let client: ClientMocks;
  let repository: DataRepository<TestItem>;
  let events: string[];
  let subscription: Subscription;

  beforeEach(() => {
    client = makeClient();
    repository = new DataRepository<TestItem>({
      dataClient: client,
      entityType: ENTITY,
    });
    events = [];
    subscription = repository.entityUpdated.subscribe((type) => {
      events.push(type);
    });
  });

  afterEach(() => {
    subscription.unsubscribe();
    repository.dispose();
  });

  /* ---------------- create ---------------- */

  describe('create', () => {
    it('returns the unwrapped item and emits one notification', async () => {
      client.create.mockResolvedValueOnce(ok(item));

      const result = await repository.create({ item });

      expect(result).toEqual({ id: 'x', value: 'v' });
      expect(client.create).toHaveBeenCalledTimes(1);
      expect(client.create.mock.calls[0][0]).toStrictEqual({
        item,
        userId: undefined,
      });
      expect(events).toEqual([ENTITY]);
    });

    it('forwards the user scope', async () => {
      client.create.mockResolvedValueOnce(ok(item));

      await repository.create({ item, userId: 'user-1' });

      expect(client.create).toHaveBeenCalledWith({ item, userId: 'user-1' });
    });

    it('rethrows a transport error unchanged without notifying', async () => {
      client.create.mockRejectedValueOnce(notFound);

      await expect(repository.create({ item })).rejects.toBe(notFound);
      expect(events).toEqual([]);
    });

    it('rethrows a format error unchanged without notifying', async () => {
      client.create.mockRejectedValueOnce(badFormat);

      await expect(repository.create({ item })).rejects.toBe(badFormat);
      expect(events).toEqual([]);
    });

    it('emits only once the client call has resolved', async () => {
      let release: (value: SuccessApiResponse<TestItem>) => void = () =>
        undefined;
      client.create.mockReturnValueOnce(
        new Promise<SuccessApiResponse<TestItem>>((resolve) => {
          release = resolve;
        }),
      );

      const pending = repository.create({ item });
      await Promise.resolve();
      expect(events).toEqual([]);

      release(ok(item));
      await expect(pending).resolves.toEqual(item);
      expect(events).toEqual([ENTITY]);
    });
  });

  /* ---------------- read ---------------- */

  describe('read', () => {
    it('returns the unwrapped item without notifying', async () => {
      client.read.mockResolvedValueOnce(ok(item));

      const result = await repository.read({ id: 'x' });

      expect(result).toEqual(item);
      expect(client.read.mock.calls[0][0]).toStrictEqual({
        id: 'x',
        userId: undefined,
      });
      expect(events).toEqual([]);
    });

    it('rejects with the exact not-found error', async () => {
      client.read.mockRejectedValueOnce(notFound);

      await expect(repository.read({ id: 'missing' })).rejects.toBe(notFound);
      expect(client.read).toHaveBeenCalledWith({
        id: 'missing',
        userId: undefined,
      });
      expect(events).toEqual([]);
    });

    it('rejects with the exact format error', async () => {
      client.read.mockRejectedValueOnce(badFormat);

      await expect(repository.read({ id: 'x' })).rejects.toBe(badFormat);
      expect(events).toEqual([]);
    });
  });

  /* ---------------- readAll ---------------- */

  describe('readAll', () => {
    it('passes explicit undefined for every omitted option', async () => {
      client.readAll.mockResolvedValueOnce(ok(page));

      const result = await repository.readAll();

      const params = client.readAll.mock.calls[0][0];
      expect(Object.keys(params).sort()).toEqual([
        'filter',
        'pagination',
        'sort',
        'userId',
      ]);
      expect(params).toStrictEqual({
        userId: undefined,
        filter: undefined,
        pagination: undefined,
        sort: undefined,
      });
      expect(result.items).toEqual([
        { id: 'id1', value: 'Item 1' },
        { id: 'id2', value: 'Item 2' },
      ]);
      expect(result.hasMore).toBe(false);
      expect(result.cursor).toBeNull();
      expect(events).toEqual([]);
    });

    it('hands filter, pagination and sort through untouched', async () => {
      client.readAll.mockResolvedValueOnce(ok(page));
      const filter = { category: 'test' };
      const pagination = { cursor: 'c-1', limit: 5 };
      const sort: SortOption[] = [
        { field: 'name', order: 'asc' },
        { field: 'createdAt', order: 'desc' },
      ];

      await repository.readAll({ userId: 'user-1', filter, pagination, sort });

      const params = client.readAll.mock.calls[0][0];
      expect(params.userId).toBe('user-1');
      expect(params.filter).toBe(filter);
      expect(params.pagination).toBe(pagination);
      expect(params.sort).toBe(sort);
      expect(params.sort?.map((s) => s.field)).toEqual(['name', 'createdAt']);
    });

    it('returns the paginated payload as-is', async () => {
      const response = ok(page);
      client.readAll.mockResolvedValueOnce(response);

      await expect(repository.readAll()).resolves.toBe(response.data);
    });

    it('rethrows client errors unchanged', async () => {
      const failure = new ServerError('upstream unavailable');
      client.readAll.mockRejectedValueOnce(failure);

      await expect(repository.readAll()).rejects.toBe(failure);
      expect(events).toEqual([]);
    });
  });

  /* ---------------- update ---------------- */

  describe('update', () => {
    it('returns the updated item and emits one notification', async () => {
      client.update.mockResolvedValueOnce(ok(updatedItem));

      const result = await repository.update({ id: 'x', item: updatedItem });

      expect(result).toEqual({ id: 'x', value: 'updated' });
      expect(client.update.mock.calls[0][0]).toStrictEqual({
        id: 'x',
        item: updatedItem,
        userId: undefined,
      });
      expect(events).toEqual([ENTITY]);
    });

    it('rethrows a not-found error without notifying', async () => {
      client.update.mockRejectedValueOnce(notFound);

      await expect(
        repository.update({ id: 'missing', item: updatedItem }),
      ).rejects.toBe(notFound);
      expect(events).toEqual([]);
    });

    it('rethrows a format error without notifying', async () => {
      client.update.mockRejectedValueOnce(badFormat);

      await expect(
        repository.update({ id: 'x', item: updatedItem, userId: 'user-1' }),
      ).rejects.toBe(badFormat);
      expect(events).toEqual([]);
    });
  });

  /* ---------------- delete ---------------- */

  describe('delete', () => {
    it('resolves with no value and emits one notification', async () => {
      client.delete.mockResolvedValueOnce(undefined);

      await expect(repository.delete({ id: 'x' })).resolves.toBeUndefined();

      expect(client.delete.mock.calls[0][0]).toStrictEqual({
        id: 'x',
        userId: undefined,
      });
      expect(events).toEqual([ENTITY]);
    });

    it('rethrows a not-found error without notifying', async () => {
      client.delete.mockRejectedValueOnce(notFound);

      await expect(repository.delete({ id: 'missing' })).rejects.toBe(
        notFound,
      );
      expect(events).toEqual([]);
    });
  });

  /* ---------------- count ---------------- */

  describe('count', () => {
    it('returns the unwrapped count without notifying', async () => {
      client.count.mockResolvedValueOnce(ok(10));

      await expect(repository.count()).resolves.toBe(10);

      expect(client.count.mock.calls[0][0]).toStrictEqual({
        userId: undefined,
        filter: undefined,
      });
      expect(events).toEqual([]);
    });

    it('forwards filter and scope', async () => {
      client.count.mockResolvedValueOnce(ok(3));
      const filter = { category: 'test' };

      await repository.count({ userId: 'user-1', filter });

      expect(client.count).toHaveBeenCalledWith({ userId: 'user-1', filter });
    });

    it('rethrows a format error unchanged', async () => {
      client.count.mockRejectedValueOnce(badFormat);

      await expect(repository.count()).rejects.toBe(badFormat);
      expect(events).toEqual([]);
    });
  });

  /* ---------------- aggregate ---------------- */

  describe('aggregate', () => {
    const pipeline = [
      { $match: { status: 'active' } },
      { $group: { _id: '$category', count: { $sum: 1 } } },
    ];

    it('returns the unwrapped records without notifying', async () => {
      client.aggregate.mockResolvedValueOnce(ok([{ _id: 'A', count: 5 }]));

      const result = await repository.aggregate({ pipeline });

      expect(result).toEqual([{ _id: 'A', count: 5 }]);
      const params = client.aggregate.mock.calls[0][0];
      expect(params).toStrictEqual({ pipeline, userId: undefined });
      expect(params.pipeline).toBe(pipeline);
      expect(events).toEqual([]);
    });

    it('rethrows a transport error unchanged', async () => {
      client.aggregate.mockRejectedValueOnce(notFound);

      await expect(
        repository.aggregate({ pipeline, userId: 'user-1' }),
      ).rejects.toBe(notFound);
      expect(events).toEqual([]);
    });
  });

  /* ---------------- errors outside the families ---------------- */

  it('rethrows unclassified errors unchanged too', async () => {
    const boom = new Error('boom');
    client.read.mockRejectedValueOnce(boom);

    await expect(repository.read({ id: 'x' })).rejects.toBe(boom);
  });

  /* ---------------- notification stream ---------------- */

  describe('entityUpdated', () => {
    it('delivers every notification to every current subscriber', async () => {
      const second: string[] = [];
      const sub2 = repository.entityUpdated.subscribe((type) => {
        second.push(type);
      });
      client.create.mockResolvedValueOnce(ok(item));
      client.update.mockResolvedValueOnce(ok(updatedItem));
      client.delete.mockResolvedValueOnce(undefined);

      await repository.create({ item });
      await repository.update({ id: 'x', item: updatedItem });
      await repository.delete({ id: 'x' });
      sub2.unsubscribe();

      expect(events).toEqual([ENTITY, ENTITY, ENTITY]);
      expect(second).toEqual([ENTITY, ENTITY, ENTITY]);
    });

    it('does not replay earlier notifications to late subscribers', async () => {
      client.create.mockResolvedValue(ok(item));
      await repository.create({ item });

      const late: string[] = [];
      const lateSub = repository.entityUpdated.subscribe((type) => {
        late.push(type);
      });
      expect(late).toEqual([]);

      await repository.create({ item });
      lateSub.unsubscribe();

      expect(late).toEqual([ENTITY]);
      expect(events).toEqual([ENTITY, ENTITY]);
    });

    it('emits in the order the client calls settle, not the order they start', async () => {
      let createSettled = false;
      let releaseCreate: () => void = () => undefined;
      client.create.mockReturnValueOnce(
        new Promise<SuccessApiResponse<TestItem>>((resolve) => {
          releaseCreate = () => {
            createSettled = true;
            resolve(ok(item));
          };
        }),
      );
      client.update.mockResolvedValueOnce(ok(updatedItem));
      const seen: string[] = [];
      const orderSub = repository.entityUpdated.subscribe(() => {
        seen.push(createSettled ? 'create' : 'update');
      });

      const creating = repository.create({ item });
      await repository.update({ id: 'x', item: updatedItem });
      expect(seen).toEqual(['update']);

      releaseCreate();
      await creating;
      orderSub.unsubscribe();

      expect(seen).toEqual(['update', 'create']);
      expect(events).toEqual([ENTITY, ENTITY]);
    });

    it('keeps notifying remaining subscribers after one unsubscribes', async () => {
      client.delete.mockResolvedValue(undefined);
      subscription.unsubscribe();
      const other: string[] = [];
      const otherSub = repository.entityUpdated.subscribe((type) => {
        other.push(type);
      });

      await repository.delete({ id: 'x' });
      otherSub.unsubscribe();

      expect(events).toEqual([]);
      expect(other).toEqual([ENTITY]);
    });
  });

  /* ---------------- dispose ---------------- */

  describe('dispose', () => {
    it('completes the stream for existing subscribers', () => {
      let completed = false;
      const sub = repository.entityUpdated.subscribe({
        complete: () => {
          completed = true;
        },
      });

      repository.dispose();

      expect(completed).toBe(true);
      expect(sub.closed).toBe(true);
    });

    it('completes late subscribers immediately', () => {
      repository.dispose();

      let completed = false;
      const received: string[] = [];
      repository.entityUpdated.subscribe({
        next: (type) => {
          received.push(type);
        },
        complete: () => {
          completed = true;
        },
      });

      expect(completed).toBe(true);
      expect(received).toEqual([]);
    });

    it('drops notifications after disposal without throwing', async () => {
      client.create.mockResolvedValueOnce(ok(item));
      repository.dispose();

      await expect(repository.create({ item })).resolves.toEqual(item);
      expect(events).toEqual([]);
    });

    it('tolerates a second call', () => {
      repository.dispose();
      expect(() => repository.dispose()).not.toThrow();
    });

    it('is triggered by onModuleDestroy', () => {
      let completed = false;
      repository.entityUpdated.subscribe({
        complete: () => {
          completed = true;
        },
      });

      repository.onModuleDestroy();

      expect(completed).toBe(true);
    });
  });
});
