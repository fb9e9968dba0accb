import { MongoClient, Db, MongoClientOptions } from 'mongodb';

/**
 * Lazy MongoDB client.
 * - Connects on first use; concurrent first calls share one attempt.
 * - A failed attempt is forgotten so the next call retries.
 * - Graceful close on shutdown.
 */
export class LazyMongoClient {
  private client?: MongoClient;
  private connecting?: Promise<MongoClient>;

  constructor(
    private readonly uri: string,
    private readonly defaultDbName: string,
    private readonly options: MongoClientOptions = { ignoreUndefined: true },
  ) {}

  /** Get (or create) a connected MongoClient instance. */
  public async getClient(): Promise<MongoClient> {
    const existing: MongoClient | undefined = this.client;
    if (existing) return existing;

    const inflight: Promise<MongoClient> | undefined = this.connecting;
    if (inflight) return inflight;

    const connectPromise: Promise<MongoClient> = (async () => {
      const created = new MongoClient(this.uri, this.options);
      await created.connect();
      this.client = created;
      this.connecting = undefined;
      return created;
    })();

    this.connecting = connectPromise;

    try {
      const connected: MongoClient = await connectPromise;
      return connected;
    } catch (err) {
      this.connecting = undefined;
      this.client = undefined;
      throw err;
    }
  }

  /** Get a Db handle (defaults to the configured database). */
  public async getDb(dbName?: string): Promise<Db> {
    const client: MongoClient = await this.getClient();
    return client.db(dbName ?? this.defaultDbName);
  }

  /** Close client if connected (idempotent). Waits for a connect in flight. */
  public async close(): Promise<void> {
    const inflight: Promise<MongoClient> | undefined = this.connecting;
    if (inflight) {
      // A failed connect is reported to the getClient caller; nothing to close then.
      await inflight.catch(() => undefined);
    }

    const current: MongoClient | undefined = this.client;
    if (!current) return;
    this.client = undefined;
    this.connecting = undefined;
    await current.close();
  }
}
