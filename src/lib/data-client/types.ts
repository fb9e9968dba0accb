/**
 * Contract between a DataRepository and the client it delegates to.
 * Shapes here are consumed as-is; nothing in the repository inspects them.
 */

/** Name of the item type a repository serves (e.g. "headline"). */
export type EntityType = string;

export interface ResponseMetadata {
  /** Correlation id assigned by the client for this call. */
  readonly requestId: string;
  readonly timestamp: Date;
}

/** Successful client response wrapping a payload. */
export interface SuccessApiResponse<D> {
  readonly status: 'success';
  readonly data: D;
  readonly metadata: ResponseMetadata;
}

export interface PaginatedResponse<T> {
  readonly items: T[];
  /** Continuation cursor for the next page; null on the last page. */
  readonly cursor: string | null;
  readonly hasMore: boolean;
}

export interface PaginationOptions {
  readonly cursor?: string;
  readonly limit?: number;
}

export type SortOrder = 'asc' | 'desc';

export interface SortOption {
  readonly field: string;
  readonly order: SortOrder;
}

/** Field name -> match criteria. Interpreted by the client only. */
export type DataFilter = Record<string, unknown>;

export type AggregateStage = Record<string, unknown>;
export type AggregatePipeline = AggregateStage[];
export type AggregateResult = Record<string, unknown>[];

/* ---------------------------
   Client call parameters
   --------------------------- */

export interface CreateParams<T> {
  item: T;
  userId?: string;
}

export interface ReadParams {
  id: string;
  userId?: string;
}

export interface ReadAllParams {
  userId?: string;
  filter?: DataFilter;
  pagination?: PaginationOptions;
  sort?: SortOption[];
}

export interface UpdateParams<T> {
  id: string;
  item: T;
  userId?: string;
}

export interface DeleteParams {
  id: string;
  userId?: string;
}

export interface CountParams {
  userId?: string;
  filter?: DataFilter;
}

export interface AggregateParams {
  pipeline: AggregatePipeline;
  userId?: string;
}

/**
 * Low-level data access for items of type T.
 * Implementations raise DataClientError subclasses (transport or format family).
 */
export interface DataClient<T> {
  create(params: CreateParams<T>): Promise<SuccessApiResponse<T>>;
  read(params: ReadParams): Promise<SuccessApiResponse<T>>;
  readAll(
    params: ReadAllParams,
  ): Promise<SuccessApiResponse<PaginatedResponse<T>>>;
  update(params: UpdateParams<T>): Promise<SuccessApiResponse<T>>;
  delete(params: DeleteParams): Promise<void>;
  count(params: CountParams): Promise<SuccessApiResponse<number>>;
  aggregate(
    params: AggregateParams,
  ): Promise<SuccessApiResponse<AggregateResult>>;
}
