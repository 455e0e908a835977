import { toDbError, type PostgrestErrorLike } from "./errors";
import { withUpstreamRetry, type UpstreamRetryOptions } from "./retry";

export type QueryResponse = {
  data: unknown;
  error: PostgrestErrorLike | null;
  status: number;
};

export type ExecuteQueryParams = {
  message: string;
  context?: Record<string, unknown>;
  run: () => PromiseLike<QueryResponse>;
  retry?: UpstreamRetryOptions;
};

/**
 * Await a PostgREST builder, converting its `error` into a classified
 * DbError. Upstream-unavailable failures are retried before surfacing.
 */
export async function executeQuery(params: ExecuteQueryParams): Promise<unknown> {
  return withUpstreamRetry(async () => {
    const { data, error, status } = await params.run();
    if (error) {
      throw toDbError({
        message: params.message,
        error,
        status,
        context: params.context,
      });
    }
    return data;
  }, params.retry);
}

export type CountQueryResponse = QueryResponse & { count: number | null };

/** Like executeQuery, for `{ count: "exact", head: true }` selects. */
export async function executeCountQuery(
  params: Omit<ExecuteQueryParams, "run"> & { run: () => PromiseLike<CountQueryResponse> },
): Promise<number> {
  return withUpstreamRetry(async () => {
    const { error, status, count } = await params.run();
    if (error) {
      throw toDbError({
        message: params.message,
        error,
        status,
        context: params.context,
      });
    }
    return count ?? 0;
  }, params.retry);
}
