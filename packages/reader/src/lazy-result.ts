import { err, type Result } from "@git-stamp/utils/result";

type LazyState<T> =
  | { status: "uncomputed" }
  | { status: "pending"; promise: Promise<Result<T, Error>> }
  | { status: "settled"; result: Result<T, Error> };

export type LazyStatus = LazyState<unknown>["status"];

/**
 * A value computed at most once, on first request.
 *
 * Callers that arrive while the computation is running share its promise;
 * later callers get the settled result. A computation that throws settles
 * as a failure carrying the thrown error.
 */
export class LazyResult<T> {
  private state: LazyState<T> = { status: "uncomputed" };

  /**
   * @param compute Produces the value
   * @param onFailure Called once if the computation settles as a failure
   */
  constructor(
    private readonly compute: () => Promise<Result<T, Error>>,
    private readonly onFailure?: (error: Error) => void,
  ) {}

  get status(): LazyStatus {
    return this.state.status;
  }

  get(): Promise<Result<T, Error>> {
    if (this.state.status === "settled") {
      return Promise.resolve(this.state.result);
    }
    if (this.state.status === "pending") {
      return this.state.promise;
    }
    const promise = this.run();
    this.state = { status: "pending", promise };
    return promise;
  }

  private async run(): Promise<Result<T, Error>> {
    let result: Result<T, Error>;
    try {
      result = await this.compute();
    } catch (error) {
      result = err(error instanceof Error ? error : new Error(String(error), { cause: error }));
    }
    this.state = { status: "settled", result };
    if (!result.success) {
      this.onFailure?.(result.error);
    }
    return result;
  }
}
