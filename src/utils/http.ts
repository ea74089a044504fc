import { RETRYABLE_STATUS_CODES, RetryableError, TerminalError } from "./errors";

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

const NETWORK_FAILURE =
  /econnre|enotfound|etimedout|socket|network|fetch failed|abort|unable to connect|connectionrefused/i;

/**
 * Issue one HTTP request and turn failures into classified errors.
 * No retrying here; callers run this inside ResilientClient.call.
 */
export async function fetchOk(
  fetchImpl: FetchLike,
  url: string | URL,
  init: RequestInit = {},
): Promise<Response> {
  let response: Response;
  try {
    response = await fetchImpl(url, init);
  } catch (error) {
    if (init.signal?.aborted && init.signal.reason instanceof Error) {
      throw init.signal.reason;
    }
    const message = error instanceof Error ? `${error.name} ${error.message}` : String(error);
    if (NETWORK_FAILURE.test(message)) {
      throw new RetryableError(`Request to ${hostOf(url)} failed: ${message}`, undefined, { cause: error });
    }
    throw new TerminalError(`Request to ${hostOf(url)} failed: ${message}`, undefined, { cause: error });
  }

  if (response.ok) return response;

  const detail = `HTTP ${response.status} from ${hostOf(url)}`;
  if (RETRYABLE_STATUS_CODES.has(response.status) || response.status >= 500) {
    throw new RetryableError(detail, response.status);
  }
  throw new TerminalError(detail, response.status);
}

function hostOf(url: string | URL): string {
  try {
    return new URL(url).host;
  } catch {
    return String(url);
  }
}
