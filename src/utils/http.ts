import { AppError, isTimeoutError, isTransientTransportError, toAppError } from './errors.js';

/** Request signal that fires on the caller's abort or after `timeoutMs`, whichever comes first. */
export function timeoutSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

/**
 * Maps a rejected fetch to the error taxonomy. A caller abort wins over
 * everything else so cancellation is never mistaken for a retryable failure.
 */
export function toTransportError(error: unknown, label: string, signal?: AbortSignal): AppError {
  if (signal?.aborted) {
    return AppError.cancelled(`${label} request cancelled`);
  }
  if (isTimeoutError(error)) {
    return AppError.transientTransport(`${label} request timed out`, error);
  }
  if (isTransientTransportError(error)) {
    const message = error instanceof Error ? error.message : String(error);
    return AppError.transientTransport(`${label} unreachable: ${message}`, error);
  }
  return toAppError(error);
}

export async function readJson(response: Response, label: string): Promise<unknown> {
  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch {
    throw AppError.malformedResponse(`${label} returned a body that is not JSON`, {
      status: response.status,
      body: text.slice(0, 200),
    });
  }
}
