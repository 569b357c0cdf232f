import { ProviderTimeoutError } from '../../utils/errors';

/**
 * Run one provider request with a per-attempt deadline.
 * The signal is handed to the SDK so the underlying fetch is cancelled too.
 */
export async function requestWithTimeout<T>(
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await run(controller.signal);
  } catch (error) {
    if (controller.signal.aborted) {
      throw new ProviderTimeoutError(`Request exceeded ${timeoutMs}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}
