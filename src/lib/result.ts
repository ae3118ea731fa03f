import { UpstreamUnavailableError, errorMessage } from './errors';

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export type ProviderResult<T> = Result<T, UpstreamUnavailableError>;

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Runs one upstream call under its own deadline. Timeouts, rejections and error
 * results all come back as `UpstreamUnavailableError`; nothing is thrown.
 */
export async function guardCall<T>(
  operation: string,
  timeoutMs: number,
  call: () => Promise<ProviderResult<T>>
): Promise<ProviderResult<T>> {
  let t: ReturnType<typeof setTimeout> | null = null;
  const timeoutP = new Promise<ProviderResult<T>>((resolve) => {
    t = setTimeout(() => resolve(err(new UpstreamUnavailableError(operation, 'timeout', `${timeoutMs}ms`))), timeoutMs);
  });

  try {
    return await Promise.race([
      Promise.resolve()
        .then(call)
        .catch((e: unknown) => err(new UpstreamUnavailableError(operation, 'error', errorMessage(e)))),
      timeoutP,
    ]);
  } finally {
    if (t) clearTimeout(t);
  }
}

export type Strategy<I, T> = {
  name: string;
  run: (input: I) => Promise<T | null>;
};

/** Tries each strategy in order and stops at the first one that yields a value. */
export async function firstSome<I, T>(
  strategies: ReadonlyArray<Strategy<I, T>>,
  input: I
): Promise<{ value: T; strategy: string } | null> {
  for (const s of strategies) {
    const value = await s.run(input);
    if (value !== null) return { value, strategy: s.name };
  }
  return null;
}
