/** Wraps a promise with a timeout labelled for logs */
export function withTimeout<T>(p: Promise<T>, ms: number, label: string): Promise<T> {
  let t: NodeJS.Timeout | undefined;
  const killer = new Promise<never>((_, rej) => {
    t = setTimeout(() => rej(new Error(`Timeout ${ms}ms in ${label}`)), ms);
  });
  return Promise.race([p, killer]).finally(() => clearTimeout(t));
}

/** Runs `fn` once plus `retries` more times; the last error is rethrown. */
export async function withRetry<T>(fn: () => Promise<T>, retries: number, label: string): Promise<T> {
  let lastErr: unknown;
  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      return await fn();
    } catch (e) {
      lastErr = e;
      if (attempt < retries) {
        console.warn(`[llm] ${label} failed (attempt ${attempt + 1}/${retries + 1}):`, e instanceof Error ? e.message : e);
      }
    }
  }
  throw lastErr;
}
