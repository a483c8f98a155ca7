export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<{ result: T; latencyMs: number }> {
  const startedAt = Date.now();
  const controller = new AbortController();
  // timeoutMs <= 0 means wait indefinitely
  const timer = timeoutMs > 0 ? setTimeout(() => controller.abort(new Error("timeout")), timeoutMs) : undefined;

  const forward = () => controller.abort(parent?.reason);
  if (parent?.aborted) forward();
  parent?.addEventListener("abort", forward, { once: true });

  try {
    const result = await task(controller.signal);
    return { result, latencyMs: Date.now() - startedAt };
  } finally {
    if (timer) clearTimeout(timer);
    parent?.removeEventListener("abort", forward);
  }
}
