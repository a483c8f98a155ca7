import { HttpError } from "../errors";
import { withTimeout } from "../utils/timeout";

export async function postJson<T>(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<{ data: T; latencyMs: number }> {
  const { result, latencyMs } = await withTimeout(
    async (timeoutSignal) => {
      const res = await fetch(url, {
        method: "POST",
        headers: { "content-type": "application/json", ...headers },
        body: JSON.stringify(body),
        signal: timeoutSignal
      });
      const text = await res.text();
      if (!res.ok) throw new HttpError(res.status, res.statusText, text);
      return JSON.parse(text) as T;
    },
    timeoutMs,
    signal
  );

  return { data: result, latencyMs };
}
