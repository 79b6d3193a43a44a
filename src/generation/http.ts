import { GenerationError } from "./types.js";

export function backendHeaders(apiKey?: string): Record<string, string> {
  const headers: Record<string, string> = {
    "content-type": "application/json",
  };
  if (apiKey) headers.authorization = `Bearer ${apiKey}`;
  return headers;
}

/** POSTs a JSON body and returns the parsed JSON reply, mapping every failure to a GenerationError. */
export async function postJson(
  url: string,
  body: unknown,
  params: { apiKey?: string; signal?: AbortSignal; label: string },
): Promise<unknown> {
  if (params.signal?.aborted) {
    throw new GenerationError("aborted", `${params.label} aborted before sending`, { cause: params.signal.reason });
  }
  let res: Response;
  try {
    res = await fetch(url, {
      method: "POST",
      headers: backendHeaders(params.apiKey),
      body: JSON.stringify(body),
      signal: params.signal,
    });
  } catch (err) {
    throw toTransportError(err, params);
  }
  if (!res.ok) {
    const text = await res.text().catch(() => "");
    throw new GenerationError("backend_error", `${params.label} failed: ${res.status} ${text}`.trim(), {
      status: res.status,
    });
  }
  try {
    return await res.json();
  } catch (err) {
    if (params.signal?.aborted) throw toTransportError(err, params);
    throw new GenerationError("backend_error", `${params.label} returned invalid JSON`, { cause: err });
  }
}

function toTransportError(err: unknown, params: { signal?: AbortSignal; label: string }): GenerationError {
  if (params.signal?.aborted) {
    return new GenerationError("aborted", `${params.label} aborted`, { cause: err });
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new GenerationError("unreachable", `${params.label} unreachable: ${detail}`, { cause: err });
}
