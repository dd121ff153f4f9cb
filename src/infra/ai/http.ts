import { EmbeddingRequestError } from "../../domain/errors.js";

export async function postJson(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  signal: AbortSignal | undefined,
  label: string,
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...headers,
      },
      body: JSON.stringify(body),
      signal,
    });
  } catch (error) {
    if (signal?.aborted) {
      throw signal.reason;
    }
    throw new EmbeddingRequestError(
      `${label} request failed: ${error instanceof Error ? error.message : "network error"}`,
      null,
      { cause: error },
    );
  }

  if (!response.ok) {
    throw new EmbeddingRequestError(
      `${label} failed (${response.status}): ${await response.text()}`,
      response.status,
    );
  }
  return response.json();
}
