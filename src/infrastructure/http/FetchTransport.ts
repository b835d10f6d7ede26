export interface JsonResponse {
  status: number;
  body: unknown;
}

export type JsonTransport = (input: { url: string; timeoutMs: number }) => Promise<JsonResponse>;

export const fetchTransport: JsonTransport = async (input) => {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), input.timeoutMs);

  try {
    const response = await fetch(input.url, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal: controller.signal,
    });

    const body: unknown = await response.json().catch(() => ({}));
    return { status: response.status, body };
  } finally {
    clearTimeout(timeout);
  }
};
