import type { z } from 'zod'

/** POST a JSON body and validate the JSON reply. Non-2xx replies throw with the server's `error` text when it sends one. */
export async function postJson<S extends z.ZodTypeAny>(
  url: string,
  body: unknown,
  schema: S,
  signal?: AbortSignal,
): Promise<z.output<S>> {
  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
    signal,
  })

  if (!response.ok) {
    const data: unknown = await response.json().catch(() => null)
    const message =
      typeof data === 'object' && data !== null && 'error' in data && typeof data.error === 'string'
        ? data.error
        : `Server error (${response.status})`
    throw new Error(message)
  }

  const parsed = schema.safeParse(await response.json())
  if (!parsed.success) {
    throw new Error(`Invalid response from ${new URL(url).pathname}: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`)
  }
  return parsed.data
}
