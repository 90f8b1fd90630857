import { z } from "zod";

const errorBodySchema = z.object({ error: z.string() });

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise((resolve, reject) => {
    const handle = setTimeout(() => reject(new Error(`Request timed out after ${timeoutMs}ms`)), timeoutMs);
    promise
      .then((value) => {
        clearTimeout(handle);
        resolve(value);
      })
      .catch((err: unknown) => {
        clearTimeout(handle);
        reject(err);
      });
  });
}

/** GET `path` from the backend and validate the JSON body with `schema`. */
export async function getJson<T>(
  baseUrl: string,
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  timeoutMs: number,
): Promise<T> {
  const url = new URL(path, baseUrl);
  const response = await withTimeout(fetch(url.toString(), { headers: { Accept: "application/json" } }), timeoutMs);

  const data: unknown = await response.json();
  if (!response.ok) {
    const body = errorBodySchema.safeParse(data);
    throw new Error(body.success ? body.data.error : `HTTP ${response.status}`);
  }
  return schema.parse(data);
}
