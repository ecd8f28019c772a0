/** Scalar values accepted as query parameters. */
export type QueryValue = string | number | boolean;

/** Query parameters; `null`/`undefined` entries are dropped and arrays repeat the key. */
export type QueryParams = Record<string, QueryValue | readonly QueryValue[] | null | undefined>;

/**
 * Joins a base URL and an endpoint with exactly one slash between them,
 * however many slashes either side carries.
 *
 * @example
 * joinUrl('https://api.example.com/', '/v1/users'); // https://api.example.com/v1/users
 */
export function joinUrl(baseUrl: string, endpoint: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${endpoint.replace(/^\/+/, '')}`;
}

/**
 * Appends query parameters to an absolute URL, keeping any already present.
 */
export function appendSearchParams(url: string, params?: QueryParams): string {
  if (!params) {
    return url;
  }

  const parsed = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) {
      continue;
    }

    if (Array.isArray(value)) {
      for (const item of value) {
        parsed.searchParams.append(key, String(item));
      }
      continue;
    }

    parsed.searchParams.append(key, String(value));
  }

  return parsed.toString();
}
