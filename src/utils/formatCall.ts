import { inspect } from 'node:util';

/** Named arguments of a connector call, as handed to {@link formatCall}. */
export type CallArguments = Record<string, unknown>;

/** Renders a key list as `['a', 'b']`. */
function formatKeys(keys: string[]): string {
  return `[${keys.map((key) => inspect(key)).join(', ')}]`;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Builds the one-line log message for a connector call.
 *
 * A `query` argument is logged verbatim. Otherwise every argument is summarized:
 * object arguments by their sorted keys, anything else by its inspected value.
 *
 * @example
 * formatCall('parsedWhois', { query: 'example.com' }); // "parsedWhois called with query: example.com"
 * formatCall('irisInvestigate', { params: { ip: '1.1.1.1', domain: 'a.com' } });
 * // "irisInvestigate called with params_keys=['domain', 'ip']"
 */
export function formatCall(caller: string, args: CallArguments = {}): string {
  const query = args.query;
  if (query !== undefined && query !== null) {
    return `${caller} called with query: ${String(query)}`;
  }

  const entries = Object.entries(args).filter(([, value]) => value !== undefined);
  if (entries.length === 0) {
    return `${caller} called`;
  }

  const summary = entries.map(([key, value]) =>
    isPlainObject(value) ? `${key}_keys=${formatKeys(Object.keys(value).sort())}` : `${key}=${inspect(value)}`,
  );

  return `${caller} called with ${summary.join(', ')}`;
}
