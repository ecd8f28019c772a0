import type { EnvConfig } from '../config/env.js';

/** URL schemes a proxy can be mounted on. */
export type ProxyScheme = 'http://' | 'https://';

/** Proxy URL per scheme, e.g. `{ 'http://': 'http://a:3128', 'https://': 'http://b:3128' }`. */
export type ProxyMounts = Partial<Record<ProxyScheme, string>>;

/**
 * Effective proxy setting of a broker, decided once at construction.
 */
export type ProxyDecision =
  | { kind: 'none' }
  | { kind: 'single'; url: string }
  | { kind: 'split'; mounts: ProxyMounts };

const noProxy: ProxyDecision = { kind: 'none' };

/** Reads `KEY`, falling back to `key`; empty values count as unset. */
function lookup(source: Readonly<Record<string, string | undefined>>, key: string): string | undefined {
  return source[key] || source[key.toLowerCase()] || undefined;
}

/**
 * Derives the proxy setting from the settings mapping or, when that is empty and
 * `trustEnv` is set, from the process environment.
 *
 * Differing `HTTP_PROXY`/`HTTPS_PROXY` values split traffic per scheme; otherwise a
 * single proxy is picked with `ALL_PROXY` > `HTTPS_PROXY` > `HTTP_PROXY`.
 */
export function resolveProxy(
  env: EnvConfig,
  trustEnv: boolean,
  processEnv: NodeJS.ProcessEnv = process.env,
): ProxyDecision {
  let source: Readonly<Record<string, string | undefined>>;
  if (Object.keys(env).length > 0) {
    source = env;
  } else if (trustEnv) {
    source = processEnv;
  } else {
    return noProxy;
  }

  const allProxy = lookup(source, 'ALL_PROXY');
  const httpProxy = lookup(source, 'HTTP_PROXY');
  const httpsProxy = lookup(source, 'HTTPS_PROXY');

  if (httpProxy && httpsProxy && httpProxy !== httpsProxy) {
    return { kind: 'split', mounts: { 'http://': httpProxy, 'https://': httpsProxy } };
  }

  const single = allProxy ?? httpsProxy ?? httpProxy;
  return single ? { kind: 'single', url: single } : noProxy;
}

/** Inputs of {@link resolveClientProxy}. */
export interface ClientProxyOptions {
  proxy?: string;
  mounts?: ProxyMounts;
  envConfig: EnvConfig;
  trustEnv: boolean;
  processEnv?: NodeJS.ProcessEnv;
}

/**
 * Explicit `mounts`, then an explicit `proxy`, then whatever {@link resolveProxy}
 * finds in the settings or environment.
 */
export function resolveClientProxy({
  proxy,
  mounts,
  envConfig,
  trustEnv,
  processEnv,
}: ClientProxyOptions): ProxyDecision {
  if (mounts && Object.keys(mounts).length > 0) {
    return { kind: 'split', mounts };
  }

  if (proxy) {
    return { kind: 'single', url: proxy };
  }

  return resolveProxy(envConfig, trustEnv, processEnv);
}

/** Proxy URL a request to `url` should go through, if any. */
export function proxyFor(decision: ProxyDecision, url: string): string | undefined {
  switch (decision.kind) {
    case 'none':
      return undefined;
    case 'single':
      return decision.url;
    case 'split':
      return url.startsWith('https://') ? decision.mounts['https://'] : decision.mounts['http://'];
  }
}
