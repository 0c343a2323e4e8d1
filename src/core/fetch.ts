import { Agent, Dispatcher, ProxyAgent } from "undici";

export interface DispatcherOptions {
  proxyUrl?: string;
  ignoreHttpsErrors: boolean;
}

const dispatchers = new Map<string, Dispatcher>();

function cacheKey(options: DispatcherOptions): string {
  return `${options.proxyUrl ?? "direct"}|${options.ignoreHttpsErrors ? "insecure" : "strict"}`;
}

/**
 * Requests are routed through the anti-bot proxy when one is configured. Such proxies
 * re-sign TLS, so `ignoreHttpsErrors` applies to the upstream connection as well.
 * Credentials are taken from the proxy URL's userinfo.
 */
export function getFetchDispatcher(options: DispatcherOptions): Dispatcher | undefined {
  if (!options.proxyUrl && !options.ignoreHttpsErrors) {
    return undefined;
  }

  const key = cacheKey(options);
  const cached = dispatchers.get(key);
  if (cached) {
    return cached;
  }

  const tls = { rejectUnauthorized: !options.ignoreHttpsErrors };
  const dispatcher: Dispatcher = options.proxyUrl
    ? new ProxyAgent({ uri: options.proxyUrl, requestTls: tls, proxyTls: tls })
    : new Agent({ connect: tls });
  dispatchers.set(key, dispatcher);
  return dispatcher;
}

export async function closeFetchDispatchers(): Promise<void> {
  const open = [...dispatchers.values()];
  dispatchers.clear();
  await Promise.all(open.map((dispatcher) => dispatcher.close()));
}
