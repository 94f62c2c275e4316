export interface CallOptions {
  signal?: AbortSignal;
}

export interface ProxyGroup {
  name: string;
  type?: string;
  now?: string;
  all: string[];
}

/**
 * Control surface of the proxy daemon, scoped to one selector group.
 *
 * `setActive` changes live routing for every connection through the daemon,
 * so implementations serialize it and callers must not treat it as idempotent.
 */
export interface ProxyController {
  readonly apiBaseUrl: string;
  readonly groupName: string;
  readonly proxyServer?: string;
  listProxies(options?: CallOptions): Promise<string[]>;
  getActive(options?: CallOptions): Promise<string | null>;
  setActive(name: string, options?: CallOptions): Promise<void>;
  probeDelay(name: string, timeoutMs: number, options?: CallOptions): Promise<number>;
}
