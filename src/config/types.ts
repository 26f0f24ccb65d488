// Logger types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';
export type LogMetadata = Record<string, unknown>;

// Error response body
export interface ErrorResponse {
  error: {
    code: string;
    statusCode: number;
    message: string;
  };
}

// Route behaviors
export interface PageDescriptor {
  readonly status: number;
  /** Path of the page file, relative to the route's pages root. */
  readonly page: string;
}

export interface StaticBehavior {
  readonly kind: 'static';
  readonly root: string;
  readonly index: readonly string[];
  readonly autoIndex: boolean;
}

export type ProxyTarget =
  | { readonly kind: 'url'; readonly url: string }
  | { readonly kind: 'upstream'; readonly name: string };

export interface ReverseProxyBehavior {
  readonly kind: 'reverse-proxy';
  readonly target: ProxyTarget;
  readonly timeoutSec: number;
}

export interface ForwardProxyBehavior {
  readonly kind: 'forward-proxy';
  readonly timeoutSec: number;
}

export interface RedirectBehavior {
  readonly kind: 'redirect';
  readonly to: string;
  readonly code: number;
}

export interface ScriptBehavior {
  readonly kind: 'script';
  readonly path: string;
}

export type RouteBehavior =
  | StaticBehavior
  | ReverseProxyBehavior
  | ForwardProxyBehavior
  | RedirectBehavior
  | ScriptBehavior;

export interface RouteConfig {
  /** Normalized location: leading and trailing `/`. */
  readonly location: string;
  readonly behavior: RouteBehavior;
  readonly pagesRoot?: string;
  readonly notFoundPage?: PageDescriptor;
  readonly errorPage?: PageDescriptor;
  readonly headers: Readonly<Record<string, string>>;
  readonly maxBodySize?: number;
}

export interface TlsConfig {
  readonly certificate: string;
  readonly certificateKey: string;
}

export interface HostConfig {
  readonly ip: string;
  readonly port: number;
  readonly tls?: TlsConfig;
  /** `null` marks the default host of the port. */
  readonly serverName: string | null;
  readonly timeoutSec: number;
  readonly keepaliveSec: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly routes: readonly RouteConfig[];
  readonly routeMap: ReadonlyMap<string, RouteConfig>;
  /** Route map keys, longest first. */
  readonly locations: readonly string[];
}

// Upstream groups
export type BalanceMethod =
  | 'roundrobin'
  | 'weightedroundrobin'
  | 'iphash'
  | 'leastconn';

export interface UpstreamServer {
  /** `host:port` */
  readonly address: string;
  readonly weight: number;
}

export interface UpstreamGroup {
  readonly name: string;
  readonly method: BalanceMethod;
  readonly servers: readonly UpstreamServer[];
}

export interface GatewaySettings {
  readonly logLevel?: LogLevel;
  readonly defaultType: string;
  readonly types: Readonly<Record<string, string>>;
  readonly hosts: readonly HostConfig[];
  readonly upstreams: readonly UpstreamGroup[];
}
