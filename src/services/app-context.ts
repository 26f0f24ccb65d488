import { config } from '../config/index.js';
import type { GatewaySettings } from '../config/types.js';

import { logDebug, setLogLevel } from './logger.js';
import { MimeTable } from './mime.js';
import { HostRegistry, UpstreamRegistry } from './registry.js';
import type { ScriptEngine } from './script-engine.js';

export interface ContextLimits {
  /** Request body cap for proxied requests, unless a route sets its own. */
  readonly maxBodySize: number;
}

/**
 * Routing state shared by every request handler and the reload path.
 * Owned by the application and passed explicitly.
 */
export class AppContext {
  readonly hosts = new HostRegistry();
  readonly upstreams = new UpstreamRegistry();
  private mimeTable = new MimeTable();
  private engine: ScriptEngine | undefined;

  constructor(
    readonly limits: ContextLimits = { maxBodySize: config.proxy.maxBodySize }
  ) {}

  get mime(): MimeTable {
    return this.mimeTable;
  }

  get scriptEngine(): ScriptEngine | undefined {
    return this.engine;
  }

  registerScriptEngine(engine: ScriptEngine): void {
    this.engine = engine;
  }

  /**
   * Clears both registries and repopulates them from `settings`. A file
   * without `log_level` falls back to the environment's level.
   */
  applySettings(settings: GatewaySettings): void {
    this.hosts.replaceAll(settings.hosts);
    this.upstreams.replaceAll(settings.upstreams);
    this.mimeTable = new MimeTable(settings.types, settings.defaultType);
    setLogLevel(settings.logLevel ?? config.logging.level);

    logDebug('Routing tables replaced', {
      hosts: this.hosts.size,
      upstreams: this.upstreams.names().length,
    });
  }
}
