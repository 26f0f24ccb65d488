import { config } from './config/index.js';
import { loadSettings } from './config/loader.js';
import type { GatewaySettings } from './config/types.js';

import { AppContext } from './services/app-context.js';
import { ConfigWatcher, type WatcherFs } from './services/config-watcher.js';
import { logInfo, logWarn } from './services/logger.js';
import type { ScriptEngine } from './services/script-engine.js';

import { createGatewayApp } from './http/gateway-app.js';
import {
  type ListenerAddress,
  ListenerManager,
  planListeners,
  type TlsLoader,
} from './http/listener-manager.js';

export interface GatewayOptions {
  readonly configPath: string;
  readonly shutdownGraceMs?: number;
  /** Hot reload on configuration file changes. */
  readonly watch?: boolean;
  readonly load?: (filePath: string) => Promise<GatewaySettings>;
  readonly watcherFs?: WatcherFs;
  readonly loadTls?: TlsLoader;
  readonly scriptEngine?: ScriptEngine;
}

/** Startup, configuration swaps and shutdown of the whole gateway. */
export class Gateway {
  readonly context = new AppContext();
  private readonly listeners: ListenerManager;
  private readonly load: (filePath: string) => Promise<GatewaySettings>;
  private readonly graceMs: number;
  private watcher: ConfigWatcher | undefined;
  private stopping = false;

  constructor(private readonly options: GatewayOptions) {
    this.load = options.load ?? loadSettings;
    this.graceMs = options.shutdownGraceMs ?? config.server.shutdownGraceMs;
    this.listeners = new ListenerManager(
      createGatewayApp(this.context),
      options.loadTls
    );
    if (options.scriptEngine) {
      this.context.registerScriptEngine(options.scriptEngine);
    }
  }

  async start(): Promise<void> {
    const settings = await this.load(this.options.configPath);
    this.context.applySettings(settings);
    await this.listeners.startAll(planListeners(this.context.hosts));

    if (this.options.watch ?? true) {
      this.watcher = new ConfigWatcher({
        filePath: this.options.configPath,
        load: this.load,
        onReload: (next) => this.applySettings(next),
        ...(this.options.watcherFs && { fs: this.options.watcherFs }),
      });
      await this.watcher.start();
    }
  }

  /** Replaces the routing tables, then restarts the listeners against them. */
  async applySettings(settings: GatewaySettings): Promise<void> {
    if (this.stopping) {
      logWarn('Ignoring configuration swap during shutdown');
      return;
    }
    this.context.applySettings(settings);
    await this.listeners.restart(planListeners(this.context.hosts), this.graceMs);
    logInfo('Configuration reloaded', {
      hosts: this.context.hosts.size,
      listeners: this.listeners.size,
    });
  }

  /** Forces a reload outside the file watcher, e.g. on SIGHUP. */
  async reload(): Promise<void> {
    if (this.watcher) {
      await this.watcher.reloadNow();
      await this.watcher.whenSwapped();
      return;
    }
    await this.applySettings(await this.load(this.options.configPath));
  }

  addresses(): ListenerAddress[] {
    return this.listeners.addresses();
  }

  async shutdown(): Promise<void> {
    this.stopping = true;
    await this.listeners.retireAll(this.graceMs);
    this.watcher?.stop();
  }
}
