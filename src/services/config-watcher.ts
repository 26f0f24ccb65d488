import { watch } from 'node:fs';
import { stat } from 'node:fs/promises';

import { config } from '../config/index.js';
import type { GatewaySettings } from '../config/types.js';

import { getErrorMessage, isMissingFileError, toError } from '../utils/error-utils.js';

import { logDebug, logError, logInfo, logWarn } from './logger.js';

export type WatcherState =
  | 'idle'
  | 'watching'
  | 'debouncing'
  | 'reloading'
  | 'swapping'
  | 'stopped';

export type WatchEventType = 'rename' | 'change';

export interface WatchHandle {
  close(): void;
}

/** Identity of the file's content as far as the watcher cares. */
export interface FileSignature {
  readonly ino: number;
  readonly size: number;
  readonly mtimeMs: number;
}

export interface WatcherFs {
  watch(
    filePath: string,
    onEvent: (event: WatchEventType) => void,
    onError: (error: Error) => void
  ): WatchHandle;
  stat(filePath: string): Promise<FileSignature | null>;
}

export interface ConfigWatcherOptions {
  readonly filePath: string;
  readonly load: (filePath: string) => Promise<GatewaySettings>;
  readonly onReload: (settings: GatewaySettings) => Promise<void>;
  readonly debounceMs?: number;
  readonly rewatchDelayMs?: number;
  readonly maxRetries?: number;
  readonly retryDelayMs?: number;
  readonly fs?: WatcherFs;
}

export const nodeWatcherFs: WatcherFs = {
  watch(filePath, onEvent, onError) {
    const watcher = watch(filePath, { persistent: false }, (eventType) => {
      onEvent(eventType);
    });
    watcher.on('error', onError);
    return watcher;
  },
  async stat(filePath) {
    try {
      const stats = await stat(filePath);
      return { ino: stats.ino, size: stats.size, mtimeMs: stats.mtimeMs };
    } catch (error: unknown) {
      if (isMissingFileError(error)) return null;
      throw error;
    }
  },
};

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

function sameSignature(
  a: FileSignature | null,
  b: FileSignature | null
): boolean {
  if (a === null || b === null) return a === b;
  return a.ino === b.ino && a.size === b.size && a.mtimeMs === b.mtimeMs;
}

/**
 * Watches the configuration file and hands every successfully loaded
 * revision to `onReload`. Bursts of events collapse into one reload.
 */
export class ConfigWatcher {
  private currentState: WatcherState = 'idle';
  private handle: WatchHandle | undefined;
  private debounceTimer: NodeJS.Timeout | undefined;
  private signature: FileSignature | null = null;
  private needsRewatch = false;
  private activeSettle: Promise<void> | undefined;
  private queuedReload: Promise<void> | undefined;
  private dirtyWhileSettling = false;
  private swapChain: Promise<void> = Promise.resolve();

  private readonly fs: WatcherFs;
  private readonly debounceMs: number;
  private readonly rewatchDelayMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(private readonly options: ConfigWatcherOptions) {
    this.fs = options.fs ?? nodeWatcherFs;
    this.debounceMs = options.debounceMs ?? config.reload.debounceMs;
    this.rewatchDelayMs = options.rewatchDelayMs ?? config.reload.rewatchDelayMs;
    this.maxRetries = Math.max(1, options.maxRetries ?? config.reload.maxRetries);
    this.retryDelayMs = options.retryDelayMs ?? config.reload.retryDelayMs;
  }

  get state(): WatcherState {
    return this.currentState;
  }

  async start(): Promise<void> {
    if (this.currentState !== 'idle') return;
    this.signature = await this.readSignature();
    if (await this.establishWatch()) {
      this.currentState = 'watching';
      logInfo('Watching configuration file', { path: this.options.filePath });
    }
  }

  stop(): void {
    this.currentState = 'stopped';
    this.clearDebounce();
    this.closeWatch();
    logDebug('Configuration watcher stopped');
  }

  /**
   * Reloads immediately, bypassing the debounce window. During a running
   * reload, a fresh one is queued right behind it and awaited, so the file is
   * read after the request.
   */
  async reloadNow(): Promise<void> {
    if (this.isStopped()) return;
    this.clearDebounce();

    const running = this.activeSettle;
    if (!running) {
      await this.settle();
      return;
    }

    const rerun = (): Promise<void> => {
      this.queuedReload = undefined;
      this.clearDebounce();
      return this.settle();
    };
    // The running reload's failure is reported to whoever awaits it.
    this.queuedReload ??= running.then(rerun, rerun);
    await this.queuedReload;
  }

  /** Resolves once every queued swap has finished. */
  whenSwapped(): Promise<void> {
    return this.swapChain;
  }

  private handleEvent(event: WatchEventType): void {
    if (this.currentState === 'stopped') return;

    if (event === 'rename') {
      this.needsRewatch = true;
      this.markDirty();
      return;
    }

    this.checkContentChange().catch((error: unknown) => {
      logWarn('Failed to inspect configuration file', {
        error: getErrorMessage(error),
      });
    });
  }

  private handleWatchError(error: Error): void {
    if (this.currentState === 'stopped') return;
    logWarn('Configuration watch failed', { error: error.message });
    this.needsRewatch = true;
    this.markDirty();
  }

  // Access-time and permission updates also raise `change`; only a new
  // signature counts as a content change.
  private async checkContentChange(): Promise<void> {
    const next = await this.fs.stat(this.options.filePath);
    if (this.currentState === 'stopped') return;
    if (sameSignature(next, this.signature)) {
      logDebug('Ignoring metadata-only configuration event');
      return;
    }
    this.signature = next;
    this.markDirty();
  }

  private markDirty(): void {
    if (this.currentState === 'stopped') return;
    if (this.activeSettle) {
      this.dirtyWhileSettling = true;
      return;
    }

    this.clearDebounce();
    this.currentState = 'debouncing';
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = undefined;
      this.settle().catch((error: unknown) => {
        logError('Configuration reload aborted', toError(error));
      });
    }, this.debounceMs);
    this.debounceTimer.unref();
  }

  private settle(): Promise<void> {
    if (this.activeSettle) {
      this.dirtyWhileSettling = true;
      return this.activeSettle;
    }
    this.activeSettle = this.runSettle().finally(() => {
      this.activeSettle = undefined;
      this.afterSettle();
    });
    return this.activeSettle;
  }

  private async runSettle(): Promise<void> {
    if (this.needsRewatch) {
      this.needsRewatch = false;
      await delay(this.rewatchDelayMs);
      if (this.isStopped()) return;
      await this.establishWatch();
    }
    if (this.isStopped()) return;

    this.currentState = 'reloading';
    const settings = await this.loadWithRetries();
    if (settings && !this.isStopped()) {
      this.currentState = 'swapping';
      this.enqueueSwap(settings);
    }
  }

  private afterSettle(): void {
    if (this.isStopped()) return;
    this.currentState = 'watching';
    if (this.dirtyWhileSettling) {
      this.dirtyWhileSettling = false;
      this.markDirty();
    }
  }

  private isStopped(): boolean {
    return this.currentState === 'stopped';
  }

  private async establishWatch(): Promise<boolean> {
    this.closeWatch();

    for (let attempt = 1; attempt <= this.maxRetries; attempt += 1) {
      try {
        this.handle = this.fs.watch(
          this.options.filePath,
          (event) => {
            this.handleEvent(event);
          },
          (error) => {
            this.handleWatchError(error);
          }
        );
        this.signature = await this.readSignature();
        return true;
      } catch (error: unknown) {
        logWarn('Failed to watch configuration file', {
          path: this.options.filePath,
          attempt,
          error: getErrorMessage(error),
        });
        if (attempt < this.maxRetries) await delay(this.retryDelayMs);
        if (this.isStopped()) return false;
      }
    }

    logError('Giving up on watching configuration file', {
      path: this.options.filePath,
      attempts: this.maxRetries,
    });
    return false;
  }

  private async loadWithRetries(): Promise<GatewaySettings | undefined> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.maxRetries; attempt += 1) {
      try {
        return await this.options.load(this.options.filePath);
      } catch (error: unknown) {
        lastError = error;
        logWarn('Configuration reload attempt failed', {
          attempt,
          error: getErrorMessage(error),
        });
        if (attempt < this.maxRetries) await delay(this.retryDelayMs);
        if (this.isStopped()) return undefined;
      }
    }

    logError('Configuration reload failed, keeping the running configuration', {
      error: getErrorMessage(lastError),
    });
    return undefined;
  }

  private enqueueSwap(settings: GatewaySettings): void {
    this.swapChain = this.swapChain
      .then(() => this.options.onReload(settings))
      .catch((error: unknown) => {
        logError('Failed to apply reloaded configuration', toError(error));
      });
  }

  private async readSignature(): Promise<FileSignature | null> {
    try {
      return await this.fs.stat(this.options.filePath);
    } catch (error: unknown) {
      logWarn('Failed to stat configuration file', {
        error: getErrorMessage(error),
      });
      return null;
    }
  }

  private clearDebounce(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = undefined;
    }
  }

  private closeWatch(): void {
    this.handle?.close();
    this.handle = undefined;
  }
}
