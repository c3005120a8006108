import { watch, type FSWatcher } from 'chokidar';
import { loadConfigFile, configFileToConfig } from './loader.js';
import type { MockServerConfig } from '../types/index.js';

/**
 * Settings a running server picks up without a restart
 */
export type ReloadableConfig = Partial<Pick<MockServerConfig, 'delay' | 'retention'>>;

export function pickReloadable(config: Partial<MockServerConfig>): ReloadableConfig {
  const reloadable: ReloadableConfig = {};
  if (config.delay) reloadable.delay = config.delay;
  if (config.retention) reloadable.retention = config.retention;
  return reloadable;
}

export interface ConfigWatcherOptions {
  /** Quiet period after the last change before reloading, in ms */
  debounceMs?: number;
  onError?: (error: Error) => void;
}

export interface ConfigWatcherState {
  watching: boolean;
  reloads: number;
  lastReloadAt: number | null;
  lastError: Error | null;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Re-reads one config file when it changes and passes its reloadable part to `apply`
 */
export class ConfigWatcher {
  private path: string;
  private apply: (update: ReloadableConfig) => void;
  private debounceMs: number;
  private onError?: (error: Error) => void;
  private fsWatcher: FSWatcher | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private reloads = 0;
  private lastReloadAt: number | null = null;
  private lastError: Error | null = null;

  constructor(path: string, apply: (update: ReloadableConfig) => void, options: ConfigWatcherOptions = {}) {
    this.path = path;
    this.apply = apply;
    this.debounceMs = options.debounceMs ?? 300;
    this.onError = options.onError;
  }

  start(): void {
    if (this.fsWatcher) return;

    // Editors often save in several writes; wait for the file to settle
    this.fsWatcher = watch(this.path, {
      ignoreInitial: true,
      awaitWriteFinish: { stabilityThreshold: 100, pollInterval: 50 },
    })
      .on('add', () => this.schedule())
      .on('change', () => this.schedule())
      .on('error', (error) => this.fail(error));
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const fsWatcher = this.fsWatcher;
    this.fsWatcher = null;
    await fsWatcher?.close();
  }

  /**
   * Load the file now; rejects when it is missing or invalid, leaving the server untouched
   */
  async reload(): Promise<void> {
    const update = pickReloadable(configFileToConfig(await loadConfigFile(this.path)));

    this.reloads++;
    this.lastReloadAt = Date.now();
    this.lastError = null;
    this.apply(update);
  }

  state(): ConfigWatcherState {
    return {
      watching: this.fsWatcher !== null,
      reloads: this.reloads,
      lastReloadAt: this.lastReloadAt,
      lastError: this.lastError,
    };
  }

  private schedule(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.reload().catch((error: unknown) => this.fail(error));
    }, this.debounceMs);
  }

  private fail(error: unknown): void {
    this.lastError = toError(error);
    this.onError?.(this.lastError);
  }
}
