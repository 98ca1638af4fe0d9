/**
 * Command Context - Lazy service creation
 *
 * Knows how to build the configuration, hub client and catalog a command
 * needs. Removes service instantiation from handlers; tests pass overrides.
 */

import { enableFileLogging, loadConfig, setLogLevel } from '@model-bootstrap/utils';
import type { BootstrapConfig } from '@model-bootstrap/utils';
import { HubClient } from '@model-bootstrap/hub-client';
import type { ModelHub } from '@model-bootstrap/hub-client';
import { loadCatalog } from '@model-bootstrap/fetcher';
import type { Catalog } from '@model-bootstrap/fetcher';
import { ConsoleOutput } from './output.js';
import type { Output } from './output.js';

/**
 * Options for creating a CommandContext with service overrides
 */
export interface CommandContextOptions {
  /** Use this configuration instead of reading the environment */
  config?: BootstrapConfig;
  output?: Output;
  /** Override the hub client (for testing) */
  hub?: ModelHub;
  catalog?: Catalog;
}

export class CommandContext {
  readonly output: Output;
  private _config: BootstrapConfig | null = null;
  private _hub: ModelHub | null = null;
  private _catalog: Catalog | null = null;
  private readonly _options: CommandContextOptions;

  constructor(options: CommandContextOptions = {}) {
    this._options = options;
    this.output = options.output ?? new ConsoleOutput();
  }

  /**
   * Configuration (lazy). The first load also applies the logging settings.
   */
  get config(): BootstrapConfig {
    if (!this._config) {
      this._config = this._options.config ?? loadConfig();
      setLogLevel(this._config.logLevel);
      if (this._config.logToFile) {
        enableFileLogging(this._config.logDir);
      }
    }
    return this._config;
  }

  get hub(): ModelHub {
    if (!this._hub) {
      this._hub =
        this._options.hub ??
        new HubClient({
          endpoint: this.config.hubEndpoint,
          token: this.config.hubToken,
          cacheDir: this.config.hubCacheDir,
          timeout: this.config.requestTimeoutMs,
        });
    }
    return this._hub;
  }

  get catalog(): Catalog {
    if (!this._catalog) {
      this._catalog = this._options.catalog ?? loadCatalog();
    }
    return this._catalog;
  }
}

/**
 * Factory function to create CommandContext with optional overrides
 */
export function createCommandContext(options: CommandContextOptions = {}): CommandContext {
  return new CommandContext(options);
}
