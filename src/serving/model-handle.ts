import { NoModelAvailableError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { ok, err } from "../lib/result.js";

import type { NotFoundError } from "../lib/errors.js";
import type { Result } from "../lib/result.js";
import type { LoadedModel, ModelRegistry } from "../registry/index.js";

type LoadResult = Result<LoadedModel, NoModelAvailableError | NotFoundError>;

const log = logger.child("[serving]");

/**
 * Reloadable reference to the model currently being served.
 *
 * The model is loaded lazily on first use. Concurrent callers during a
 * load share the same in-flight read; once loaded, reads are lock-free.
 */
export class ModelHandle {
  private model: LoadedModel | undefined;
  private loading: Promise<LoadResult> | undefined;

  constructor(private readonly registry: ModelRegistry) {}

  /**
   * The loaded model, if any, without triggering a load
   */
  get current(): LoadedModel | undefined {
    return this.model;
  }

  /**
   * The loaded model, loading the registry's current version if needed
   */
  async get(): Promise<LoadResult> {
    if (this.model !== undefined) {
      return ok(this.model);
    }
    if (this.loading === undefined) {
      this.loading = this.load().finally(() => {
        this.loading = undefined;
      });
    }
    return this.loading;
  }

  /**
   * Forget the loaded model; the next `get` reads the registry again
   */
  reload(): void {
    this.model = undefined;
  }

  private async load(): Promise<LoadResult> {
    const current = await this.registry.resolveCurrentVersion();
    if (!current.success) {
      return err(new NoModelAvailableError());
    }

    const loaded = await this.registry.load(current.data);
    if (!loaded.success) {
      return loaded;
    }

    this.model = loaded.data;
    log.info(`Loaded model v${loaded.data.versionId}`);
    return loaded;
  }
}

/**
 * Create a handle over a registry
 */
export function createModelHandle(registry: ModelRegistry): ModelHandle {
  return new ModelHandle(registry);
}
