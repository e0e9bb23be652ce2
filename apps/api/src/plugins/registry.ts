import type { FastifyInstance } from "fastify";
import type { Logger } from "../logger.js";
import type { Plugin, PluginContext, PluginMetadata, Unsubscribe } from "./types.js";

interface LoadedPlugin {
  plugin: Plugin;
  unsubscribes: Unsubscribe[];
}

/**
 * Loads the enabled plugins: initialize, event listeners, then routes. A plugin
 * whose initialize fails is skipped and the rest still load. Routes are
 * mounted once; `reload` re-runs the lifecycle hooks only.
 */
export class PluginRegistry {
  private readonly available = new Map<string, Plugin>();
  private readonly loaded = new Map<string, LoadedPlugin>();
  private readonly logger: Logger;

  constructor(
    plugins: Plugin[],
    private readonly context: PluginContext,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "plugins" });
    for (const plugin of plugins) {
      this.available.set(plugin.name, plugin);
    }
  }

  async load(app: FastifyInstance, names: string[]): Promise<void> {
    for (const name of names) {
      const plugin = this.available.get(name);
      if (!plugin) {
        this.logger.warn({ plugin: name }, "Unknown plugin skipped");
        continue;
      }
      if (this.loaded.has(name)) {
        continue;
      }
      if (!(await this.start(plugin))) {
        continue;
      }

      if (plugin.routes) {
        await app.register(
          async (scope) => {
            await plugin.routes?.(scope, this.context);
          },
          { prefix: plugin.prefix },
        );
      }
      this.logger.info({ plugin: name, version: plugin.version }, "Plugin loaded");
    }
  }

  get(name: string): Plugin | null {
    return this.loaded.get(name)?.plugin ?? null;
  }

  list(): PluginMetadata[] {
    return [...this.available.values()].map((plugin) => ({
      name: plugin.name,
      version: plugin.version,
      enabled: this.loaded.has(plugin.name),
    }));
  }

  /** Shuts a loaded plugin down and starts it again. False when it is not loaded or fails to start. */
  async reload(name: string): Promise<boolean> {
    const entry = this.loaded.get(name);
    if (!entry) {
      return false;
    }
    await this.stop(entry);
    this.loaded.delete(name);
    return this.start(entry.plugin);
  }

  async shutdownAll(): Promise<void> {
    for (const [name, entry] of this.loaded) {
      try {
        await this.stop(entry);
      } catch (error) {
        this.logger.error({ err: error, plugin: name }, "Plugin shutdown failed");
      }
    }
    this.loaded.clear();
  }

  private async start(plugin: Plugin): Promise<boolean> {
    try {
      await plugin.initialize?.(this.context);
    } catch (error) {
      this.logger.error({ err: error, plugin: plugin.name }, "Plugin failed to initialize");
      return false;
    }

    const unsubscribes = plugin.registerEventListeners?.(this.context.bus, this.context) ?? [];
    this.loaded.set(plugin.name, { plugin, unsubscribes });
    return true;
  }

  private async stop(entry: LoadedPlugin): Promise<void> {
    for (const unsubscribe of entry.unsubscribes) {
      unsubscribe();
    }
    await entry.plugin.shutdown?.();
  }
}
