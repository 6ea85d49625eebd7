import { ConfigurationError } from "../core/errors.js";
import { DublinCorePlugin } from "./dublin-core-plugin.js";
import type { MetadataFormatPlugin } from "./metadata-format-plugin.js";

/** Plugins that can be enabled by prefix from the repository file. */
const BUILT_IN_PLUGINS: Readonly<Record<string, () => MetadataFormatPlugin>> = {
  oai_dc: () => new DublinCorePlugin(),
};

/**
 * Metadata formats the repository disseminates, keyed by metadataPrefix.
 * Iterates in registration order.
 */
export class MetadataFormatRegistry {
  private readonly plugins = new Map<string, MetadataFormatPlugin>();

  register(plugin: MetadataFormatPlugin): this {
    const prefix = plugin.format.metadataPrefix.value;
    if (this.plugins.has(prefix)) {
      throw new ConfigurationError(`Metadata format "${prefix}" is registered twice`);
    }
    this.plugins.set(prefix, plugin);
    return this;
  }

  get(prefix: string): MetadataFormatPlugin | undefined {
    return this.plugins.get(prefix);
  }

  has(prefix: string): boolean {
    return this.plugins.has(prefix);
  }

  list(): MetadataFormatPlugin[] {
    return [...this.plugins.values()];
  }

  get size(): number {
    return this.plugins.size;
  }

  /** Registry holding the built-in plugins named by `prefixes`. */
  static fromPrefixes(prefixes: readonly string[]): MetadataFormatRegistry {
    const registry = new MetadataFormatRegistry();
    for (const prefix of prefixes) {
      const create = BUILT_IN_PLUGINS[prefix];
      if (!create) {
        throw new ConfigurationError(
          `Unknown metadata format "${prefix}"; available: ${Object.keys(BUILT_IN_PLUGINS).join(", ")}`,
        );
      }
      registry.register(create());
    }
    return registry;
  }
}
