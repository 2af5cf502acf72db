import { logger } from "@/lib/logger";
import type { UrlPlugin, PluginCapabilities } from "./types";

/**
 * Plugin registry with hostname-indexed lookup.
 */
export class PluginRegistry {
  private hostIndex = new Map<string, UrlPlugin[]>();

  register(plugin: UrlPlugin): void {
    for (const host of plugin.hosts) {
      const normalized = host.toLowerCase();
      const existing = this.hostIndex.get(normalized) ?? [];
      if (!existing.includes(plugin)) {
        existing.push(plugin);
      }
      this.hostIndex.set(normalized, existing);
    }
    logger.debug("Registered plugin", {
      plugin: plugin.name,
      hosts: plugin.hosts,
      capabilities: Object.keys(plugin.capabilities),
    });
  }

  /**
   * Find the first plugin matching the URL with the given capability.
   */
  findWithCapability<K extends keyof PluginCapabilities>(
    url: URL,
    capability: K
  ): (UrlPlugin & { capabilities: Required<Pick<PluginCapabilities, K>> }) | null {
    const plugins = this.hostIndex.get(url.hostname.toLowerCase());
    if (!plugins) {
      return null;
    }

    for (const plugin of plugins) {
      if (plugin.matchUrl(url) && hasCapability(plugin, capability)) {
        return plugin;
      }
    }

    return null;
  }
}

function hasCapability<K extends keyof PluginCapabilities>(
  plugin: UrlPlugin,
  capability: K
): plugin is UrlPlugin & { capabilities: Required<Pick<PluginCapabilities, K>> } {
  return plugin.capabilities[capability] !== undefined;
}

// Global singleton
export const pluginRegistry = new PluginRegistry();
