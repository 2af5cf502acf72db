/**
 * Plugin system
 *
 * Site-specific extraction routed by hostname before the generic scraping pipeline.
 */

import { pluginRegistry } from "./registry";
import { socialPostPlugin } from "./social-post";

let registered = false;

/**
 * Register all built-in plugins. Safe to call more than once.
 */
export function registerPlugins(): void {
  if (registered) {
    return;
  }
  pluginRegistry.register(socialPostPlugin);
  registered = true;
}

// Export registry and types
export { pluginRegistry, PluginRegistry } from "./registry";
export type * from "./types";
