/**
 * URL Plugin System
 * Site-specific extraction that bypasses generic HTML scraping.
 */

/**
 * Result of extracting an article, from a plugin or the generic pipeline.
 */
export interface ExtractedArticle {
  title: string;
  content: string;
}

/**
 * Core plugin interface with hostname-based registry support.
 */
export interface UrlPlugin {
  /** Unique identifier for the plugin */
  name: string;

  /** Hostnames this plugin handles (for O(1) lookup) */
  hosts: string[];

  /**
   * More specific URL matching after hostname match.
   * Return true if this plugin should handle the URL.
   */
  matchUrl(url: URL): boolean;

  /** Plugin capabilities */
  capabilities: PluginCapabilities;
}

export interface PluginCapabilities {
  article?: ArticleCapability;
}

// ============ Article Capability ============

export interface ArticleFetchOptions {
  /** Aborting abandons the in-flight request. */
  signal?: AbortSignal;
}

export interface ArticleCapability {
  /**
   * Fetch the article for a URL.
   * Failures are thrown as ExtractionErrors; there is no fallback to scraping.
   */
  fetchArticle(url: URL, options?: ArticleFetchOptions): Promise<ExtractedArticle>;
}
