/**
 * In-memory reading store.
 */

import {
  DEFAULT_APP_SETTINGS,
  parseAppSettings,
  type AppSettings,
} from "@/lib/settings/app-settings";
import type { Article, ReadingMode, ReadingProgress } from "@/lib/types/article";
import type { ArticleUpdate, NewArticle, ReadingStore } from "./types";

function progressKey(articleId: string, mode: ReadingMode): string {
  return `${mode}:${articleId}`;
}

export class MemoryReadingStore implements ReadingStore {
  private readonly articles = new Map<string, Article>();
  private readonly progress = new Map<string, ReadingProgress>();
  private settings: AppSettings | null = null;

  async createArticle(article: NewArticle): Promise<Article> {
    if (this.articles.has(article.id)) {
      throw new Error(`Article ${article.id} already exists`);
    }

    const created: Article = {
      id: article.id,
      url: article.url,
      title: article.title,
      content: article.content,
      summary: article.summary ?? null,
      dateAdded: article.dateAdded ?? new Date(),
      lastRead: article.lastRead ?? null,
    };
    this.articles.set(created.id, created);
    return { ...created };
  }

  async getArticle(id: string): Promise<Article | null> {
    const article = this.articles.get(id);
    return article ? { ...article } : null;
  }

  async listArticles(): Promise<Article[]> {
    return [...this.articles.values()]
      .sort((a, b) => b.dateAdded.getTime() - a.dateAdded.getTime())
      .map((article) => ({ ...article }));
  }

  async updateArticle(id: string, update: ArticleUpdate): Promise<Article | null> {
    const article = this.articles.get(id);
    if (!article) {
      return null;
    }

    const updated: Article = {
      ...article,
      title: update.title ?? article.title,
      summary: update.summary !== undefined ? update.summary : article.summary,
      lastRead: update.lastRead !== undefined ? update.lastRead : article.lastRead,
    };
    this.articles.set(id, updated);
    return { ...updated };
  }

  async deleteArticle(id: string): Promise<boolean> {
    const deleted = this.articles.delete(id);
    for (const [key, progress] of this.progress) {
      if (progress.articleId === id) {
        this.progress.delete(key);
      }
    }
    return deleted;
  }

  async getProgress(articleId: string, mode: ReadingMode): Promise<ReadingProgress | null> {
    const progress = this.progress.get(progressKey(articleId, mode));
    return progress ? { ...progress } : null;
  }

  async upsertProgress(progress: ReadingProgress): Promise<void> {
    this.progress.set(progressKey(progress.articleId, progress.mode), { ...progress });
  }

  async getSettings(): Promise<AppSettings> {
    if (!this.settings) {
      this.settings = { ...DEFAULT_APP_SETTINGS };
    }
    return { ...this.settings };
  }

  async updateSettings(patch: Partial<AppSettings>): Promise<AppSettings> {
    const current = await this.getSettings();
    this.settings = parseAppSettings({ ...current, ...patch });
    return { ...this.settings };
  }
}
