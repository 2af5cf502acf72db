/**
 * Reading store interface.
 *
 * Articles, per-mode reading progress, and the single settings record.
 * Implemented in memory for tests and embedding, and over Postgres.
 */

import type { ProgressStore } from "@/lib/reading/progress";
import type { SettingsStore } from "@/lib/settings/app-settings";
import type { Article } from "@/lib/types/article";

/**
 * Fields a caller supplies when saving an article.
 */
export type NewArticle = Pick<Article, "id" | "url" | "title" | "content"> &
  Partial<Pick<Article, "summary" | "dateAdded" | "lastRead">>;

/**
 * Fields that can change after an article is saved. Content never does.
 */
export type ArticleUpdate = Partial<Pick<Article, "title" | "summary" | "lastRead">>;

export interface ReadingStore extends ProgressStore, SettingsStore {
  createArticle(article: NewArticle): Promise<Article>;
  getArticle(id: string): Promise<Article | null>;
  /** Newest first by dateAdded */
  listArticles(): Promise<Article[]>;
  /** @returns The updated article, or null if it doesn't exist */
  updateArticle(id: string, update: ArticleUpdate): Promise<Article | null>;
  /** Also deletes the article's progress. @returns Whether an article was deleted */
  deleteArticle(id: string): Promise<boolean>;
}
