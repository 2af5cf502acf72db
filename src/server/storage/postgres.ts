/**
 * Postgres-backed reading store.
 */

import { and, desc, eq } from "drizzle-orm";

import { logger } from "@/lib/logger";
import { parseAppSettings, type AppSettings } from "@/lib/settings/app-settings";
import type { Article, ReadingMode, ReadingProgress } from "@/lib/types/article";
import type { Database } from "@/server/db";
import { appSettings, articles, readingProgress, type ArticleRow } from "@/server/db/schema";
import type { ArticleUpdate, NewArticle, ReadingStore } from "./types";

/**
 * The settings table holds exactly one row.
 */
const SETTINGS_ROW_ID = 1;

function toArticle(row: ArticleRow): Article {
  return {
    id: row.id,
    url: row.url,
    title: row.title,
    content: row.content,
    summary: row.summary,
    dateAdded: row.dateAdded,
    lastRead: row.lastRead,
  };
}

export class PostgresReadingStore implements ReadingStore {
  constructor(private readonly db: Database) {}

  async createArticle(article: NewArticle): Promise<Article> {
    const [row] = await this.db
      .insert(articles)
      .values({
        id: article.id,
        url: article.url,
        title: article.title,
        content: article.content,
        summary: article.summary ?? null,
        dateAdded: article.dateAdded ?? new Date(),
        lastRead: article.lastRead ?? null,
      })
      .returning();

    logger.debug("Created article", { articleId: row.id });
    return toArticle(row);
  }

  async getArticle(id: string): Promise<Article | null> {
    const [row] = await this.db.select().from(articles).where(eq(articles.id, id)).limit(1);
    return row ? toArticle(row) : null;
  }

  async listArticles(): Promise<Article[]> {
    const rows = await this.db
      .select()
      .from(articles)
      .orderBy(desc(articles.dateAdded), desc(articles.id));
    return rows.map(toArticle);
  }

  async updateArticle(id: string, update: ArticleUpdate): Promise<Article | null> {
    const set: Partial<typeof articles.$inferInsert> = {};
    if (update.title !== undefined) set.title = update.title;
    if (update.summary !== undefined) set.summary = update.summary;
    if (update.lastRead !== undefined) set.lastRead = update.lastRead;

    if (Object.keys(set).length === 0) {
      return this.getArticle(id);
    }

    const [row] = await this.db.update(articles).set(set).where(eq(articles.id, id)).returning();
    return row ? toArticle(row) : null;
  }

  async deleteArticle(id: string): Promise<boolean> {
    // reading_progress rows go with it (ON DELETE CASCADE)
    const deleted = await this.db
      .delete(articles)
      .where(eq(articles.id, id))
      .returning({ id: articles.id });
    return deleted.length > 0;
  }

  async getProgress(articleId: string, mode: ReadingMode): Promise<ReadingProgress | null> {
    const [row] = await this.db
      .select()
      .from(readingProgress)
      .where(and(eq(readingProgress.articleId, articleId), eq(readingProgress.mode, mode)))
      .limit(1);

    if (!row) {
      return null;
    }
    return {
      articleId: row.articleId,
      mode: row.mode,
      currentWordIndex: row.currentWordIndex,
      totalWords: row.totalWords,
    };
  }

  async upsertProgress(progress: ReadingProgress): Promise<void> {
    const now = new Date();
    await this.db
      .insert(readingProgress)
      .values({
        articleId: progress.articleId,
        mode: progress.mode,
        currentWordIndex: progress.currentWordIndex,
        totalWords: progress.totalWords,
        updatedAt: now,
      })
      .onConflictDoUpdate({
        target: [readingProgress.articleId, readingProgress.mode],
        set: {
          currentWordIndex: progress.currentWordIndex,
          totalWords: progress.totalWords,
          updatedAt: now,
        },
      });
  }

  async getSettings(): Promise<AppSettings> {
    await this.db.insert(appSettings).values({ id: SETTINGS_ROW_ID }).onConflictDoNothing();

    const [row] = await this.db
      .select()
      .from(appSettings)
      .where(eq(appSettings.id, SETTINGS_ROW_ID))
      .limit(1);
    return parseAppSettings(row);
  }

  async updateSettings(patch: Partial<AppSettings>): Promise<AppSettings> {
    const current = await this.getSettings();
    const next = parseAppSettings({ ...current, ...patch });

    await this.db
      .update(appSettings)
      .set({ ...next, updatedAt: new Date() })
      .where(eq(appSettings.id, SETTINGS_ROW_ID));

    return next;
  }
}
