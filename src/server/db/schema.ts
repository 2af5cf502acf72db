import {
  index,
  integer,
  pgEnum,
  pgTable,
  primaryKey,
  real,
  text,
  timestamp,
  uuid,
} from "drizzle-orm/pg-core";

// ============================================================================
// ENUMS
// ============================================================================

export const readingModeEnum = pgEnum("reading_mode", ["rsvp", "tts"]);

export const appearanceModeEnum = pgEnum("appearance_mode", ["system", "light", "dark"]);

// ============================================================================
// ARTICLES
// ============================================================================

/**
 * Articles table - one row per saved article.
 * Content is the extracted plain text and never changes after insert.
 */
export const articles = pgTable(
  "articles",
  {
    id: uuid("id").primaryKey(),
    url: text("url").notNull(),
    title: text("title").notNull(),
    content: text("content").notNull(),
    summary: text("summary"), // null until summarized

    dateAdded: timestamp("date_added", { withTimezone: true }).notNull().defaultNow(),
    lastRead: timestamp("last_read", { withTimezone: true }),
  },
  (table) => [index("idx_articles_date_added").on(table.dateAdded)]
);

// ============================================================================
// READING PROGRESS
// ============================================================================

/**
 * Reading progress - one row per (article, mode), replaced on every save.
 * TTS rows store the word offset of the current sentence.
 */
export const readingProgress = pgTable(
  "reading_progress",
  {
    articleId: uuid("article_id")
      .notNull()
      .references(() => articles.id, { onDelete: "cascade" }),
    mode: readingModeEnum("mode").notNull(),
    currentWordIndex: integer("current_word_index").notNull().default(0),
    totalWords: integer("total_words").notNull().default(0),

    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [primaryKey({ columns: [table.articleId, table.mode] })]
);

// ============================================================================
// SETTINGS
// ============================================================================

/**
 * App settings - a single row with id 1, created on first read.
 */
export const appSettings = pgTable("app_settings", {
  id: integer("id").primaryKey(),
  rsvpSpeedWpm: integer("rsvp_speed_wpm").notNull().default(300),
  ttsSpeedMultiplier: real("tts_speed_multiplier").notNull().default(1.0),
  focusColor: text("focus_color").notNull().default("#FF3B30"),
  selectedVoiceId: text("selected_voice_id"),
  appearanceMode: appearanceModeEnum("appearance_mode").notNull().default("system"),

  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export type ArticleRow = typeof articles.$inferSelect;
