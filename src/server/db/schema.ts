/**
 * Drizzle ORM schema for PostgreSQL.
 * This defines the database structure for production.
 */

import { pgTable, text, timestamp, boolean, integer, serial, index } from 'drizzle-orm/pg-core';
import { DEFAULT_THEME_SLOTS } from './types';

// =============================================================================
// Users
// =============================================================================

export const users = pgTable('users', {
  id: text('id').primaryKey(), // external account id from the command channel
  displayName: text('display_name'),
  themeSlots: integer('theme_slots').default(DEFAULT_THEME_SLOTS).notNull(),
  isBanned: boolean('is_banned').default(false).notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
});

// =============================================================================
// Themes
// =============================================================================

export const themes = pgTable('themes', {
  id: serial('id').primaryKey(),
  publicId: text('public_id').notNull().unique(), // share handle, never derived from id
  ownerId: text('owner_id').notNull().references(() => users.id),
  name: text('name').notNull(),
  description: text('description').default('').notNull(),
  visibility: text('visibility', { enum: ['public', 'private'] }).default('public').notNull(),
  contentRef: text('content_ref').notNull(),
  contentHash: text('content_hash').notNull().unique(), // global dedup key
  previewRef: text('preview_ref').notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
}, (t) => ({
  ownerIdx: index('idx_themes_owner_id').on(t.ownerId),
  visibilityIdx: index('idx_themes_visibility').on(t.visibility),
}));

// =============================================================================
// Types (inferred from schema)
// =============================================================================

export type User = typeof users.$inferSelect;
export type Theme = typeof themes.$inferSelect;
