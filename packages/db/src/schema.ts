import { integer, primaryKey, sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const flagStatuses = ['down'] as const;
export type FlagStatus = (typeof flagStatuses)[number];

// One row per target currently known to be down. Presence is the signal;
// rows are removed on recovery rather than updated.
export const flags = sqliteTable(
  'flags',
  {
    namespace: text('namespace').notNull(),
    key: text('key').notNull(),
    timestamp: integer('timestamp').notNull(),
    status: text('status', { enum: flagStatuses }).notNull(),
  },
  (t) => ({
    pk: primaryKey({ columns: [t.namespace, t.key] }),
  }),
);
