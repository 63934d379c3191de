import {
  pgTable,
  pgEnum,
  serial,
  timestamp,
  varchar,
  text,
  boolean,
} from 'drizzle-orm/pg-core';

// Dashboard roles
// admin: full access, including soft delete and user management
// founder / ceo: triage access (inbox, status, notes, export, analytics)
export const USER_ROLES = ['admin', 'founder', 'ceo'] as const;
export type UserRole = (typeof USER_ROLES)[number];
export const userRoleEnum = pgEnum('user_role', USER_ROLES);

export const users = pgTable('users', {
  id: serial('id').primaryKey(),
  email: varchar('email', { length: 255 }).notNull().unique(),
  passwordHash: text('password_hash').notNull(),
  name: varchar('name', { length: 255 }).notNull(),
  role: userRoleEnum('role').notNull(),

  // Deactivation is logical; login and sessions require an active account
  isActive: boolean('is_active').default(true).notNull(),

  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
