/**
 * Drizzle ORM schema definitions.
 *
 * Mirrors the SQL migrations in ./migrations; the migrations are the source of
 * truth for the physical tables.
 */

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';
import { DUTY_TYPES } from '@office-duties/shared';

/**
 * Members table - the office roster.
 * Deactivation is a soft delete: `active` is cleared, the row stays.
 */
export const members = sqliteTable('members', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  username: text('username').unique().notNull(),
  fullName: text('full_name'),
  coffeeDrinker: integer('coffee_drinker', { mode: 'boolean' }).notNull().default(true),
  active: integer('active', { mode: 'boolean' }).notNull().default(true),
});

/**
 * Duty assignments table - one row per member per duty per rotation cycle.
 */
export const dutyAssignments = sqliteTable(
  'duty_assignments',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    memberId: integer('member_id')
      .notNull()
      .references(() => members.id),
    dutyType: text('duty_type', { enum: DUTY_TYPES }).notNull(),
    assignedAt: text('assigned_at')
      .notNull()
      .default(sql`(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))`),
    cycleId: integer('cycle_id').notNull(),
    completed: integer('completed', { mode: 'boolean' }).notNull().default(false),
    completedAt: text('completed_at'),
  },
  (table) => ({
    memberIdIdx: index('idx_duty_assignments_member_id').on(table.memberId),
    assignedAtIdx: index('idx_duty_assignments_assigned_at').on(table.assignedAt),
    typeAssignedAtIdx: index('idx_duty_assignments_type_assigned_at').on(
      table.dutyType,
      table.assignedAt,
    ),
  }),
);
