import { and, asc, eq, ne } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type * as schemaTypes from '../db/schema.js';
import { members } from '../db/schema.js';
import type {
  CreateMemberRequest,
  MemberResponse,
  UpdateMemberRequest,
} from '@office-duties/shared';
import { ConflictError, NotFoundError, ValidationError } from '../errors/AppError.js';

type DbType = BetterSQLite3Database<typeof schemaTypes>;

const USERNAME_MAX_LENGTH = 50;
const FULL_NAME_MAX_LENGTH = 100;

export interface ListMembersOptions {
  /** Include deactivated members (default: active members only). */
  includeInactive?: boolean;
  coffeeDrinkersOnly?: boolean;
}

/**
 * Convert a database member row to the MemberResponse wire shape.
 */
export function toMemberResponse(row: typeof members.$inferSelect): MemberResponse {
  return {
    id: row.id,
    username: row.username,
    full_name: row.fullName,
    coffee_drinker: row.coffeeDrinker,
    active: row.active,
  };
}

function validateUsername(username: string): string {
  const trimmed = username.trim();
  if (trimmed.length === 0 || trimmed.length > USERNAME_MAX_LENGTH) {
    throw new ValidationError(`Username must be between 1 and ${USERNAME_MAX_LENGTH} characters`);
  }
  return trimmed;
}

function validateFullName(fullName: string): string {
  const trimmed = fullName.trim();
  if (trimmed.length === 0 || trimmed.length > FULL_NAME_MAX_LENGTH) {
    throw new ValidationError(
      `Full name must be between 1 and ${FULL_NAME_MAX_LENGTH} characters`,
    );
  }
  return trimmed;
}

/**
 * List members in store order (by id).
 */
export function listMembers(db: DbType, options: ListMembersOptions = {}): MemberResponse[] {
  const conditions: SQL[] = [];
  if (!options.includeInactive) {
    conditions.push(eq(members.active, true));
  }
  if (options.coffeeDrinkersOnly) {
    conditions.push(eq(members.coffeeDrinker, true));
  }

  const rows = db
    .select()
    .from(members)
    .where(and(...conditions))
    .orderBy(asc(members.id))
    .all();
  return rows.map(toMemberResponse);
}

/**
 * Add a member to the roster. New members are always active.
 * @throws ValidationError if username or full name is blank or too long
 * @throws ConflictError if the username is taken, by an active or a deactivated member
 */
export function createMember(db: DbType, data: CreateMemberRequest): MemberResponse {
  const username = validateUsername(data.username);
  const fullName = validateFullName(data.full_name);

  return db.transaction((tx) => {
    const existing = tx
      .select({ id: members.id })
      .from(members)
      .where(eq(members.username, username))
      .get();
    if (existing) {
      throw new ConflictError(`Username '${username}' already exists`, { username });
    }

    const row = tx
      .insert(members)
      .values({
        username,
        fullName,
        coffeeDrinker: data.coffee_drinker ?? true,
        active: true,
      })
      .returning()
      .get();
    return toMemberResponse(row);
  });
}

/**
 * Update a member's username, full name and/or coffee-drinker flag.
 * @throws ValidationError if no field is provided or a field is invalid
 * @throws NotFoundError if the member does not exist
 * @throws ConflictError if the new username belongs to another member
 */
export function updateMember(db: DbType, data: UpdateMemberRequest): MemberResponse {
  const { id } = data;
  if (
    data.username === undefined &&
    data.full_name === undefined &&
    data.coffee_drinker === undefined
  ) {
    throw new ValidationError('At least one field must be provided');
  }

  const updates: Partial<typeof members.$inferInsert> = {};
  if (data.username !== undefined) {
    updates.username = validateUsername(data.username);
  }
  if (data.full_name !== undefined) {
    updates.fullName = validateFullName(data.full_name);
  }
  if (data.coffee_drinker !== undefined) {
    updates.coffeeDrinker = data.coffee_drinker;
  }

  return db.transaction((tx) => {
    const existing = tx.select({ id: members.id }).from(members).where(eq(members.id, id)).get();
    if (!existing) {
      throw new NotFoundError('Member not found', { id });
    }

    if (updates.username !== undefined) {
      const duplicate = tx
        .select({ id: members.id })
        .from(members)
        .where(and(eq(members.username, updates.username), ne(members.id, id)))
        .get();
      if (duplicate) {
        throw new ConflictError(`Username '${updates.username}' already exists`, {
          username: updates.username,
        });
      }
    }

    const row = tx.update(members).set(updates).where(eq(members.id, id)).returning().get();
    return toMemberResponse(row);
  });
}

/**
 * Soft-delete a member by clearing `active`. The row is kept for the duty history.
 * Deactivating an already inactive member changes nothing and is not an error.
 *
 * @returns true if the member was active before the call
 * @throws NotFoundError if the member does not exist
 */
export function deactivateMember(db: DbType, id: number): boolean {
  return db.transaction((tx) => {
    const existing = tx
      .select({ id: members.id, active: members.active })
      .from(members)
      .where(eq(members.id, id))
      .get();
    if (!existing) {
      throw new NotFoundError('Member not found', { id });
    }
    if (!existing.active) {
      return false;
    }

    tx.update(members).set({ active: false }).where(eq(members.id, id)).run();
    return true;
  });
}
