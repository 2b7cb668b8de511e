import { and, desc, eq } from 'drizzle-orm';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type * as schemaTypes from '../db/schema.js';
import { dutyAssignments, members } from '../db/schema.js';
import { DUTY_TYPES } from '@office-duties/shared';
import type { DutyResponse, DutyType } from '@office-duties/shared';
import { NotFoundError, ValidationError } from '../errors/AppError.js';

type DbType = BetterSQLite3Database<typeof schemaTypes>;

export const DEFAULT_DUTY_LIMIT = 100;
/** Largest integer that binds to SQLite as an INTEGER without losing precision. */
export const MAX_INTEGER_PARAM = Number.MAX_SAFE_INTEGER;

/** Columns of an assignment joined with its member's identity. */
const dutyColumns = {
  id: dutyAssignments.id,
  memberId: dutyAssignments.memberId,
  username: members.username,
  fullName: members.fullName,
  dutyType: dutyAssignments.dutyType,
  assignedAt: dutyAssignments.assignedAt,
  cycleId: dutyAssignments.cycleId,
  completed: dutyAssignments.completed,
  completedAt: dutyAssignments.completedAt,
};

interface DutyRow {
  id: number;
  memberId: number;
  username: string;
  fullName: string | null;
  dutyType: DutyType;
  assignedAt: string;
  cycleId: number;
  completed: boolean;
  completedAt: string | null;
}

function toDutyResponse(row: DutyRow): DutyResponse {
  return {
    id: row.id,
    member_id: row.memberId,
    username: row.username,
    full_name: row.fullName || row.username,
    duty_type: row.dutyType,
    assigned_at: row.assignedAt,
    cycle_id: row.cycleId,
    completed: row.completed,
    completed_at: row.completedAt,
  };
}

export function isDutyType(value: string): value is DutyType {
  return DUTY_TYPES.some((type) => type === value);
}

function parseDutyType(value: string): DutyType {
  if (!isDutyType(value)) {
    throw new ValidationError(`duty_type must be one of ${DUTY_TYPES.join(', ')}`, {
      dutyType: value,
    });
  }
  return value;
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ValidationError(`${name} must be a positive integer`, { [name]: value });
  }
}

/**
 * List duty assignments of active members, newest first.
 * @throws ValidationError if limit is not a positive integer up to MAX_INTEGER_PARAM
 */
export function listDuties(db: DbType, limit: number = DEFAULT_DUTY_LIMIT): DutyResponse[] {
  assertPositiveInteger('limit', limit);

  const rows = db
    .select(dutyColumns)
    .from(dutyAssignments)
    .innerJoin(members, eq(dutyAssignments.memberId, members.id))
    .where(eq(members.active, true))
    .orderBy(desc(dutyAssignments.assignedAt), desc(dutyAssignments.id))
    .limit(limit)
    .all();

  return rows.map(toDutyResponse);
}

/**
 * Get the newest assignment of the given duty type.
 * @throws ValidationError if the duty type is unknown
 * @throws NotFoundError if no active member holds an assignment of that type
 */
export function getMostRecentDuty(db: DbType, type: string): DutyResponse {
  const dutyType = parseDutyType(type);

  const row = db
    .select(dutyColumns)
    .from(dutyAssignments)
    .innerJoin(members, eq(dutyAssignments.memberId, members.id))
    .where(and(eq(members.active, true), eq(dutyAssignments.dutyType, dutyType)))
    .orderBy(desc(dutyAssignments.assignedAt), desc(dutyAssignments.id))
    .limit(1)
    .get();

  if (!row) {
    throw new NotFoundError(`No ${dutyType} duty found`, { dutyType });
  }
  return toDutyResponse(row);
}

/**
 * Set the completion state of the assignment identified by id and type.
 * Lookup and update share one transaction. Setting the state an assignment
 * already has leaves the row untouched, including its completed_at.
 *
 * @returns true if the row changed
 * @throws ValidationError if the id or duty type is invalid
 * @throws NotFoundError if no assignment matches both id and type
 */
export function setDutyCompletion(
  db: DbType,
  dutyId: number,
  type: string,
  completed: boolean,
): boolean {
  assertPositiveInteger('dutyId', dutyId);
  const dutyType = parseDutyType(type);

  return db.transaction((tx) => {
    const assignment = tx
      .select({ id: dutyAssignments.id, completed: dutyAssignments.completed })
      .from(dutyAssignments)
      .where(and(eq(dutyAssignments.id, dutyId), eq(dutyAssignments.dutyType, dutyType)))
      .get();

    if (!assignment) {
      throw new NotFoundError(`No ${dutyType} duty found with ID ${dutyId}`, {
        dutyId,
        dutyType,
      });
    }

    if (assignment.completed === completed) {
      return false;
    }

    tx.update(dutyAssignments)
      .set({ completed, completedAt: completed ? new Date().toISOString() : null })
      .where(eq(dutyAssignments.id, dutyId))
      .run();
    return true;
  });
}

export function completeDuty(db: DbType, dutyId: number, dutyType: string): boolean {
  return setDutyCompletion(db, dutyId, dutyType, true);
}

export function uncompleteDuty(db: DbType, dutyId: number, dutyType: string): boolean {
  return setDutyCompletion(db, dutyId, dutyType, false);
}
