import Database from 'better-sqlite3';
import { db } from '../client';
import { OpenSlot, SlotScope } from '../../services/scheduling/interfaces';

export interface TimeSlotRecord {
    id: number;
    physician_id: number;
    date: string;
    start_time: string;
    end_time: string;
    is_available: number;
}

export interface NewTimeSlot {
    start_time: string;
    end_time: string;
}

interface OpenSlotRow {
    slot_id: number;
    physician_id: number;
    physician_name: string;
    date: string;
    start_time: string;
    end_time: string;
    consultation_price: number;
}

function scopeClause(scope: SlotScope): { sql: string; param: string | number } {
    if ('physicianId' in scope) {
        return { sql: 'p.id = ?', param: scope.physicianId };
    }
    return { sql: 'p.specialty = ? COLLATE NOCASE', param: scope.specialty };
}

export class ScheduleRepository {
    constructor(private readonly database: Database.Database) {}

    /**
     * Adds slots to a physician's day; slots already present for the same start time are kept as they are
     */
    addTimeSlots(physicianId: number, date: string, slots: NewTimeSlot[]): number {
        const stmt = this.database.prepare(`
            INSERT OR IGNORE INTO time_slots (physician_id, date, start_time, end_time)
            VALUES (?, ?, ?, ?)
        `);

        const insertAll = this.database.transaction((rows: NewTimeSlot[]) => {
            let inserted = 0;
            for (const slot of rows) {
                inserted += stmt.run(physicianId, date, slot.start_time, slot.end_time).changes;
            }
            return inserted;
        });

        return insertAll(slots);
    }

    findById(slotId: number): TimeSlotRecord | null {
        return this.database
            .prepare<[number], TimeSlotRecord>('SELECT * FROM time_slots WHERE id = ?')
            .get(slotId) ?? null;
    }

    findOpenSlots(scope: SlotScope, date: string): OpenSlot[] {
        const clause = scopeClause(scope);
        return this.database
            .prepare<[string | number, string], OpenSlotRow>(`
                SELECT s.id AS slot_id, p.id AS physician_id, p.name AS physician_name,
                       s.date, s.start_time, s.end_time, p.consultation_price
                FROM time_slots s
                JOIN physicians p ON p.id = s.physician_id
                WHERE ${clause.sql} AND p.is_active = 1
                  AND s.date = ? AND s.is_available = 1
                ORDER BY s.start_time ASC, p.name ASC
            `)
            .all(clause.param, date)
            .map(row => ({
                slotId: row.slot_id,
                physicianId: row.physician_id,
                physicianName: row.physician_name,
                date: row.date,
                startTime: row.start_time,
                endTime: row.end_time,
                consultationPrice: row.consultation_price,
            }));
    }

    /**
     * Dates strictly after `afterDate` and no later than `untilDate` that still have an open slot
     */
    findDatesWithOpenSlots(scope: SlotScope, afterDate: string, untilDate: string, limit: number): string[] {
        const clause = scopeClause(scope);
        return this.database
            .prepare<[string | number, string, string, number], { date: string }>(`
                SELECT DISTINCT s.date
                FROM time_slots s
                JOIN physicians p ON p.id = s.physician_id
                WHERE ${clause.sql} AND p.is_active = 1
                  AND s.date > ? AND s.date <= ? AND s.is_available = 1
                ORDER BY s.date ASC
                LIMIT ?
            `)
            .all(clause.param, afterDate, untilDate, limit)
            .map(row => row.date);
    }

    /**
     * Compare-and-swap: succeeds only for the caller that flips the slot from open to taken
     */
    claimSlot(slotId: number): boolean {
        const result = this.database
            .prepare('UPDATE time_slots SET is_available = 0 WHERE id = ? AND is_available = 1')
            .run(slotId);
        return result.changes === 1;
    }

    releaseSlot(slotId: number): boolean {
        const result = this.database
            .prepare('UPDATE time_slots SET is_available = 1 WHERE id = ? AND is_available = 0')
            .run(slotId);
        return result.changes === 1;
    }
}

export const scheduleRepository = new ScheduleRepository(db);
