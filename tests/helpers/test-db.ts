import Database from 'better-sqlite3';
import { applySchema, openDatabase } from '../../src/db/client';
import { AppointmentRepository } from '../../src/db/repositories/appointment-repository';
import { ClinicRepository } from '../../src/db/repositories/clinic-repository';
import { ConversationLogRepository } from '../../src/db/repositories/conversation-log-repository';
import { PhysicianRepository } from '../../src/db/repositories/physician-repository';
import { ScheduleRepository } from '../../src/db/repositories/schedule-repository';
import { UserRepository } from '../../src/db/repositories/user-repository';

export const TODAY = '2026-03-02';

export interface TestDb {
    database: Database.Database;
    users: UserRepository;
    physicians: PhysicianRepository;
    schedule: ScheduleRepository;
    appointments: AppointmentRepository;
    clinic: ClinicRepository;
    conversations: ConversationLogRepository;
}

export function createTestDb(): TestDb {
    const database = openDatabase(':memory:');
    applySchema(database);
    return {
        database,
        users: new UserRepository(database),
        physicians: new PhysicianRepository(database),
        schedule: new ScheduleRepository(database),
        appointments: new AppointmentRepository(database),
        clinic: new ClinicRepository(database),
        conversations: new ConversationLogRepository(database),
    };
}

export interface ClinicFixture {
    haddadId: number;
    webbId: number;
    lindqvistId: number;
}

/**
 * Two cardiologists and a dermatologist with a handful of open slots:
 *
 * - Haddad  2026-03-03 09:00, 10:00 and 2026-03-10 09:00
 * - Webb    2026-03-03 09:00, 11:00 and 2026-03-05 09:00
 * - Lindqvist 2026-03-04 14:00
 */
export function seedClinic(ctx: TestDb): ClinicFixture {
    const haddadId = ctx.physicians.create({
        name: 'Layla Haddad',
        specialty: 'Cardiology',
        qualification: 'MD, MRCP',
        experience_years: 16,
        consultation_price: 900,
        languages: ['English', 'Arabic'],
    });
    const webbId = ctx.physicians.create({
        name: 'Marcus Webb',
        specialty: 'Cardiology',
        qualification: 'MBBS',
        experience_years: 11,
        consultation_price: 750,
        languages: ['English'],
    });
    const lindqvistId = ctx.physicians.create({
        name: 'Hannah Lindqvist',
        specialty: 'Dermatology',
        qualification: 'MD',
        experience_years: 8,
        consultation_price: 600,
        bio: 'Medical and cosmetic dermatology.',
        languages: ['English', 'Swedish'],
    });

    ctx.schedule.addTimeSlots(haddadId, '2026-03-03', [
        { start_time: '09:00', end_time: '09:30' },
        { start_time: '10:00', end_time: '10:30' },
    ]);
    ctx.schedule.addTimeSlots(webbId, '2026-03-03', [
        { start_time: '09:00', end_time: '09:30' },
        { start_time: '11:00', end_time: '11:30' },
    ]);
    ctx.schedule.addTimeSlots(webbId, '2026-03-05', [{ start_time: '09:00', end_time: '09:30' }]);
    ctx.schedule.addTimeSlots(lindqvistId, '2026-03-04', [{ start_time: '14:00', end_time: '14:30' }]);
    ctx.schedule.addTimeSlots(haddadId, '2026-03-10', [{ start_time: '09:00', end_time: '09:30' }]);

    return { haddadId, webbId, lindqvistId };
}

export function slotId(ctx: TestDb, physicianId: number, date: string, startTime: string): number {
    const row = ctx.database
        .prepare<[number, string, string], { id: number }>(
            'SELECT id FROM time_slots WHERE physician_id = ? AND date = ? AND start_time = ?'
        )
        .get(physicianId, date, startTime);
    if (!row) {
        throw new Error(`No slot for physician ${physicianId} on ${date} at ${startTime}`);
    }
    return row.id;
}

export function isSlotOpen(ctx: TestDb, id: number): boolean {
    const slot = ctx.schedule.findById(id);
    return slot?.is_available === 1;
}

export function appointmentCount(ctx: TestDb): number {
    const row = ctx.database.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM appointments').get();
    return row?.count ?? 0;
}
