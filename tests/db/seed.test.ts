import { dailySlots, scheduleDates, seedDatabase, SeedData, SeedDataSchema } from '../../src/db/seed';
import { createTestDb, TestDb } from '../helpers/test-db';

const seedData: SeedData = SeedDataSchema.parse({
    clinic: { name: 'Test Clinic', workingHours: { Monday: '09:00-17:00' } },
    schedule: { days: 7, closedWeekdays: [5, 6], startTime: '09:00', endTime: '10:30', slotMinutes: 30 },
    physicians: [
        { name: 'Test Cardiologist', specialty: 'Cardiology', consultation_price: 500 },
        { name: 'Test Dermatologist', specialty: 'Dermatology', consultation_price: 400, languages: ['English'] },
    ],
});

describe('seed data', () => {
    test('splits the working day into back-to-back slots', () => {
        expect(dailySlots(seedData.schedule)).toEqual([
            { start_time: '09:00', end_time: '09:30' },
            { start_time: '09:30', end_time: '10:00' },
            { start_time: '10:00', end_time: '10:30' },
        ]);
    });

    test('drops a trailing partial slot', () => {
        const slots = dailySlots({ ...seedData.schedule, endTime: '10:15' });
        expect(slots.map(s => s.start_time)).toEqual(['09:00', '09:30']);
    });

    test('skips closed weekdays', () => {
        // 2026-03-02 is a Monday; Friday 6th and Saturday 7th are closed
        expect(scheduleDates(seedData.schedule, '2026-03-02')).toEqual([
            '2026-03-02', '2026-03-03', '2026-03-04', '2026-03-05', '2026-03-08',
        ]);
    });

    test('rejects malformed clock times', () => {
        const result = SeedDataSchema.safeParse({ ...seedData, schedule: { ...seedData.schedule, startTime: '9:00' } });
        expect(result.success).toBe(false);
    });
});

describe('seedDatabase', () => {
    let ctx: TestDb;

    beforeEach(() => {
        ctx = createTestDb();
    });

    afterEach(() => ctx.database.close());

    test('creates physicians, their schedules and the clinic record', () => {
        const summary = seedDatabase(ctx.database, seedData, '2026-03-02');

        expect(summary).toEqual({ physiciansCreated: 2, slotsCreated: 2 * 5 * 3, clinicInfoSaved: true });
        expect(ctx.physicians.listSpecialties()).toEqual(['Cardiology', 'Dermatology']);
        expect(ctx.schedule.findOpenSlots({ specialty: 'Dermatology' }, '2026-03-08')).toHaveLength(3);
        expect(ctx.clinic.getInfo()?.name).toBe('Test Clinic');
    });

    test('only opens new days when run again', () => {
        seedDatabase(ctx.database, seedData, '2026-03-02');
        const again = seedDatabase(ctx.database, seedData, '2026-03-03');

        // 2026-03-09 (Monday) is the only new open day
        expect(again).toEqual({ physiciansCreated: 0, slotsCreated: 2 * 3, clinicInfoSaved: false });
    });
});
