import { createTestDb, seedClinic, slotId, ClinicFixture, TestDb } from '../../helpers/test-db';

describe('ScheduleRepository', () => {
    let ctx: TestDb;
    let fixture: ClinicFixture;

    beforeEach(() => {
        ctx = createTestDb();
        fixture = seedClinic(ctx);
    });

    afterEach(() => ctx.database.close());

    test('keeps existing slots when the same start time is added again', () => {
        const inserted = ctx.schedule.addTimeSlots(fixture.haddadId, '2026-03-03', [
            { start_time: '09:00', end_time: '09:30' },
            { start_time: '12:00', end_time: '12:30' },
        ]);
        expect(inserted).toBe(1);
    });

    test('orders open slots by start time, then physician name', () => {
        const slots = ctx.schedule.findOpenSlots({ specialty: 'cardiology' }, '2026-03-03');
        expect(slots.map(s => `${s.startTime} ${s.physicianName}`)).toEqual([
            '09:00 Layla Haddad',
            '09:00 Marcus Webb',
            '10:00 Layla Haddad',
            '11:00 Marcus Webb',
        ]);
        expect(slots[1].consultationPrice).toBe(750);
    });

    test('scopes open slots to a single physician', () => {
        const slots = ctx.schedule.findOpenSlots({ physicianId: fixture.webbId }, '2026-03-03');
        expect(slots.map(s => s.startTime)).toEqual(['09:00', '11:00']);
    });

    test('claims a slot only once', () => {
        const id = slotId(ctx, fixture.webbId, '2026-03-05', '09:00');

        expect(ctx.schedule.claimSlot(id)).toBe(true);
        expect(ctx.schedule.claimSlot(id)).toBe(false);
        expect(ctx.schedule.findOpenSlots({ physicianId: fixture.webbId }, '2026-03-05')).toEqual([]);

        expect(ctx.schedule.releaseSlot(id)).toBe(true);
        expect(ctx.schedule.releaseSlot(id)).toBe(false);
    });

    test('finds later dates with open slots inside the window', () => {
        const scope = { specialty: 'Cardiology' };
        expect(ctx.schedule.findDatesWithOpenSlots(scope, '2026-03-02', '2026-03-31', 3))
            .toEqual(['2026-03-03', '2026-03-05', '2026-03-10']);
        expect(ctx.schedule.findDatesWithOpenSlots(scope, '2026-03-03', '2026-03-06', 3))
            .toEqual(['2026-03-05']);
        expect(ctx.schedule.findDatesWithOpenSlots(scope, '2026-03-02', '2026-03-31', 1))
            .toEqual(['2026-03-03']);
    });
});
