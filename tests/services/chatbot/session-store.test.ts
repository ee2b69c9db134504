import { UserSessionStore } from '../../../src/services/chatbot/session-store';
import { advanceSession, createSession } from '../../../src/services/chatbot/session';
import { createTestDb, TestDb } from '../../helpers/test-db';

const PHONE = '+971500000001';

describe('UserSessionStore', () => {
    let ctx: TestDb;
    let store: UserSessionStore;
    const now = new Date('2026-03-02T10:00:00Z');

    beforeEach(() => {
        ctx = createTestDb();
        ctx.users.findOrCreate(PHONE);
        store = new UserSessionStore(ctx.users, 30);
    });

    afterEach(() => ctx.database.close());

    test('returns a fresh session when nothing is stored', () => {
        expect(store.load(PHONE, now)).toEqual(createSession(now));
    });

    test('round-trips an active session', () => {
        const session = advanceSession('book_appointment', 'awaiting_time', { specialty: 'Cardiology', date: '2026-03-03' }, now);
        store.save(PHONE, session);

        expect(store.load(PHONE, new Date('2026-03-02T10:05:00Z'))).toEqual(session);
    });

    test('treats an expired session as a fresh one', () => {
        store.save(PHONE, advanceSession('book_appointment', 'awaiting_date', { specialty: 'Cardiology' }, now));

        const later = new Date('2026-03-02T11:00:00Z');
        expect(store.load(PHONE, later)).toEqual(createSession(later));
    });

    test('does not persist idle sessions', () => {
        store.save(PHONE, advanceSession('cancel_appointment', 'awaiting_appointment_choice', {}, now, [1]));
        store.save(PHONE, createSession(now));

        expect(ctx.users.getSessionJson(PHONE)).toBeNull();
    });

    test('discards corrupt or outdated session data', () => {
        ctx.users.saveSessionJson(PHONE, '{not json');
        expect(store.load(PHONE, now)).toEqual(createSession(now));

        ctx.users.saveSessionJson(PHONE, JSON.stringify({ intent: 'book_appointment', specialty: 'Cardiology' }));
        expect(store.load(PHONE, now)).toEqual(createSession(now));
    });

    test('clears the stored session', () => {
        store.save(PHONE, advanceSession('insurance_check', 'awaiting_emirates_id', {}, now));
        store.clear(PHONE);

        expect(ctx.users.getSessionJson(PHONE)).toBeNull();
    });
});
