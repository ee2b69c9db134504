import Database from 'better-sqlite3';
import { db } from '../client';

export const APPOINTMENT_STATUSES = ['pending', 'confirmed', 'completed', 'cancelled', 'no_show'] as const;
export const PAYMENT_STATUSES = ['pending', 'paid', 'refunded', 'refund_failed', 'failed'] as const;

export type AppointmentStatus = typeof APPOINTMENT_STATUSES[number];
export type PaymentStatus = typeof PAYMENT_STATUSES[number];

/** Statuses from which an appointment can still be cancelled or moved */
export const OPEN_STATUSES: readonly AppointmentStatus[] = ['pending', 'confirmed'];

export interface Appointment {
    id: number;
    user_id: number;
    physician_id: number;
    time_slot_id: number;
    date: string;
    start_time: string;
    end_time: string;
    notes: string | null;
    status: AppointmentStatus;
    payment_status: PaymentStatus;
    payment_intent_id: string | null;
    amount: number;
    created_at: string;
    updated_at: string | null;
}

export interface AppointmentSummary extends Appointment {
    physician_name: string;
    specialty: string;
}

export type NewAppointment = Pick<Appointment,
    'user_id' | 'physician_id' | 'time_slot_id' | 'date' | 'start_time' | 'end_time' | 'amount'
> & { notes?: string };

export interface SlotMove {
    time_slot_id: number;
    date: string;
    start_time: string;
    end_time: string;
}

export class AppointmentRepository {
    constructor(private readonly database: Database.Database) {}

    create(appt: NewAppointment): number {
        const result = this.database.prepare(`
            INSERT INTO appointments (
                user_id, physician_id, time_slot_id, date,
                start_time, end_time, notes, amount
            ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        `).run(
            appt.user_id,
            appt.physician_id,
            appt.time_slot_id,
            appt.date,
            appt.start_time,
            appt.end_time,
            appt.notes ?? null,
            appt.amount
        );
        return Number(result.lastInsertRowid);
    }

    findById(id: number): Appointment | null {
        return this.database
            .prepare<[number], Appointment>('SELECT * FROM appointments WHERE id = ?')
            .get(id) ?? null;
    }

    /**
     * A user's appointments with physician details, earliest first
     */
    findByUser(userId: number, options: { statuses?: readonly AppointmentStatus[]; fromDate?: string } = {}): AppointmentSummary[] {
        let query = `
            SELECT a.*, p.name AS physician_name, p.specialty AS specialty
            FROM appointments a
            JOIN physicians p ON p.id = a.physician_id
            WHERE a.user_id = ?
        `;
        const params: (string | number)[] = [userId];

        if (options.statuses && options.statuses.length > 0) {
            query += ` AND a.status IN (${options.statuses.map(() => '?').join(', ')})`;
            params.push(...options.statuses);
        }
        if (options.fromDate) {
            query += ' AND a.date >= ?';
            params.push(options.fromDate);
        }
        query += ' ORDER BY a.date ASC, a.start_time ASC';

        return this.database.prepare<(string | number)[], AppointmentSummary>(query).all(...params);
    }

    updateStatus(id: number, status: AppointmentStatus): void {
        this.database.prepare(`
            UPDATE appointments
            SET status = ?, updated_at = CURRENT_TIMESTAMP
            WHERE id = ?
        `).run(status, id);
    }

    updatePayment(id: number, paymentStatus: PaymentStatus, paymentIntentId?: string): void {
        this.database.prepare(`
            UPDATE appointments
            SET payment_status = ?,
                payment_intent_id = COALESCE(?, payment_intent_id),
                updated_at = CURRENT_TIMESTAMP
            WHERE id = ?
        `).run(paymentStatus, paymentIntentId ?? null, id);
    }

    moveToSlot(id: number, move: SlotMove): void {
        this.database.prepare(`
            UPDATE appointments
            SET time_slot_id = ?, date = ?, start_time = ?, end_time = ?,
                updated_at = CURRENT_TIMESTAMP
            WHERE id = ?
        `).run(move.time_slot_id, move.date, move.start_time, move.end_time, id);
    }
}

export const appointmentRepository = new AppointmentRepository(db);
