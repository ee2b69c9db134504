import Database from 'better-sqlite3';
import { db } from '../../db/client';
import {
    Appointment,
    AppointmentRepository,
    AppointmentSummary,
    OPEN_STATUSES,
    appointmentRepository,
} from '../../db/repositories/appointment-repository';
import { PhysicianRepository, physicianRepository } from '../../db/repositories/physician-repository';
import { ScheduleRepository, scheduleRepository } from '../../db/repositories/schedule-repository';
import { BookingError, NotFoundError, SlotUnavailableError } from '../../utils/errors';
import { config } from '../../config';
import { errorDetails, logger } from '../logging';
import { PaymentGateway } from './interfaces';
import { paymentService } from '../payments';

export interface BookingRequest {
    userId: number;
    slotId: number;
    notes?: string;
}

export class BookingService {
    constructor(
        private readonly database: Database.Database,
        private readonly appointments: AppointmentRepository,
        private readonly schedule: ScheduleRepository,
        private readonly physicians: PhysicianRepository,
        private readonly payments?: PaymentGateway
    ) {}

    /**
     * Takes the slot and records a pending appointment in one transaction.
     * Throws SlotUnavailableError when another booking got the slot first.
     */
    book(request: BookingRequest): Appointment {
        return this.database.transaction(() => {
            const slot = this.schedule.findById(request.slotId);
            if (!slot) {
                throw new NotFoundError(`Time slot ${request.slotId} not found`);
            }

            const physician = this.physicians.findById(slot.physician_id);
            if (!physician || !physician.is_active) {
                throw new BookingError(`Physician ${slot.physician_id} is not taking appointments`);
            }

            if (!this.schedule.claimSlot(slot.id)) {
                throw new SlotUnavailableError(slot.id);
            }

            const id = this.appointments.create({
                user_id: request.userId,
                physician_id: physician.id,
                time_slot_id: slot.id,
                date: slot.date,
                start_time: slot.start_time,
                end_time: slot.end_time,
                amount: physician.consultation_price,
                notes: request.notes,
            });

            return this.requireAppointment(id);
        })();
    }

    /**
     * Opens a payment intent for the appointment fee; null when payments are not wired
     */
    async requestPayment(appointmentId: number): Promise<string | null> {
        if (!this.payments) return null;

        const appointment = this.requireAppointment(appointmentId);
        const paymentIntentId = await this.payments.createIntent(appointment);
        this.appointments.updatePayment(appointment.id, 'pending', paymentIntentId);
        return paymentIntentId;
    }

    /**
     * Cancels a pending or confirmed appointment and frees the one slot it held.
     * Paid appointments are refunded; a refund that fails leaves the cancellation in place.
     */
    async cancel(appointmentId: number, userId?: number): Promise<Appointment> {
        const cancelled = this.database.transaction(() => {
            const appointment = this.requireOpenAppointment(appointmentId, userId);
            this.appointments.updateStatus(appointment.id, 'cancelled');
            if (!this.schedule.releaseSlot(appointment.time_slot_id)) {
                logger.warn('Cancelled appointment held a slot that was already open', {
                    appointmentId: appointment.id,
                    slotId: appointment.time_slot_id,
                });
            }
            return appointment;
        })();

        if (cancelled.payment_status === 'paid' && cancelled.payment_intent_id) {
            await this.refundPayment(cancelled.id, cancelled.payment_intent_id);
        }

        return this.requireAppointment(cancelled.id);
    }

    /**
     * Moves an appointment to another open slot of the same physician
     */
    reschedule(appointmentId: number, newSlotId: number, userId?: number): Appointment {
        return this.database.transaction(() => {
            const appointment = this.requireOpenAppointment(appointmentId, userId);

            const slot = this.schedule.findById(newSlotId);
            if (!slot) {
                throw new NotFoundError(`Time slot ${newSlotId} not found`);
            }
            if (slot.physician_id !== appointment.physician_id) {
                throw new BookingError('Appointments can only be moved to a slot of the same physician', {
                    appointmentId,
                    slotId: newSlotId,
                });
            }
            if (slot.id === appointment.time_slot_id) {
                return appointment;
            }
            if (!this.schedule.claimSlot(slot.id)) {
                throw new SlotUnavailableError(slot.id);
            }

            this.schedule.releaseSlot(appointment.time_slot_id);
            this.appointments.moveToSlot(appointment.id, {
                time_slot_id: slot.id,
                date: slot.date,
                start_time: slot.start_time,
                end_time: slot.end_time,
            });

            return this.requireAppointment(appointment.id);
        })();
    }

    /**
     * Confirms a pending appointment once its fee is captured. A payment that lands after
     * the appointment was cancelled is refunded instead.
     */
    async confirmPayment(appointmentId: number, paymentIntentId: string): Promise<Appointment> {
        const appointment = this.requireAppointment(appointmentId);

        if (appointment.status === 'confirmed' && appointment.payment_status === 'paid') {
            return appointment;
        }
        if (appointment.status === 'cancelled') {
            if (appointment.payment_status !== 'refunded') {
                logger.warn('Payment captured for a cancelled appointment', { appointmentId, paymentIntentId });
                await this.refundPayment(appointment.id, paymentIntentId);
            }
            return this.requireAppointment(appointment.id);
        }
        if (appointment.status !== 'pending') {
            throw new BookingError(`Cannot confirm appointment with status: ${appointment.status}`, { appointmentId });
        }

        this.appointments.updatePayment(appointment.id, 'paid', paymentIntentId);
        this.appointments.updateStatus(appointment.id, 'confirmed');
        return this.requireAppointment(appointment.id);
    }

    markPaymentFailed(appointmentId: number): void {
        const appointment = this.requireAppointment(appointmentId);
        if (appointment.payment_status === 'pending') {
            this.appointments.updatePayment(appointment.id, 'failed');
        }
    }

    upcomingFor(userId: number, today: string): AppointmentSummary[] {
        return this.appointments.findByUser(userId, { statuses: OPEN_STATUSES, fromDate: today });
    }

    getAppointment(appointmentId: number): Appointment | null {
        return this.appointments.findById(appointmentId);
    }

    /**
     * Returns a captured payment. Failures are recorded as refund_failed for staff to settle by hand.
     */
    private async refundPayment(appointmentId: number, paymentIntentId: string): Promise<void> {
        if (!this.payments) {
            logger.error('Cannot refund without a payment gateway', { appointmentId, paymentIntentId });
            this.appointments.updatePayment(appointmentId, 'refund_failed', paymentIntentId);
            return;
        }

        try {
            await this.payments.refund(paymentIntentId);
            this.appointments.updatePayment(appointmentId, 'refunded', paymentIntentId);
        } catch (error) {
            logger.error('Refund failed', { appointmentId, paymentIntentId, ...errorDetails(error) });
            this.appointments.updatePayment(appointmentId, 'refund_failed', paymentIntentId);
        }
    }

    private requireAppointment(appointmentId: number): Appointment {
        const appointment = this.appointments.findById(appointmentId);
        if (!appointment) {
            throw new NotFoundError(`Appointment ${appointmentId} not found`);
        }
        return appointment;
    }

    private requireOpenAppointment(appointmentId: number, userId?: number): Appointment {
        const appointment = this.requireAppointment(appointmentId);
        if (userId !== undefined && appointment.user_id !== userId) {
            throw new BookingError('Appointment belongs to another user', { appointmentId });
        }
        if (!OPEN_STATUSES.includes(appointment.status)) {
            throw new BookingError(`Cannot change appointment with status: ${appointment.status}`, { appointmentId });
        }
        return appointment;
    }
}

export const bookingService = new BookingService(
    db,
    appointmentRepository,
    scheduleRepository,
    physicianRepository,
    config.features.paymentIntents ? paymentService : undefined
);
