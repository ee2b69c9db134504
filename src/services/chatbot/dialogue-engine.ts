import { config } from '../../config';
import { Appointment, AppointmentSummary } from '../../db/repositories/appointment-repository';
import { ClinicRepository, clinicRepository } from '../../db/repositories/clinic-repository';
import {
    PhysicianRepository,
    physicianRepository,
} from '../../db/repositories/physician-repository';
import {
    PLACEHOLDER_FIRST_NAME,
    User,
    UserRepository,
    userRepository,
} from '../../db/repositories/user-repository';
import { BookingError, NotFoundError, SlotUnavailableError } from '../../utils/errors';
import { DateTimeUtils } from '../../utils/date-time';
import { Classification, ExtractedEntities } from '../ai/intent-detector';
import { InsuranceService, insuranceService } from '../insurance/insurance-service';
import { errorDetails, logger } from '../logging';
import { availabilityService } from '../scheduling/availability-service';
import { BookingService, bookingService } from '../scheduling/booking-service';
import { IAvailabilityService, OpenSlot, SlotScope } from '../scheduling/interfaces';
import * as Replies from './messages';
import {
    ChatSession,
    FlowIntent,
    SchedulingField,
    SessionSlots,
    SessionStep,
    advanceSession,
    createSession,
    expectedField,
    isFlowIntent,
    isSchedulingIntent,
    parseChoice,
} from './session';

const SPECIALTY_PREVIEW = 5;
const PHYSICIAN_PREVIEW = 3;
const TIME_PREVIEW = 6;
const SLOT_PREVIEW = 8;
const LIST_LIMIT = 5;

export interface Turn {
    user: User;
    session: ChatSession;
    classification: Classification;
    text: string;
    today: string;
    now?: Date;
}

export interface TurnResult {
    reply: string;
    session: ChatSession;
}

export interface DialogueDependencies {
    availability: IAvailabilityService;
    physicians: Pick<PhysicianRepository, 'findById' | 'findBySpecialty' | 'findByName' | 'priceRanges'>;
    booking: Pick<BookingService, 'book' | 'requestPayment' | 'cancel' | 'reschedule' | 'upcomingFor'>;
    insurance: Pick<InsuranceService, 'verify'>;
    clinic: Pick<ClinicRepository, 'getInfo'>;
    users: Pick<UserRepository, 'setEmiratesId'>;
}

interface FlowContext {
    turn: Turn;
    session: ChatSession;
    now: Date;
}

function mergeSlots(slots: SessionSlots, entities: ExtractedEntities, fields: readonly SchedulingField[]): SessionSlots {
    const merged: SessionSlots = { ...slots };
    for (const field of fields) {
        const value = entities[field];
        if (value) merged[field] = value;
    }
    return merged;
}

function distinctStartTimes(slots: OpenSlot[]): string[] {
    return [...new Set(slots.map(s => s.startTime))];
}

/**
 * Slot-filling state machine behind the WhatsApp assistant. Each turn takes the
 * stored session plus the classified message and returns the reply together
 * with the session to store next.
 */
export class DialogueEngine {
    constructor(
        private readonly deps: DialogueDependencies,
        private readonly timezone: string = config.clinic.timezone
    ) {}

    async handle(turn: Turn): Promise<TurnResult> {
        const now = turn.now ?? new Date();
        const { session, classification } = turn;
        const { intent } = classification;

        if (intent === 'restart') {
            return { reply: Replies.RESTART_REPLY, session: createSession(now) };
        }

        if (session.intent && this.continuesFlow(session, turn)) {
            return this.runFlow(session.intent, { turn, session, now });
        }

        if (isFlowIntent(intent)) {
            return this.runFlow(intent, { turn, session: this.startFlow(intent, session, now), now });
        }

        switch (intent) {
            case 'greeting':
                return { reply: this.greet(turn.user), session };
            case 'physician_info':
                return { reply: this.physicianInfo(classification.entities), session };
            case 'pricing':
                return { reply: this.pricing(classification.entities), session };
            case 'clinic_info':
                return { reply: Replies.clinicInfo(this.deps.clinic.getInfo()), session };
            default:
                return this.fallback({ turn, session, now });
        }
    }

    /**
     * Whether this turn answers the question the active flow is waiting on
     */
    private continuesFlow(session: ChatSession, turn: Turn): boolean {
        const { intent, entities } = turn.classification;
        if (intent === session.intent) return true;
        if (isFlowIntent(intent)) return false;

        const field = expectedField(session);
        switch (field) {
            case 'appointment_choice':
                return entities.choice !== undefined || parseChoice(turn.text) !== null;
            case 'emirates_id':
                return entities.emiratesId !== undefined;
            case 'specialty':
            case 'date':
            case 'time':
                // Unclassified replies may correct an earlier answer, not only the awaited one
                return entities[field] !== undefined
                    || (intent === 'other' && Boolean(entities.specialty || entities.date || entities.time));
            default:
                return false;
        }
    }

    private startFlow(intent: FlowIntent, previous: ChatSession, now: Date): ChatSession {
        const slots: SessionSlots = {};
        // Checking availability and booking share what the user already told us
        if (isSchedulingIntent(intent) && isSchedulingIntent(previous.intent)) {
            if (previous.slots.specialty) slots.specialty = previous.slots.specialty;
            if (previous.slots.date) slots.date = previous.slots.date;
        } else if (previous.intent) {
            logger.debug('Abandoning flow for a new one', { from: previous.intent, to: intent });
        }
        return advanceSession(intent, 'idle', slots, now);
    }

    private runFlow(intent: FlowIntent, ctx: FlowContext): Promise<TurnResult> {
        switch (intent) {
            case 'book_appointment':
                return this.bookAppointment(ctx);
            case 'check_availability':
                return Promise.resolve(this.checkAvailability(ctx));
            case 'cancel_appointment':
                return this.cancelAppointment(ctx);
            case 'reschedule_appointment':
                return Promise.resolve(this.rescheduleAppointment(ctx));
            case 'insurance_check':
                return this.checkInsurance(ctx);
        }
    }

    private async fallback(ctx: FlowContext): Promise<TurnResult> {
        const { session } = ctx;
        if (!session.intent) {
            return { reply: Replies.HELP_REPLY, session };
        }

        // Ask the pending question again without consuming this message
        const resumed = await this.runFlow(session.intent, {
            ...ctx,
            turn: { ...ctx.turn, classification: { intent: 'other', entities: {} }, text: '' },
        });
        return { reply: `${Replies.INTERRUPTED_NOTICE}\n\n${resumed.reply}`, session: resumed.session };
    }

    /**
     * Open slots for the day; for today only those that have not started yet
     */
    private openSlots(scope: SlotScope, date: string, turn: Turn, now: Date): OpenSlot[] {
        const open = this.deps.availability.getOpenSlots(scope, date);
        if (date !== turn.today) return open;

        const clock = DateTimeUtils.currentTime(this.timezone, now);
        return open.filter(slot => slot.startTime > clock);
    }

    private specialtyPreview(): string[] {
        return this.deps.availability.listSpecialties().slice(0, SPECIALTY_PREVIEW);
    }

    // --- Booking ---------------------------------------------------------

    private async bookAppointment(ctx: FlowContext): Promise<TurnResult> {
        const { turn, now } = ctx;
        const slots = mergeSlots(ctx.session.slots, turn.classification.entities, ['specialty', 'date', 'time']);
        const ask = (step: SessionStep, reply: string, next: SessionSlots = slots): TurnResult => ({
            reply,
            session: advanceSession('book_appointment', step, next, now),
        });

        if (!slots.specialty) {
            return ask('awaiting_specialty', Replies.askSpecialty(this.specialtyPreview()));
        }

        const specialty = this.deps.availability.resolveSpecialty(slots.specialty);
        if (!specialty) {
            return ask(
                'awaiting_specialty',
                Replies.unknownSpecialty(slots.specialty, this.specialtyPreview()),
                { ...slots, specialty: undefined }
            );
        }
        slots.specialty = specialty;

        if (!slots.date) {
            const physicians = this.deps.physicians.findBySpecialty(specialty).slice(0, PHYSICIAN_PREVIEW);
            return ask('awaiting_date', Replies.askBookingDate(specialty, physicians));
        }

        if (DateTimeUtils.isBefore(slots.date, turn.today)) {
            return ask('awaiting_date', Replies.pastDate(slots.date), { ...slots, date: undefined, time: undefined });
        }

        const scope: SlotScope = { specialty };
        const open = this.openSlots(scope, slots.date, turn, now);
        if (open.length === 0) {
            const nextDates = this.deps.availability.getNextAvailableDates(scope, slots.date);
            return ask(
                'awaiting_date',
                Replies.noSlotsOnDate(specialty, slots.date, nextDates),
                { ...slots, date: undefined, time: undefined }
            );
        }

        const times = distinctStartTimes(open);
        if (!slots.time) {
            return ask('awaiting_time', Replies.askTime(specialty, slots.date, times.slice(0, TIME_PREVIEW)));
        }

        const slot = open.find(s => s.startTime === slots.time);
        if (!slot) {
            return ask(
                'awaiting_time',
                Replies.timeUnavailable(slots.time, slots.date, times.slice(0, TIME_PREVIEW)),
                { ...slots, time: undefined }
            );
        }

        let appointmentId: number;
        try {
            appointmentId = this.deps.booking.book({ userId: turn.user.id, slotId: slot.slotId }).id;
        } catch (error) {
            if (!(error instanceof SlotUnavailableError)) throw error;

            const remaining = distinctStartTimes(this.openSlots(scope, slots.date, turn, now));
            logger.info('Slot taken while booking', { slotId: slot.slotId, userId: turn.user.id });
            return ask(
                'awaiting_time',
                Replies.timeUnavailable(slots.time, slots.date, remaining.slice(0, TIME_PREVIEW)),
                { ...slots, time: undefined }
            );
        }

        await this.requestPayment(appointmentId);
        logger.conversation(turn.user.phone_number, 'BOOKED', {
            appointmentId,
            physicianId: slot.physicianId,
            date: slot.date,
            time: slot.startTime,
        });

        return { reply: Replies.booked(appointmentId, slot, specialty), session: createSession(now) };
    }

    private async requestPayment(appointmentId: number): Promise<void> {
        try {
            await this.deps.booking.requestPayment(appointmentId);
        } catch (error) {
            // The appointment stays pending; staff can resend the payment link
            logger.error('Failed to open payment for appointment', { appointmentId, ...errorDetails(error) });
        }
    }

    // --- Availability ----------------------------------------------------

    private checkAvailability(ctx: FlowContext): TurnResult {
        const { turn, now } = ctx;
        const slots = mergeSlots(ctx.session.slots, turn.classification.entities, ['specialty', 'date']);
        const ask = (step: SessionStep, reply: string, next: SessionSlots = slots): TurnResult => ({
            reply,
            session: advanceSession('check_availability', step, next, now),
        });

        if (!slots.specialty) {
            return ask('awaiting_specialty', Replies.askAvailabilitySpecialty(this.specialtyPreview()));
        }

        const specialty = this.deps.availability.resolveSpecialty(slots.specialty);
        if (!specialty) {
            return ask(
                'awaiting_specialty',
                Replies.unknownSpecialty(slots.specialty, this.specialtyPreview()),
                { ...slots, specialty: undefined }
            );
        }

        if (!slots.date) {
            return ask('awaiting_date', Replies.askAvailabilityDate(specialty), { ...slots, specialty });
        }

        if (DateTimeUtils.isBefore(slots.date, turn.today)) {
            return ask('awaiting_date', Replies.pastDate(slots.date), { specialty });
        }

        const scope: SlotScope = { specialty };
        const open = this.openSlots(scope, slots.date, turn, now);
        if (open.length === 0) {
            const nextDates = this.deps.availability.getNextAvailableDates(scope, slots.date);
            if (nextDates.length === 0) {
                return { reply: Replies.noAvailabilitySoon(specialty), session: createSession(now) };
            }
            return ask('awaiting_date', Replies.noSlotsOnDate(specialty, slots.date, nextDates), { specialty });
        }

        // Whatever time the user picks next books directly
        return {
            reply: Replies.availableSlots(specialty, slots.date, open.slice(0, SLOT_PREVIEW)),
            session: advanceSession('book_appointment', 'awaiting_time', { specialty, date: slots.date }, now),
        };
    }

    // --- Cancellation and rescheduling -----------------------------------

    private listAppointments(
        ctx: FlowContext,
        intent: 'cancel_appointment' | 'reschedule_appointment',
        invalidChoice: boolean
    ): TurnResult {
        const action = intent === 'cancel_appointment' ? 'cancel' : 'reschedule';
        const upcoming = this.deps.booking.upcomingFor(ctx.turn.user.id, ctx.turn.today);
        if (upcoming.length === 0) {
            return { reply: Replies.noUpcomingAppointments(action), session: createSession(ctx.now) };
        }

        return {
            reply: Replies.appointmentList(upcoming, action, invalidChoice),
            session: advanceSession(intent, 'awaiting_appointment_choice', {}, ctx.now, upcoming.map(a => a.id)),
        };
    }

    /**
     * Maps the user's numbered pick onto the appointment ids shown to them
     */
    private chosenAppointment(ctx: FlowContext): { choice: number | null; appointment?: AppointmentSummary } {
        const { turn, session } = ctx;
        const choice = turn.classification.entities.choice ?? parseChoice(turn.text);
        if (choice === null) return { choice };

        const appointmentId = session.appointmentOptions[choice - 1];
        if (appointmentId === undefined) return { choice };

        const appointment = this.findUpcoming(ctx, appointmentId);
        return appointment ? { choice, appointment } : { choice };
    }

    private findUpcoming(ctx: FlowContext, appointmentId: number): AppointmentSummary | undefined {
        return this.deps.booking
            .upcomingFor(ctx.turn.user.id, ctx.turn.today)
            .find(a => a.id === appointmentId);
    }

    private async cancelAppointment(ctx: FlowContext): Promise<TurnResult> {
        const { turn, session, now } = ctx;
        if (session.step !== 'awaiting_appointment_choice') {
            return this.listAppointments(ctx, 'cancel_appointment', false);
        }

        const { choice, appointment } = this.chosenAppointment(ctx);
        if (!appointment) {
            return this.listAppointments(ctx, 'cancel_appointment', choice !== null);
        }

        let result: Appointment;
        try {
            result = await this.deps.booking.cancel(appointment.id, turn.user.id);
        } catch (error) {
            if (!(error instanceof BookingError || error instanceof NotFoundError)) throw error;
            logger.warn('Appointment could not be cancelled', { appointmentId: appointment.id, reason: error.message });
            return { reply: Replies.appointmentUnavailable(), session: createSession(now) };
        }

        logger.conversation(turn.user.phone_number, 'CANCELLED', {
            appointmentId: appointment.id,
            paymentStatus: result.payment_status,
        });
        return { reply: Replies.cancelled(appointment, result.payment_status), session: createSession(now) };
    }

    private rescheduleAppointment(ctx: FlowContext): TurnResult {
        const { turn, session, now } = ctx;
        let slots = session.slots;
        let appointment: AppointmentSummary | undefined;

        if (slots.appointmentId === undefined) {
            if (session.step !== 'awaiting_appointment_choice') {
                return this.listAppointments(ctx, 'reschedule_appointment', false);
            }
            const chosen = this.chosenAppointment(ctx);
            if (!chosen.appointment) {
                return this.listAppointments(ctx, 'reschedule_appointment', chosen.choice !== null);
            }
            appointment = chosen.appointment;
            slots = { appointmentId: appointment.id, physicianId: appointment.physician_id };
        } else {
            appointment = this.findUpcoming(ctx, slots.appointmentId);
            if (!appointment) {
                return { reply: Replies.appointmentUnavailable(), session: createSession(now) };
            }
        }

        const current = appointment;
        slots = mergeSlots(slots, turn.classification.entities, ['date', 'time']);
        const ask = (step: SessionStep, reply: string, next: SessionSlots = slots): TurnResult => ({
            reply,
            session: advanceSession('reschedule_appointment', step, next, now),
        });
        const withoutDate: SessionSlots = { appointmentId: current.id, physicianId: current.physician_id };
        const doctor = `Dr. ${current.physician_name}`;

        if (!slots.date) {
            return ask('awaiting_date', Replies.askRescheduleDate(current));
        }
        if (DateTimeUtils.isBefore(slots.date, turn.today)) {
            return ask('awaiting_date', Replies.pastDate(slots.date), withoutDate);
        }

        const scope: SlotScope = { physicianId: current.physician_id };
        const open = this.openSlots(scope, slots.date, turn, now);
        if (open.length === 0) {
            const nextDates = this.deps.availability.getNextAvailableDates(scope, slots.date);
            return ask('awaiting_date', Replies.noSlotsOnDate(doctor, slots.date, nextDates), withoutDate);
        }

        const times = distinctStartTimes(open);
        if (!slots.time) {
            return ask('awaiting_time', Replies.askTime(doctor, slots.date, times.slice(0, TIME_PREVIEW)));
        }

        const slot = open.find(s => s.startTime === slots.time);
        if (!slot) {
            return ask(
                'awaiting_time',
                Replies.timeUnavailable(slots.time, slots.date, times.slice(0, TIME_PREVIEW)),
                { ...slots, time: undefined }
            );
        }

        try {
            this.deps.booking.reschedule(current.id, slot.slotId, turn.user.id);
        } catch (error) {
            if (error instanceof SlotUnavailableError) {
                const remaining = distinctStartTimes(this.openSlots(scope, slots.date, turn, now));
                return ask(
                    'awaiting_time',
                    Replies.timeUnavailable(slots.time, slots.date, remaining.slice(0, TIME_PREVIEW)),
                    { ...slots, time: undefined }
                );
            }
            if (!(error instanceof BookingError || error instanceof NotFoundError)) throw error;
            logger.warn('Appointment could not be rescheduled', { appointmentId: current.id, reason: error.message });
            return { reply: Replies.appointmentUnavailable(), session: createSession(now) };
        }

        logger.conversation(turn.user.phone_number, 'RESCHEDULED', {
            appointmentId: current.id,
            date: slot.date,
            time: slot.startTime,
        });
        return { reply: Replies.rescheduled(current.physician_name, slot.date, slot.startTime), session: createSession(now) };
    }

    // --- Insurance -------------------------------------------------------

    private async checkInsurance(ctx: FlowContext): Promise<TurnResult> {
        const { turn, now } = ctx;
        const emiratesId = turn.classification.entities.emiratesId ?? turn.user.emirates_id;
        if (!emiratesId) {
            return {
                reply: Replies.askEmiratesId(),
                session: advanceSession('insurance_check', 'awaiting_emirates_id', {}, now),
            };
        }

        const result = await this.deps.insurance.verify(emiratesId);
        if (!turn.user.emirates_id && result.status !== 'error') {
            this.deps.users.setEmiratesId(turn.user.id, emiratesId);
        }

        return { reply: Replies.insuranceResult(result), session: createSession(now) };
    }

    // --- Informational ---------------------------------------------------

    private greet(user: User): string {
        return Replies.greeting(user.first_name === PLACEHOLDER_FIRST_NAME ? null : user.first_name);
    }

    private physicianInfo(entities: ExtractedEntities): string {
        if (entities.physicianName) {
            const physician = this.deps.physicians.findByName(entities.physicianName);
            if (physician) return Replies.physicianDetails(physician);
        }

        if (entities.specialty) {
            const specialty = this.deps.availability.resolveSpecialty(entities.specialty);
            if (!specialty) {
                return Replies.unknownSpecialty(entities.specialty, this.specialtyPreview());
            }
            const physicians = this.deps.physicians.findBySpecialty(specialty).slice(0, LIST_LIMIT);
            return Replies.physiciansForSpecialty(specialty, physicians);
        }

        return entities.physicianName
            ? Replies.physicianNotFound()
            : Replies.askPhysicianQuery(this.specialtyPreview());
    }

    private pricing(entities: ExtractedEntities): string {
        if (!entities.specialty) {
            return Replies.priceRanges(this.deps.physicians.priceRanges());
        }

        const specialty = this.deps.availability.resolveSpecialty(entities.specialty);
        if (!specialty) {
            return Replies.unknownPricingSpecialty(entities.specialty);
        }

        const physicians = [...this.deps.physicians.findBySpecialty(specialty)]
            .sort((a, b) => a.consultation_price - b.consultation_price)
            .slice(0, LIST_LIMIT);
        return Replies.specialtyPrices(specialty, physicians);
    }
}

export const dialogueEngine = new DialogueEngine({
    availability: availabilityService,
    physicians: physicianRepository,
    booking: bookingService,
    insurance: insuranceService,
    clinic: clinicRepository,
    users: userRepository,
});
