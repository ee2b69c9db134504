import { z } from 'zod';
import { ExpectedField, Intent } from '../ai/intent-detector';

export const FLOW_INTENTS = [
    'book_appointment',
    'check_availability',
    'cancel_appointment',
    'reschedule_appointment',
    'insurance_check',
] as const;

export const SESSION_STEPS = [
    'idle',
    'awaiting_specialty',
    'awaiting_date',
    'awaiting_time',
    'awaiting_appointment_choice',
    'awaiting_emirates_id',
] as const;

export type FlowIntent = typeof FLOW_INTENTS[number];
export type SessionStep = typeof SESSION_STEPS[number];

export const SessionSlotsSchema = z.object({
    specialty: z.string().optional(),
    date: z.string().optional(),
    time: z.string().optional(),
    physicianId: z.number().int().optional(),
    appointmentId: z.number().int().optional(),
});

export const ChatSessionSchema = z.object({
    intent: z.enum(FLOW_INTENTS).nullable(),
    step: z.enum(SESSION_STEPS),
    slots: SessionSlotsSchema,
    appointmentOptions: z.array(z.number().int()),
    updatedAt: z.string(),
});

export type SessionSlots = z.infer<typeof SessionSlotsSchema>;
export type ChatSession = z.infer<typeof ChatSessionSchema>;

export type SchedulingField = 'specialty' | 'date' | 'time';

const STEP_EXPECTS: Record<SessionStep, ExpectedField | undefined> = {
    idle: undefined,
    awaiting_specialty: 'specialty',
    awaiting_date: 'date',
    awaiting_time: 'time',
    awaiting_appointment_choice: 'appointment_choice',
    awaiting_emirates_id: 'emirates_id',
};

export function createSession(now: Date = new Date()): ChatSession {
    return {
        intent: null,
        step: 'idle',
        slots: {},
        appointmentOptions: [],
        updatedAt: now.toISOString(),
    };
}

export function isFlowIntent(intent: Intent): intent is FlowIntent {
    return (FLOW_INTENTS as readonly string[]).includes(intent);
}

export function isSchedulingIntent(intent: FlowIntent | null): boolean {
    return intent === 'book_appointment' || intent === 'check_availability';
}

export function isActive(session: ChatSession): boolean {
    return session.intent !== null;
}

/**
 * A flow left idle longer than the TTL counts as abandoned
 */
export function isExpired(session: ChatSession, ttlMinutes: number, now: Date = new Date()): boolean {
    const updated = Date.parse(session.updatedAt);
    if (Number.isNaN(updated)) return true;
    return now.getTime() - updated > ttlMinutes * 60_000;
}

export function expectedField(session: ChatSession): ExpectedField | undefined {
    return STEP_EXPECTS[session.step];
}

export function advanceSession(
    intent: FlowIntent,
    step: SessionStep,
    slots: SessionSlots,
    now: Date,
    appointmentOptions: number[] = []
): ChatSession {
    return {
        intent,
        step,
        slots,
        appointmentOptions,
        updatedAt: now.toISOString(),
    };
}

/**
 * "2" -> 2 for replies to a numbered list; null for anything else
 */
export function parseChoice(text: string): number | null {
    const trimmed = text.trim().replace(/[.)]$/, '');
    if (!/^\d{1,2}$/.test(trimmed)) return null;
    const choice = Number(trimmed);
    return choice > 0 ? choice : null;
}
