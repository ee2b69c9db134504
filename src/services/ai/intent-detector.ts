import { z } from 'zod';
import { DateTimeUtils } from '../../utils/date-time';
import { logger } from '../logging';
import { LLMService, TextGenerator } from './llm';

export const INTENTS = [
    'book_appointment',
    'check_availability',
    'cancel_appointment',
    'reschedule_appointment',
    'physician_info',
    'insurance_check',
    'clinic_info',
    'pricing',
    'greeting',
    'restart',
    'other',
] as const;

export type Intent = typeof INTENTS[number];

/**
 * Typed result of entity extraction. Every field is optional; a field the model
 * returned in an unusable shape is left out rather than failing the whole turn.
 */
export interface ExtractedEntities {
    specialty?: string;
    date?: string;        // YYYY-MM-DD
    time?: string;        // HH:MM
    physicianName?: string;
    emiratesId?: string;  // 784-XXXX-XXXXXXX-X
    patientName?: string;
    choice?: number;      // 1-based pick from a numbered list
}

export interface Classification {
    intent: Intent;
    confidence?: number;
    entities: ExtractedEntities;
}

export type ExpectedField = 'specialty' | 'date' | 'time' | 'appointment_choice' | 'emirates_id';

export interface ClassifierContext {
    today: string;
    expecting?: ExpectedField;
}

export interface IntentClassifier {
    classify(message: string, context: ClassifierContext): Promise<Classification>;
}

export const FALLBACK_CLASSIFICATION: Classification = { intent: 'other', entities: {} };

const optionalText = z.string().trim().min(1).optional().catch(undefined);

function normalizeEmiratesId(value: string): string | null {
    const digits = value.replace(/\D/g, '');
    if (digits.length !== 15 || !digits.startsWith('784')) return null;
    return `${digits.slice(0, 3)}-${digits.slice(3, 7)}-${digits.slice(7, 14)}-${digits.slice(14)}`;
}

const RawEntitiesSchema = z.object({
    specialty: optionalText,
    date: z.string().trim().refine(DateTimeUtils.isIsoDate).optional().catch(undefined),
    time: z.string().transform((value, ctx) => {
        const normalized = DateTimeUtils.normalizeTime(value);
        if (!normalized) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected HH:MM' });
            return z.NEVER;
        }
        return normalized;
    }).optional().catch(undefined),
    physician_name: optionalText,
    emirates_id: z.string().transform((value, ctx) => {
        const normalized = normalizeEmiratesId(value);
        if (!normalized) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a 15-digit Emirates ID' });
            return z.NEVER;
        }
        return normalized;
    }).optional().catch(undefined),
    patient_name: optionalText,
    choice: z.coerce.number().int().positive().optional().catch(undefined),
});

export const ClassificationSchema = z.object({
    intent: z.enum(INTENTS).catch('other'),
    confidence: z.number().min(0).max(1).optional().catch(undefined),
    entities: RawEntitiesSchema.catch({}),
});

function toEntities(raw: z.infer<typeof RawEntitiesSchema>): ExtractedEntities {
    const entities: ExtractedEntities = {};
    if (raw.specialty !== undefined) entities.specialty = raw.specialty;
    if (raw.date !== undefined) entities.date = raw.date;
    if (raw.time !== undefined) entities.time = raw.time;
    if (raw.physician_name !== undefined) entities.physicianName = raw.physician_name;
    if (raw.emirates_id !== undefined) entities.emiratesId = raw.emirates_id;
    if (raw.patient_name !== undefined) entities.patientName = raw.patient_name;
    if (raw.choice !== undefined) entities.choice = raw.choice;
    return entities;
}

/**
 * Pulls the outermost JSON object out of a model reply that may wrap it in prose or code fences
 */
export function extractJsonObject(text: string): unknown {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start === -1 || end <= start) {
        throw new SyntaxError('No JSON object in classifier reply');
    }
    return JSON.parse(text.slice(start, end + 1));
}

export function parseClassification(text: string): Classification {
    const parsed = ClassificationSchema.safeParse(extractJsonObject(text));
    if (!parsed.success) {
        throw new TypeError(`Classifier reply does not match schema: ${parsed.error.message}`);
    }

    const result: Classification = {
        intent: parsed.data.intent,
        entities: toEntities(parsed.data.entities),
    };
    if (parsed.data.confidence !== undefined) {
        result.confidence = parsed.data.confidence;
    }
    return result;
}

const EXPECTING_HINTS: Record<ExpectedField, string> = {
    specialty: 'the medical specialty the user wants to see',
    date: 'the appointment date',
    time: 'the appointment time',
    appointment_choice: 'the number of one of the appointments listed to them',
    emirates_id: 'their Emirates ID number',
};

export class IntentDetector implements IntentClassifier {
    constructor(private readonly llm: TextGenerator = new LLMService()) {}

    private buildPrompt(message: string, context: ClassifierContext): string {
        const expecting = context.expecting
            ? `\n        The assistant has just asked the user for ${EXPECTING_HINTS[context.expecting]}. A bare answer to that question should still be returned as an entity.\n`
            : '';

        return `
        Classify the following WhatsApp message sent to a medical clinic into one of these intents:
        - book_appointment (wants to book a doctor appointment)
        - check_availability (wants to know when physicians are available)
        - cancel_appointment (wants to cancel an existing appointment)
        - reschedule_appointment (wants to move an existing appointment)
        - physician_info (asks about physicians)
        - insurance_check (wants insurance coverage checked)
        - clinic_info (asks about location, hours, contact)
        - pricing (asks about prices or fees)
        - greeting (just says hello)
        - restart (wants to start over or a new conversation)
        - other (anything else)

        Today is ${context.today}. Resolve relative dates ("tomorrow", "next Monday") against it.
        ${expecting}
        Message: "${message}"

        Return ONLY a JSON object of the form:
        {"intent": "<intent>", "confidence": <0..1>, "entities": {"specialty": string, "date": "YYYY-MM-DD", "time": "HH:MM", "physician_name": string, "emirates_id": string, "patient_name": string, "choice": number}}
        Omit entities that are not present in the message.`;
    }

    /**
     * Never throws: any failure degrades to the "other" intent with no entities
     */
    async classify(message: string, context: ClassifierContext): Promise<Classification> {
        try {
            const reply = await this.llm.generateText(
                [{ role: 'user', content: this.buildPrompt(message, context) }],
                'You are an intent classifier for a medical clinic. Output only JSON.'
            );
            const classification = parseClassification(reply);
            logger.info('Intent classified', {
                intent: classification.intent,
                entities: Object.keys(classification.entities),
            });
            return classification;
        } catch (error) {
            logger.warn('Intent classification failed, falling back to "other"', {
                error: error instanceof Error ? error.message : String(error),
            });
            return { intent: FALLBACK_CLASSIFICATION.intent, entities: {} };
        }
    }
}
