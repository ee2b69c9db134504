import {
    extractJsonObject,
    IntentDetector,
    parseClassification,
} from '../../../src/services/ai/intent-detector';
import { ChatMessage, TextGenerator } from '../../../src/services/ai/llm';
import { AIError } from '../../../src/utils/errors';

class StubGenerator implements TextGenerator {
    readonly prompts: string[] = [];

    constructor(private readonly reply: string | Error) {}

    async generateText(history: ChatMessage[]): Promise<string> {
        this.prompts.push(history.map(m => m.content).join('\n'));
        if (this.reply instanceof Error) throw this.reply;
        return this.reply;
    }
}

const context = { today: '2026-03-02' };

describe('parseClassification', () => {
    test('reads JSON wrapped in a code fence', () => {
        const reply = '```json\n{"intent": "book_appointment", "confidence": 0.9, "entities": {"specialty": "Cardiology", "date": "2026-03-03", "time": "9:00"}}\n```';

        expect(parseClassification(reply)).toEqual({
            intent: 'book_appointment',
            confidence: 0.9,
            entities: { specialty: 'Cardiology', date: '2026-03-03', time: '09:00' },
        });
    });

    test('normalizes Emirates IDs and numeric choices', () => {
        const reply = JSON.stringify({
            intent: 'insurance_check',
            entities: { emirates_id: '784 1990 1234567 1', choice: '2', patient_name: 'Amira Saleh' },
        });

        expect(parseClassification(reply).entities).toEqual({
            emiratesId: '784-1990-1234567-1',
            choice: 2,
            patientName: 'Amira Saleh',
        });
    });

    test('drops unusable fields one by one', () => {
        const reply = JSON.stringify({
            intent: 'book_appointment',
            entities: {
                specialty: 'Dermatology',
                date: 'tomorrow',
                time: '25:00',
                emirates_id: '12345',
                choice: 0,
                physician_name: '',
            },
        });

        expect(parseClassification(reply).entities).toEqual({ specialty: 'Dermatology' });
    });

    test('maps unknown intents to other', () => {
        const classification = parseClassification('{"intent": "order_pizza", "entities": "none"}');
        expect(classification).toEqual({ intent: 'other', entities: {} });
    });

    test('throws when there is no JSON object', () => {
        expect(() => extractJsonObject('I think the user wants to book')).toThrow(SyntaxError);
    });
});

describe('IntentDetector', () => {
    test('classifies through the text generator', async () => {
        const generator = new StubGenerator('{"intent": "cancel_appointment", "entities": {}}');
        const detector = new IntentDetector(generator);

        await expect(detector.classify('please cancel my visit', context))
            .resolves.toEqual({ intent: 'cancel_appointment', entities: {} });
    });

    test('tells the model the date and the awaited field', async () => {
        const generator = new StubGenerator('{"intent": "other", "entities": {}}');
        const detector = new IntentDetector(generator);

        await detector.classify('cardiology', { today: '2026-03-02', expecting: 'specialty' });

        expect(generator.prompts[0]).toContain('Today is 2026-03-02.');
        expect(generator.prompts[0]).toContain('the medical specialty the user wants to see');
        expect(generator.prompts[0]).toContain('Message: "cardiology"');
    });

    test('degrades to other when the reply is not valid JSON', async () => {
        const detector = new IntentDetector(new StubGenerator('{"intent": "book_appointment", '));

        await expect(detector.classify('book me in', context)).resolves.toEqual({ intent: 'other', entities: {} });
    });

    test('degrades to other when the model call fails', async () => {
        const detector = new IntentDetector(new StubGenerator(new AIError('LLM generation failed')));

        await expect(detector.classify('hello', context)).resolves.toEqual({ intent: 'other', entities: {} });
    });
});
