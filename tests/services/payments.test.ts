import Stripe from 'stripe';
import { config } from '../../src/config';
import { PaymentService } from '../../src/services/payments';

const WEBHOOK_SECRET = 'test-secret';

function signedEvent(event: object): { payload: Buffer; signature: string } {
    const payload = JSON.stringify(event);
    const signature = new Stripe('sk_test_placeholder').webhooks.generateTestHeaderString({
        payload,
        secret: WEBHOOK_SECRET,
    });
    return { payload: Buffer.from(payload), signature };
}

function paymentIntentEvent(type: string, metadata: Record<string, string>): object {
    return {
        id: 'evt_test_1',
        object: 'event',
        type,
        data: { object: { id: 'pi_test_7', object: 'payment_intent', metadata } },
    };
}

describe('PaymentService.parseWebhook', () => {
    const originalSecret = config.stripe.webhookSecret;
    const payments = new PaymentService('sk_test_placeholder');

    beforeEach(() => {
        config.stripe.webhookSecret = WEBHOOK_SECRET;
    });

    afterEach(() => {
        config.stripe.webhookSecret = originalSecret;
    });

    test('maps a successful payment to its appointment', () => {
        const { payload, signature } = signedEvent(paymentIntentEvent('payment_intent.succeeded', { appointmentId: '7' }));

        expect(payments.parseWebhook(payload, signature)).toEqual({
            type: 'succeeded',
            paymentIntentId: 'pi_test_7',
            appointmentId: 7,
        });
    });

    test('maps a failed payment to its appointment', () => {
        const { payload, signature } = signedEvent(paymentIntentEvent('payment_intent.payment_failed', { appointmentId: '7' }));

        expect(payments.parseWebhook(payload, signature)).toEqual({
            type: 'failed',
            paymentIntentId: 'pi_test_7',
            appointmentId: 7,
        });
    });

    test('ignores payments that do not belong to an appointment', () => {
        const { payload, signature } = signedEvent(paymentIntentEvent('payment_intent.succeeded', {}));

        expect(payments.parseWebhook(payload, signature)).toEqual({
            type: 'ignored',
            eventType: 'payment_intent.succeeded',
        });
    });

    test('ignores unrelated event types', () => {
        const { payload, signature } = signedEvent({
            id: 'evt_test_2',
            object: 'event',
            type: 'customer.created',
            data: { object: { id: 'cus_test_1', object: 'customer' } },
        });

        expect(payments.parseWebhook(payload, signature)).toEqual({ type: 'ignored', eventType: 'customer.created' });
    });

    test('rejects a payload whose signature does not match', () => {
        const { signature } = signedEvent(paymentIntentEvent('payment_intent.succeeded', { appointmentId: '7' }));
        const tampered = Buffer.from(JSON.stringify(paymentIntentEvent('payment_intent.succeeded', { appointmentId: '8' })));

        expect(() => payments.parseWebhook(tampered, signature)).toThrow();
    });
});
