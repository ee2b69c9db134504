import Stripe from 'stripe';
import { config } from '../config';
import { Appointment } from '../db/repositories/appointment-repository';
import { PaymentError } from '../utils/errors';
import { logger } from './logging';
import { PaymentGateway } from './scheduling/interfaces';

export type PaymentEvent =
    | { type: 'succeeded'; paymentIntentId: string; appointmentId: number }
    | { type: 'failed'; paymentIntentId: string; appointmentId: number }
    | { type: 'ignored'; eventType: string };

export class PaymentService implements PaymentGateway {
    private stripe: Stripe;

    constructor(secretKey: string = config.stripe.secretKey) {
        this.stripe = new Stripe(secretKey || 'sk_test_placeholder');
    }

    /**
     * Creates a PaymentIntent for the consultation fee (amount in fils)
     */
    async createIntent(appointment: Appointment): Promise<string> {
        try {
            const intent = await this.stripe.paymentIntents.create({
                amount: Math.round(appointment.amount * 100),
                currency: config.stripe.currency,
                automatic_payment_methods: { enabled: true },
                metadata: {
                    appointmentId: String(appointment.id),
                    userId: String(appointment.user_id),
                },
            });
            logger.info('Payment intent created', { appointmentId: appointment.id, paymentIntentId: intent.id });
            return intent.id;
        } catch (error) {
            logger.error('Error creating Stripe PaymentIntent', { error: String(error), appointmentId: appointment.id });
            throw new PaymentError('Could not create payment intent', { appointmentId: appointment.id });
        }
    }

    async refund(paymentIntentId: string): Promise<void> {
        try {
            await this.stripe.refunds.create({ payment_intent: paymentIntentId });
            logger.info('Payment refunded', { paymentIntentId });
        } catch (error) {
            logger.error('Error refunding Stripe payment', { error: String(error), paymentIntentId });
            throw new PaymentError('Could not refund payment', { paymentIntentId });
        }
    }

    /**
     * Verifies the Stripe signature and reduces the event to what the booking lifecycle needs
     */
    parseWebhook(payload: Buffer, signature: string): PaymentEvent {
        const event = this.stripe.webhooks.constructEvent(payload, signature, config.stripe.webhookSecret);

        if (event.type !== 'payment_intent.succeeded' && event.type !== 'payment_intent.payment_failed') {
            return { type: 'ignored', eventType: event.type };
        }

        const intent = event.data.object;
        const appointmentId = Number(intent.metadata.appointmentId);
        if (!Number.isInteger(appointmentId)) {
            return { type: 'ignored', eventType: event.type };
        }

        return {
            type: event.type === 'payment_intent.succeeded' ? 'succeeded' : 'failed',
            paymentIntentId: intent.id,
            appointmentId,
        };
    }
}

export const paymentService = new PaymentService();
