import express, { Router, Request, Response } from 'express';
import { asyncHandler } from '../middleware/error-handler';
import { PaymentEvent, paymentService } from '../../services/payments';
import { bookingService } from '../../services/scheduling/booking-service';
import { errorDetails, logger } from '../../services/logging';

export const paymentsRouter = Router();

// Stripe signs the raw payload, so this route parses its own body
paymentsRouter.post('/webhook', express.raw({ type: 'application/json' }), asyncHandler(async (req: Request, res: Response) => {
    const signature = req.get('stripe-signature');
    if (!signature || !Buffer.isBuffer(req.body)) {
        return res.status(400).json({ error: 'Missing Stripe signature or payload' });
    }

    let event: PaymentEvent;
    try {
        event = paymentService.parseWebhook(req.body, signature);
    } catch (error) {
        logger.warn('Rejected Stripe webhook', errorDetails(error));
        return res.status(400).json({ error: 'Invalid signature' });
    }

    switch (event.type) {
        case 'succeeded': {
            const appointment = await bookingService.confirmPayment(event.appointmentId, event.paymentIntentId);
            logger.info('Payment succeeded', {
                appointmentId: appointment.id,
                status: appointment.status,
                paymentStatus: appointment.payment_status,
            });
            break;
        }
        case 'failed':
            bookingService.markPaymentFailed(event.appointmentId);
            logger.warn('Appointment payment failed', { appointmentId: event.appointmentId });
            break;
        case 'ignored':
            logger.debug('Ignoring Stripe event', { eventType: event.type, stripeType: event.eventType });
            break;
    }

    res.json({ received: true });
}));
