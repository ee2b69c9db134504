import { Router, Request, Response } from 'express';
import twilio from 'twilio';
import { z } from 'zod';
import { validateTwilioRequest } from '../middleware/twilio-validator';
import { asyncHandler } from '../middleware/error-handler';
import { chatbotAgent, ChatbotAgent } from '../../services/chatbot/chatbot-agent';
import { redisCoordinator, RedisCoordinator } from '../../services/coordination/redis-coordinator';
import { errorDetails, logger } from '../../services/logging';
import { PhoneFormatter } from '../../utils/phone-formatter';

const MessagingResponse = twilio.twiml.MessagingResponse;

const InboundMessageSchema = z.object({
    From: z.string().min(1),
    Body: z.string().default(''),
    MessageSid: z.string().optional(),
});

export interface WhatsAppWebhookDependencies {
    agent: Pick<ChatbotAgent, 'processMessage'>;
    coordinator: Pick<RedisCoordinator, 'markWebhookProcessed'>;
}

async function isFirstDelivery(coordinator: WhatsAppWebhookDependencies['coordinator'], messageSid: string): Promise<boolean> {
    try {
        return await coordinator.markWebhookProcessed(`whatsapp:${messageSid}`);
    } catch (error) {
        logger.warn('Webhook de-duplication unavailable, processing message', { messageSid, ...errorDetails(error) });
        return true;
    }
}

/**
 * Runs one inbound WhatsApp message through the agent and returns the TwiML to answer with.
 * Twilio retries a delivery until it gets a 200, so the caller always answers 200.
 */
export async function handleInboundMessage(
    body: unknown,
    deps: WhatsAppWebhookDependencies = { agent: chatbotAgent, coordinator: redisCoordinator }
): Promise<string> {
    const twiml = new MessagingResponse();

    const parsed = InboundMessageSchema.safeParse(body);
    if (!parsed.success) {
        logger.warn('Ignoring malformed WhatsApp webhook', { issues: parsed.error.issues.length });
        return twiml.toString();
    }

    const { From, Body, MessageSid } = parsed.data;
    if (MessageSid && !(await isFirstDelivery(deps.coordinator, MessageSid))) {
        logger.info('Duplicate WhatsApp delivery ignored', { messageSid: MessageSid });
        return twiml.toString();
    }

    const phoneNumber = PhoneFormatter.normalize(From);
    logger.info('WhatsApp message received', { phoneNumber, messageSid: MessageSid });

    const reply = await deps.agent.processMessage(phoneNumber, Body, { messageSid: MessageSid });
    twiml.message(reply);
    return twiml.toString();
}

export const whatsappWebhookRouter = Router();

whatsappWebhookRouter.post('/whatsapp/webhook', validateTwilioRequest, asyncHandler(async (req: Request, res: Response) => {
    const xml = await handleInboundMessage(req.body);
    res.type('text/xml');
    res.status(200).send(xml);
}));
