import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../middleware/error-handler';
import { chatbotAgent } from '../../services/chatbot/chatbot-agent';
import { messagingService } from '../../services/telephony/messaging-service';
import { conversationLogRepository } from '../../db/repositories/conversation-log-repository';
import { userRepository } from '../../db/repositories/user-repository';
import { PhoneFormatter } from '../../utils/phone-formatter';
import { TelephonyError, ValidationError } from '../../utils/errors';

export const chatbotRouter = Router();

const phoneNumber = z.string()
    .transform(value => PhoneFormatter.normalize(value))
    .refine(value => PhoneFormatter.isValid(value), { message: 'Invalid phone number' });

const SendMessageSchema = z.object({
    to: phoneNumber,
    message: z.string().trim().min(1),
    channel: z.enum(['whatsapp', 'sms']).default('whatsapp'),
});

const TestAgentSchema = z.object({
    phoneNumber: phoneNumber.default('+10000000000'),
    message: z.string().trim().min(1),
});

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
        throw new ValidationError('Invalid request body', { issues: parsed.error.issues.map(i => i.message) });
    }
    return parsed.data;
}

chatbotRouter.post('/send', asyncHandler(async (req: Request, res: Response) => {
    const { to, message, channel } = parseBody(SendMessageSchema, req.body);

    const sid = await messagingService.send(to, message, channel);
    if (!sid) {
        throw new TelephonyError('Message could not be sent', { to, channel });
    }

    conversationLogRepository.create({
        phone_number: to,
        message: `[OUTGOING] ${message}`,
        response: null,
        message_sid: sid,
    });

    res.json({ success: true, sid });
}));

chatbotRouter.get('/conversations/:phone', (req: Request, res: Response) => {
    const phone = PhoneFormatter.normalize(req.params.phone);
    if (!PhoneFormatter.isValid(phone)) {
        throw new ValidationError('Invalid phone number', { phone: req.params.phone });
    }

    const limit = Math.min(Math.max(Number(req.query.limit) || 50, 1), 500);
    const user = userRepository.findByPhone(phone);

    res.json({
        phoneNumber: phone,
        user: user && {
            id: user.id,
            firstName: user.first_name,
            lastName: user.last_name,
            hasEmiratesId: Boolean(user.emirates_id),
            isVerified: user.is_verified,
        },
        conversations: conversationLogRepository.findByPhone(phone, limit),
    });
});

chatbotRouter.post('/test-agent', asyncHandler(async (req: Request, res: Response) => {
    const { phoneNumber: phone, message } = parseBody(TestAgentSchema, req.body);
    const reply = await chatbotAgent.processMessage(phone, message);
    res.json({ phoneNumber: phone, message, reply });
}));
