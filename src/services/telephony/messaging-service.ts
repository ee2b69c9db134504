import twilio from 'twilio';
import { config } from '../../config';
import { PhoneFormatter } from '../../utils/phone-formatter';
import { errorDetails, logger } from '../logging';

export type MessageChannel = 'whatsapp' | 'sms';

/** The slice of the Twilio REST client used for outbound messages */
export interface MessageClient {
    messages: {
        create(params: { body: string; from: string; to: string }): Promise<{ sid: string }>;
    };
}

export interface MessageSender {
    send(to: string, body: string, channel?: MessageChannel): Promise<string | null>;
}

function createTwilioClient(): MessageClient {
    return twilio(config.twilio.accountSid, config.twilio.authToken);
}

export class MessagingService implements MessageSender {
    private client: MessageClient | null = null;

    constructor(private readonly clientFactory: () => MessageClient = createTwilioClient) {}

    private getClient(): MessageClient {
        if (!this.client) {
            this.client = this.clientFactory();
        }
        return this.client;
    }

    /**
     * Resolves with the Twilio message SID, or null when the message was not sent
     */
    async send(to: string, body: string, channel: MessageChannel = 'whatsapp'): Promise<string | null> {
        const phoneNumber = PhoneFormatter.normalize(to);
        if (!PhoneFormatter.isValid(phoneNumber)) {
            logger.warn('Refusing to message invalid phone number', { to, channel });
            return null;
        }

        if (!config.twilio.accountSid || !config.twilio.authToken) {
            logger.warn('Twilio credentials missing, message not sent', { phoneNumber, channel });
            return null;
        }

        const from = channel === 'whatsapp'
            ? PhoneFormatter.toWhatsAppAddress(config.twilio.whatsappNumber)
            : config.twilio.phoneNumber;
        const recipient = channel === 'whatsapp'
            ? PhoneFormatter.toWhatsAppAddress(phoneNumber)
            : phoneNumber;

        try {
            const message = await this.getClient().messages.create({ body, from, to: recipient });
            logger.info('Message sent', { phoneNumber, channel, sid: message.sid });
            return message.sid;
        } catch (error) {
            logger.error('Failed to send message', { phoneNumber, channel, ...errorDetails(error) });
            return null;
        }
    }
}

export const messagingService = new MessagingService();
