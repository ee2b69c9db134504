import { config } from '../../../src/config';
import { MessageClient, MessagingService } from '../../../src/services/telephony/messaging-service';

interface SentMessage {
    body: string;
    from: string;
    to: string;
}

class FakeMessageClient implements MessageClient {
    readonly sent: SentMessage[] = [];
    fail = false;

    readonly messages = {
        create: async (params: SentMessage): Promise<{ sid: string }> => {
            if (this.fail) {
                throw new Error('Twilio unavailable');
            }
            this.sent.push(params);
            return { sid: `SM-test-${this.sent.length}` };
        },
    };
}

describe('MessagingService', () => {
    const original = { ...config.twilio };
    let client: FakeMessageClient;
    let service: MessagingService;

    beforeEach(() => {
        config.twilio.accountSid = 'test-account';
        config.twilio.authToken = 'test-secret';
        config.twilio.phoneNumber = '+15550000001';
        config.twilio.whatsappNumber = '+15550000002';
        client = new FakeMessageClient();
        service = new MessagingService(() => client);
    });

    afterEach(() => {
        Object.assign(config.twilio, original);
    });

    test('sends WhatsApp messages between whatsapp: addresses', async () => {
        const sid = await service.send('+971 50 123 4567', 'Your appointment is confirmed');

        expect(sid).toBe('SM-test-1');
        expect(client.sent).toEqual([{
            body: 'Your appointment is confirmed',
            from: 'whatsapp:+15550000002',
            to: 'whatsapp:+971501234567',
        }]);
    });

    test('sends SMS from the plain phone number', async () => {
        await service.send('+971501234567', 'Reminder', 'sms');

        expect(client.sent[0]).toEqual({ body: 'Reminder', from: '+15550000001', to: '+971501234567' });
    });

    test('does not send to an invalid number', async () => {
        await expect(service.send('12', 'Hello')).resolves.toBeNull();
        expect(client.sent).toHaveLength(0);
    });

    test('does not send without credentials', async () => {
        config.twilio.authToken = '';

        await expect(service.send('+971501234567', 'Hello')).resolves.toBeNull();
        expect(client.sent).toHaveLength(0);
    });

    test('returns null when the provider rejects the message', async () => {
        client.fail = true;

        await expect(service.send('+971501234567', 'Hello')).resolves.toBeNull();
    });
});
