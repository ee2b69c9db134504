import { config } from '../../config';
import {
    ConversationLogRepository,
    conversationLogRepository,
} from '../../db/repositories/conversation-log-repository';
import {
    PLACEHOLDER_FIRST_NAME,
    User,
    UserRepository,
    userRepository,
} from '../../db/repositories/user-repository';
import { DateTimeUtils } from '../../utils/date-time';
import { IntentClassifier, IntentDetector } from '../ai/intent-detector';
import { errorDetails, logger } from '../logging';
import { DialogueEngine, dialogueEngine } from './dialogue-engine';
import { ERROR_REPLY } from './messages';
import { expectedField } from './session';
import { SessionStore, sessionStore } from './session-store';

export interface ChatbotAgentDependencies {
    users: Pick<UserRepository, 'findOrCreate' | 'updateName'>;
    sessions: SessionStore;
    classifier: IntentClassifier;
    engine: Pick<DialogueEngine, 'handle'>;
    conversations: Pick<ConversationLogRepository, 'create'>;
    timezone: string;
}

export interface IncomingMessageOptions {
    messageSid?: string;
    now?: Date;
}

/**
 * Entry point for one inbound WhatsApp message: user lookup, session load,
 * classification, dialogue turn, session save and conversation log
 */
export class ChatbotAgent {
    constructor(private readonly deps: ChatbotAgentDependencies) {}

    /**
     * Always resolves with a reply; failures inside the turn become a generic apology
     */
    async processMessage(phoneNumber: string, message: string, options: IncomingMessageOptions = {}): Promise<string> {
        const now = options.now ?? new Date();

        let reply: string;
        try {
            reply = await this.respond(phoneNumber, message, now);
        } catch (error) {
            logger.error('Chatbot turn failed', { phoneNumber, ...errorDetails(error) });
            reply = ERROR_REPLY;
        }

        try {
            this.deps.conversations.create({
                phone_number: phoneNumber,
                message,
                response: reply,
                message_sid: options.messageSid ?? null,
            });
        } catch (error) {
            logger.error('Failed to record conversation', { phoneNumber, ...errorDetails(error) });
        }

        return reply;
    }

    private async respond(phoneNumber: string, message: string, now: Date): Promise<string> {
        const found = this.deps.users.findOrCreate(phoneNumber);
        const session = this.deps.sessions.load(phoneNumber, now);
        const today = DateTimeUtils.today(this.deps.timezone, now);

        const classification = await this.deps.classifier.classify(message, {
            today,
            expecting: expectedField(session),
        });
        const user = this.rememberName(found, classification.entities.patientName);

        const result = await this.deps.engine.handle({ user, session, classification, text: message, today, now });
        this.deps.sessions.save(phoneNumber, result.session);

        logger.conversation(phoneNumber, 'TURN', {
            intent: classification.intent,
            flow: result.session.intent,
            step: result.session.step,
        });
        return result.reply;
    }

    /**
     * Replaces the placeholder name once the user tells us who they are
     */
    private rememberName(user: User, patientName?: string): User {
        if (!patientName || user.first_name !== PLACEHOLDER_FIRST_NAME) return user;

        const [firstName, ...rest] = patientName.split(/\s+/);
        const lastName = rest.length > 0 ? rest.join(' ') : user.last_name;
        this.deps.users.updateName(user.id, firstName, lastName);
        return { ...user, first_name: firstName, last_name: lastName };
    }
}

export const chatbotAgent = new ChatbotAgent({
    users: userRepository,
    sessions: sessionStore,
    classifier: new IntentDetector(),
    engine: dialogueEngine,
    conversations: conversationLogRepository,
    timezone: config.clinic.timezone,
});
