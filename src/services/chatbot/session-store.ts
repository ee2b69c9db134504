import { config } from '../../config';
import { UserRepository, userRepository } from '../../db/repositories/user-repository';
import { logger } from '../logging';
import { ChatSession, ChatSessionSchema, createSession, isActive, isExpired } from './session';

export interface SessionStore {
    load(phoneNumber: string, now?: Date): ChatSession;
    save(phoneNumber: string, session: ChatSession): void;
    clear(phoneNumber: string): void;
}

/**
 * Keeps each user's conversation state on their user record
 */
export class UserSessionStore implements SessionStore {
    constructor(
        private readonly users: UserRepository,
        private readonly ttlMinutes: number = config.chatbot.sessionTtlMinutes
    ) {}

    load(phoneNumber: string, now: Date = new Date()): ChatSession {
        const raw = this.users.getSessionJson(phoneNumber);
        if (!raw) return createSession(now);

        let session: ChatSession;
        try {
            const parsed = ChatSessionSchema.safeParse(JSON.parse(raw));
            if (!parsed.success) {
                logger.warn('Discarding session that does not match schema', { phoneNumber });
                return createSession(now);
            }
            session = parsed.data;
        } catch {
            logger.warn('Discarding session that is not valid JSON', { phoneNumber });
            return createSession(now);
        }

        if (isActive(session) && isExpired(session, this.ttlMinutes, now)) {
            logger.conversation(phoneNumber, 'SESSION_RESET', { reason: 'expired', intent: session.intent });
            return createSession(now);
        }

        return session;
    }

    save(phoneNumber: string, session: ChatSession): void {
        this.users.saveSessionJson(phoneNumber, isActive(session) ? JSON.stringify(session) : null);
    }

    clear(phoneNumber: string): void {
        this.users.saveSessionJson(phoneNumber, null);
    }
}

export const sessionStore = new UserSessionStore(userRepository);
