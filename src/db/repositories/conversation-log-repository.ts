import Database from 'better-sqlite3';
import { db } from '../client';

export interface ConversationEntry {
    id?: number;
    phone_number: string;
    message: string;
    response: string | null;
    message_sid?: string | null;
    timestamp?: string;
}

export class ConversationLogRepository {
    constructor(private readonly database: Database.Database) {}

    create(entry: ConversationEntry): void {
        this.database.prepare(`
            INSERT INTO chatbot_conversations (phone_number, message, response, message_sid)
            VALUES (?, ?, ?, ?)
        `).run(entry.phone_number, entry.message, entry.response, entry.message_sid ?? null);
    }

    /**
     * Most recent `limit` entries, returned in chronological order
     */
    findByPhone(phoneNumber: string, limit: number = 50): ConversationEntry[] {
        const rows = this.database
            .prepare<[string, number], ConversationEntry>(`
                SELECT * FROM chatbot_conversations
                WHERE phone_number = ?
                ORDER BY timestamp DESC, id DESC
                LIMIT ?
            `)
            .all(phoneNumber, limit);
        return rows.reverse();
    }
}

export const conversationLogRepository = new ConversationLogRepository(db);
