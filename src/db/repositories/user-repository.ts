import Database from 'better-sqlite3';
import { db } from '../client';

export const PLACEHOLDER_FIRST_NAME = 'WhatsApp';

export interface User {
    id: number;
    phone_number: string;
    first_name: string;
    last_name: string;
    email: string | null;
    emirates_id: string | null;
    is_verified: boolean;
    is_active: boolean;
    created_at: string;
    updated_at: string | null;
}

interface UserRow extends Omit<User, 'is_verified' | 'is_active'> {
    is_verified: number;
    is_active: number;
}

function toUser(row: UserRow): User {
    return {
        ...row,
        is_verified: row.is_verified === 1,
        is_active: row.is_active === 1,
    };
}

const USER_COLUMNS = `
    id, phone_number, first_name, last_name, email, emirates_id,
    is_verified, is_active, created_at, updated_at
`;

export class UserRepository {
    constructor(private readonly database: Database.Database) {}

    findByPhone(phoneNumber: string): User | null {
        const row = this.database
            .prepare<[string], UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE phone_number = ?`)
            .get(phoneNumber);
        return row ? toUser(row) : null;
    }

    findById(id: number): User | null {
        const row = this.database
            .prepare<[number], UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = ?`)
            .get(id);
        return row ? toUser(row) : null;
    }

    /**
     * Chatbot users are created on first contact with placeholder names and no verification
     */
    findOrCreate(phoneNumber: string): User {
        this.database.prepare(`
            INSERT INTO users (phone_number) VALUES (?)
            ON CONFLICT(phone_number) DO NOTHING
        `).run(phoneNumber);

        const user = this.findByPhone(phoneNumber);
        if (!user) {
            throw new Error(`User ${phoneNumber} could not be created`);
        }
        return user;
    }

    updateName(id: number, firstName: string, lastName: string): void {
        this.database.prepare(`
            UPDATE users SET first_name = ?, last_name = ?, updated_at = CURRENT_TIMESTAMP
            WHERE id = ?
        `).run(firstName, lastName, id);
    }

    setEmiratesId(id: number, emiratesId: string): void {
        this.database.prepare(`
            UPDATE users SET emirates_id = ?, updated_at = CURRENT_TIMESTAMP
            WHERE id = ?
        `).run(emiratesId, id);
    }

    getSessionJson(phoneNumber: string): string | null {
        const row = this.database
            .prepare<[string], { chatbot_session: string | null }>('SELECT chatbot_session FROM users WHERE phone_number = ?')
            .get(phoneNumber);
        return row?.chatbot_session ?? null;
    }

    saveSessionJson(phoneNumber: string, sessionJson: string | null): void {
        this.database.prepare(`
            UPDATE users SET chatbot_session = ?, updated_at = CURRENT_TIMESTAMP
            WHERE phone_number = ?
        `).run(sessionJson, phoneNumber);
    }
}

export const userRepository = new UserRepository(db);
