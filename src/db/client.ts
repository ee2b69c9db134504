import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { config } from '../config';

const IN_MEMORY = ':memory:';

/**
 * Opens a database file (or an in-memory database), creating its directory if needed
 */
export function openDatabase(filePath: string): Database.Database {
    if (filePath !== IN_MEMORY) {
        const dbDir = path.dirname(path.resolve(filePath));
        if (!fs.existsSync(dbDir)) {
            fs.mkdirSync(dbDir, { recursive: true });
        }
    }

    const database = new Database(filePath);
    if (filePath !== IN_MEMORY) {
        database.pragma('journal_mode = WAL');
    }
    database.pragma('foreign_keys = ON');
    return database;
}

/**
 * Get schema content from file
 */
function getSchemaContent(): string {
    let schemaPath = path.join(__dirname, 'schema.sql');

    // Fallback for compiled dist directory
    if (!fs.existsSync(schemaPath)) {
        schemaPath = path.join(process.cwd(), 'src', 'db', 'schema.sql');
    }

    if (!fs.existsSync(schemaPath)) {
        throw new Error(`Schema file not found at: ${schemaPath}`);
    }

    return fs.readFileSync(schemaPath, 'utf-8');
}

export function applySchema(database: Database.Database): void {
    database.exec(getSchemaContent());
}

export const db = openDatabase(config.database.path);

export function initDatabase(): void {
    try {
        applySchema(db);
        console.log('✓ Database initialized successfully.');

        const tables = db.prepare<[], { name: string }>(
            "SELECT name FROM sqlite_master WHERE type='table'"
        ).all();
        console.log(`✓ Tables: ${tables.map(t => t.name).join(', ')}`);
    } catch (error) {
        console.error('✗ Database initialization failed:', error);
        throw error;
    }
}

export function closeDatabase(): void {
    try {
        db.close();
        console.log('✓ Closed database');
    } catch (err) {
        console.error('✗ Error closing database:', err);
    }
}
