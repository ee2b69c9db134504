import fs from 'fs';
import path from 'path';
import { config } from '../config';

type LogMeta = Record<string, unknown>;

const LEVEL_WEIGHT: Record<string, number> = { debug: 10, info: 20, conversation: 20, warn: 30, error: 40 };

class Logger {
    private logStream?: fs.WriteStream;

    constructor() {
        // Tests log to the console only
        if (config.nodeEnv === 'test') return;

        const logDir = path.resolve(config.paths.logs);
        if (!fs.existsSync(logDir)) {
            try {
                fs.mkdirSync(logDir, { recursive: true });
            } catch (e) {
                console.error(`Failed to create log directory at ${logDir}:`, e);
                return;
            }
        }

        this.logStream = fs.createWriteStream(path.join(logDir, 'app.log'), { flags: 'a' });
        this.logStream.on('error', (err) => {
            console.error('Failed to write to log file stream:', err);
        });
    }

    private log(level: string, message: string, meta?: LogMeta) {
        if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[config.logLevel]) return;

        const logString = JSON.stringify({
            timestamp: new Date().toISOString(),
            level,
            message,
            ...meta
        });

        if (level === 'error') {
            console.error(logString);
        } else {
            console.log(logString);
        }

        if (this.logStream?.writable) {
            this.logStream.write(logString + '\n');
        }
    }

    public debug(message: string, meta?: LogMeta) {
        this.log('debug', message, meta);
    }

    public info(message: string, meta?: LogMeta) {
        this.log('info', message, meta);
    }

    public warn(message: string, meta?: LogMeta) {
        this.log('warn', message, meta);
    }

    public error(message: string, meta?: LogMeta) {
        this.log('error', message, meta);
    }

    /**
     * One line per chatbot turn, so flows can be reconstructed from the log
     */
    public conversation(phoneNumber: string, event: 'TURN' | 'SESSION_RESET' | 'BOOKED' | 'CANCELLED' | 'RESCHEDULED', meta?: LogMeta) {
        this.log('conversation', event, {
            phoneNumber,
            conversationEvent: true,
            ...meta
        });
    }

    public close(): void {
        this.logStream?.end();
    }
}

export function errorDetails(error: unknown): LogMeta {
    if (error instanceof Error) {
        return {
            name: error.name,
            message: error.message,
            stack: error.stack,
        };
    }
    return { value: String(error) };
}

export const logger = new Logger();
