import dotenv from 'dotenv';

if (process.env.NODE_ENV !== 'production') {
    dotenv.config();
}

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface Config {
    port: number;
    nodeEnv: string;
    logLevel: LogLevel;

    twilio: {
        accountSid: string;
        authToken: string;
        phoneNumber: string;
        whatsappNumber: string;
    };

    ai: {
        anthropicApiKey?: string;
        model: string;
        temperature: number;
        maxTokens: number;
    };

    stripe: {
        secretKey: string;
        webhookSecret: string;
        currency: string;
    };

    redis: {
        url?: string;
        webhookIdempotencyTtlSeconds: number;
    };

    database: {
        path: string;
    };

    paths: {
        logs: string;
        seedData: string;
    };

    admin: {
        apiKey: string;
    };

    clinic: {
        timezone: string;
    };

    chatbot: {
        sessionTtlMinutes: number;
    };

    scheduling: {
        lookaheadDays: number;
        nextDatesLimit: number;
    };

    features: {
        skipTwilioValidation: boolean;
        paymentIntents: boolean;
    };
}

function getEnvVar(key: string, defaultValue?: string): string {
    const value = process.env[key] || defaultValue;
    if (value === undefined) {
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return value;
}

function parseLogLevel(value: string): LogLevel {
    if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') {
        return value;
    }
    return 'info';
}

const nodeEnv = getEnvVar('NODE_ENV', 'development');

export const config: Config = {
    port: parseInt(getEnvVar('PORT', '3000')),
    nodeEnv,
    logLevel: parseLogLevel(getEnvVar('LOG_LEVEL', 'info')),

    twilio: {
        accountSid: getEnvVar('TWILIO_ACCOUNT_SID', ''),
        authToken: getEnvVar('TWILIO_AUTH_TOKEN', ''),
        phoneNumber: getEnvVar('TWILIO_PHONE_NUMBER', ''),
        whatsappNumber: process.env.TWILIO_WHATSAPP_NUMBER || process.env.TWILIO_PHONE_NUMBER || '',
    },

    ai: {
        anthropicApiKey: process.env.ANTHROPIC_API_KEY,
        model: getEnvVar('AI_MODEL', 'claude-3-haiku-20240307'),
        temperature: parseFloat(getEnvVar('AI_TEMPERATURE', '0')),
        maxTokens: parseInt(getEnvVar('AI_MAX_TOKENS', '400')),
    },

    stripe: {
        secretKey: getEnvVar('STRIPE_SECRET_KEY', ''),
        webhookSecret: getEnvVar('STRIPE_WEBHOOK_SECRET', ''),
        currency: getEnvVar('STRIPE_CURRENCY', 'aed'),
    },

    redis: {
        url: process.env.REDIS_URL,
        webhookIdempotencyTtlSeconds: parseInt(getEnvVar('WEBHOOK_IDEMPOTENCY_TTL_SECONDS', '86400')),
    },

    database: {
        path: process.env.DB_PATH || (nodeEnv === 'test' ? ':memory:' : nodeEnv === 'production' ? '/app/data/clinic.db' : './clinic.db'),
    },

    paths: {
        logs: getEnvVar('LOGS_PATH', nodeEnv === 'production' ? '/app/data/logs' : './logs'),
        seedData: getEnvVar('SEED_DATA_PATH', './data/seed.json'),
    },

    admin: {
        apiKey: getEnvVar('ADMIN_API_KEY', ''),
    },

    clinic: {
        timezone: getEnvVar('CLINIC_TIMEZONE', 'Asia/Dubai'),
    },

    chatbot: {
        sessionTtlMinutes: parseInt(getEnvVar('SESSION_TTL_MINUTES', '30')),
    },

    scheduling: {
        lookaheadDays: parseInt(getEnvVar('AVAILABILITY_LOOKAHEAD_DAYS', '30')),
        nextDatesLimit: parseInt(getEnvVar('NEXT_AVAILABLE_DATES_LIMIT', '3')),
    },

    features: {
        skipTwilioValidation: nodeEnv === 'development' && getEnvVar('SKIP_TWILIO_VALIDATION', 'false') === 'true',
        paymentIntents: getEnvVar('FEATURE_PAYMENT_INTENTS', 'true') === 'true',
    },
};

// Called from server startup only, so tests and scripts can import config freely
export function validateEnvironment(): void {
    const errors: string[] = [];

    if (!config.twilio.accountSid) errors.push('TWILIO_ACCOUNT_SID');
    if (!config.twilio.authToken) errors.push('TWILIO_AUTH_TOKEN');
    if (!config.twilio.phoneNumber) errors.push('TWILIO_PHONE_NUMBER');
    if (!config.ai.anthropicApiKey) errors.push('ANTHROPIC_API_KEY');
    if (!config.admin.apiKey) errors.push('ADMIN_API_KEY');

    if (config.features.paymentIntents && !config.stripe.secretKey) {
        errors.push('STRIPE_SECRET_KEY (required when FEATURE_PAYMENT_INTENTS=true)');
    }

    if (errors.length > 0) {
        console.error('\n❌ Missing required environment variables:');
        errors.forEach(e => console.error(`   - ${e}`));
        console.error('\n💡 Copy .env.example to .env and fill in your values\n');
        process.exit(1);
    }

    console.log('✓ Environment validation passed');

    if (config.nodeEnv === 'development') {
        console.log('\n📋 Configuration Loaded:');
        console.log(`  Environment: ${config.nodeEnv}`);
        console.log(`  Port: ${config.port}`);
        console.log(`  AI Model: ${config.ai.model}`);
        console.log(`  Database: ${config.database.path}`);
        console.log(`  Clinic timezone: ${config.clinic.timezone}`);

        if (!config.redis.url) {
            console.warn('  ⚠️  Redis not configured (webhook de-duplication disabled)');
        }
        console.log('');
    }
}
