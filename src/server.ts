import express, { Request, Response, NextFunction } from 'express';
import rateLimit from 'express-rate-limit';
import { config, validateEnvironment } from './config';
import { initDatabase, db, closeDatabase } from './db/client';
import { errorHandler } from './api/middleware/error-handler';
import { requireAuth } from './api/middleware/auth';
import { whatsappWebhookRouter } from './api/routes/whatsapp-webhook';
import { chatbotRouter } from './api/routes/chatbot';
import { paymentsRouter } from './api/routes/payments';
import { errorDetails, logger } from './services/logging';
import { redisCoordinator } from './services/coordination/redis-coordinator';

validateEnvironment();

logger.info(`🚀 Starting clinic assistant server in ${config.nodeEnv} mode...`);

const app = express();

app.set('trust proxy', 1);

// Needs the raw body for signature checks, so it is mounted before the body parsers
app.use('/api/payments', paymentsRouter);

app.use(express.urlencoded({ extended: true }));
app.use(express.json());

const apiLimiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: 100,
    standardHeaders: true,
    legacyHeaders: false,
});
app.use('/api/', apiLimiter);

if (config.nodeEnv === 'development') {
    app.use((req: Request, res: Response, next: NextFunction) => {
        logger.info('HTTP Request', { method: req.method, path: req.path, ip: req.ip });
        next();
    });
}

app.use(whatsappWebhookRouter);
app.use('/api/chatbot', requireAuth, chatbotRouter);

app.get('/health', (req: Request, res: Response) => {
    try {
        db.prepare('SELECT 1').get();
        res.json({
            status: 'healthy',
            version: '1.0.0',
            database: 'connected',
            timestamp: new Date().toISOString()
        });
    } catch (error) {
        res.status(503).json({
            status: 'unhealthy',
            database: 'disconnected',
            error: error instanceof Error ? error.message : 'Unknown error'
        });
    }
});

app.get('/', (req: Request, res: Response) => {
    res.json({
        status: 'ok',
        service: 'Clinic WhatsApp Assistant',
        version: '1.0.0',
        timestamp: new Date().toISOString()
    });
});

// Error handling middleware (must be last)
app.use(errorHandler);

async function start(): Promise<void> {
    initDatabase();
    await redisCoordinator.init();
}

const server = app.listen(config.port, '0.0.0.0', () => {
    start()
        .then(() => {
            logger.info('Server listening', { port: config.port });
            console.log(`✓ WhatsApp webhook: http://localhost:${config.port}/whatsapp/webhook`);
            console.log(`✓ Health check: http://localhost:${config.port}/health\n`);
        })
        .catch((error: unknown) => {
            logger.error('Failed to start server', errorDetails(error));
            process.exit(1);
        });
});

process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection', errorDetails(reason));
});

process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', errorDetails(error));
});

function gracefulShutdown(signal: string) {
    console.log(`\n🛑 Received ${signal}, shutting down gracefully...`);

    server.close(() => {
        console.log('✓ HTTP server closed');

        redisCoordinator.close()
            .catch((error: unknown) => logger.warn('Error closing Redis connection', errorDetails(error)))
            .finally(() => {
                closeDatabase();
                logger.close();
                console.log('👋 Shutdown complete');
                process.exit(0);
            });
    });

    // Force close after 10 seconds
    setTimeout(() => {
        console.error('⚠️ Forced shutdown after timeout');
        process.exit(1);
    }, 10000);
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
