import { Request, Response, NextFunction } from 'express';
import twilio from 'twilio';
import { config } from '../../config';
import { logger } from '../../services/logging';

export function validateTwilioRequest(req: Request, res: Response, next: NextFunction) {
    if (config.features.skipTwilioValidation) {
        logger.debug('Skipping Twilio signature validation (development)');
        return next();
    }

    const signature = req.get('x-twilio-signature');
    if (!signature) {
        logger.warn('Missing Twilio signature', { path: req.path });
        return res.status(403).json({ error: 'Missing Twilio signature' });
    }

    // Proxies (ngrok, load balancers) set X-Forwarded headers with the URL Twilio actually called
    const protocol = req.get('x-forwarded-proto') || 'https';
    const host = req.get('x-forwarded-host') || req.get('host');
    const url = `${protocol}://${host}${req.originalUrl}`;

    const isValid = twilio.validateRequest(config.twilio.authToken, signature, url, req.body || {});
    if (!isValid) {
        logger.warn('Invalid Twilio signature', { url });
        return res.status(403).json({ error: 'Invalid signature' });
    }

    next();
}
