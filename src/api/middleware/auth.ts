import { Request, Response, NextFunction } from 'express';
import { config } from '../../config';

/**
 * API key check for staff-facing routes: `x-api-key` header or a Bearer token
 */
export const requireAuth = (req: Request, res: Response, next: NextFunction) => {
    const authHeader = req.get('authorization');
    const apiKey = req.get('x-api-key');

    const providedKey = apiKey || (authHeader?.startsWith('Bearer ') ? authHeader.substring(7) : authHeader);

    if (!config.admin.apiKey || !providedKey || providedKey !== config.admin.apiKey) {
        return res.status(401).json({ error: 'Unauthorized' });
    }

    next();
};
