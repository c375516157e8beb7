/**
 * Authentication Middleware for the admin API
 *
 * Checks a static bearer token from the Authorization header.
 * Returns 401 for invalid or missing tokens, 503 when no token is configured.
 */

import crypto from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../lib/logger';

function tokensMatch(expected: string, received: string): boolean {
    const a = Buffer.from(expected);
    const b = Buffer.from(received);
    return a.length === b.length && crypto.timingSafeEqual(a, b);
}

export function requireAdminToken(expectedToken: string | undefined): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        if (!expectedToken) {
            logger.warn({ path: req.path }, 'Admin API called but ADMIN_API_TOKEN is not configured');
            res.status(503).json({
                status: 503,
                code: 'ADMIN_API_DISABLED',
                message: 'Admin API is not configured',
            });
            return;
        }

        const authHeader = req.headers.authorization;

        if (!authHeader || !authHeader.startsWith('Bearer ')) {
            logger.debug({ path: req.path }, 'Missing or invalid Authorization header');
            res.status(401).json({
                status: 401,
                code: 'UNAUTHORIZED',
                message: 'Authentication required',
            });
            return;
        }

        const token = authHeader.substring(7); // Remove 'Bearer ' prefix
        if (!tokensMatch(expectedToken, token)) {
            logger.warn({ path: req.path }, 'Admin API token rejected');
            res.status(401).json({
                status: 401,
                code: 'UNAUTHORIZED',
                message: 'Invalid token',
            });
            return;
        }

        next();
    };
}
