/**
 * Admin Routes
 *
 * GET  /api/admin/stats            - account counts and today's aggregate
 * GET  /api/admin/top?limit=N      - accounts by total usage (1..50, default 10)
 * GET  /api/admin/daily?day=DAY    - aggregate for a day (default today)
 * GET  /api/admin/users/:id        - account detail
 * PUT  /api/admin/users/:id/tier   - body { isPro: boolean }
 * GET  /api/admin/export           - CSV of every usage record
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { requireAdminToken } from '../middleware/auth.middleware';
import { logger } from '../lib/logger';
import type { AdminService } from '../services/admin.service';

const userIdParam = z.coerce.number().int().positive();
const topQuery = z.object({ limit: z.coerce.number().int().optional() });
const dailyQuery = z.object({ day: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional() });
const tierBody = z.object({ isPro: z.boolean() });

function badRequest(res: Response, message: string): void {
    res.status(400).json({ status: 400, code: 'VALIDATION_ERROR', message });
}

function internalError(res: Response, error: unknown, context: string): void {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, context);
    res.status(500).json({
        status: 500,
        code: 'INTERNAL_ERROR',
        message: 'Internal server error',
    });
}

export function createAdminRouter(admin: AdminService, apiToken: string | undefined): Router {
    const router = Router();

    // All routes require the admin token
    router.use(requireAdminToken(apiToken));

    router.get('/stats', async (req: Request, res: Response) => {
        try {
            res.json(await admin.overallStats());
        } catch (error) {
            internalError(res, error, 'Error getting admin stats');
        }
    });

    router.get('/top', async (req: Request, res: Response) => {
        const parsed = topQuery.safeParse(req.query);
        if (!parsed.success) {
            return badRequest(res, 'limit must be an integer');
        }

        try {
            res.json({ users: await admin.topUsers(parsed.data.limit) });
        } catch (error) {
            internalError(res, error, 'Error getting top users');
        }
    });

    router.get('/daily', async (req: Request, res: Response) => {
        const parsed = dailyQuery.safeParse(req.query);
        if (!parsed.success) {
            return badRequest(res, 'day must be formatted as YYYY-MM-DD');
        }

        try {
            res.json(await admin.dailyStats(parsed.data.day));
        } catch (error) {
            internalError(res, error, 'Error getting daily stats');
        }
    });

    router.get('/users/:id', async (req: Request, res: Response) => {
        const parsed = userIdParam.safeParse(req.params.id);
        if (!parsed.success) {
            return badRequest(res, 'id must be a positive integer');
        }

        try {
            const detail = await admin.userDetail(parsed.data);
            if (!detail) {
                res.status(404).json({ status: 404, code: 'NOT_FOUND', message: 'User not found' });
                return;
            }
            res.json(detail);
        } catch (error) {
            internalError(res, error, 'Error getting user detail');
        }
    });

    router.put('/users/:id/tier', async (req: Request, res: Response) => {
        const id = userIdParam.safeParse(req.params.id);
        const body = tierBody.safeParse(req.body);
        if (!id.success || !body.success) {
            return badRequest(res, 'expected a positive integer id and a body of { isPro: boolean }');
        }

        try {
            const updated = await admin.setTier(id.data, body.data.isPro);
            if (!updated) {
                res.status(500).json({ status: 500, code: 'STORAGE_FAILED', message: 'Could not update user' });
                return;
            }
            res.json({ userId: id.data, isPro: body.data.isPro });
        } catch (error) {
            internalError(res, error, 'Error updating user tier');
        }
    });

    router.get('/export', async (req: Request, res: Response) => {
        try {
            const csv = await admin.exportCsv();
            res.setHeader('Content-Type', 'text/csv; charset=utf-8');
            res.setHeader('Content-Disposition', 'attachment; filename="usage_export.csv"');
            res.send(csv);
        } catch (error) {
            internalError(res, error, 'Error exporting usage');
        }
    });

    return router;
}
