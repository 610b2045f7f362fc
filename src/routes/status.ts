import express, {Request, Response, Router} from 'express';
import {asyncHandler} from "../middleware/errorHandler";

export type StatusProvider = () => Promise<Record<string, unknown>> | Record<string, unknown>;

/**
 * GET /health  liveness
 * GET /status  counters of every running component
 */
export function createStatusRouter(getStatus: StatusProvider): Router {
    const router = express.Router();

    router.get('/health', (req: Request, res: Response) => {
        res.status(200).json({
            status: 'healthy',
            uptime: Math.round(process.uptime()),
            timestamp: new Date().toISOString()
        });
    });

    router.get('/status', asyncHandler(async (req: Request, res: Response) => {
        const status = await getStatus();
        res.status(200).json({...status, timestamp: new Date().toISOString()});
    }));

    return router;
}
