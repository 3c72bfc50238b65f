import express, { NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import { RateLimitError } from '../exchanges/errors';
import { INCOME_TYPES, TimeRange } from '../models/history.model';
import { AccountMonitorService, DatasetResult } from '../services/accountMonitorService';
import { Clock, systemClock } from '../utils/clock';

const DAY_MS = 24 * 60 * 60 * 1000;
const DEFAULT_INCOME_LOOKBACK_MS = 7 * DAY_MS;
const DEFAULT_STATS_LOOKBACK_MS = DAY_MS;

export interface DatasetResponseBody<D> {
    status: 'fresh' | 'stale' | 'unavailable';
    stale: boolean;
    data: D | null;
    fetchedAt: string | null;
    ageMs: number | null;
    refreshing: boolean;
    error: { kind: string; message: string } | null;
}

export interface DatasetResponse<D> {
    statusCode: number;
    headers: Record<string, string>;
    body: DatasetResponseBody<D>;
}

/**
 * HTTP shape of a dataset read. Stale data is still a 200: the body says it
 * is stale and why. Unavailable is a 503, or a 429 with Retry-After when the
 * exchange is rate limiting us.
 */
export function toDatasetResponse<D>(result: DatasetResult<D>): DatasetResponse<D> {
    if (result.status === 'unavailable') {
        const headers: Record<string, string> = {};
        let statusCode = 503;
        if (result.error instanceof RateLimitError) {
            statusCode = 429;
            headers['Retry-After'] = Math.max(1, Math.ceil(result.error.retryAfterMs / 1000)).toString();
        }
        return {
            statusCode,
            headers,
            body: {
                status: 'unavailable',
                stale: false,
                data: null,
                fetchedAt: null,
                ageMs: null,
                refreshing: false,
                error: { kind: result.error.kind, message: result.reason }
            }
        };
    }

    const stale = result.status === 'stale';
    return {
        statusCode: 200,
        headers: {},
        body: {
            status: result.status,
            stale,
            data: result.data,
            fetchedAt: new Date(result.fetchedAt).toISOString(),
            ageMs: result.ageMs,
            refreshing: result.status === 'stale' && result.refreshing,
            error: result.status === 'stale' && result.error
                ? { kind: result.error.kind, message: result.reason ?? result.error.message }
                : null
        }
    };
}

const symbol = z.string().trim().min(1).transform(value => value.toUpperCase());
const millis = z.coerce.number().int().nonnegative();

export const positionsQuerySchema = z.object({
    symbol: symbol.optional(),
    side: z.enum(['LONG', 'SHORT']).optional(),
    marginMode: z.enum(['CROSS', 'ISOLATED']).optional()
});

export const tradesQuerySchema = z.object({
    symbol: symbol.optional(),
    limit: z.coerce.number().int().min(1).max(1000).default(50)
});

const rangeQuery = {
    startTime: millis.optional(),
    endTime: millis.optional()
};

const orderedRange = (query: { startTime?: number; endTime?: number }) =>
    query.startTime === undefined || query.endTime === undefined || query.startTime <= query.endTime;
const orderedRangeIssue = { message: 'startTime must not be after endTime', path: ['startTime'] };

export const rangeQuerySchema = z.object(rangeQuery).refine(orderedRange, orderedRangeIssue);

export const incomeQuerySchema = z
    .object({ ...rangeQuery, incomeType: z.enum(INCOME_TYPES).optional() })
    .refine(orderedRange, orderedRangeIssue);

export const statsQuerySchema = z
    .object({ ...rangeQuery, symbol: symbol.optional() })
    .refine(orderedRange, orderedRangeIssue);

export const performanceQuerySchema = z.object({
    symbol: symbol.optional()
});

// A missing end defaults to now, a missing start to `lookbackMs` before the end.
export function resolveRange(query: { startTime?: number; endTime?: number }, now: number, lookbackMs: number): TimeRange {
    const endTime = query.endTime ?? Math.max(now, query.startTime ?? 0);
    const startTime = query.startTime ?? Math.max(0, endTime - lookbackMs);
    return { startTime, endTime };
}

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

// Error handler wrapper
const asyncHandler = (fn: AsyncRoute): RequestHandler =>
    (req: Request, res: Response, next: NextFunction) => {
        fn(req, res).catch(error => {
            console.error(`Error in ${req.path}:`, error);
            next(error);
        });
    };

function parseQuery<S extends z.ZodTypeAny>(schema: S, req: Request, res: Response): z.output<S> | undefined {
    const parsed = schema.safeParse(req.query);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(issue => `${issue.path.join('.') || 'query'}: ${issue.message}`);
        res.status(400).json({ error: `Invalid query: ${problems.join('; ')}` });
        return undefined;
    }
    return parsed.data;
}

function send<D>(res: Response, result: DatasetResult<D>): void {
    const response = toDatasetResponse(result);
    for (const [name, value] of Object.entries(response.headers)) {
        res.setHeader(name, value);
    }
    res.status(response.statusCode).json(response.body);
}

export function createMonitorRoutes(monitor: AccountMonitorService, clock: Clock = systemClock): express.Router {
    const router = express.Router();

    router.get('/', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            endpoints: {
                account: '/account',
                positions: '/positions',
                trades: '/trades',
                income: '/income',
                metrics: '/metrics',
                stats: '/stats',
                performance: '/performance',
                health: '/health'
            }
        });
    });

    router.get('/account', asyncHandler(async (req, res) => {
        send(res, await monitor.getAccountSnapshot());
    }));

    router.get('/positions', asyncHandler(async (req, res) => {
        const query = parseQuery(positionsQuerySchema, req, res);
        if (!query) return;
        send(res, await monitor.getPositions(query));
    }));

    router.get('/trades', asyncHandler(async (req, res) => {
        const query = parseQuery(tradesQuerySchema, req, res);
        if (!query) return;
        send(res, await monitor.getRecentTrades(query.symbol, query.limit));
    }));

    router.get('/income', asyncHandler(async (req, res) => {
        const query = parseQuery(incomeQuerySchema, req, res);
        if (!query) return;
        const range = resolveRange(query, clock.now(), DEFAULT_INCOME_LOOKBACK_MS);
        send(res, await monitor.getIncomeHistory(range, query.incomeType));
    }));

    router.get('/income/summary', asyncHandler(async (req, res) => {
        const query = parseQuery(rangeQuerySchema, req, res);
        if (!query) return;
        send(res, await monitor.getIncomeSummary(resolveRange(query, clock.now(), DEFAULT_INCOME_LOOKBACK_MS)));
    }));

    router.get('/metrics', asyncHandler(async (req, res) => {
        send(res, await monitor.getDerivedMetrics());
    }));

    router.get('/stats', asyncHandler(async (req, res) => {
        const query = parseQuery(statsQuerySchema, req, res);
        if (!query) return;
        const range = resolveRange(query, clock.now(), DEFAULT_STATS_LOOKBACK_MS);
        send(res, await monitor.getTradingStatistics(range, query.symbol));
    }));

    router.get('/performance', asyncHandler(async (req, res) => {
        const query = parseQuery(performanceQuerySchema, req, res);
        if (!query) return;
        send(res, await monitor.getPerformanceMetrics(query.symbol));
    }));

    router.get('/health', (req: Request, res: Response) => {
        const health = monitor.getHealthStatus();
        res.status(health.healthy ? 200 : 503).json(health);
    });

    return router;
}
