import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { loadConfig } from './config';
import { ConfigError } from './exchanges/errors';
import { createMonitorRoutes } from './routes/monitor.routes';
import { AccountMonitorService } from './services/accountMonitorService';

export function createApp(monitor: AccountMonitorService): express.Express {
    const app = express();

    // Middleware
    app.use(cors({
        origin: '*', // Allow all origins
        methods: ['GET', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization']
    }));
    app.use(express.json());

    // Request logging middleware
    app.use((req, res, next) => {
        console.log(`${new Date().toISOString()} - ${req.method} ${req.url}`);
        next();
    });

    app.get('/', (req, res) => {
        res.status(200).json({ status: 'ok' });
    });

    // Mount API routes
    app.use('/api', createMonitorRoutes(monitor));

    // Liveness only; /api/health reports exchange and cache state.
    app.get('/health', (req, res) => {
        res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    // Error handling middleware
    app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
        console.error('Error:', err);
        if (res.headersSent) {
            next(err);
            return;
        }
        res.status(500).json({ error: 'Internal Server Error' });
    });

    return app;
}

async function main(): Promise<void> {
    const config = loadConfig();
    const monitor = new AccountMonitorService(config);
    await monitor.initialize();

    const app = createApp(monitor);
    const server = app.listen(config.port, () => {
        console.log(`Server running on port ${config.port}`);
        console.log(`Health check: http://localhost:${config.port}/health`);
        console.log(`API endpoints: http://localhost:${config.port}/api`);
    });

    monitor.startBackgroundRefresh();

    const shutdown = (signal: string) => {
        console.log(`${signal} received, shutting down`);
        monitor.stopBackgroundRefresh();
        server.close(() => process.exit(0));
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
    main().catch(error => {
        if (error instanceof ConfigError) {
            console.error(error.message);
        } else {
            console.error('Failed to start account monitor:', error);
        }
        process.exit(1);
    });
}
