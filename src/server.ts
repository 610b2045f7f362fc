import express, {Application} from 'express';
import helmet from 'helmet';
import http from 'http';
import logger from './utils/logger';
import {errorHandler, notFoundHandler} from './middleware/errorHandler';
import {StatusProvider, createStatusRouter} from './routes/status';

export function createStatusApp(getStatus: StatusProvider): Application {
    const app = express();
    app.use(helmet());
    app.use(express.json({limit: '1mb'}));

    app.use(createStatusRouter(getStatus));

    app.use(notFoundHandler);
    app.use(errorHandler);
    return app;
}

/** Small read-only HTTP surface next to the worker loops. */
export class StatusServer {
    private server: http.Server | null = null;

    constructor(private readonly app: Application) {
    }

    /** Port 0 picks a free port; the bound one is returned. */
    start(port: number): Promise<number> {
        return new Promise((resolve, reject) => {
            const server = http.createServer(this.app);
            server.once('error', reject);
            server.listen(port, () => {
                this.server = server;
                const address = server.address();
                const bound = typeof address === 'object' && address !== null ? address.port : port;
                logger.info(`📊 Status server listening on port ${bound}`);
                resolve(bound);
            });
        });
    }

    stop(): Promise<void> {
        const server = this.server;
        this.server = null;
        if (!server) return Promise.resolve();
        return new Promise((resolve, reject) => {
            server.close((error) => {
                if (error) {
                    reject(error);
                } else {
                    logger.info('HTTP server closed');
                    resolve();
                }
            });
        });
    }
}
