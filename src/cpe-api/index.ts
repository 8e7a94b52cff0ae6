import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createServer } from 'http';
import { config } from './config';
import { errorHandler, requestLogger } from './middleware/index';
import { API_PREFIX } from '@shared/constants';
import apiRouter from './routes/index';

const app = express();
const server = createServer(app);

app.use(helmet());
app.use(cors({ origin: config.corsOrigins }));
app.use(express.json({ limit: config.bodyLimit }));
app.use(requestLogger);

app.use(API_PREFIX, apiRouter);

app.use(errorHandler);

function shutdown(signal: string) {
  console.warn(`[SERVER] ${signal} received, shutting down`);
  server.close(() => process.exit(0));
  setTimeout(() => process.exit(1), 5000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

server.listen(config.port, () => {
  console.warn(`[SERVER] CPE report API on port ${config.port}`);
  console.warn(`[SERVER] Health: http://localhost:${config.port}${API_PREFIX}/health`);
});

export { app, server };
