import express, { Application, Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { config } from './config';
import './database/connection';
import userRoutes from './routes/users';
import authRoutes from './routes/auth';
import meRoutes from './routes/me';
import channelRoutes from './routes/channels';
import { authenticate } from './middleware/auth';
import { apiLimiter } from './middleware/rateLimit';
import { connectionManager } from './realtime/ConnectionManager';
import { ApiResponse } from './types';

const app: Application = express();

app.use(helmet());
app.use(cors({ origin: config.server.corsOrigin }));

app.use(express.json({ limit: '10mb' }));
app.use(express.urlencoded({ extended: true }));

app.get('/health', (req: Request, res: Response) => {
  res.json({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    connections: connectionManager.connectionCount,
  });
});

app.use('/api/users', userRoutes);
app.use('/api/auth', authRoutes);
app.use('/api/me', apiLimiter, authenticate, meRoutes);
app.use('/api/channel', apiLimiter, authenticate, channelRoutes);

app.use((req: Request, res: Response) => {
  const response: ApiResponse = { success: false, error: 'Not found' };
  res.status(404).json(response);
});

// Body parser failures and anything else thrown outside a controller
app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
  if (err instanceof SyntaxError) {
    const response: ApiResponse = {
      success: false,
      error: 'Malformed JSON body',
      kind: 'validation_failed',
    };
    res.status(400).json(response);
    return;
  }

  console.error('Unhandled error:', err);
  const response: ApiResponse = {
    success: false,
    error: config.server.nodeEnv === 'development' ? err.message : 'Internal server error',
    kind: 'internal_error',
  };
  res.status(500).json(response);
});

export { app };
