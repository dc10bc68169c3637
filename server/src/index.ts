import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import { createServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { loadPipelineConfig } from './config/pipeline.config';
import { errorHandler } from './middleware/error-handler';
import { createBackdropRouter } from './routes/backdrop.routes';
import { createComposeRouter } from './routes/compose.routes';
import { createBackdropRegistry } from './services/backdrop-registry.service';
import { ImageService } from './services/image.service';
import { PipelineService } from './services/pipeline.service';
import { WorkerManagerService } from './services/worker-manager.service';

const PORT = process.env.PORT || 3001;

async function main(): Promise<void> {
  const config = loadPipelineConfig();
  const imageService = new ImageService();
  const backdrops = await createBackdropRegistry({
    backdropsDir: config.backdropsDir,
    groundLevel: config.groundLevel,
    imageService,
  });
  const pipeline = new PipelineService(backdrops, config, imageService);
  const workerManager = config.useWorkers ? new WorkerManagerService(config) : undefined;

  const app: Express = express();
  const httpServer = createServer(app);

  // Socket.IO carries pipeline stage notifications
  const io = new SocketIOServer(httpServer, {
    cors: {
      origin: process.env.NODE_ENV === 'production' ? false : '*',
      methods: ['GET', 'POST'],
    },
  });

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Routes
  app.use('/api/backdrops', createBackdropRouter(backdrops));
  app.use('/api/compose', createComposeRouter({ backdrops, pipeline, imageService, workerManager, io }));

  // Health check
  app.get('/api/health', (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      backdrops: backdrops.size,
      workers: workerManager ? workerManager.getActiveWorkerCount() : null,
      queued: workerManager ? workerManager.getQueuedJobCount() : null,
    });
  });

  app.use(errorHandler);

  io.on('connection', (socket) => {
    console.log(`[Server] Client connected: ${socket.id}`);
    socket.on('disconnect', (reason) => {
      console.log(`[Server] Client disconnected: ${socket.id} (${reason})`);
    });
  });

  // Graceful shutdown: terminate all workers
  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, cleaning up workers...`);
    workerManager?.terminateAll();
    process.exit(0);
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  httpServer.listen(PORT, () => {
    console.log(`[Server] Compositing API ready at http://localhost:${PORT}/api`);
    console.log(`[Server] ${backdrops.size} backdrops, workers ${workerManager ? 'enabled' : 'disabled'}`);
  });
}

main().catch((error: unknown) => {
  console.error('[Server] Failed to start:', error);
  process.exit(1);
});
