import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { createServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { loadServerConfig } from './config/server.config';
import { gradientRouter } from './routes/gradient.routes';
import { GradientJobService } from './services/gradient-job.service';

const config = loadServerConfig();
const app: Express = express();
const httpServer = createServer(app);

// Initialize Socket.IO
const io = new SocketIOServer(httpServer, {
  cors: {
    origin: config.production
      ? false // In production, use same origin
      : config.corsOrigins,
    methods: ['GET', 'POST']
  },
  pingTimeout: 60000,
  pingInterval: 25000
});

const jobService = new GradientJobService();

// Make io and jobService available to routes via app.locals
app.locals.io = io;
app.locals.jobService = jobService;

// Middleware
app.use(cors());
app.use(express.json({ limit: config.jsonBodyLimit }));

// Routes
app.use('/api/gradient', gradientRouter);

// Health check
app.get('/api/health', (req: Request, res: Response) => {
  res.json({ status: 'ok', message: 'Clip gradient API is running' });
});

// Error handling middleware
app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
  console.error('[Server] Error occurred:', err);

  if (err instanceof SyntaxError) {
    return res.status(400).json({
      error: 'Malformed JSON body',
      message: err.message
    });
  }

  res.status(500).json({
    error: 'Internal Server Error',
    message: err.message
  });
});

// Socket.IO connection handling
io.on('connection', (socket) => {
  console.log(`[Server] Client connected: ${socket.id}`);

  socket.on('disconnect', (reason) => {
    console.log(`[Server] Client disconnected: ${socket.id} (${reason})`);
  });

  socket.on('error', (error) => {
    console.error(`[Server] Socket error for ${socket.id}:`, error);
  });
});

// Graceful shutdown: stop running jobs at the next line boundary, then exit
function shutdown(signal: NodeJS.Signals): void {
  console.log(`[Server] ${signal} received, cancelling jobs...`);
  jobService.cancelAll().then(
    results => {
      console.log(`[Server] ${results.length} jobs stopped, exiting`);
      process.exit(0);
    },
    error => {
      console.error('[Server] Error while stopping jobs:', error);
      process.exit(1);
    }
  );
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

// Start server
httpServer.listen(config.port, () => {
  console.log(`[Server] Listening on port ${config.port}`);
  console.log(`[Server] Gradient API ready at http://localhost:${config.port}/api/gradient`);
});

export default app;
