import { Router, Request, Response } from 'express';
import { Server as SocketIOServer } from 'socket.io';
import { GradientConfigError, resolveGradientConfig } from '../config/gradient.config';
import { UnusableShapeError } from '../services/geometry.service';
import { GradientJobService, GradientLineInput } from '../services/gradient-job.service';
import { GradientService } from '../services/gradient.service';
import { OffsetService } from '../services/offset.service';
import { ParsedClip, PathCodecService } from '../services/path-codec.service';

const router = Router();
const codec = new PathCodecService();
const offsetService = new OffsetService();
const gradientService = new GradientService();

class BadRequestError extends Error {}

function readClip(body: unknown): ParsedClip {
  const clip = typeof body === 'object' && body !== null && 'clip' in body ? body.clip : undefined;
  if (typeof clip !== 'string' || clip.trim().length === 0) {
    throw new BadRequestError('Missing required "clip" parameter');
  }

  const parsed = codec.parseClip(clip);
  if (parsed.path.length === 0) {
    throw new UnusableShapeError('Clip could not be parsed');
  }
  return parsed;
}

function readLines(value: unknown): GradientLineInput[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new BadRequestError('Missing required "lines" parameter');
  }

  return value.map((line: unknown, i: number) => {
    if (typeof line !== 'object' || line === null || !('clip' in line) || typeof line.clip !== 'string') {
      throw new BadRequestError(`lines[${i}].clip must be a string`);
    }
    const inverse = 'inverse' in line && line.inverse === true;
    return { clip: line.clip, inverse };
  });
}

/**
 * Map domain errors to 400, everything else to 500
 */
function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof GradientConfigError) {
    res.status(400).json({ error: 'Invalid gradient config', field: error.field, message: error.message });
    return;
  }
  if (error instanceof UnusableShapeError) {
    res.status(400).json({ error: 'Unusable clip shape', message: error.message });
    return;
  }
  if (error instanceof BadRequestError) {
    res.status(400).json({ error: error.message });
    return;
  }

  console.error(`[Gradient] Error ${context}:`, error);
  res.status(500).json({ error: error instanceof Error ? error.message : 'Internal Server Error' });
}

/**
 * Parse clip text and return the vertices and normalized drawing
 */
router.post('/parse', (req: Request, res: Response) => {
  try {
    const { path, scaleExponent } = readClip(req.body);
    res.json({
      scaleExponent,
      vertices: path,
      normalized: codec.formatClip(path, scaleExponent),
    });
  } catch (error) {
    sendError(res, error, 'parsing clip');
  }
});

/**
 * Offset a clip by a single radius
 */
router.post('/grow', (req: Request, res: Response) => {
  try {
    const { path, scaleExponent } = readClip(req.body);
    const { radius, scale = 1 } = req.body;

    if (typeof radius !== 'number' || !Number.isFinite(radius)) {
      throw new BadRequestError('Missing required "radius" parameter');
    }
    if (typeof scale !== 'number' || !Number.isInteger(scale) || scale < 1) {
      throw new BadRequestError('"scale" must be a positive integer');
    }

    const grown = offsetService.grow(path, radius, scale);
    if (grown.length === 0) {
      throw new UnusableShapeError('Clip needs at least 3 distinct, non-collinear points');
    }

    res.json({
      scaleExponent,
      vertices: grown,
      clip: codec.formatClip(grown, scaleExponent),
    });
  } catch (error) {
    sendError(res, error, 'growing clip');
  }
});

/**
 * Expand one clip into gradient bands
 */
router.post('/bands', (req: Request, res: Response) => {
  try {
    const clip = readClip(req.body);
    const config = resolveGradientConfig(req.body.config);
    const inverse = req.body.inverse === true;

    const result = gradientService.generateBands(clip, config, inverse);
    console.log(`[Gradient] Generated ${result.bands.length} bands (inverse: ${inverse})`);
    res.json(gradientService.renderBands(result));
  } catch (error) {
    sendError(res, error, 'generating bands');
  }
});

/**
 * Process many lines in the background.
 * Progress is pushed over Socket.IO to `socketId` when one is given.
 */
router.post('/batch', (req: Request, res: Response) => {
  try {
    const lines = readLines(req.body.lines);
    const config = resolveGradientConfig(req.body.config);
    const socketId: string | null = typeof req.body.socketId === 'string' ? req.body.socketId : null;

    const io: SocketIOServer = req.app.locals.io;
    const jobService: GradientJobService = req.app.locals.jobService;

    const job = jobService.startJob(lines, config, {
      onProgress: (progress) => {
        if (socketId && io) {
          io.to(socketId).emit('gradient:progress', progress);
        }
      },
      onComplete: (result) => {
        if (socketId && io) {
          io.to(socketId).emit('gradient:complete', result);
        }
      },
      onCancel: (result) => {
        if (socketId && io) {
          io.to(socketId).emit('gradient:cancelled', result);
        }
      },
    });

    job.completion.catch(error => {
      console.error(`[Gradient] Batch job ${job.id} failed:`, error);
    });

    console.log(`[Gradient] Batch job ${job.id} started (socket: ${socketId || 'none'})`);
    res.json({
      jobId: job.id,
      total: job.total,
      message: 'Gradient job started. Listen for progress via Socket.IO.',
    });
  } catch (error) {
    sendError(res, error, 'starting batch');
  }
});

router.get('/jobs/:jobId', (req: Request, res: Response) => {
  const jobService: GradientJobService = req.app.locals.jobService;
  const job = jobService.getJob(req.params.jobId);
  if (!job) {
    return res.status(404).json({ error: 'Job not found' });
  }
  res.json(jobService.toResult(job));
});

router.post('/jobs/:jobId/cancel', (req: Request, res: Response) => {
  const jobService: GradientJobService = req.app.locals.jobService;
  const job = jobService.getJob(req.params.jobId);
  if (!job) {
    return res.status(404).json({ error: 'Job not found' });
  }

  const cancelled = jobService.cancelJob(job.id);
  res.json({ jobId: job.id, cancelled, status: job.status });
});

export const gradientRouter = router;
