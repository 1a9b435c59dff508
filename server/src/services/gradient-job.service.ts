/**
 * Gradient Job Service
 * Runs the gradient over many clip lines, one line at a time, so that
 * progress can be reported and a job can be cancelled between lines
 */
import { v4 as uuidv4 } from 'uuid';
import { GradientConfig } from '../config/gradient.config';
import { UnusableShapeError } from './geometry.service';
import { GradientService, RenderedGradient } from './gradient.service';
import { PathCodecService } from './path-codec.service';

export interface GradientLineInput {
  clip: string;
  inverse?: boolean;
}

export type GradientLineResult =
  | { index: number; ok: true; gradient: RenderedGradient }
  | { index: number; ok: false; error: string };

export type GradientJobStatus = 'running' | 'completed' | 'cancelled';

export interface GradientJobProgress {
  jobId: string;
  current: number;
  total: number;
  percentComplete: number;
  message: string;
}

export interface GradientJobResult {
  jobId: string;
  status: GradientJobStatus;
  processed: number;
  failed: number;
  total: number;
  lines: GradientLineResult[];
}

export interface GradientJobCallbacks {
  onProgress?: (progress: GradientJobProgress) => void;
  onComplete?: (result: GradientJobResult) => void;
  onCancel?: (result: GradientJobResult) => void;
}

interface GradientJobState {
  id: string;
  status: GradientJobStatus;
  total: number;
  results: GradientLineResult[];
  cancelRequested: boolean;
}

export interface GradientJob extends GradientJobState {
  completion: Promise<GradientJobResult>;
}

// Finished jobs kept around for status queries
const MAX_FINISHED_JOBS = 100;

function nextTick(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

export class GradientJobService {
  private jobs: Map<string, GradientJob> = new Map();
  private codec = new PathCodecService();
  private gradientService = new GradientService();

  /**
   * Start processing in the background and return the job record at once
   */
  startJob(
    lines: GradientLineInput[],
    config: GradientConfig,
    callbacks: GradientJobCallbacks = {},
    jobId: string = uuidv4()
  ): GradientJob {
    const state: GradientJobState = {
      id: jobId,
      status: 'running',
      total: lines.length,
      results: [],
      cancelRequested: false,
    };

    console.log(`[GradientJob] Starting job ${jobId} (${lines.length} lines)`);
    const job: GradientJob = Object.assign(state, {
      completion: this.run(state, lines, config, callbacks),
    });
    this.jobs.set(jobId, job);
    this.evictFinishedJobs();
    return job;
  }

  getJob(jobId: string): GradientJob | undefined {
    return this.jobs.get(jobId);
  }

  /**
   * Request a stop before the next line; lines already done are kept
   */
  cancelJob(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job || job.status !== 'running') return false;

    job.cancelRequested = true;
    console.log(`[GradientJob] Cancel requested for job ${jobId}`);
    return true;
  }

  /**
   * Request a stop for every running job; resolves once each has stopped
   */
  cancelAll(): Promise<GradientJobResult[]> {
    const running = Array.from(this.jobs.values()).filter(job => job.status === 'running');
    console.log(`[GradientJob] Cancelling ${running.length} running jobs`);
    running.forEach(job => {
      job.cancelRequested = true;
    });
    return Promise.all(running.map(job => job.completion));
  }

  toResult(job: GradientJobState): GradientJobResult {
    return {
      jobId: job.id,
      status: job.status,
      processed: job.results.length,
      failed: job.results.filter(line => !line.ok).length,
      total: job.total,
      lines: [...job.results],
    };
  }

  /**
   * Process one line. Failures are reported in the result instead of thrown,
   * so one bad clip never affects the other lines of a job.
   */
  processLine(index: number, line: GradientLineInput, config: GradientConfig): GradientLineResult {
    try {
      const clip = this.codec.parseClip(line.clip);
      if (clip.path.length === 0) {
        throw new UnusableShapeError('Clip could not be parsed');
      }

      const result = this.gradientService.generateBands(clip, config, line.inverse ?? false);
      return { index, ok: true, gradient: this.gradientService.renderBands(result) };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[GradientJob] Line ${index + 1} failed: ${message}`);
      return { index, ok: false, error: message };
    }
  }

  private async run(
    job: GradientJobState,
    lines: GradientLineInput[],
    config: GradientConfig,
    callbacks: GradientJobCallbacks
  ): Promise<GradientJobResult> {
    for (let i = 0; i < lines.length; i++) {
      // Let cancel requests and socket traffic through between lines
      await nextTick();

      if (job.cancelRequested) {
        job.status = 'cancelled';
        const result = this.toResult(job);
        console.log(`[GradientJob] Job ${job.id} cancelled after ${i}/${lines.length} lines`);
        this.notify(callbacks.onCancel, result, job.id);
        return result;
      }

      const progress: GradientJobProgress = {
        jobId: job.id,
        current: i + 1,
        total: lines.length,
        percentComplete: Math.round((100 * (i + 1)) / lines.length),
        message: `Processing line ${i + 1}/${lines.length}`,
      };
      this.notify(callbacks.onProgress, progress, job.id);

      job.results.push(this.processLine(i, lines[i], config));
    }

    job.status = 'completed';
    const result = this.toResult(job);
    console.log(`[GradientJob] Job ${job.id} completed (${result.failed} failed)`);
    this.notify(callbacks.onComplete, result, job.id);
    return result;
  }

  /**
   * A failing listener is logged and never stops the job
   */
  private notify<T>(callback: ((payload: T) => void) | undefined, payload: T, jobId: string): void {
    if (!callback) return;
    try {
      callback(payload);
    } catch (error) {
      console.error(`[GradientJob] Listener failed for job ${jobId}:`, error);
    }
  }

  private evictFinishedJobs(): void {
    const finished = Array.from(this.jobs.values()).filter(job => job.status !== 'running');
    const excess = finished.length - MAX_FINISHED_JOBS;
    for (let i = 0; i < excess; i++) {
      this.jobs.delete(finished[i].id);
    }
  }
}
