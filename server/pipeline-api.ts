/**
 * Pipeline API
 * Express routes for starting a study run, following its progress and reading
 * the resulting report documents.
 */

import path from 'path';
import { Router, type Request, type Response } from 'express';
import multer from 'multer';
import { nanoid } from 'nanoid';
import { z } from 'zod';
import { AVERAGES_KEY, reportCategorySchema, runRequestSchema, type SeriesDimensions } from '@shared/schema';
import type { AppConfig } from './config';
import type { UploadedDicom } from './dicom-intake';
import { RunBusyError, UploadTimeoutError, ValidationError, errorMessage } from './errors';
import { forSource } from './logger';
import { readNiftiDimensions } from './nifti-header';
import type { ProgressChannel } from './pipeline/progress-channel';
import type { RunGuard } from './pipeline/run-guard';
import type { RunInput, RunOutcome } from './pipeline/orchestrator';
import { loadJsonDocument } from './reports/report-aggregator';
import { reportFileName } from './reports/report-builder';
import { discoverSeries, niftiPath, sanitizeId, studyLayout, studyRoot } from './study-storage';
import type { UploadManager, UploadSession } from './upload-manager';

const log = forSource('pipeline-api');

const NO_DATA = { message: 'No data available yet' };

// Report files are served as stored.
const jsonObjectSchema = z.record(z.string(), z.unknown());

export interface PipelineRunner {
  run(input: RunInput): Promise<RunOutcome>;
}

export interface PipelineServices {
  config: Pick<AppConfig, 'dataRoot' | 'heartbeatMs' | 'uploadTimeoutMs'>;
  guard: RunGuard;
  channel: ProgressChannel;
  orchestrator: PipelineRunner;
  uploads: UploadManager;
  readDimensions?: (filePath: string) => Promise<number[]>;
}

function resolveStudy(dataRoot: string, patient: string, study: string): string {
  if (!sanitizeId(patient) || !sanitizeId(study)) {
    throw new ValidationError('patient and study must contain at least one of A-Z, a-z, 0-9, _ or -');
  }
  return studyRoot(dataRoot, patient, study);
}

/** Study root named by the multipart fields received so far. */
function resolveRunRequest(dataRoot: string, body: unknown): string {
  const parsed = runRequestSchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '));
  }
  return resolveStudy(dataRoot, parsed.data.patient, parsed.data.study);
}

const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)));

interface UploadHooks {
  timeoutMs: number;
  /** Called before the first file is written; throwing rejects the upload. */
  admit: () => void;
  destination: () => Promise<string>;
}

function receiveUploads(req: Request, res: Response, hooks: UploadHooks): Promise<void> {
  const upload = multer({
    storage: multer.diskStorage({
      destination: (_req, _file, cb) => {
        hooks.destination().then(
          (dir) => cb(null, dir),
          (error: unknown) => cb(toError(error), ''),
        );
      },
      // Prefixed so identically named files from different folders do not collide
      filename: (_req, file, cb) => cb(null, `${nanoid(8)}-${path.basename(file.originalname)}`),
    }),
    fileFilter: (_req, _file, cb) => {
      try {
        hooks.admit();
        cb(null, true);
      } catch (error) {
        cb(toError(error));
      }
    },
    limits: {
      fileSize: 2 * 1024 * 1024 * 1024, // 2GB per file
      files: 5000,
    },
  }).array('dicoms');

  return new Promise<void>((resolve, reject) => {
    let settled = false;
    const settle = (error?: unknown) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (error) reject(error);
      else resolve();
    };
    const timer = setTimeout(() => settle(new UploadTimeoutError(hooks.timeoutMs)), hooks.timeoutMs);
    upload(req, res, (err?: unknown) => settle(err));
  });
}

function uploadedFiles(req: Request): UploadedDicom[] {
  const files = req.files;
  if (!Array.isArray(files)) return [];
  return files.map((file) => ({ originalName: file.originalname, path: file.path }));
}

async function runInBackground(services: PipelineServices, input: RunInput, sessionId: string): Promise<void> {
  try {
    const outcome = await services.orchestrator.run(input);
    if (outcome.status === 'completed') {
      log.info(`Run for ${input.studyRoot} completed (${outcome.series.length} series)`);
    } else {
      log.warn(`Run for ${input.studyRoot} failed at ${outcome.stage}: ${outcome.message}`);
    }
  } finally {
    await services.uploads.cleanupSession(sessionId);
  }
}

export function createPipelineRouter(services: PipelineServices): Router {
  const router = Router();
  const { config, guard, channel, uploads } = services;
  const readDimensions = services.readDimensions ?? readNiftiDimensions;

  /**
   * Start a run. `patient` and `study` must precede the `dicoms` parts: they
   * are validated and the guard is taken when the first file arrives, so an
   * invalid or busy request writes nothing and never holds the guard.
   */
  router.post('/run', async (req: Request, res: Response) => {
    const admission: { root: string | null; acquired: boolean; session: UploadSession | null } = {
      root: null,
      acquired: false,
      session: null,
    };
    let pendingSession: Promise<UploadSession> | null = null;

    try {
      await receiveUploads(req, res, {
        timeoutMs: config.uploadTimeoutMs,
        admit: () => {
          if (admission.acquired) return;
          admission.root = resolveRunRequest(config.dataRoot, req.body);
          if (!guard.tryAcquire()) throw new RunBusyError();
          admission.acquired = true;
        },
        destination: async () => {
          pendingSession ??= uploads.createSession().then((session) => (admission.session = session));
          return (await pendingSession).dir;
        },
      });

      const root = admission.root ?? resolveRunRequest(config.dataRoot, req.body);
      const files = uploadedFiles(req);
      const session = admission.session;
      if (files.length === 0 || !session) {
        throw new ValidationError('No DICOM files provided');
      }

      log.info(`Starting run for ${root} with ${files.length} files`);
      runInBackground(services, { studyRoot: root, files }, session.id).catch((error: unknown) => {
        log.error(`Background run for ${root} ended abnormally: ${errorMessage(error)}`);
      });
      return res.status(202).json({ message: 'Processing started' });
    } catch (error) {
      if (admission.acquired) guard.release();
      if (admission.session) {
        await uploads.cleanupSession(admission.session.id);
      }
      if (req.socket.destroyed) {
        log.warn(`Upload connection closed before a response: ${errorMessage(error)}`);
        return;
      }
      if (error instanceof UploadTimeoutError) {
        log.warn(`Upload aborted: ${error.message}`);
        res.set('Connection', 'close');
        return res.status(408).json({ message: error.message });
      }
      if (error instanceof RunBusyError || error instanceof ValidationError || error instanceof multer.MulterError) {
        return res.status(400).json({ message: error.message });
      }
      log.error(`Failed to start run: ${errorMessage(error)}`);
      return res.status(500).json({ error: 'Failed to start pipeline run' });
    }
  });

  router.get('/status', (_req: Request, res: Response) => {
    res.json({ busy: guard.isBusy() });
  });

  /**
   * Server-sent events: one `data:` line per progress event, a heartbeat on
   * every quiet interval.
   */
  router.get('/stream', async (_req: Request, res: Response) => {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    res.flushHeaders();

    const closed = new AbortController();
    res.on('close', () => closed.abort());

    try {
      while (!closed.signal.aborted) {
        const event = await channel.pull(config.heartbeatMs, closed.signal);
        if (closed.signal.aborted) break;
        res.write(`data: ${JSON.stringify(event ?? { heartbeat: true })}\n\n`);
      }
    } catch (error) {
      log.error(`Progress stream aborted: ${errorMessage(error)}`);
    } finally {
      res.end();
    }
  });

  router.get('/reports/:patient/:study/:category', async (req: Request, res: Response) => {
    const category = reportCategorySchema.safeParse(req.params.category);
    if (!category.success) {
      return res.status(400).json({ message: `Unknown report category: ${req.params.category}` });
    }

    let root: string;
    try {
      root = resolveStudy(config.dataRoot, req.params.patient, req.params.study);
    } catch (error) {
      return res.status(400).json({ message: errorMessage(error) });
    }

    const jsonRoot = studyLayout(root).json;
    const fileName = reportFileName(category.data);
    const series = typeof req.query.series === 'string' ? req.query.series : undefined;

    const scope = series === undefined ? '' : series === AVERAGES_KEY ? AVERAGES_KEY : sanitizeId(series);
    if (series !== undefined && !scope) {
      return res.status(404).json(NO_DATA);
    }
    const loaded = await loadJsonDocument(path.join(jsonRoot, scope, fileName), jsonObjectSchema);

    if (!loaded.ok) {
      log.debug(`No ${category.data} report for ${root}: ${loaded.detail}`);
      return res.status(404).json(NO_DATA);
    }
    return res.json(loaded.document);
  });

  router.get('/series/:patient/:study', async (req: Request, res: Response) => {
    let root: string;
    try {
      root = resolveStudy(config.dataRoot, req.params.patient, req.params.study);
    } catch (error) {
      return res.status(400).json({ message: errorMessage(error) });
    }

    const layout = studyLayout(root);
    let series: string[];
    try {
      series = await discoverSeries(layout);
    } catch (error) {
      log.error(`Failed to list series under ${layout.dicom}: ${errorMessage(error)}`);
      return res.status(500).json({ error: 'Failed to list series' });
    }

    const result: SeriesDimensions = {};
    for (const name of series) {
      try {
        result[name] = await readDimensions(niftiPath(layout, name));
      } catch (error) {
        log.warn(`No dimensions for series ${name}: ${errorMessage(error)}`);
        result[name] = null;
      }
    }
    return res.json(result);
  });

  return router;
}
