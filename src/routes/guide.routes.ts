import express, { Request, Response } from 'express';
import multer from 'multer';
import { GuideService, GuideSession } from '../services/guide.service';
import { MIME_TYPES } from '../services/extraction.service';
import {
  DEFAULT_READING_LEVEL,
  DEFAULT_SPECIALTY,
  ReadingLevel,
  Specialty,
  UPLOAD,
  isReadingLevel,
  isSpecialty,
} from '../config/guide';
import { GuideRequest } from '../types/guide.types';
import { ValidationError, createError, errorMessage } from '../utils/errors';
import { metrics } from '../utils/metrics';
import { generationRateLimiter } from '../middleware/rateLimit.middleware';

const SESSION_HEADER = 'x-session-id';

const ALLOWED_TYPES: readonly string[] = Object.values(MIME_TYPES);

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: UPLOAD.maxFileSize,
  },
  fileFilter: (req, file, cb) => {
    if (ALLOWED_TYPES.includes(file.mimetype) || /\.(pdf|docx|txt)$/i.test(file.originalname)) {
      cb(null, true);
    } else {
      cb(createError('Invalid file type. Only PDF, DOCX and TXT files are allowed.', 400));
    }
  },
});

export function parseReadingLevel(value: unknown): ReadingLevel {
  if (value === undefined || value === null || value === '') {
    return DEFAULT_READING_LEVEL;
  }
  const level = typeof value === 'string' ? Number(value) : value;
  if (!isReadingLevel(level)) {
    throw new ValidationError('Reading level must be a whole number from 1 to 5');
  }
  return level;
}

export function parseSpecialty(value: unknown): Specialty {
  if (value === undefined || value === null || value === '') {
    return DEFAULT_SPECIALTY;
  }
  if (!isSpecialty(value)) {
    throw new ValidationError(`Unknown specialty: ${String(value)}`);
  }
  return value;
}

function parseGuideRequest(body: unknown): GuideRequest {
  const fields: Record<string, unknown> = typeof body === 'object' && body !== null ? { ...body } : {};
  const { symptoms } = fields;

  if (symptoms !== undefined && typeof symptoms !== 'string') {
    throw new ValidationError('Symptoms must be text');
  }

  return {
    symptoms,
    specialty: parseSpecialty(fields.specialty),
    readingLevel: parseReadingLevel(fields.readingLevel),
  };
}

function sessionFor(service: GuideService, req: Request, res: Response): GuideSession {
  const session = service.resolveSession(req.get(SESSION_HEADER));
  res.setHeader('X-Session-Id', session.id);
  return session;
}

function writeEvent(res: Response, event: string, data: unknown): void {
  res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
}

export function createGuideRouter(guideService: GuideService) {
  const router = express.Router();

  router.get('/options', (req, res) => {
    res.json({
      success: true,
      data: guideService.getOptions(),
    });
  });

  router.post('/session', (req, res) => {
    const session = guideService.createSession();
    res.setHeader('X-Session-Id', session.id);
    res.status(201).json({
      success: true,
      data: session.snapshot(),
    });
  });

  router.get('/session', (req, res, next) => {
    const id = req.get(SESSION_HEADER);
    const session = id ? guideService.getSession(id) : null;
    if (!session) {
      return next(createError('Session not found', 404));
    }
    res.json({
      success: true,
      data: session.snapshot(),
    });
  });

  router.post('/extract', upload.single(UPLOAD.fieldName), async (req, res, next) => {
    try {
      if (!req.file) {
        return res.status(400).json({
          success: false,
          error: { message: 'No file provided', code: 'VALIDATION_ERROR' },
        });
      }

      const session = sessionFor(guideService, req, res);
      const result = await guideService.extract(session, req.file).catch((error: unknown) => {
        metrics.recordGuideEvent('extraction_failed');
        throw error;
      });

      metrics.recordGuideEvent('extracted');
      if (result.hazard.detected) {
        metrics.recordGuideEvent('halted');
      }

      res.json({
        success: true,
        data: {
          ...result,
          session: session.snapshot(),
        },
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/scan', (req, res, next) => {
    try {
      const { symptoms } = parseGuideRequest(req.body);
      const session = sessionFor(guideService, req, res);
      const hazard = guideService.submitText(session, symptoms ?? '');

      if (hazard.detected) {
        metrics.recordGuideEvent('halted');
      }

      res.json({
        success: true,
        data: {
          hazard,
          session: session.snapshot(),
        },
      });
    } catch (error) {
      next(error);
    }
  });

  // Streams the guide as server-sent events: a `fragment` event carrying the
  // accumulated text after every chunk, then exactly one of hazard/complete/error.
  router.post('/generate', generationRateLimiter, async (req, res, next) => {
    let session: GuideSession;
    let request: GuideRequest;
    try {
      request = parseGuideRequest(req.body);
      session = sessionFor(guideService, req, res);
      guideService.resolveSymptoms(session, request.symptoms);
      if (session.busy) {
        throw createError('A request is already in progress for this session', 409);
      }
    } catch (error) {
      return next(error);
    }

    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache, no-transform');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    try {
      const outcome = await guideService.generate(session, request, (partial) =>
        writeEvent(res, 'fragment', { text: partial })
      );

      if (outcome.status === 'halted') {
        metrics.recordGuideEvent('halted');
        writeEvent(res, 'hazard', outcome.hazard);
      } else {
        metrics.recordGuideEvent('generated');
        if (outcome.renderError) {
          metrics.recordGuideEvent('render_failed');
        }
        writeEvent(res, 'complete', {
          guide: outcome.document.text,
          levelLabel: outcome.document.levelLabel,
          summary: outcome.summary
            ? {
                id: outcome.summary.id,
                filename: outcome.summary.filename,
                size: outcome.summary.size,
                url: `${req.baseUrl}/summary/${outcome.summary.id}`,
              }
            : null,
          preview: outcome.preview,
          renderError: outcome.renderError,
        });
      }
    } catch (error) {
      metrics.recordGuideEvent('generation_failed');
      writeEvent(res, 'error', { message: errorMessage(error) });
    } finally {
      res.end();
    }
  });

  router.get('/summary/:id', async (req, res, next) => {
    try {
      // the session id is read from the header only, never from the URL
      const id = req.get(SESSION_HEADER);
      const session = id ? guideService.getSession(id) : null;
      if (!session) {
        throw createError('Session not found', 404);
      }

      const { summary, bytes } = await guideService.readSummary(session, req.params.id);
      res.setHeader('Content-Type', summary.mimeType);
      res.attachment(summary.filename);
      res.send(bytes);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
