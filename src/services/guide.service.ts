import { randomUUID } from 'crypto';
import { HazardScanner } from './hazard.service';
import { ExtractionService } from './extraction.service';
import { GuideGenerator } from './openai.service';
import { buildGuidePrompt, buildStyleInstruction } from './prompt.service';
import { RenderService, toDataUri } from './render.service';
import { StorageService } from './storage.service';
import { READING_LEVELS, SPECIALTIES, SUMMARY } from '../config/guide';
import { Cache } from '../utils/cache';
import {
  ConflictError,
  GenerationError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from '../utils/errors';
import {
  CleanupWarning,
  DocumentFormat,
  GuidanceDocument,
  GuideOutcome,
  GuideRequest,
  GuideState,
  HazardResult,
  RenderedSummary,
  UploadedFile,
} from '../types/guide.types';

export const MISSING_SYMPTOMS_MESSAGE = 'Please describe symptoms or upload a file';

const TRANSITIONS: Readonly<Record<GuideState, readonly GuideState[]>> = Object.freeze({
  idle: ['extracting', 'scanning'],
  extracting: ['scanning', 'idle'],
  scanning: ['halted', 'ready', 'idle'],
  halted: ['idle'],
  ready: ['generating', 'idle'],
  generating: ['rendering', 'idle'],
  rendering: ['complete'],
  complete: ['ready', 'idle'],
});

const BUSY_STATES: readonly GuideState[] = ['extracting', 'scanning', 'generating', 'rendering'];

export interface SessionSnapshot {
  id: string;
  state: GuideState;
  hazard: HazardResult | null;
  summaryId: string | null;
  lastError: string | null;
}

/**
 * One browser's walk through the request lifecycle:
 * idle -> extracting -> scanning -> halted | ready -> generating -> rendering -> complete.
 */
export class GuideSession {
  readonly id: string;
  private current: GuideState = 'idle';
  symptoms = '';
  hazard: HazardResult | null = null;
  summary: RenderedSummary | null = null;
  lastError: string | null = null;

  constructor(id: string) {
    this.id = id;
  }

  get state(): GuideState {
    return this.current;
  }

  get busy(): boolean {
    return BUSY_STATES.includes(this.current);
  }

  transition(next: GuideState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new ConflictError(`Cannot move from ${this.current} to ${next}`);
    }
    this.current = next;
  }

  /** New input discards the previous text and hazard verdict. */
  beginInput(): void {
    if (this.busy) {
      throw new ConflictError('A request is already in progress for this session');
    }
    if (this.current !== 'idle') {
      this.transition('idle');
    }
    this.symptoms = '';
    this.hazard = null;
    this.lastError = null;
  }

  fail(message: string): void {
    this.lastError = message;
    this.transition('idle');
  }

  snapshot(): SessionSnapshot {
    return {
      id: this.id,
      state: this.current,
      hazard: this.hazard,
      summaryId: this.summary?.id ?? null,
      lastError: this.lastError,
    };
  }
}

export interface ExtractOutcome {
  text: string;
  format: DocumentFormat;
  hazard: HazardResult;
  warnings: CleanupWarning[];
}

export interface GuideServiceOptions {
  generator: GuideGenerator;
  scanner: HazardScanner;
  storage?: StorageService;
  extractor?: ExtractionService;
  renderer?: RenderService;
  sessionTtl?: number;
}

export class GuideService {
  private generator: GuideGenerator;
  private scanner: HazardScanner;
  private storage: StorageService;
  private extractor: ExtractionService;
  private renderer: RenderService;
  private sessions: Cache<GuideSession>;

  constructor(options: GuideServiceOptions) {
    this.generator = options.generator;
    this.scanner = options.scanner;
    this.storage = options.storage ?? new StorageService();
    this.extractor = options.extractor ?? new ExtractionService(this.storage);
    this.renderer = options.renderer ?? new RenderService();
    this.sessions = new Cache<GuideSession>({
      ttl: options.sessionTtl ?? 60 * 60 * 1000,
      onEvict: (_id, session) => {
        void this.discardSummary(session);
      },
    });
    this.sessions.startCleanup();
  }

  getOptions() {
    return {
      readingLevels: Object.entries(READING_LEVELS).map(([level, label]) => ({
        level: Number(level),
        label,
      })),
      specialties: [...SPECIALTIES],
    };
  }

  createSession(): GuideSession {
    const session = new GuideSession(randomUUID());
    this.sessions.set(session.id, session);
    return session;
  }

  getSession(id: string): GuideSession | null {
    const session = this.sessions.get(id);
    if (session) {
      this.sessions.set(id, session);
    }
    return session;
  }

  /** Looks up the caller's session, starting a fresh one for unknown ids. */
  resolveSession(id?: string): GuideSession {
    return (id ? this.getSession(id) : null) ?? this.createSession();
  }

  async extract(session: GuideSession, file: UploadedFile): Promise<ExtractOutcome> {
    session.beginInput();
    session.transition('extracting');

    const format = this.extractor.detectFormat(file.mimetype, file.originalname);
    const { text, warnings } = await this.extractor
      .extractText(file.buffer, format)
      .catch((error: unknown) => {
        session.fail(errorMessage(error));
        throw error;
      });

    if (!text) {
      session.transition('idle');
      return { text, format, hazard: { detected: false }, warnings };
    }

    session.transition('scanning');
    return { text, format, hazard: this.scanInto(session, text), warnings };
  }

  submitText(session: GuideSession, text: string): HazardResult {
    const symptoms = text.trim();
    if (!symptoms) {
      throw new ValidationError(MISSING_SYMPTOMS_MESSAGE);
    }

    session.beginInput();
    session.transition('scanning');
    return this.scanInto(session, symptoms);
  }

  /** Throws before any streaming starts when there is nothing to generate from. */
  resolveSymptoms(session: GuideSession, symptoms?: string): string {
    const resolved = symptoms?.trim() || session.symptoms;
    if (!resolved) {
      throw new ValidationError(MISSING_SYMPTOMS_MESSAGE);
    }
    return resolved;
  }

  async generate(
    session: GuideSession,
    request: GuideRequest,
    onFragment?: (partial: string) => void
  ): Promise<GuideOutcome> {
    const symptoms = this.resolveSymptoms(session, request.symptoms);
    this.sessions.set(session.id, session);

    if (symptoms !== session.symptoms || session.state === 'idle') {
      this.submitText(session, symptoms);
    }

    const hazard = session.hazard;
    if (session.state === 'halted' && hazard !== null && hazard.detected) {
      return { status: 'halted', hazard };
    }

    if (session.state === 'complete') {
      session.transition('ready');
    }
    if (session.state !== 'ready') {
      throw new ConflictError(`Cannot generate while the session is ${session.state}`);
    }

    session.transition('generating');
    session.lastError = null;

    const prompt = buildGuidePrompt({
      symptoms,
      specialty: request.specialty,
      readingLevel: request.readingLevel,
    });
    const styleInstruction = buildStyleInstruction(request.readingLevel);

    const fragments: string[] = [];
    try {
      for await (const fragment of this.generator.streamGuide(prompt, styleInstruction)) {
        fragments.push(fragment);
        onFragment?.(fragments.join(''));
      }
    } catch (error) {
      const failure =
        error instanceof GenerationError
          ? error
          : new GenerationError(`Generation failed: ${errorMessage(error)}`);
      session.fail(failure.message);
      throw failure;
    }

    const document: GuidanceDocument = Object.freeze({
      symptoms,
      specialty: request.specialty,
      readingLevel: request.readingLevel,
      levelLabel: READING_LEVELS[request.readingLevel],
      text: fragments.join(''),
    });

    session.transition('rendering');

    let summary: RenderedSummary | null = null;
    let preview: string | null = null;
    let renderError: string | null = null;
    try {
      const bytes = this.renderer.renderSummary(document.symptoms, document.text);
      const stored = await this.storage.saveArtifact(bytes);
      summary = {
        ...stored,
        filename: SUMMARY.filename,
        mimeType: SUMMARY.mimeType,
      };
      preview = toDataUri(bytes);
    } catch (error) {
      renderError = errorMessage(error);
      console.error('Summary rendering failed:', renderError);
    }

    // a session that expired mid-request can no longer reach its artifact
    if (summary && this.sessions.get(session.id) !== session) {
      await this.storage.deleteFile(summary.path);
      summary = null;
    }

    const previous = session.summary;
    session.summary = summary;
    session.lastError = renderError;
    session.transition('complete');

    if (previous) {
      await this.storage.deleteFile(previous.path);
    }

    return { status: 'complete', document, summary, preview, renderError };
  }

  async readSummary(
    session: GuideSession,
    summaryId: string
  ): Promise<{ summary: RenderedSummary; bytes: Buffer }> {
    const summary = session.summary;
    if (!summary || summary.id !== summaryId) {
      throw new NotFoundError('Summary not found');
    }

    try {
      return { summary, bytes: await this.storage.readFile(summary.path) };
    } catch (error) {
      throw new NotFoundError(`Summary not available: ${errorMessage(error)}`);
    }
  }

  /** Drops every session and its summary file. */
  shutdown(): void {
    this.sessions.stopCleanup();
    this.sessions.clear();
  }

  private scanInto(session: GuideSession, text: string): HazardResult {
    session.symptoms = text;
    const hazard = this.scanner.scan(text);
    session.hazard = hazard;
    session.transition(hazard.detected ? 'halted' : 'ready');

    if (hazard.detected) {
      console.warn('🚨 Hazard phrase detected, generation halted:', {
        sessionId: session.id,
        pattern: hazard.pattern,
      });
    }

    return hazard;
  }

  private async discardSummary(session: GuideSession): Promise<void> {
    if (session.summary) {
      await this.storage.deleteFile(session.summary.path);
      session.summary = null;
    }
  }
}
