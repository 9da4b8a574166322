import { ReadingLevel, Specialty } from '../config/guide';

export type DocumentFormat = 'text' | 'pdf' | 'docx';

export interface HazardRule {
  pattern: string;
  message: string;
}

export type HazardResult =
  | { detected: false }
  | { detected: true; message: string; advisory: string; pattern: string };

export interface CleanupWarning {
  path: string;
  message: string;
}

export interface ExtractionResult {
  text: string;
  format: DocumentFormat;
  warnings: CleanupWarning[];
}

export interface UploadedFile {
  buffer: Buffer;
  mimetype: string;
  originalname: string;
}

export interface GuideRequest {
  symptoms?: string;
  specialty: Specialty;
  readingLevel: ReadingLevel;
}

export interface GuidanceDocument {
  readonly symptoms: string;
  readonly specialty: Specialty;
  readonly readingLevel: ReadingLevel;
  readonly levelLabel: string;
  readonly text: string;
}

export interface RenderedSummary {
  id: string;
  path: string;
  filename: string;
  mimeType: string;
  size: number;
}

export type GuideState =
  | 'idle'
  | 'extracting'
  | 'scanning'
  | 'halted'
  | 'ready'
  | 'generating'
  | 'rendering'
  | 'complete';

export type GuideOutcome =
  | { status: 'halted'; hazard: Extract<HazardResult, { detected: true }> }
  | {
      status: 'complete';
      document: GuidanceDocument;
      summary: RenderedSummary | null;
      preview: string | null;
      renderError: string | null;
    };
