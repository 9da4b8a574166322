export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number = 500, code: string = 'INTERNAL_ERROR') {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

/** Missing or malformed startup configuration. Fatal: the process does not start. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500, 'CONFIGURATION_ERROR');
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, 'CONFLICT');
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'NOT_FOUND');
  }
}

/** An uploaded document could not be read. The caller treats the text as empty. */
export class ExtractionError extends AppError {
  constructor(message: string) {
    super(message, 422, 'EXTRACTION_ERROR');
  }
}

/** The remote model call failed; the message is shown to the user as is. */
export class GenerationError extends AppError {
  constructor(message: string) {
    super(message, 502, 'GENERATION_ERROR');
  }
}

/** The summary PDF could not be built. Non-fatal to a generation request. */
export class RenderError extends AppError {
  constructor(message: string) {
    super(message, 500, 'RENDER_ERROR');
  }
}

export const createError = (message: string, statusCode: number = 500): AppError => {
  return new AppError(message, statusCode);
};

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
