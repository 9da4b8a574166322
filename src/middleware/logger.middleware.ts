import { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';

const isTest = () => process.env.NODE_ENV === 'test';

export const requestLogger = morgan('combined', {
  skip: (req: Request) => isTest() || req.path === '/health',
});

// Symptom text never reaches the log: only routing and timing data.
export const apiLogger = (req: Request, res: Response, next: NextFunction) => {
  if (isTest()) {
    return next();
  }

  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    const logData = {
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: `${duration}ms`,
      sessionId: req.get('x-session-id') ?? null,
      ip: req.ip,
      timestamp: new Date().toISOString(),
    };

    if (res.statusCode >= 400) {
      console.error('API Error:', logData);
    } else {
      console.log('API Request:', logData);
    }
  });

  next();
};
