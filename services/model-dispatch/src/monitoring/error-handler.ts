import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { ConfigError, DispatchError } from '../errors.js';

export interface ErrorInfo {
  id: string;
  timestamp: string;
  type: string;
  code: string;
  statusCode: number;
  message: string;
  details?: Record<string, unknown>;
  stack?: string;
  context: {
    url?: string;
    method?: string;
    userAgent?: string;
    ip?: string;
    service?: string;
    jobId?: string;
  };
  severity: 'low' | 'medium' | 'high' | 'critical';
}

export interface ErrorStats {
  total: number;
  bySeverity: Record<string, number>;
  byCode: Record<string, number>;
}

interface ErrorHandlerOptions {
  exposeStack: boolean;
  maxEntries: number;
}

/**
 * Captures every error that reaches Express, logs it, keeps recent history for
 * the /errors endpoint, and writes the client response with the error's status code.
 */
export class ErrorHandler {
  private readonly errors: Map<string, ErrorInfo> = new Map();
  private readonly options: ErrorHandlerOptions;

  constructor(options: Partial<ErrorHandlerOptions> = {}) {
    this.options = {
      exposeStack: process.env.NODE_ENV === 'development',
      maxEntries: 1000,
      ...options
    };
  }

  /**
   * Express error handling middleware
   */
  middleware() {
    return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
      if (res.headersSent) {
        next(error);
        return;
      }

      const errorInfo = this.captureError(error, {
        url: req.originalUrl,
        method: req.method,
        userAgent: req.get('User-Agent'),
        ip: req.ip,
        service: req.params['service'],
        jobId: req.params['jobId']
      });

      this.sendErrorResponse(errorInfo, res);
    };
  }

  /**
   * Capture and categorize an error
   */
  captureError(error: unknown, context: ErrorInfo['context'] = {}): ErrorInfo {
    const { code, statusCode, message, details } = this.classify(error);

    const errorInfo: ErrorInfo = {
      id: this.generateErrorId(),
      timestamp: new Date().toISOString(),
      type: error instanceof Error ? error.name : typeof error,
      code,
      statusCode,
      message,
      details,
      stack: error instanceof Error ? error.stack : undefined,
      context,
      severity: this.determineSeverity(statusCode)
    };

    this.errors.set(errorInfo.id, errorInfo);
    this.trim();
    this.logError(errorInfo);

    return errorInfo;
  }

  getErrorStats(): ErrorStats {
    const stats: ErrorStats = {
      total: this.errors.size,
      bySeverity: {},
      byCode: {}
    };

    for (const error of this.errors.values()) {
      stats.bySeverity[error.severity] = (stats.bySeverity[error.severity] || 0) + 1;
      stats.byCode[error.code] = (stats.byCode[error.code] || 0) + 1;
    }

    return stats;
  }

  getAllErrors(): ErrorInfo[] {
    return Array.from(this.errors.values());
  }

  getRecentErrors(limit: number = 10): ErrorInfo[] {
    return this.getAllErrors().slice(-limit);
  }

  /**
   * Clear errors older than specified time
   */
  clearOldErrors(maxAgeMs: number = 24 * 60 * 60 * 1000): number {
    const cutoff = Date.now() - maxAgeMs;
    let cleared = 0;

    for (const [id, error] of this.errors.entries()) {
      if (new Date(error.timestamp).getTime() < cutoff) {
        this.errors.delete(id);
        cleared++;
      }
    }

    return cleared;
  }

  private classify(error: unknown): Pick<ErrorInfo, 'code' | 'statusCode' | 'message' | 'details'> {
    if (error instanceof DispatchError) {
      return { code: error.code, statusCode: error.statusCode, message: error.message, details: error.details };
    }

    if (error instanceof ConfigError) {
      return { code: 'ConfigError', statusCode: 500, message: error.message };
    }

    // body-parser failures carry their own client status
    const status = clientStatusOf(error);
    if (status !== null) {
      return {
        code: status === 413 ? 'PayloadTooLarge' : 'ValidationError',
        statusCode: status,
        message: error instanceof Error ? error.message : 'Invalid request'
      };
    }

    return {
      code: 'InternalError',
      statusCode: 500,
      message: 'An unexpected error occurred.'
    };
  }

  private sendErrorResponse(errorInfo: ErrorInfo, res: Response): void {
    res.status(errorInfo.statusCode).json({
      success: false,
      error: errorInfo.code,
      message: errorInfo.message,
      errorId: errorInfo.id,
      ...(errorInfo.details && { details: errorInfo.details }),
      timestamp: errorInfo.timestamp,
      ...(this.options.exposeStack && {
        stack: errorInfo.stack,
        context: errorInfo.context
      })
    });
  }

  private determineSeverity(statusCode: number): ErrorInfo['severity'] {
    if (statusCode === 500 || statusCode === 503) {
      return 'critical';
    }
    if (statusCode >= 500) {
      return 'high';
    }
    if (statusCode === 404 || statusCode === 409) {
      return 'medium';
    }
    return 'low';
  }

  private logError(errorInfo: ErrorInfo): void {
    const logLevel = errorInfo.severity === 'critical' || errorInfo.severity === 'high' ? 'error' : 'warn';
    console[logLevel](`Error ${errorInfo.id}: ${errorInfo.code} - ${errorInfo.message}`, {
      severity: errorInfo.severity,
      context: errorInfo.context,
      timestamp: errorInfo.timestamp,
      ...(errorInfo.statusCode === 500 && { stack: errorInfo.stack })
    });
  }

  private trim(): void {
    while (this.errors.size > this.options.maxEntries) {
      const oldest = this.errors.keys().next();
      if (oldest.done) {
        return;
      }
      this.errors.delete(oldest.value);
    }
  }

  private generateErrorId(): string {
    return `err_${Date.now()}_${uuidv4().slice(0, 8)}`;
  }
}

function clientStatusOf(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return null;
  }
  const status = error.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}
