import { Request, Response, NextFunction } from 'express';
import { VideoErrorCode, VideoJobError } from '../../domain/errors/VideoJobError';

/**
 * HTTP-only error with a status code, for conditions outside the domain taxonomy.
 */
export class AppError extends Error {
    constructor(
        public readonly statusCode: number,
        public readonly code: string,
        message: string
    ) {
        super(message);
        this.name = 'AppError';
    }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super(404, 'NotFound', message);
        this.name = 'NotFoundError';
    }
}

const STATUS_BY_CODE: Record<VideoErrorCode, number> = {
    InvalidRequest: 400,
    CategoryNotFound: 400,
    NotFound: 404,
    Expired: 410,
    AssetFetchError: 500,
    TranscriptionError: 500,
    PlanningError: 500,
    EncodingError: 500,
    InternalError: 500,
};

/**
 * Error response structure.
 */
interface ErrorResponse {
    error: {
        message: string;
        code: string;
    };
}

/**
 * True for the error express.json() raises on a malformed body.
 */
function isBodyParseError(err: Error): boolean {
    return err instanceof SyntaxError && 'status' in err && err.status === 400;
}

/**
 * Global error handler middleware.
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    let status = 500;
    let code = 'InternalError';
    let message = err.message;

    if (err instanceof VideoJobError) {
        status = STATUS_BY_CODE[err.code];
        code = err.code;
    } else if (err instanceof AppError) {
        status = err.statusCode;
        code = err.code;
    } else if (isBodyParseError(err)) {
        status = 400;
        code = 'InvalidRequest';
        message = 'Request body is not valid JSON';
    }

    if (status >= 500) {
        console.error(`[HTTP] ${err.name}: ${err.message} (${req.method} ${req.path})`);
        if (err.stack) {
            console.error(err.stack);
        }
        if (process.env.NODE_ENV === 'production') {
            message = 'Internal server error';
        }
    } else {
        console.warn(`[HTTP] ${code}: ${message} (${req.method} ${req.path})`);
    }

    const response: ErrorResponse = { error: { message, code } };
    res.status(status).json(response);
}

/**
 * Async route handler wrapper to catch errors.
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        return Promise.resolve(fn(req, res, next)).catch(next);
    };
}
