import express, { Application, Request } from 'express';
import request from 'supertest';
import {
    AppError,
    NotFoundError,
    asyncHandler,
    errorHandler,
} from '../../../../src/presentation/middleware/errorHandler';
import { StageError, VideoExpiredError } from '../../../../src/domain/errors/VideoJobError';

function appThrowing(error: Error): Application {
    const app = express();
    app.use(express.json());
    app.get('/sync', () => {
        throw error;
    });
    app.get('/async', asyncHandler(async () => {
        await Promise.resolve();
        throw error;
    }));
    app.post('/echo', (req: Request, res) => {
        res.json(req.body);
    });
    app.use(errorHandler);
    return app;
}

describe('errorHandler', () => {
    const originalEnv = process.env.NODE_ENV;
    let warnSpy: jest.SpyInstance;
    let errorSpy: jest.SpyInstance;

    beforeEach(() => {
        warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        process.env.NODE_ENV = originalEnv;
        warnSpy.mockRestore();
        errorSpy.mockRestore();
    });

    describe('error classes', () => {
        test('AppError should carry status and code', () => {
            const err = new AppError(418, 'Teapot', 'I am a teapot');
            expect(err.statusCode).toBe(418);
            expect(err.code).toBe('Teapot');
            expect(err.name).toBe('AppError');
        });

        test('NotFoundError should default to 404', () => {
            const err = new NotFoundError();
            expect(err.statusCode).toBe(404);
            expect(err.message).toBe('Resource not found');
        });
    });

    test('should map domain error codes to HTTP statuses', async () => {
        const response = await request(appThrowing(new VideoExpiredError('video_job_1.mp4'))).get('/sync');

        expect(response.status).toBe(410);
        expect(response.body).toEqual({ error: { code: 'Expired', message: 'Video has expired: video_job_1.mp4' } });
        expect(warnSpy).toHaveBeenCalledTimes(1);
    });

    test('should report stage failures as server errors with their reason', async () => {
        const response = await request(appThrowing(new StageError('EncodingError', 'FFmpeg failed'))).get('/async');

        expect(response.status).toBe(500);
        expect(response.body).toEqual({ error: { code: 'EncodingError', message: 'FFmpeg failed' } });
    });

    test('should reject malformed JSON bodies', async () => {
        const response = await request(appThrowing(new Error('unused')))
            .post('/echo')
            .set('Content-Type', 'application/json')
            .send('{"audioUrl": ');

        expect(response.status).toBe(400);
        expect(response.body).toEqual({ error: { code: 'InvalidRequest', message: 'Request body is not valid JSON' } });
    });

    test('should hide unexpected error messages in production', async () => {
        process.env.NODE_ENV = 'production';

        const response = await request(appThrowing(new Error('db exploded'))).get('/sync');

        expect(response.status).toBe(500);
        expect(response.body).toEqual({ error: { code: 'InternalError', message: 'Internal server error' } });
        expect(errorSpy).toHaveBeenCalledWith('[HTTP] Error: db exploded (GET /sync)');
    });

    test('should keep unexpected error messages outside production', async () => {
        process.env.NODE_ENV = 'test';

        const response = await request(appThrowing(new Error('db exploded'))).get('/sync');

        expect(response.body).toEqual({ error: { code: 'InternalError', message: 'db exploded' } });
    });
});
