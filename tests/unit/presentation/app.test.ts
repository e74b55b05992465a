import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../../../src/presentation/app';
import { BackgroundClipSelector } from '../../../src/application/BackgroundClipSelector';
import { JobRunner, JobScheduler } from '../../../src/application/JobScheduler';
import { OutputFileTracker } from '../../../src/application/OutputFileTracker';
import { createTestConfig } from '../../helpers/testConfig';

const standardBody = {
    audioUrl: 'http://assets.local/narration.mp3',
    gameplayType: 'minecraft',
    introImageUrl: 'http://assets.local/intro.png',
    outroImageUrl: 'http://assets.local/outro.png',
};

describe('HTTP API', () => {
    let outputDir: string;
    let scheduler: JobScheduler;
    let tracker: OutputFileTracker;
    let app: Application;
    let spies: jest.SpyInstance[];

    beforeEach(async () => {
        spies = [
            jest.spyOn(console, 'log').mockImplementation(() => undefined),
            jest.spyOn(console, 'warn').mockImplementation(() => undefined),
            jest.spyOn(console, 'error').mockImplementation(() => undefined),
        ];
        outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'api-test-'));

        let next = 0;
        const runner: JobRunner = {
            run: async (job) => `http://test.local/videos/video_${job.id}.mp4`,
        };
        scheduler = new JobScheduler(runner, 2, () => `job_${++next}`);
        tracker = new OutputFileTracker();
        const selector = new BackgroundClipSelector(new Map([
            ['subway', { list: async () => ['/bg/subway.mp4'] }],
            ['minecraft', { list: async () => ['/bg/minecraft.mp4'] }],
        ]));

        app = createApp(createTestConfig({ processedVideosDir: outputDir }), { scheduler, selector, tracker });
    });

    afterEach(async () => {
        await scheduler.onIdle();
        spies.forEach((spy) => spy.mockRestore());
        await fs.rm(outputDir, { recursive: true, force: true });
    });

    test('GET /health should report ok', async () => {
        const response = await request(app).get('/health');

        expect(response.status).toBe(200);
        expect(response.body).toMatchObject({ status: 'ok', version: '1.0.0' });
    });

    describe('job submission', () => {
        test('POST /create-video should accept a standard job', async () => {
            const response = await request(app).post('/api/v1/create-video').send(standardBody);

            expect(response.status).toBe(202);
            expect(response.body).toEqual({ jobId: 'job_1', status: 'admitted', statusUrl: '/api/v1/jobs/job_1' });
            expect(scheduler.status('job_1').variant).toBe('standard');
        });

        test('POST /create-reddit-video should accept a reddit job', async () => {
            const response = await request(app).post('/api/v1/create-reddit-video').send({
                audioUrl: 'http://assets.local/narration.mp3',
                gameplayType: 'subway',
                redditPostImageUrl: 'http://assets.local/post.png',
                firstImageUrl: 'http://assets.local/one.png',
                secondImageUrl: 'http://assets.local/two.png',
                variant: 'standard',
            });

            expect(response.status).toBe(202);
            expect(scheduler.status(response.body.jobId).variant).toBe('reddit');
        });

        test('should reject a request missing a field', async () => {
            const response = await request(app).post('/api/v1/create-video').send({
                audioUrl: 'http://assets.local/narration.mp3',
                gameplayType: 'minecraft',
            });

            expect(response.status).toBe(400);
            expect(response.body).toEqual({
                error: { code: 'InvalidRequest', message: 'introImageUrl is required and must be a non-empty string' },
            });
            expect(scheduler.getAllJobs()).toEqual([]);
        });

        test('should reject a body that is not an object', async () => {
            const response = await request(app).post('/api/v1/create-video').send([standardBody]);

            expect(response.status).toBe(400);
            expect(response.body.error.message).toBe('Request body must be a JSON object');
        });
    });

    describe('job status', () => {
        test('GET /jobs/:jobId should show the result once finished', async () => {
            await request(app).post('/api/v1/create-video').send(standardBody);
            await scheduler.onIdle();

            const response = await request(app).get('/api/v1/jobs/job_1');

            expect(response.status).toBe(200);
            expect(response.body).toMatchObject({
                jobId: 'job_1',
                variant: 'standard',
                status: 'succeeded',
                videoUrl: 'http://test.local/videos/video_job_1.mp4',
            });
            expect(response.body.error).toBeUndefined();
        });

        test('GET /jobs/:jobId should return 404 for an unknown job', async () => {
            const response = await request(app).get('/api/v1/jobs/job_missing');

            expect(response.status).toBe(404);
            expect(response.body).toEqual({ error: { code: 'NotFound', message: 'Job not found: job_missing' } });
        });

        test('GET /jobs should list jobs with scheduler counters', async () => {
            await request(app).post('/api/v1/create-video').send(standardBody);
            await scheduler.onIdle();

            const response = await request(app).get('/api/v1/jobs');

            expect(response.body).toMatchObject({ total: 1, running: 0, queued: 0, concurrencyLimit: 2 });
            expect(response.body.jobs[0]).toMatchObject({ jobId: 'job_1', status: 'succeeded' });
        });

        test('GET /categories should list registered categories', async () => {
            const response = await request(app).get('/api/v1/categories');

            expect(response.body).toEqual({ categories: ['minecraft', 'subway'] });
        });
    });

    describe('video files', () => {
        beforeEach(async () => {
            await fs.writeFile(path.join(outputDir, 'video_job_1.mp4'), 'mp4-bytes');
        });

        test('should serve a finished video', async () => {
            const response = await request(app).get('/videos/video_job_1.mp4');

            expect(response.status).toBe(200);
            expect(response.headers['content-type']).toBe('video/mp4');
            expect(response.headers['content-length']).toBe('9');
        });

        test('should honour range requests', async () => {
            const response = await request(app).get('/videos/video_job_1.mp4').set('Range', 'bytes=0-3');

            expect(response.status).toBe(206);
            expect(response.headers['content-range']).toBe('bytes 0-3/9');
        });

        test('should answer 410 for a video removed by retention', async () => {
            tracker.track('job_old', path.join(outputDir, 'video_job_old.mp4'));
            tracker.markExpired(path.join(outputDir, 'video_job_old.mp4'));

            const response = await request(app).get('/videos/video_job_old.mp4');

            expect(response.status).toBe(410);
            expect(response.body).toEqual({ error: { code: 'Expired', message: 'Video has expired: video_job_old.mp4' } });
        });

        test('should answer 404 for an unknown video', async () => {
            const response = await request(app).get('/videos/nope.mp4');

            expect(response.status).toBe(404);
            expect(response.body).toEqual({ error: { code: 'NotFound', message: 'Video not found: nope.mp4' } });
        });

        test('should refuse names that leave the output directory', async () => {
            const response = await request(app).get('/videos/..%5Csecret.mp4');

            expect(response.status).toBe(404);
            expect(response.body.error.code).toBe('NotFound');
        });
    });

    test('should answer 404 for unknown routes', async () => {
        const response = await request(app).get('/nope');

        expect(response.status).toBe(404);
        expect(response.body).toEqual({ error: { code: 'NotFound', message: 'Route not found: GET /nope' } });
    });
});
