import { DegradedRetryError, withDegradedRetry } from '../../../src/application/pipelines/DegradedRetry';

describe('withDegradedRetry', () => {
    const plan = { primary: 'high', degraded: 'low' };

    it('should return the primary result without a second attempt', async () => {
        const run = jest.fn().mockResolvedValue('done');

        const result = await withDegradedRetry(plan, run);

        expect(result).toEqual({ value: 'done', attempt: 'primary' });
        expect(run).toHaveBeenCalledTimes(1);
        expect(run).toHaveBeenCalledWith('high', 'primary');
    });

    it('should retry exactly once with the degraded parameters', async () => {
        const onDegrade = jest.fn();
        const run = jest.fn()
            .mockRejectedValueOnce(new Error('too slow'))
            .mockResolvedValueOnce('done');

        const result = await withDegradedRetry(plan, run, onDegrade);

        expect(result).toEqual({ value: 'done', attempt: 'degraded' });
        expect(run.mock.calls).toEqual([['high', 'primary'], ['low', 'degraded']]);
        expect(onDegrade).toHaveBeenCalledWith(new Error('too slow'));
    });

    it('should fail with both errors when the degraded attempt also fails', async () => {
        const primary = new Error('first');
        const degraded = new Error('second');
        const run = jest.fn()
            .mockRejectedValueOnce(primary)
            .mockRejectedValueOnce(degraded);

        let thrown: unknown;
        try {
            await withDegradedRetry(plan, run);
        } catch (error) {
            thrown = error;
        }

        expect(thrown).toBeInstanceOf(DegradedRetryError);
        expect(thrown).toMatchObject({
            message: 'Primary and degraded attempts both failed: second',
            primaryError: primary,
            degradedError: degraded,
        });
        expect(run).toHaveBeenCalledTimes(2);
    });
});
