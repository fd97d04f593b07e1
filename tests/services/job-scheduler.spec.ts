import { afterEach, describe, expect, it, vi } from 'vitest';
import { JobScheduler } from '../../src/services/job-scheduler.js';

describe('JobScheduler', () => {
    const scheduler = new JobScheduler();

    afterEach(() => {
        for (const job of scheduler.listJobs()) {
            scheduler.unregister(job.id);
        }
    });

    it('rejects duplicate ids and invalid expressions', () => {
        scheduler.register({ id: 'sweep', cronExpression: '* * * * * *', description: 'sweep', handler: vi.fn(), autoStart: false });

        expect(() =>
            scheduler.register({ id: 'sweep', cronExpression: '* * * * * *', description: 'again', handler: vi.fn() }),
        ).toThrow("[JobScheduler] Job 'sweep' is already registered.");
        expect(() =>
            scheduler.register({ id: 'broken', cronExpression: 'every second', description: 'bad', handler: vi.fn() }),
        ).toThrow("[JobScheduler] Invalid cron expression for job 'broken': every second");
    });

    it('runs a job on demand and records the run', async () => {
        const handler = vi.fn();
        scheduler.register({ id: 'sweep', cronExpression: '* * * * * *', description: 'sweep', handler, autoStart: false });

        await scheduler.runNow('sweep');

        const job = scheduler.getJob('sweep');
        expect(handler).toHaveBeenCalledTimes(1);
        expect(job?.status).toBe('idle');
        expect(job?.runCount).toBe(1);
        expect(job?.lastRunAt).toBeInstanceOf(Date);
    });

    it('marks a job as errored when its handler throws', async () => {
        scheduler.register({
            id: 'flaky',
            cronExpression: '*/5 * * * * *',
            description: 'flaky',
            handler: async () => {
                throw new Error('remote unavailable');
            },
            autoStart: false,
        });

        await scheduler.runNow('flaky');

        expect(scheduler.getJob('flaky')).toMatchObject({ status: 'error', lastError: 'remote unavailable' });
    });

    it('skips a run while the previous one is still in flight', async () => {
        let release: () => void = () => undefined;
        const handler = vi.fn(
            () =>
                new Promise<void>((resolve) => {
                    release = resolve;
                }),
        );
        scheduler.register({ id: 'slow', cronExpression: '* * * * * *', description: 'slow', handler, autoStart: false });

        const first = scheduler.runNow('slow');
        await scheduler.runNow('slow');
        release();
        await first;

        expect(handler).toHaveBeenCalledTimes(1);
        expect(scheduler.getJob('slow')).toMatchObject({ runCount: 1, skippedTicks: 1, status: 'idle' });
    });

    it('throws when running an unknown job', async () => {
        await expect(scheduler.runNow('missing')).rejects.toThrow("[JobScheduler] Job 'missing' is not registered.");
    });

    it('reports whether unregister removed anything', () => {
        scheduler.register({ id: 'sweep', cronExpression: '* * * * * *', description: 'sweep', handler: vi.fn(), autoStart: false });

        expect(scheduler.unregister('sweep')).toBe(true);
        expect(scheduler.unregister('sweep')).toBe(false);
        expect(scheduler.listJobs()).toEqual([]);
    });

    it('marks running jobs as stopped on stopAll', () => {
        scheduler.register({ id: 'sweep', cronExpression: '* * * * * *', description: 'sweep', handler: vi.fn() });

        scheduler.stopAll();

        expect(scheduler.getJob('sweep')?.status).toBe('stopped');
    });
});
