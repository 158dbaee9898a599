import { describe, expect, it, vi } from 'vitest';
import { runGated } from '../src/index';

describe('runGated', () => {
    it('should fire the action when the value meets the threshold', async () => {
        const action = vi.fn(async () => 'penguins/1');

        const outcome = await runGated({ value: 0.75, threshold: 0.75, action });

        expect(action).toHaveBeenCalledTimes(1);
        expect(outcome).toEqual({ status: 'fired', value: 0.75, threshold: 0.75, result: 'penguins/1' });
    });

    it('should skip the action below the threshold without failing', async () => {
        const action = vi.fn(async () => 'penguins/1');
        const info = vi.fn();
        const logger = { info, debug: vi.fn(), warn: vi.fn(), error: vi.fn(), trace: vi.fn(), fatal: vi.fn(), child: vi.fn() };

        const outcome = await runGated({ value: 0.7, threshold: 0.75, action, label: 'Model registration', logger });

        expect(action).not.toHaveBeenCalled();
        expect(outcome).toEqual({ status: 'skipped', reason: 'threshold-not-met', value: 0.7, threshold: 0.75 });
        expect(info).toHaveBeenCalledWith({ value: 0.7, threshold: 0.75 }, 'Model registration skipped: 0.70 is below the threshold 0.75');
    });

    it('should treat NaN as below any threshold', async () => {
        const outcome = await runGated({ value: Number.NaN, threshold: 0, action: async () => true });
        expect(outcome.status).toBe('skipped');
    });

    it('should propagate a failing action', async () => {
        await expect(runGated({ value: 1, threshold: 0.5, action: async () => { throw new Error('registry down'); } }))
            .rejects.toThrow('registry down');
    });
});
