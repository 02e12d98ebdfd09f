import { afterEach, describe, expect, it, vi } from 'vitest';
import { logger } from './Logger';

describe('logger', () => {
    afterEach(() => {
        logger.clear();
        logger.setConsoleLevel('silent');
        vi.restoreAllMocks();
    });

    it('records entries with level and scope', () => {
        logger.clear();
        logger.info('graft', 'Selected device');
        logger.warn('fenestration', 'Rejected', { distance: 53 });
        logger.error('export', 'Failed', new RangeError('bad color'));

        const entries = logger.getEntries();
        expect(entries.map(entry => [entry.level, entry.scope, entry.message])).toEqual([
            ['info', 'graft', 'Selected device'],
            ['warn', 'fenestration', 'Rejected {"distance":53}'],
            ['error', 'export', 'Failed RangeError: bad color'],
        ]);
        expect(logger.getLogs()).toContain('[WARN] [fenestration] Rejected {"distance":53}');
    });

    it('keeps the most recent 1000 entries', () => {
        logger.clear();
        for (let i = 0; i < 1005; i++) {
            logger.debug('test', `entry ${i}`);
        }
        const entries = logger.getEntries();
        expect(entries).toHaveLength(1000);
        expect(entries[0].message).toBe('entry 5');
        expect(entries[999].message).toBe('entry 1004');
    });

    it('forwards entries at or above the console level', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
        logger.setConsoleLevel('warn');

        logger.info('graft', 'quiet');
        logger.warn('graft', 'loud');

        expect(info).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledWith('[graft] loud');
    });
});
