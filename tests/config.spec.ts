import { describe, it, expect } from 'vitest';
import { ConfigValidationError, loadConfig } from '../config';

describe('loadConfig', () => {
    it('falls back to the defaults', () => {
        expect(loadConfig({})).toEqual({ logLevel: 'warn', timeStep: 0.1, maxSimulationTime: 20 });
    });

    it('reads and coerces environment values', () => {
        const config = loadConfig({
            BIOENERGETICS_LOG_LEVEL: 'DEBUG',
            BIOENERGETICS_TIME_STEP: '0.5',
            BIOENERGETICS_MAX_SIMULATION_TIME: ' 60 ',
        });
        expect(config).toEqual({ logLevel: 'debug', timeStep: 0.5, maxSimulationTime: 60 });
    });

    it('treats empty strings as unset', () => {
        expect(loadConfig({ BIOENERGETICS_TIME_STEP: '' }).timeStep).toBe(0.1);
    });

    it('rejects an unknown log level', () => {
        expect(() => loadConfig({ BIOENERGETICS_LOG_LEVEL: 'loud' })).toThrow(ConfigValidationError);
    });

    it('lists each issue on its own line of the error message', () => {
        expect(() => loadConfig({ BIOENERGETICS_TIME_STEP: '-1' })).toThrow(
            'Invalid configuration:\n  - timeStep: Number must be greater than 0',
        );
    });

    it('names every invalid key', () => {
        let caught: unknown;
        try {
            loadConfig({ BIOENERGETICS_TIME_STEP: '-1', BIOENERGETICS_MAX_SIMULATION_TIME: 'soon' });
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(ConfigValidationError);
        const issues = caught instanceof ConfigValidationError ? caught.issues : [];
        expect(issues).toHaveLength(2);
        expect(issues[0]).toMatch(/^timeStep: /);
        expect(issues[1]).toMatch(/^maxSimulationTime: /);
    });
});
