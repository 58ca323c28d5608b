/**
 * Runtime configuration.
 *
 * Reads the simulator's knobs from environment variables and validates them
 * with zod, falling back to the defaults in constants.ts.
 *
 * Usage:
 *   import { loadConfig } from './config';
 *   const config = loadConfig();
 *   config.logLevel; // 'warn'
 */

import { z } from 'zod';
import { MAX_SIMULATION_TIME, TIME_STEP } from './constants';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const configSchema = z.object({
    logLevel: z.enum(LOG_LEVELS).default('warn'),
    timeStep: z.coerce.number().positive().default(TIME_STEP),
    maxSimulationTime: z.coerce.number().positive().default(MAX_SIMULATION_TIME),
});

export type Config = z.infer<typeof configSchema>;

export class ConfigValidationError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
        this.name = 'ConfigValidationError';
        this.issues = issues;
    }
}

type Env = Record<string, string | undefined>;

/**
 * Build the configuration from an environment map (process.env by default).
 * Empty strings count as unset.
 */
export function loadConfig(env: Env = process.env): Config {
    const pick = (key: string): string | undefined => {
        const value = env[key];
        return value === undefined || value.trim() === '' ? undefined : value.trim();
    };

    const result = configSchema.safeParse({
        logLevel: pick('BIOENERGETICS_LOG_LEVEL')?.toLowerCase(),
        timeStep: pick('BIOENERGETICS_TIME_STEP'),
        maxSimulationTime: pick('BIOENERGETICS_MAX_SIMULATION_TIME'),
    });

    if (!result.success) {
        throw new ConfigValidationError(
            result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`),
        );
    }
    return result.data;
}
