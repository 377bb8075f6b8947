import fs from 'fs/promises';
import { ConfigurationError } from '../../errors/errors.js';
import { AttributionConfigSchema, type AttributionConfig } from '../../validation/schema.js';
import { validate } from '../../validation/zod-middleware.js';

export const ENV_CONFIG_PATH = 'DRIFT_CONFIG';
export const DEFAULT_CONFIG_PATH = 'config.json';

export function parseConfig(document: unknown): AttributionConfig {
    return validate(AttributionConfigSchema, document, 'configuration');
}

export async function loadConfig(path: string): Promise<AttributionConfig> {
    let raw: string;
    try {
        raw = await fs.readFile(path, 'utf-8');
    } catch (error: unknown) {
        throw new ConfigurationError(`Issue opening configuration file '${path}'`, [], { cause: error });
    }

    let document: unknown;
    try {
        document = JSON.parse(raw);
    } catch (error: unknown) {
        throw new ConfigurationError(`Configuration file '${path}' is not valid JSON`, [], { cause: error });
    }
    return parseConfig(document);
}
