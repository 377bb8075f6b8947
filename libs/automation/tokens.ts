import fs from 'fs/promises';
import { z } from 'zod';
import { ConfigurationError } from '../errors/errors.js';

export const ENV_TERRAFORM_TOKEN_FILE = 'TERRAFORM_READ_TOKENS';

const OrgTokenMapSchema = z.record(z.string().min(1), z.string().min(1));

export type OrgTokenMap = Readonly<Record<string, string>>;

/**
 * Reads the organization -> team token map from a JSON file.
 */
export async function loadOrgTokens(tokenFile: string): Promise<OrgTokenMap> {
    let raw: string;
    try {
        raw = await fs.readFile(tokenFile, 'utf-8');
    } catch (error: unknown) {
        throw new ConfigurationError(`Issue opening token file '${tokenFile}'`, [], { cause: error });
    }

    let document: unknown;
    try {
        document = JSON.parse(raw);
    } catch (error: unknown) {
        throw new ConfigurationError(`Token file '${tokenFile}' is not valid JSON`, [], { cause: error });
    }

    const parsed = OrgTokenMapSchema.safeParse(document);
    if (!parsed.success) {
        throw new ConfigurationError(
            `Incorrect token file '${tokenFile}': expected an object of organization names to token strings`,
            parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }
    return parsed.data;
}
