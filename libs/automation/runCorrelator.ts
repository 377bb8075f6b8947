import { pino } from 'pino';
import { windowStart, utcNow } from '../change/time.js';
import { AutomationRunQueryError, UnknownChangerError } from '../errors/errors.js';
import { filterRelevantRuns, parseRuns, type AutomationRun } from './run.js';
import { TerraformHttpClient, type TerraformApi } from './terraformClient.js';
import type { OrgTokenMap } from './tokens.js';

const logger = pino({ name: 'AutomationRunCorrelator' });

export const DEFAULT_RUN_LIMIT = 10;

export interface WorkspaceMapping {
    readonly org: string;
    readonly workspace: readonly string[];
}

export interface RunWindow {
    readonly referenceTime?: Date;
    readonly windowMinutes?: number;
}

/**
 * Source of pipeline runs for automation identities.
 * Throws UnknownChangerError for unmapped logins and
 * AutomationRunQueryError for transport failures.
 */
export interface AutomationRunSource {
    runsFor(changerLogin: string, window?: RunWindow): Promise<AutomationRun[]>;
    runUrl(run: AutomationRun): string;
}

export interface AutomationRunCorrelatorOptions {
    /** Terraform instance, e.g. https://app.terraform.io */
    readonly baseUrl: string;
    readonly serviceWorkspaceMap: Readonly<Record<string, WorkspaceMapping>>;
    /** Builds an API client bound to one organization's token. */
    readonly clientFor: (organization: string) => TerraformApi;
    readonly defaultWindowMinutes: number;
    readonly runLimit?: number;
}

export class AutomationRunCorrelator implements AutomationRunSource {
    public readonly baseUrl: string;
    private readonly runLimit: number;

    constructor(private readonly options: AutomationRunCorrelatorOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.runLimit = options.runLimit ?? DEFAULT_RUN_LIMIT;
    }

    /**
     * Recent applied/errored runs of every workspace mapped to the login.
     * A workspace lookup failure aborts the whole lookup.
     */
    public async runsFor(changerLogin: string, window: RunWindow = {}): Promise<AutomationRun[]> {
        const mapping = Object.prototype.hasOwnProperty.call(this.options.serviceWorkspaceMap, changerLogin)
            ? this.options.serviceWorkspaceMap[changerLogin]
            : undefined;
        if (!mapping) {
            throw new UnknownChangerError(changerLogin);
        }

        const api = this.options.clientFor(mapping.org);
        logger.info({ changerLogin, org: mapping.org, runLimit: this.runLimit }, 'Getting recent runs for changer workspaces');

        const runs: AutomationRun[] = [];
        for (const workspace of mapping.workspace) {
            let workspaceId: string;
            try {
                workspaceId = await api.showWorkspace(mapping.org, workspace);
            } catch (error: unknown) {
                throw new AutomationRunQueryError(`Issue getting workspace ID for workspace '${workspace}'`, { cause: error });
            }

            try {
                const response = await api.listRuns(workspaceId, this.runLimit);
                runs.push(...parseRuns(response, mapping.org, workspace));
            } catch (error: unknown) {
                throw new AutomationRunQueryError(`Issue getting runs for workspace '${workspace}'`, { cause: error });
            }
        }

        const since = windowStart(
            window.referenceTime ?? utcNow(),
            window.windowMinutes ?? this.options.defaultWindowMinutes
        );
        return filterRelevantRuns(runs, since);
    }

    public runUrl(run: AutomationRun): string {
        return `${this.baseUrl}/app/${run.organization}/workspaces/${run.workspace}/runs/${run.runId ?? ''}`;
    }
}

/**
 * Client factory that authenticates each organization with its own token.
 */
export function tokenClientFactory(baseUrl: string, tokens: OrgTokenMap): (organization: string) => TerraformApi {
    return (organization: string) => {
        const token = Object.prototype.hasOwnProperty.call(tokens, organization) ? tokens[organization] : undefined;
        if (!token) {
            throw new AutomationRunQueryError(`No API token configured for organization '${organization}'`);
        }
        return new TerraformHttpClient(baseUrl, token);
    };
}
