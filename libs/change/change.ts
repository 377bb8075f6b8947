/**
 * Drifted resource snapshot awaiting attribution.
 *
 * Snapshots live at `<provider>/<resourceType>/<projectId>.yaml`. Trees written
 * before Azure support use `<resourceType>/<projectId>.yaml` and are GCP only.
 */

export const PROVIDERS = ['gcp', 'azure'] as const;

export type Provider = typeof PROVIDERS[number];

export function isProvider(value: string): value is Provider {
    return (PROVIDERS as readonly string[]).includes(value);
}

export interface ChangeIdentity {
    readonly provider: Provider;
    readonly resourceType: string;
    readonly projectId: string;
}

export class Change implements ChangeIdentity {
    /** Commit message, built by the attributor. */
    public message: string | null = null;
    /** Diff of the commit recording this change. */
    public diff: string | null = null;
    public commitId: string | null = null;
    public manual = false;
    /** Distinct changer logins, first seen first. */
    public readonly changers: string[] = [];

    constructor(
        public readonly provider: Provider,
        public readonly resourceType: string,
        public readonly projectId: string,
        private readonly legacyLayout = false
    ) { }

    get filename(): string {
        if (this.legacyLayout) {
            return `${this.resourceType}/${this.projectId}.yaml`;
        }
        return `${this.provider}/${this.resourceType}/${this.projectId}.yaml`;
    }

    /**
     * Two changes are the same when they target the same resource file,
     * whatever their message state.
     */
    equals(other: ChangeIdentity): boolean {
        return this.provider === other.provider
            && this.resourceType === other.resourceType
            && this.projectId === other.projectId;
    }

    toString(): string {
        return this.filename;
    }
}

/**
 * Builds a Change from a path relative to the repository root.
 * Returns null for paths outside the snapshot layout (README.md, dotfiles).
 */
export function changeFromPath(path: string): Change | null {
    const segments = path.split('/').filter(segment => segment.length > 0);
    const file = segments[segments.length - 1];
    if (!file || !file.endsWith('.yaml')) {
        return null;
    }
    const projectId = file.slice(0, -'.yaml'.length);
    if (projectId.length === 0) {
        return null;
    }

    if (segments.length === 3) {
        const [provider, resourceType] = segments;
        if (provider && resourceType && isProvider(provider)) {
            return new Change(provider, resourceType, projectId);
        }
        return null;
    }

    if (segments.length === 2) {
        const [resourceType] = segments;
        if (resourceType && !isProvider(resourceType)) {
            return new Change('gcp', resourceType, projectId, true);
        }
    }

    return null;
}

/**
 * Title-cases every alphabetic run: the first letter upper, the rest lower.
 * `vpnTunnels` becomes `Vpntunnels`, `private_ranges` becomes `Private_Ranges`.
 */
export function titleCase(value: string): string {
    return value.replace(/[A-Za-z]+/g, word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}
