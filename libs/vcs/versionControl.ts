/**
 * Version-control operations the attributor drives. Every method may fail
 * with a VersionControlError.
 */
export interface VersionControl {
    stagePath(path: string): Promise<void>;
    /** True when the staged state of `path` differs from the last commit. */
    hasPendingDiff(path: string): Promise<boolean>;
    /** @returns the new commit id */
    commit(message: string): Promise<string>;
    diffLastCommit(): Promise<string>;
    /** Local commits not yet on the remote branch. */
    commitsAhead(): Promise<number>;
    /** Total commits reachable from HEAD. */
    commitCount(): Promise<number>;
    push(): Promise<void>;
}
