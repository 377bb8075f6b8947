import { execFile } from 'child_process';
import fs from 'fs/promises';
import path from 'path';
import { promisify } from 'util';
import { pino } from 'pino';
import { changeFromPath, type Change } from '../change/change.js';
import { VersionControlError, describeError } from '../errors/errors.js';
import type { VersionControl } from './versionControl.js';

const logger = pino({ name: 'GitRepository' });

const execFileAsync = promisify(execFile);

/** Diffs of large snapshot files exceed the default 1 MiB buffer. */
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/**
 * Runs `git` with the given arguments and returns stdout. Commands run in the
 * repository directory unless `cwd` says otherwise.
 */
export type GitRunner = (args: readonly string[], cwd?: string) => Promise<string>;

export function createGitRunner(directory: string): GitRunner {
    return async (args, cwd) => {
        const { stdout } = await execFileAsync('git', [...args], {
            cwd: cwd ?? directory,
            maxBuffer: MAX_OUTPUT_BYTES,
            env: { ...process.env, GIT_TERMINAL_PROMPT: '0' }
        });
        return stdout;
    };
}

export interface GitRepositoryOptions {
    readonly directory: string;
    /** Cloned into `directory` when it does not exist yet. */
    readonly remoteUrl?: string;
    readonly branch?: string;
    readonly remote?: string;
}

/**
 * Working tree holding the configuration snapshots.
 * The caller guarantees a single writer for the duration of a batch.
 */
export class GitRepository implements VersionControl {
    public readonly directory: string;
    private readonly remoteUrl: string | null;
    private readonly branch: string;
    private readonly remote: string;
    private readonly git: GitRunner;

    constructor(options: GitRepositoryOptions, git?: GitRunner) {
        this.directory = options.directory;
        this.remoteUrl = options.remoteUrl ?? null;
        this.branch = options.branch ?? 'master';
        this.remote = options.remote ?? 'origin';
        this.git = git ?? createGitRunner(options.directory);
    }

    private async run(args: readonly string[], failure: string, cwd?: string): Promise<string> {
        try {
            return await this.git(args, cwd);
        } catch (error: unknown) {
            throw new VersionControlError(failure, { cause: error });
        }
    }

    /**
     * Clones the remote when the working tree is missing, otherwise verifies it
     * and fast-forwards the branch to the remote. Local snapshot edits are kept.
     */
    public async setup(): Promise<void> {
        if (!(await directoryExists(this.directory))) {
            if (!this.remoteUrl) {
                throw new VersionControlError(`Directory '${this.directory}' does not exist and no remote URL is set`);
            }
            logger.info({ remoteUrl: this.remoteUrl, directory: this.directory }, 'Local repository not found, cloning');
            await this.run(
                ['clone', '--branch', this.branch, '--origin', this.remote, '--', this.remoteUrl, this.directory],
                `Issue cloning repository '${this.remoteUrl}'`,
                path.dirname(this.directory)
            );
            return;
        }

        logger.info({ directory: this.directory }, 'Verifying local repository');
        await this.run(['rev-parse', '--is-inside-work-tree'], `Directory '${this.directory}' is not a git repository`);
        await this.run(['fetch', this.remote], 'Issue syncing with remote');
        await this.run(['merge', '--ff-only', `${this.remote}/${this.branch}`], 'Issue syncing with remote');
    }

    /**
     * Snapshot files that are untracked or modified in the working tree.
     */
    public async detectChanges(): Promise<Change[]> {
        // -z leaves paths unquoted, NUL separated
        const output = await this.run(
            ['status', '--porcelain', '-z', '--untracked-files=all', '--no-renames'],
            'Issue reading working tree status'
        );

        const changes: Change[] = [];
        for (const record of output.split('\0')) {
            if (record.length < 4) {
                continue;
            }
            const file = record.slice(3);
            const change = changeFromPath(file);
            if (!change) {
                logger.warn({ path: file }, 'Ignoring file outside snapshot layout');
                continue;
            }
            if (!changes.some(existing => existing.equals(change))) {
                changes.push(change);
            }
        }
        return changes;
    }

    public async stagePath(path: string): Promise<void> {
        await this.run(['add', '--', path], `Issue adding file '${path}'`);
    }

    public async hasPendingDiff(path: string): Promise<boolean> {
        const output = await this.run(
            ['diff', '--cached', '--name-only', 'HEAD', '--', path],
            `Issue comparing '${path}' against HEAD`
        );
        return output.trim().length > 0;
    }

    public async commit(message: string): Promise<string> {
        await this.run(['commit', '-m', message], 'Issue committing change');
        const head = await this.run(['rev-parse', 'HEAD'], 'Issue resolving HEAD after commit');
        return head.trim();
    }

    /**
     * Patch of HEAD against its parent, or against the empty tree for a root commit.
     */
    public async diffLastCommit(): Promise<string> {
        return this.run(['show', '--format=', 'HEAD'], 'Issue reading diff of last commit');
    }

    public async commitsAhead(): Promise<number> {
        const output = await this.run(
            ['rev-list', '--count', `${this.remote}/${this.branch}..${this.branch}`],
            'Issue checking commits ahead of remote'
        );
        return parseCount(output);
    }

    public async commitCount(): Promise<number> {
        const output = await this.run(['rev-list', '--count', 'HEAD'], 'Issue counting commits');
        return parseCount(output);
    }

    public async push(): Promise<void> {
        logger.info({ remote: this.remote, branch: this.branch }, 'Pushing to remote');
        await this.run(['push', this.remote, this.branch], 'Issue pushing local changes to remote');
    }
}

function parseCount(output: string): number {
    const count = Number.parseInt(output.trim(), 10);
    if (Number.isNaN(count)) {
        throw new VersionControlError(`Unexpected commit count output '${output.trim()}'`);
    }
    return count;
}

async function directoryExists(directory: string): Promise<boolean> {
    try {
        return (await fs.stat(directory)).isDirectory();
    } catch (error: unknown) {
        logger.debug({ directory, error: describeError(error) }, 'Directory not accessible');
        return false;
    }
}
