/**
 * Raised when a deploy key pair cannot be produced. Usually transient
 * (entropy), so callers may retry the whole creation.
 */
export class KeyGenerationError extends Error {
    readonly cause: unknown;

    constructor(message: string, cause?: unknown) {
        super(message);
        this.name = 'KeyGenerationError';
        this.cause = cause;
    }
}

export class RepoExistsError extends Error {
    constructor(readonly slug: string) {
        super(`Repository ${slug} is already registered`);
        this.name = 'RepoExistsError';
    }
}

export class RepoNotFoundError extends Error {
    constructor(readonly repoId: number) {
        super(`Repository ${repoId} not found`);
        this.name = 'RepoNotFoundError';
    }
}
