export enum Host {
    GitHub = 'github.com',
    Bitbucket = 'bitbucket.org',
    GoogleCode = 'code.google.com',
    Custom = 'custom',
}

export enum Scm {
    Git = 'git',
    Hg = 'hg',
    Svn = 'svn',
}

export enum DefaultBranch {
    Git = 'master',
    Hg = 'default',
    Svn = 'trunk',
}

export enum Visibility {
    Public = 'public',
    Private = 'private',
}

/**
 * Canonical `host/owner/name` identifier. Parts are used verbatim.
 */
export function repoSlug(host: string, owner: string, name: string): string {
    return `${host}/${owner}/${name}`;
}

/**
 * Conventional default branch for an SCM kind. Kinds outside the known set
 * get the git default.
 */
export function resolveDefaultBranch(kind: string): DefaultBranch {
    switch (kind) {
        case Scm.Git:
            return DefaultBranch.Git;
        case Scm.Hg:
            return DefaultBranch.Hg;
        case Scm.Svn:
            return DefaultBranch.Svn;
        default:
            return DefaultBranch.Git;
    }
}

export interface RepoInit {
    id?: number;
    host: Host;
    owner: string;
    name: string;
    isPrivate?: boolean;
    disabled?: boolean;
    disabledPullRequest?: boolean;
    scm: Scm;
    url: string;
    username?: string;
    password?: string;
    publicKey: string;
    privateKey: string;
    params?: Record<string, string>;
    timeout: number;
    privileged?: boolean;
    userId?: string | null;
    teamId?: string | null;
    created?: Date;
    updated?: Date;
}

export class Repo {
    id: number;

    // e.g. github.com/octocat/hello-world
    readonly slug: string;
    readonly host: Host;
    readonly owner: string;
    readonly name: string;

    readonly isPrivate: boolean;

    /** No builds are executed while set. */
    disabled: boolean;
    /** No pull request builds are executed while set. */
    disabledPullRequest: boolean;

    readonly scm: Scm;
    readonly url: string;

    readonly username: string;
    readonly password: string;

    // Injected into build environments as .ssh/id_rsa.pub and .ssh/id_rsa.
    readonly publicKey: string;
    readonly privateKey: string;

    params: Record<string, string>;

    /** Seconds a build may run before it is killed. */
    timeout: number;
    readonly privileged: boolean;

    readonly userId: string | null;
    readonly teamId: string | null;

    created: Date;
    updated: Date;

    constructor(init: RepoInit) {
        const now = new Date();
        this.id = init.id ?? 0;
        this.host = init.host;
        this.owner = init.owner;
        this.name = init.name;
        this.slug = repoSlug(init.host, init.owner, init.name);
        this.isPrivate = init.isPrivate ?? false;
        this.disabled = init.disabled ?? false;
        this.disabledPullRequest = init.disabledPullRequest ?? false;
        this.scm = init.scm;
        this.url = init.url;
        this.username = init.username ?? '';
        this.password = init.password ?? '';
        this.publicKey = init.publicKey;
        this.privateKey = init.privateKey;
        this.params = { ...init.params };
        this.timeout = init.timeout;
        this.privileged = init.privileged ?? false;
        this.userId = init.userId ?? null;
        this.teamId = init.teamId ?? null;
        this.created = init.created ?? now;
        this.updated = init.updated ?? now;
    }

    defaultBranch(): DefaultBranch {
        return resolveDefaultBranch(this.scm);
    }
}
