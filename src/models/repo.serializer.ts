import { z } from 'zod';
import { Host, Repo, Scm } from './repo.model';

/**
 * Persisted form. Carries credentials, so it must stay behind the store.
 */
export const repoRecordSchema = z.object({
    id: z.number().int().nonnegative(),
    slug: z.string(),
    host: z.nativeEnum(Host),
    owner: z.string().min(1),
    name: z.string().min(1),
    private: z.boolean(),
    disabled: z.boolean(),
    disabled_pr: z.boolean(),
    scm: z.nativeEnum(Scm),
    url: z.string(),
    username: z.string(),
    password: z.string(),
    public_key: z.string(),
    private_key: z.string(),
    params: z.record(z.string()),
    timeout: z.number().int(),
    priveleged: z.boolean(),
    user_id: z.string().nullable(),
    team_id: z.string().nullable(),
    created: z.string().datetime(),
    updated: z.string().datetime(),
});

export type RepoRecord = z.infer<typeof repoRecordSchema>;

/** API-facing form: no username, password, private key or params. */
export type RepoView = Omit<RepoRecord, 'username' | 'password' | 'private_key' | 'params'>;

export function toRecord(repo: Repo): RepoRecord {
    return {
        id: repo.id,
        slug: repo.slug,
        host: repo.host,
        owner: repo.owner,
        name: repo.name,
        private: repo.isPrivate,
        disabled: repo.disabled,
        disabled_pr: repo.disabledPullRequest,
        scm: repo.scm,
        url: repo.url,
        username: repo.username,
        password: repo.password,
        public_key: repo.publicKey,
        private_key: repo.privateKey,
        params: { ...repo.params },
        timeout: repo.timeout,
        priveleged: repo.privileged,
        user_id: repo.userId,
        team_id: repo.teamId,
        created: repo.created.toISOString(),
        updated: repo.updated.toISOString(),
    };
}

export function fromRecord(input: unknown): Repo {
    const record = repoRecordSchema.parse(input);
    const repo = new Repo({
        id: record.id,
        host: record.host,
        owner: record.owner,
        name: record.name,
        isPrivate: record.private,
        disabled: record.disabled,
        disabledPullRequest: record.disabled_pr,
        scm: record.scm,
        url: record.url,
        username: record.username,
        password: record.password,
        publicKey: record.public_key,
        privateKey: record.private_key,
        params: record.params,
        timeout: record.timeout,
        privileged: record.priveleged,
        userId: record.user_id,
        teamId: record.team_id,
        created: new Date(record.created),
        updated: new Date(record.updated),
    });
    if (repo.slug !== record.slug) {
        throw new Error(`Stored slug ${record.slug} does not match ${repo.slug}`);
    }
    return repo;
}

export function toApiView(repo: Repo): RepoView {
    const { username, password, private_key, params, ...view } = toRecord(repo);
    return view;
}
