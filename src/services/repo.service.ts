import { Inject, Injectable, Logger } from '@nestjs/common';
import * as sshpk from 'sshpk';
import type { CreateRepoInput, UpdateRepoInput } from '../api/repo.dto';
import { DefaultBranch, Repo, Scm, repoSlug } from '../models/repo.model';
import { REPO_STORE } from '../integrations/store/repo-store.interface';
import type { RepoStore } from '../integrations/store/repo-store.interface';
import { hasCloneUrlTemplate } from './clone-url.builder';
import { RepoFactoryService, RepoOptions } from './repo-factory.service';
import { RepoExistsError, RepoNotFoundError } from './repo.errors';

@Injectable()
export class RepoService {
    private readonly logger = new Logger(RepoService.name);

    constructor(
        private repoFactory: RepoFactoryService,
        @Inject(REPO_STORE) private store: RepoStore,
    ) { }

    async create(userId: string, input: CreateRepoInput): Promise<Repo> {
        // Before key generation. insert() still rejects a racing duplicate.
        const slug = repoSlug(input.host, input.owner, input.name);
        if (await this.store.findBySlug(slug)) {
            throw new RepoExistsError(slug);
        }

        const options: RepoOptions = {
            username: input.username,
            password: input.password,
            params: input.params,
            timeout: input.timeout,
            privileged: input.priveleged,
            userId,
            teamId: input.team_id ?? null,
        };

        let repo: Repo;
        if (hasCloneUrlTemplate(input.host)) {
            repo = this.repoFactory.newHostedRepo(input.host, input.owner, input.name, input.private, options);
        } else if (input.url) {
            repo = this.repoFactory.newRepo(input.host, input.owner, input.name, input.scm, input.url, {
                ...options,
                isPrivate: input.private,
            });
        } else {
            throw new Error(`A clone URL is required for host ${input.host}`);
        }

        const saved = await this.store.insert(repo);
        this.logger.log(`Registered ${saved.slug} as #${saved.id} for user ${userId}`);
        return saved;
    }

    async list(userId: string): Promise<Repo[]> {
        return this.store.listByUser(userId);
    }

    /**
     * Repositories owned by someone else are reported as missing.
     */
    async get(userId: string, id: number): Promise<Repo> {
        const repo = await this.store.findById(id);
        if (!repo || repo.userId !== userId) throw new RepoNotFoundError(id);
        return repo;
    }

    async update(userId: string, id: number, patch: UpdateRepoInput): Promise<Repo> {
        const repo = await this.get(userId, id);
        if (patch.disabled !== undefined) repo.disabled = patch.disabled;
        if (patch.disabled_pr !== undefined) repo.disabledPullRequest = patch.disabled_pr;
        if (patch.timeout !== undefined) repo.timeout = patch.timeout;
        if (patch.params !== undefined) repo.params = { ...patch.params };
        return this.store.update(repo);
    }

    async getKey(userId: string, id: number): Promise<{ publicKey: string; fingerprint: string }> {
        const repo = await this.get(userId, id);
        const fingerprint = sshpk.parseKey(repo.publicKey, 'ssh').fingerprint('sha256').toString();
        return { publicKey: repo.publicKey, fingerprint };
    }

    async defaultBranch(userId: string, id: number): Promise<{ scm: Scm; branch: DefaultBranch }> {
        const repo = await this.get(userId, id);
        return { scm: repo.scm, branch: repo.defaultBranch() };
    }
}
