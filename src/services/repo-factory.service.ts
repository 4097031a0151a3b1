import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { Host, Repo, Scm, repoSlug } from '../models/repo.model';
import { KeyProvisionerService } from './key-provisioner.service';
import { cloneUrl, TemplatedHost } from './clone-url.builder';

export interface RepoOptions {
    isPrivate?: boolean;
    username?: string;
    password?: string;
    params?: Record<string, string>;
    timeout?: number;
    privileged?: boolean;
    userId?: string | null;
    teamId?: string | null;
}

interface HostStrategy {
    host: Host;
    scm: Scm;
}

const HOST_STRATEGIES: Record<TemplatedHost, HostStrategy> = {
    [Host.GitHub]: { host: Host.GitHub, scm: Scm.Git },
    [Host.Bitbucket]: { host: Host.Bitbucket, scm: Scm.Git },
};

@Injectable()
export class RepoFactoryService {
    private readonly logger = new Logger(RepoFactoryService.name);

    constructor(
        private keyProvisioner: KeyProvisionerService,
        @Inject(APP_CONFIG) private readonly config: AppConfig,
    ) { }

    /**
     * Build a repository with a freshly provisioned key pair. Throws
     * KeyGenerationError without returning anything if provisioning fails.
     */
    newRepo(host: Host, owner: string, name: string, scm: Scm, url: string, options: RepoOptions = {}): Repo {
        const slug = repoSlug(host, owner, name);
        const keys = this.keyProvisioner.generate(slug);

        this.logger.log(`Created ${scm} repository ${slug}`);
        return new Repo({
            host,
            owner,
            name,
            scm,
            url,
            isPrivate: options.isPrivate,
            username: options.username,
            password: options.password,
            publicKey: keys.publicKey,
            privateKey: keys.privateKey,
            params: options.params,
            timeout: options.timeout ?? this.config.defaultTimeout,
            privileged: options.privileged,
            userId: options.userId,
            teamId: options.teamId,
        });
    }

    newHostedRepo(host: TemplatedHost, owner: string, name: string, isPrivate: boolean, options: RepoOptions = {}): Repo {
        const strategy = HOST_STRATEGIES[host];
        const url = cloneUrl(host, owner, name, isPrivate);
        return this.newRepo(strategy.host, owner, name, strategy.scm, url, { ...options, isPrivate });
    }

    newGitHubRepo(owner: string, name: string, isPrivate: boolean): Repo {
        return this.newHostedRepo(Host.GitHub, owner, name, isPrivate);
    }

    newBitbucketRepo(owner: string, name: string, isPrivate: boolean): Repo {
        return this.newHostedRepo(Host.Bitbucket, owner, name, isPrivate);
    }
}
