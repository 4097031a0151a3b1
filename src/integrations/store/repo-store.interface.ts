import { Repo } from '../../models/repo.model';

export const REPO_STORE = 'RepoStore';

export interface RepoStore {
    /** Assigns id and timestamps. Rejects a slug that is already registered. */
    insert(repo: Repo): Promise<Repo>;
    findById(id: number): Promise<Repo | null>;
    findBySlug(slug: string): Promise<Repo | null>;
    listByUser(userId: string): Promise<Repo[]>;
    update(repo: Repo): Promise<Repo>;
}
