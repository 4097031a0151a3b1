import { Injectable } from '@nestjs/common';
import { Repo } from '../../models/repo.model';
import { RepoRecord, fromRecord, toRecord } from '../../models/repo.serializer';
import { RepoExistsError, RepoNotFoundError } from '../../services/repo.errors';
import { RepoStore } from './repo-store.interface';

/**
 * Keeps persisted records in process memory. Records are copied in and out,
 * so callers never share an instance with the store.
 */
@Injectable()
export class InMemoryRepoStore implements RepoStore {
    private readonly records = new Map<number, RepoRecord>();
    private nextId = 1;

    async insert(repo: Repo): Promise<Repo> {
        if (this.recordBySlug(repo.slug)) {
            throw new RepoExistsError(repo.slug);
        }
        const now = new Date().toISOString();
        const record: RepoRecord = { ...toRecord(repo), id: this.nextId++, created: now, updated: now };
        this.records.set(record.id, record);
        return fromRecord(record);
    }

    async findById(id: number): Promise<Repo | null> {
        const record = this.records.get(id);
        return record ? fromRecord(record) : null;
    }

    async findBySlug(slug: string): Promise<Repo | null> {
        const record = this.recordBySlug(slug);
        return record ? fromRecord(record) : null;
    }

    async listByUser(userId: string): Promise<Repo[]> {
        return Array.from(this.records.values())
            .filter((record) => record.user_id === userId)
            .sort((a, b) => a.id - b.id)
            .map((record) => fromRecord(record));
    }

    async update(repo: Repo): Promise<Repo> {
        const existing = this.records.get(repo.id);
        if (!existing) throw new RepoNotFoundError(repo.id);

        const record: RepoRecord = {
            ...toRecord(repo),
            created: existing.created,
            updated: new Date().toISOString(),
        };
        this.records.set(record.id, record);
        return fromRecord(record);
    }

    private recordBySlug(slug: string): RepoRecord | undefined {
        for (const record of this.records.values()) {
            if (record.slug === slug) return record;
        }
        return undefined;
    }
}
