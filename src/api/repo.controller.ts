import {
    Body,
    ConflictException,
    Controller,
    Get,
    HttpCode,
    HttpStatus,
    Logger,
    NotFoundException,
    Param,
    ParseIntPipe,
    Patch,
    Post,
    Req,
    ServiceUnavailableException,
    UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import type { Request } from 'express';
import type { AuthUser } from '../auth/jwt.strategy';
import { DefaultBranch, Scm } from '../models/repo.model';
import { RepoView, toApiView } from '../models/repo.serializer';
import { KeyGenerationError, RepoExistsError, RepoNotFoundError } from '../services/repo.errors';
import { RepoService } from '../services/repo.service';
import { CreateRepoInput, createRepoSchema, UpdateRepoInput, updateRepoSchema } from './repo.dto';
import { ZodValidationPipe } from './zod-validation.pipe';

export interface AuthenticatedRequest extends Request {
    user: AuthUser;
}

@Controller('api/repos')
@UseGuards(AuthGuard('jwt'))
export class RepoController {
    private readonly logger = new Logger(RepoController.name);

    constructor(private repoService: RepoService) { }

    @Post()
    @HttpCode(HttpStatus.CREATED)
    async createRepo(
        @Req() req: AuthenticatedRequest,
        @Body(new ZodValidationPipe(createRepoSchema)) body: CreateRepoInput,
    ): Promise<RepoView> {
        try {
            const repo = await this.repoService.create(req.user.userId, body);
            return toApiView(repo);
        } catch (e: unknown) {
            if (e instanceof KeyGenerationError) {
                this.logger.error(`Could not create ${body.host}/${body.owner}/${body.name}: ${e.message}`);
                throw new ServiceUnavailableException('Deploy key generation failed, retry later');
            }
            if (e instanceof RepoExistsError) {
                throw new ConflictException(e.message);
            }
            throw e;
        }
    }

    @Get()
    async getRepos(@Req() req: AuthenticatedRequest): Promise<RepoView[]> {
        const repos = await this.repoService.list(req.user.userId);
        return repos.map((repo) => toApiView(repo));
    }

    @Get(':id')
    async getRepo(@Req() req: AuthenticatedRequest, @Param('id', ParseIntPipe) id: number): Promise<RepoView> {
        const repo = await this.withRepo(() => this.repoService.get(req.user.userId, id));
        return toApiView(repo);
    }

    /**
     * Update the build gating flags, timeout or parameters.
     */
    @Patch(':id')
    async updateRepo(
        @Req() req: AuthenticatedRequest,
        @Param('id', ParseIntPipe) id: number,
        @Body(new ZodValidationPipe(updateRepoSchema)) body: UpdateRepoInput,
    ): Promise<RepoView> {
        const repo = await this.withRepo(() => this.repoService.update(req.user.userId, id, body));
        return toApiView(repo);
    }

    /**
     * Public half of the deploy key, to be registered with the host.
     */
    @Get(':id/key')
    async getKey(
        @Req() req: AuthenticatedRequest,
        @Param('id', ParseIntPipe) id: number,
    ): Promise<{ public_key: string; fingerprint: string }> {
        const key = await this.withRepo(() => this.repoService.getKey(req.user.userId, id));
        return { public_key: key.publicKey, fingerprint: key.fingerprint };
    }

    @Get(':id/branch')
    async getDefaultBranch(
        @Req() req: AuthenticatedRequest,
        @Param('id', ParseIntPipe) id: number,
    ): Promise<{ scm: Scm; branch: DefaultBranch }> {
        return this.withRepo(() => this.repoService.defaultBranch(req.user.userId, id));
    }

    private async withRepo<T>(fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (e: unknown) {
            if (e instanceof RepoNotFoundError) throw new NotFoundException(e.message);
            throw e;
        }
    }
}
