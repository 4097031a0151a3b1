import { Module } from '@nestjs/common';
import { RepoController } from './api/repo.controller';
import { AuthModule } from './auth/auth.module';
import { ConfigModule } from './config/config.module';
import { InMemoryRepoStore } from './integrations/store/in-memory-repo.store';
import { REPO_STORE } from './integrations/store/repo-store.interface';
import { KeyProvisionerService } from './services/key-provisioner.service';
import { RepoFactoryService } from './services/repo-factory.service';
import { RepoService } from './services/repo.service';

@Module({
  imports: [ConfigModule, AuthModule],
  controllers: [RepoController],
  providers: [
    KeyProvisionerService,
    RepoFactoryService,
    RepoService,
    { provide: REPO_STORE, useClass: InMemoryRepoStore },
  ],
})
export class AppModule { }
