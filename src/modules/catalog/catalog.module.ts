import { Logger, Module, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MikroOrmModule } from '@mikro-orm/nestjs';
import { CreateRequestContext, MikroORM } from '@mikro-orm/core';
import { LegalPackage } from './entities/legal-package.entity';
import { CatalogService } from './services/catalog.service';
import { CatalogController } from './controllers/catalog.controller';

@Module({
  imports: [MikroOrmModule.forFeature([LegalPackage])],
  controllers: [CatalogController],
  providers: [CatalogService],
  exports: [CatalogService],
})
export class CatalogModule implements OnApplicationBootstrap {
  private readonly logger = new Logger(CatalogModule.name);

  constructor(
    private readonly orm: MikroORM,
    private readonly configService: ConfigService,
    private readonly catalogService: CatalogService,
  ) {}

  @CreateRequestContext()
  async onApplicationBootstrap(): Promise<void> {
    if (String(this.configService.get('SEED_CATALOG', 'false')) !== 'true') {
      return;
    }
    this.logger.log('Seeding default catalog');
    await this.catalogService.seedDefaultPackages();
  }
}
