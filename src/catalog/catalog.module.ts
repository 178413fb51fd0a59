import { Module } from '@nestjs/common';
import { ArkhamdbModule } from '../arkhamdb/arkhamdb.module';
import { CatalogController } from './catalog.controller';
import { CatalogService } from './catalog.service';

@Module({
  imports: [ArkhamdbModule],
  controllers: [CatalogController],
  providers: [CatalogService],
  exports: [CatalogService],
})
export class CatalogModule {}
