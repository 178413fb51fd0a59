import { Module } from '@nestjs/common';
import { ArkhamdbModule } from '../arkhamdb/arkhamdb.module';
import { MatchResolverService } from './match-resolver.service';

@Module({
  imports: [ArkhamdbModule],
  providers: [MatchResolverService],
  exports: [MatchResolverService],
})
export class CardsModule {}
