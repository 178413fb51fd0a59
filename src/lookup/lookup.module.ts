import { Module } from '@nestjs/common';
import { ArkhamdbModule } from '../arkhamdb/arkhamdb.module';
import { CardsModule } from '../cards/cards.module';
import { DecksModule } from '../decks/decks.module';
import { LookupController } from './lookup.controller';
import { LookupService } from './lookup.service';

@Module({
  imports: [ArkhamdbModule, CardsModule, DecksModule],
  controllers: [LookupController],
  providers: [LookupService],
  exports: [LookupService],
})
export class LookupModule {}
