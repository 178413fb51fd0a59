import { Module } from '@nestjs/common';
import { ArkhamdbModule } from '../arkhamdb/arkhamdb.module';
import { DeckComposerService } from './deck-composer.service';

@Module({
  imports: [ArkhamdbModule],
  providers: [DeckComposerService],
  exports: [DeckComposerService],
})
export class DecksModule {}
