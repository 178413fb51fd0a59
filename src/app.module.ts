import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration from './config/configuration';
import { validationSchema } from './config/validation';
import { ArkhamdbModule } from './arkhamdb/arkhamdb.module';
import { CardsModule } from './cards/cards.module';
import { CatalogModule } from './catalog/catalog.module';
import { DecksModule } from './decks/decks.module';
import { LookupModule } from './lookup/lookup.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      validationSchema,
    }),
    ArkhamdbModule,
    CatalogModule,
    CardsModule,
    DecksModule,
    LookupModule,
  ],
})
export class AppModule {}
