import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpModule } from '@nestjs/axios';
import { ArkhamdbApiService } from './arkhamdb-api.service';
import { CardCatalogRepository } from './repositories/card-catalog.repository';

@Module({
  imports: [
    HttpModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        baseURL: configService.get<string>('arkhamdb.baseUrl'),
        timeout: configService.get<number>('arkhamdb.timeout'),
        maxRedirects: 5,
        headers: {
          Accept: 'application/json',
          'User-Agent': configService.get<string>('arkhamdb.userAgent') ?? 'ArkhamdbLookup/1.0',
        },
      }),
    }),
  ],
  providers: [ArkhamdbApiService, CardCatalogRepository],
  exports: [ArkhamdbApiService, CardCatalogRepository],
})
export class ArkhamdbModule {}
