import { Controller, Get, HttpCode, Post } from '@nestjs/common';
import { CatalogStatus } from '@shared/contracts/lookup';
import { CatalogService } from './catalog.service';

@Controller('catalog')
export class CatalogController {
  constructor(private readonly catalogService: CatalogService) {}

  @Get('status')
  status(): CatalogStatus {
    return this.catalogService.status();
  }

  @Post('reload')
  @HttpCode(200)
  async reload(): Promise<CatalogStatus> {
    await this.catalogService.reload();
    return this.catalogService.status();
  }
}
