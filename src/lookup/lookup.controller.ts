import { Body, Controller, Get, HttpCode, NotFoundException, Param, Post } from '@nestjs/common';
import { CardSummary, LookupResponse } from '@shared/contracts/lookup';
import { CardCatalogRepository } from '../arkhamdb/repositories/card-catalog.repository';
import { toCardSummary } from '../cards/card-summary';
import { LookupDto } from './dto/lookup.dto';
import { SearchCardsDto } from './dto/search-cards.dto';
import { LookupService } from './lookup.service';

@Controller()
export class LookupController {
  constructor(
    private readonly lookupService: LookupService,
    private readonly catalog: CardCatalogRepository,
  ) {}

  @Post('lookup')
  @HttpCode(200)
  async lookup(@Body() dto: LookupDto): Promise<LookupResponse> {
    return this.lookupService.lookup(dto.content);
  }

  @Post('cards/search')
  @HttpCode(200)
  searchCards(@Body() dto: SearchCardsDto): CardSummary[] {
    return this.lookupService.searchCards(dto.queries);
  }

  @Get('cards/:code')
  getCard(@Param('code') code: string): CardSummary {
    const card = this.catalog.findByCode(code);
    if (!card) {
      throw new NotFoundException(`Card ${code} is not in the catalog`);
    }
    return toCardSummary(card);
  }
}
