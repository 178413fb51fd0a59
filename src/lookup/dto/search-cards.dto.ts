import { ArrayMaxSize, ArrayMinSize, IsArray, IsString, MaxLength } from 'class-validator';
import { SearchCardsRequest } from '@shared/contracts/lookup';

export class SearchCardsDto implements SearchCardsRequest {
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(20)
  @IsString({ each: true })
  @MaxLength(200, { each: true })
  queries!: string[];
}
