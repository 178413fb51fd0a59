import { IsString, MaxLength } from 'class-validator';
import { LookupRequest } from '@shared/contracts/lookup';

export class LookupDto implements LookupRequest {
  @IsString()
  @MaxLength(4000)
  content!: string;
}
