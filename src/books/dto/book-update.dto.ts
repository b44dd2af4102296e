import { IsInt, IsString, Min } from 'class-validator';
import { Transform } from 'class-transformer';
import { toInteger } from '../../common/transforms/coerce';
import { IsSafeInteger, Required } from './field-rules';

// Neither the id nor the publication date can be changed by an update.
export class BookUpdateDto {
  @Required()
  @IsString()
  readonly title!: string;

  @Required()
  @IsString()
  readonly author!: string;

  @Required()
  @IsString()
  readonly publisher!: string;

  @Required()
  @Transform(({ value }) => toInteger(value), { toClassOnly: true })
  @IsInt()
  @IsSafeInteger()
  @Min(0)
  readonly page_count!: number;

  @Required()
  @IsString()
  readonly language!: string;
}
