import { IsDate, IsInt, IsString, Min } from 'class-validator';
import { Transform } from 'class-transformer';
import { toDateTime, toInteger, toIsoString } from '../../common/transforms/coerce';
import { IsSafeInteger, Required } from './field-rules';

/** Read representation of a book. `id` is assigned by the owning store. */
export class BookDto {
  @Required()
  @Transform(({ value }) => toInteger(value), { toClassOnly: true })
  @IsInt()
  @IsSafeInteger()
  readonly id!: number;

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
  @Transform(({ value }) => toDateTime(value), { toClassOnly: true })
  @Transform(({ value }) => toIsoString(value), { toPlainOnly: true })
  @IsDate({ message: '$property must be a valid date-time' })
  readonly published_date!: Date;

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
