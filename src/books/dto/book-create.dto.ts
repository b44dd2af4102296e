import { IsISBN, IsString } from 'class-validator';
import { Required } from './field-rules';

export class BookCreateDto {
  @Required()
  @IsString()
  readonly title!: string;

  @Required()
  @IsString()
  readonly author!: string;

  @Required()
  @IsString()
  readonly isbn!: string;

  @Required()
  @IsString()
  readonly description!: string;
}

/**
 * BookCreateDto with `isbn` checked as an ISBN-10 or ISBN-13, hyphens and
 * spaces allowed. Enabled through `BOOK_SCHEMA_STRICT_ISBN`.
 */
export class BookCreateStrictIsbnDto extends BookCreateDto {
  @IsString()
  @IsISBN()
  readonly isbn!: string;
}
