import { Logger, PipeTransform } from '@nestjs/common';
import { ValidationError } from '../../common/errors/validation.error';
import { BookShapeName } from '../schemas/book-shapes';
import { BookRecord, constructAndValidate, RecordValidationOptions } from '../schemas/record-validator';

/**
 * Validates a request value against one book shape. Failures surface as a
 * 400 with every violation message, the same body `ValidationPipe` sends.
 *
 * Usage: `@Body(new BookRecordPipe('book-create')) body: BookCreateDto`, or
 * `BookSchemaService.pipeFor` to pick up the configured options.
 */
export class BookRecordPipe<N extends BookShapeName> implements PipeTransform<unknown, BookRecord<N>> {
  private readonly logger = new Logger(BookRecordPipe.name);

  constructor(
    private readonly shape: N,
    private readonly options: RecordValidationOptions = {},
  ) {}

  transform(value: unknown): BookRecord<N> {
    try {
      const record = constructAndValidate(this.shape, value, this.options);
      this.logger.debug(`Accepted ${this.shape} payload`);
      return record;
    } catch (error) {
      if (error instanceof ValidationError) {
        this.logger.warn(`Rejected ${this.shape} payload (fields: ${error.fields.join(', ')})`);
        throw error.toBadRequest();
      }
      throw error;
    }
  }
}
