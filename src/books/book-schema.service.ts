import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { normalizeBoolean } from '../common/config/normalize-boolean';
import { ValidationError } from '../common/errors/validation.error';
import { BookRecordPipe } from './pipes/book-record.pipe';
import { BookShapeName } from './schemas/book-shapes';
import {
  BookRecord,
  constructAndValidate,
  RecordValidationOptions,
  serializeRecord,
} from './schemas/record-validator';

@Injectable()
export class BookSchemaService {
  private readonly logger = new Logger(BookSchemaService.name);
  private readonly options: Readonly<RecordValidationOptions>;

  constructor(private readonly configService: ConfigService) {
    this.options = Object.freeze({
      forbidUnknownFields: this.readFlag('BOOK_SCHEMA_FORBID_UNKNOWN_FIELDS'),
      strictIsbn: this.readFlag('BOOK_SCHEMA_STRICT_ISBN'),
    });

    this.logger.log(
      `Book schemas ready (forbidUnknownFields=${this.options.forbidUnknownFields}, strictIsbn=${this.options.strictIsbn})`,
    );
  }

  get validationOptions(): Readonly<RecordValidationOptions> {
    return this.options;
  }

  parse<N extends BookShapeName>(shape: N, raw: unknown): BookRecord<N> {
    try {
      const record = constructAndValidate(shape, raw, this.options);
      this.logger.debug(`Accepted ${shape} payload`);
      return record;
    } catch (error) {
      if (error instanceof ValidationError) {
        this.logger.warn(`Rejected ${shape} payload (fields: ${error.fields.join(', ')})`);
      }
      throw error;
    }
  }

  parseBook(raw: unknown): BookRecord<'book'> {
    return this.parse('book', raw);
  }

  parseBookUpdate(raw: unknown): BookRecord<'book-update'> {
    return this.parse('book-update', raw);
  }

  parseBookCreate(raw: unknown): BookRecord<'book-create'> {
    return this.parse('book-create', raw);
  }

  serialize(record: object): Record<string, unknown> {
    return serializeRecord(record);
  }

  pipeFor<N extends BookShapeName>(shape: N): BookRecordPipe<N> {
    return new BookRecordPipe(shape, this.options);
  }

  private readFlag(key: string): boolean {
    const raw = this.configService.get<string | boolean>(key);
    if (raw === undefined || raw === '') {
      return false;
    }

    const flag = normalizeBoolean(raw);
    if (flag === undefined) {
      this.logger.warn(`Ignoring ${key}=${String(raw)}: expected a boolean, using false.`);
      return false;
    }

    return flag;
  }
}
