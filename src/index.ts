import 'reflect-metadata';

export { BookSchemasModule } from './books/book-schemas.module';
export { BookSchemaService } from './books/book-schema.service';
export { BookRecordPipe } from './books/pipes/book-record.pipe';
export { BookDto } from './books/dto/book.dto';
export { BookUpdateDto } from './books/dto/book-update.dto';
export { BookCreateDto, BookCreateStrictIsbnDto } from './books/dto/book-create.dto';
export { BOOK_SHAPES, isBookShapeName, shapeClassFor } from './books/schemas/book-shapes';
export type { BookShapeName, BookShapeRecords } from './books/schemas/book-shapes';
export { constructAndValidate, serializeRecord } from './books/schemas/record-validator';
export type { BookRecord, RecordValidationOptions } from './books/schemas/record-validator';
export { ValidationError } from './common/errors/validation.error';
export type { FieldViolation, ViolationKind } from './common/errors/validation.error';
