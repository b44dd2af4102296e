import type { ClassConstructor } from 'class-transformer';
import { BookDto } from '../dto/book.dto';
import { BookCreateDto, BookCreateStrictIsbnDto } from '../dto/book-create.dto';
import { BookUpdateDto } from '../dto/book-update.dto';

export interface BookShapeRecords {
  book: BookDto;
  'book-update': BookUpdateDto;
  'book-create': BookCreateDto;
}

export type BookShapeName = keyof BookShapeRecords;

type ShapeTable = { [N in BookShapeName]: ClassConstructor<BookShapeRecords[N]> };

export const BOOK_SHAPES: ShapeTable = {
  book: BookDto,
  'book-update': BookUpdateDto,
  'book-create': BookCreateDto,
};

const STRICT_ISBN_SHAPES: ShapeTable = {
  ...BOOK_SHAPES,
  'book-create': BookCreateStrictIsbnDto,
};

export function isBookShapeName(name: string): name is BookShapeName {
  return Object.prototype.hasOwnProperty.call(BOOK_SHAPES, name);
}

export function shapeClassFor<N extends BookShapeName>(
  name: N,
  strictIsbn = false,
): ClassConstructor<BookShapeRecords[N]> {
  return (strictIsbn ? STRICT_ISBN_SHAPES : BOOK_SHAPES)[name];
}
