import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { BookSchemaService } from './book-schema.service';

@Module({
  imports: [ConfigModule],
  providers: [BookSchemaService],
  exports: [BookSchemaService],
})
export class BookSchemasModule {}
