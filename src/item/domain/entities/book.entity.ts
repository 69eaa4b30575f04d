import { ChildEntity, Column } from 'typeorm';
import { Item, ItemSpec, ItemType } from './item.entity';

@ChildEntity('B')
export class Book extends Item {
  @Column({ type: 'varchar', length: 100, nullable: true })
  author!: string | null;

  @Column({ type: 'varchar', length: 20, nullable: true })
  isbn!: string | null;

  get itemType(): ItemType {
    return 'B';
  }

  static create(
    spec: ItemSpec & { author?: string | null; isbn?: string | null },
  ): Book {
    const book = new Book();
    book.applySpec(spec);
    book.author = spec.author ?? null;
    book.isbn = spec.isbn ?? null;
    return book;
  }
}
