import { ChildEntity, Column } from 'typeorm';
import { Item, ItemSpec, ItemType } from './item.entity';

@ChildEntity('M')
export class Movie extends Item {
  @Column({ type: 'varchar', length: 100, nullable: true })
  director!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  actor!: string | null;

  get itemType(): ItemType {
    return 'M';
  }

  static create(
    spec: ItemSpec & { director?: string | null; actor?: string | null },
  ): Movie {
    const movie = new Movie();
    movie.applySpec(spec);
    movie.director = spec.director ?? null;
    movie.actor = spec.actor ?? null;
    return movie;
  }
}
