import { ChildEntity, Column } from 'typeorm';
import { Item, ItemSpec, ItemType } from './item.entity';

@ChildEntity('A')
export class Album extends Item {
  @Column({ type: 'varchar', length: 100, nullable: true })
  artist!: string | null;

  @Column({ type: 'varchar', length: 200, nullable: true })
  etc!: string | null;

  get itemType(): ItemType {
    return 'A';
  }

  static create(
    spec: ItemSpec & { artist?: string | null; etc?: string | null },
  ): Album {
    const album = new Album();
    album.applySpec(spec);
    album.artist = spec.artist ?? null;
    album.etc = spec.etc ?? null;
    return album;
  }
}
