import {
  Column,
  Entity,
  JoinColumn,
  JoinTable,
  ManyToMany,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { Item } from './item.entity';

/**
 * Category Entity
 * 자기 자신을 부모로 갖는 계층 구조 + 상품과 다대다
 */
@Entity('category')
export class Category {
  @PrimaryGeneratedColumn({ name: 'category_id' })
  id!: number;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @ManyToMany(() => Item, (item) => item.categories)
  @JoinTable({
    name: 'category_item',
    joinColumn: { name: 'category_id', referencedColumnName: 'id' },
    inverseJoinColumn: { name: 'item_id', referencedColumnName: 'id' },
  })
  items!: Item[];

  @ManyToOne(() => Category, (category) => category.children, {
    nullable: true,
  })
  @JoinColumn({ name: 'parent_id' })
  parent!: Category | null;

  @OneToMany(() => Category, (category) => category.parent)
  children!: Category[];

  static create(name: string): Category {
    const category = new Category();
    category.name = name;
    category.parent = null;
    category.children = [];
    category.items = [];
    return category;
  }

  /**
   * ANCHOR 연관관계 편의 메서드 (부모-자식 양쪽 설정)
   */
  addChildCategory(child: Category): void {
    this.children.push(child);
    child.parent = this;
  }

  /**
   * ANCHOR 연관관계 편의 메서드 (카테고리-상품 양쪽 설정)
   */
  addItem(item: Item): void {
    this.items.push(item);
    if (item.categories === undefined) {
      item.categories = [];
    }
    item.categories.push(this);
  }
}
