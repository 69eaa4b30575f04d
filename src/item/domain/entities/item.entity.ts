import { Exclude } from 'class-transformer';
import {
  Column,
  Entity,
  ManyToMany,
  PrimaryGeneratedColumn,
  TableInheritance,
} from 'typeorm';
import { ErrorCode, DomainException, ValidationException } from '@common/exception';
import { Category } from './category.entity';

export interface ItemSpec {
  name: string;
  price: number;
  stockQuantity: number;
}

/**
 * Item Entity
 * 단일 테이블 전략. 하위 타입(Book, Album, Movie)은 dtype 컬럼으로 구분한다.
 */
@Entity('item')
@TableInheritance({
  column: { type: 'varchar', name: 'dtype', length: 1 },
})
export abstract class Item {
  @PrimaryGeneratedColumn({ name: 'item_id' })
  id!: number;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ type: 'int' })
  price!: number;

  @Column({ name: 'stock_quantity', type: 'int' })
  stockQuantity!: number;

  @Exclude()
  @ManyToMany(() => Category, (category) => category.items)
  categories!: Category[];

  /**
   * 하위 타입 구분값 (B: 도서, A: 음반, M: 영화)
   */
  abstract get itemType(): ItemType;

  protected applySpec(spec: ItemSpec): void {
    Item.validateSpec(spec);
    this.name = spec.name;
    this.price = spec.price;
    this.stockQuantity = spec.stockQuantity;
  }

  /**
   * ANCHOR 기본 정보 변경 (변경 감지 대상)
   */
  change(spec: ItemSpec): void {
    this.applySpec(spec);
  }

  /**
   * ANCHOR 재고 증가
   */
  addStock(quantity: number): void {
    Item.validateQuantity(quantity);
    this.stockQuantity += quantity;
  }

  /**
   * ANCHOR 재고 감소
   */
  removeStock(quantity: number): void {
    Item.validateQuantity(quantity);
    const restStock = this.stockQuantity - quantity;
    if (restStock < 0) {
      throw new DomainException(ErrorCode.NOT_ENOUGH_STOCK);
    }
    this.stockQuantity = restStock;
  }

  private static validateSpec(spec: ItemSpec): void {
    if (!Number.isInteger(spec.price) || spec.price < 0) {
      throw new ValidationException(ErrorCode.INVALID_PRICE);
    }
    if (!Number.isInteger(spec.stockQuantity) || spec.stockQuantity < 0) {
      throw new ValidationException(ErrorCode.INVALID_STOCK_QUANTITY);
    }
  }

  private static validateQuantity(quantity: number): void {
    if (!Number.isInteger(quantity) || quantity <= 0) {
      throw new ValidationException(ErrorCode.INVALID_STOCK_QUANTITY);
    }
  }
}

export type ItemType = 'B' | 'A' | 'M';
