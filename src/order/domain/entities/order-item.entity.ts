import { Exclude } from 'class-transformer';
import {
  Column,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { ErrorCode, ValidationException } from '@common/exception';
import { Item } from '@/item/domain/entities/item.entity';
import { Order } from './order.entity';

/**
 * OrderItem Entity
 * 주문 시점의 가격(orderPrice)과 수량을 보관한다.
 */
@Entity('order_item')
export class OrderItem {
  @PrimaryGeneratedColumn({ name: 'order_item_id' })
  id!: number;

  // FK 값만 필요한 배치 로딩에서 연관 엔티티를 초기화하지 않고 사용한다
  @Column({ name: 'item_id', type: 'int' })
  itemId!: number;

  @ManyToOne(() => Item, { nullable: false })
  @JoinColumn({ name: 'item_id' })
  item!: Item;

  @Column({ name: 'order_id', type: 'int' })
  orderId!: number;

  @Exclude()
  @ManyToOne(() => Order, (order) => order.orderItems, { nullable: false })
  @JoinColumn({ name: 'order_id' })
  order!: Order;

  @Column({ name: 'order_price', type: 'int' })
  orderPrice!: number;

  @Column({ type: 'int' })
  count!: number;

  /**
   * ANCHOR 주문 상품 생성 (재고 차감)
   */
  static createOrderItem(item: Item, orderPrice: number, count: number): OrderItem {
    if (!Number.isInteger(count) || count <= 0) {
      throw new ValidationException(ErrorCode.INVALID_QUANTITY);
    }
    if (!Number.isInteger(orderPrice) || orderPrice < 0) {
      throw new ValidationException(ErrorCode.INVALID_PRICE);
    }

    const orderItem = new OrderItem();
    orderItem.item = item;
    orderItem.itemId = item.id;
    orderItem.orderPrice = orderPrice;
    orderItem.count = count;

    item.removeStock(count);
    return orderItem;
  }

  /**
   * ANCHOR 주문 취소 시 재고 원복
   */
  cancel(): void {
    this.item.addStock(this.count);
  }

  /**
   * ANCHOR 주문 상품 가격 조회
   */
  getTotalPrice(): number {
    return this.orderPrice * this.count;
  }
}
