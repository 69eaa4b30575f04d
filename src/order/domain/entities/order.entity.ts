import {
  Column,
  Entity,
  JoinColumn,
  ManyToOne,
  OneToMany,
  OneToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { ErrorCode, DomainException } from '@common/exception';
import { Member } from '@/member/domain/entities/member.entity';
import { Delivery } from './delivery.entity';
import { OrderItem } from './order-item.entity';
import { OrderStatus } from './order-status';

/**
 * Order Entity
 * 연관관계는 모두 지연 로딩된다. 필요한 연관관계는 fetch join 으로 함께 조회하거나
 * EntityRelationLoader 로 명시적으로 초기화한다.
 */
@Entity('orders')
export class Order {
  @PrimaryGeneratedColumn({ name: 'order_id' })
  id!: number;

  @ManyToOne(() => Member, (member) => member.orders, { nullable: false })
  @JoinColumn({ name: 'member_id' })
  member!: Member;

  @OneToMany(() => OrderItem, (orderItem) => orderItem.order, {
    cascade: ['insert', 'update'],
  })
  orderItems!: OrderItem[];

  @OneToOne(() => Delivery, (delivery) => delivery.order, {
    cascade: ['insert', 'update'],
  })
  @JoinColumn({ name: 'delivery_id' })
  delivery!: Delivery;

  @Column({ name: 'order_date', type: 'datetime' })
  orderDate!: Date;

  @Column({ type: 'varchar', length: 10 })
  status!: OrderStatus;

  /**
   * ANCHOR 주문 생성
   * 연관관계 편의 메서드로 양방향 연관관계를 함께 설정한다.
   */
  static createOrder(
    member: Member,
    delivery: Delivery,
    ...orderItems: OrderItem[]
  ): Order {
    const order = new Order();
    order.member = member;
    order.setDelivery(delivery);
    order.orderItems = [];
    for (const orderItem of orderItems) {
      order.addOrderItem(orderItem);
    }
    order.status = OrderStatus.ORDER;
    order.orderDate = new Date();
    return order;
  }

  private addOrderItem(orderItem: OrderItem): void {
    this.orderItems.push(orderItem);
    orderItem.order = this;
  }

  private setDelivery(delivery: Delivery): void {
    this.delivery = delivery;
    delivery.order = this;
  }

  /**
   * ANCHOR 주문 취소
   * 배송 완료된 주문과 이미 취소된 주문은 취소할 수 없다.
   */
  cancel(): void {
    if (this.delivery.isCompleted()) {
      throw new DomainException(ErrorCode.ALREADY_DELIVERED);
    }
    if (this.isCancelled()) {
      throw new DomainException(ErrorCode.ALREADY_CANCELLED);
    }

    this.status = OrderStatus.CANCEL;
    for (const orderItem of this.orderItems) {
      orderItem.cancel();
    }
  }

  isCancelled(): boolean {
    return this.status === OrderStatus.CANCEL;
  }

  /**
   * ANCHOR 전체 주문 가격 조회
   */
  getTotalPrice(): number {
    return this.orderItems.reduce(
      (sum, orderItem) => sum + orderItem.getTotalPrice(),
      0,
    );
  }
}
