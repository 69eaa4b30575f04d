import { Address } from '@common/domain/address.vo';
import { OrderStatus } from '../entities/order-status';

/**
 * 주문 상품 조회 전용 DTO
 * orderId 는 주문별로 묶기 위한 키로만 쓰이고 응답에는 내려가지 않는다.
 */
export class OrderItemQueryDto {
  constructor(
    public readonly orderId: number,
    public readonly itemName: string,
    public readonly orderPrice: number,
    public readonly count: number,
  ) {}
}

/**
 * 주문 조회 전용 DTO
 * 컬렉션은 select 절에 담을 수 없으므로 orderItems 는 별도 쿼리로 채운다.
 */
export class OrderQueryDto {
  orderItems: OrderItemQueryDto[] = [];

  constructor(
    public readonly orderId: number,
    public readonly name: string,
    public readonly orderDate: Date,
    public readonly orderStatus: OrderStatus,
    public readonly address: Address,
  ) {}

  withOrderItems(orderItems: OrderItemQueryDto[]): this {
    this.orderItems = orderItems;
    return this;
  }
}
