import { Order } from '@/order/domain/entities/order.entity';
import { OrderStatus } from '@/order/domain/entities/order-status';
import { OrderSearch } from '@/order/domain/entities/order-search';
import { requireInitialized } from '@common/typeorm-manager/entity-relation.loader';

/**
 * 애플리케이션 레이어 DTO: PlaceOrder 요청
 */
export class PlaceOrderCommand {
  constructor(
    public readonly memberId: number,
    public readonly itemId: number,
    public readonly count: number,
  ) {}
}

/**
 * 애플리케이션 레이어 DTO: PlaceOrder 응답
 */
export class PlaceOrderResult {
  constructor(public readonly orderId: number) {}
}

/**
 * 애플리케이션 레이어 DTO: CancelOrder 응답
 */
export class CancelOrderResult {
  constructor(
    public readonly orderId: number,
    public readonly status: OrderStatus,
  ) {}

  static fromDomain(order: Order): CancelOrderResult {
    return new CancelOrderResult(order.id, order.status);
  }
}

/**
 * 애플리케이션 레이어 DTO: SearchOrders 요청
 */
export class SearchOrdersQuery implements OrderSearch {
  constructor(
    public readonly memberName?: string,
    public readonly orderStatus?: OrderStatus,
  ) {}
}

/**
 * 애플리케이션 레이어 DTO: 주문 검색 결과 (주문 한 건)
 */
export class OrderSummaryResult {
  constructor(
    public readonly orderId: number,
    public readonly memberName: string,
    public readonly orderStatus: OrderStatus,
    public readonly orderDate: Date,
    public readonly totalPrice: number,
  ) {}

  /**
   * 회원과 주문상품은 호출 전에 초기화되어 있어야 한다.
   */
  static fromDomain(order: Order): OrderSummaryResult {
    const member = requireInitialized(order, 'member');
    requireInitialized(order, 'orderItems');

    return new OrderSummaryResult(
      order.id,
      member.name,
      order.status,
      order.orderDate,
      order.getTotalPrice(),
    );
  }
}
