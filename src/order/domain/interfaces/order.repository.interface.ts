import { Order } from '@/order/domain/entities/order.entity';
import { OrderItem } from '@/order/domain/entities/order-item.entity';
import { OrderSearch } from '@/order/domain/entities/order-search';

/**
 * Order Repository Port
 * 엔티티를 돌려주는 범용 리포지토리. 여러 화면/API 에서 재사용한다.
 */
export abstract class IOrderRepository {
  abstract save(order: Order): Promise<Order>;
  abstract findById(id: number): Promise<Order | null>;

  /**
   * 주문 + 배송 + 주문상품 + 상품을 함께 조회 (취소 처리용)
   */
  abstract findByIdWithDeliveryAndItems(id: number): Promise<Order | null>;

  /**
   * 동적 검색. 회원은 조건에만 조인하고 로딩하지 않는다.
   */
  abstract findAllByString(search: OrderSearch): Promise<Order[]>;

  /**
   * 회원, 배송을 fetch join (xToOne 만 조인하므로 페이징 가능)
   */
  abstract findAllWithMemberDelivery(
    offset?: number,
    limit?: number,
  ): Promise<Order[]>;

  /**
   * 회원, 배송, 주문상품, 상품까지 fetch join (컬렉션 조인이라 페이징 불가)
   */
  abstract findAllWithItem(): Promise<Order[]>;
}

/**
 * OrderItem Repository Port
 */
export abstract class IOrderItemRepository {
  /**
   * 여러 주문의 주문상품을 IN 절 한 번으로 조회 (배치 로딩용)
   */
  abstract findManyByOrderIds(orderIds: number[]): Promise<OrderItem[]>;
}
