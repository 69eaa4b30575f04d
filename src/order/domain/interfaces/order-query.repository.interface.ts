import { OrderSimpleQueryDto } from '@/order/domain/queries/order-simple-query.dto';
import {
  OrderItemQueryDto,
  OrderQueryDto,
} from '@/order/domain/queries/order-query.dto';
import { OrderFlatDto } from '@/order/domain/queries/order-flat.dto';

/**
 * 화면(API 응답) 하나에 맞춘 조회 전용 리포지토리
 * 엔티티 대신 DTO 를 바로 조회한다.
 */
export abstract class IOrderSimpleQueryRepository {
  abstract findOrderDtos(): Promise<OrderSimpleQueryDto[]>;
}

export abstract class IOrderQueryRepository {
  /**
   * 루트 조회 1번 + 주문마다 주문상품 조회 N번
   */
  abstract findOrderQueryDtos(): Promise<OrderQueryDto[]>;

  /**
   * 루트 조회 1번 + 주문상품 IN 조회 1번
   */
  abstract findAllByDtoOptimization(): Promise<OrderQueryDto[]>;

  /**
   * 전체를 조인한 평면 행 조회 1번
   */
  abstract findAllByDtoFlat(): Promise<OrderFlatDto[]>;

  abstract findOrderItems(orderId: number): Promise<OrderItemQueryDto[]>;
}
