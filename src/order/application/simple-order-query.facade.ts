import { Injectable } from '@nestjs/common';
import { IOrderRepository } from '@/order/domain/interfaces/order.repository.interface';
import { IOrderSimpleQueryRepository } from '@/order/domain/interfaces/order-query.repository.interface';
import { Order } from '@/order/domain/entities/order.entity';
import { EntityRelationLoader } from '@common/typeorm-manager/entity-relation.loader';
import { SimpleOrderResult } from './dto/order.result';

/**
 * 주문 조회 (to-one: 회원, 배송)
 * 버전이 올라갈수록 실행되는 쿼리 수가 줄어든다.
 */
@Injectable()
export class SimpleOrderQueryFacade {
  constructor(
    private readonly orderRepository: IOrderRepository,
    private readonly orderSimpleQueryRepository: IOrderSimpleQueryRepository,
    private readonly relationLoader: EntityRelationLoader,
  ) {}

  /**
   * ANCHOR V1: 엔티티를 그대로 반환
   * 지연 로딩 연관관계를 강제로 초기화해야 직렬화할 수 있다. (1 + 2N)
   */
  async ordersV1(): Promise<Order[]> {
    const orders = await this.orderRepository.findAllByString({});
    await this.initializeToOne(orders);
    return orders;
  }

  /**
   * ANCHOR V2: 엔티티 → DTO, 지연 로딩 (1 + 2N)
   */
  async ordersV2(): Promise<SimpleOrderResult[]> {
    const orders = await this.orderRepository.findAllByString({});
    await this.initializeToOne(orders);
    return orders.map((order) => SimpleOrderResult.fromEntity(order));
  }

  /**
   * ANCHOR V3: 엔티티 → DTO, fetch join (1)
   * 연관관계가 이미 채워져 있으므로 초기화는 쿼리를 실행하지 않는다.
   */
  async ordersV3(): Promise<SimpleOrderResult[]> {
    const orders = await this.orderRepository.findAllWithMemberDelivery();
    await this.initializeToOne(orders);
    return orders.map((order) => SimpleOrderResult.fromEntity(order));
  }

  /**
   * ANCHOR V4: DTO 직접 조회 (1)
   */
  async ordersV4(): Promise<SimpleOrderResult[]> {
    const dtos = await this.orderSimpleQueryRepository.findOrderDtos();
    return dtos.map((dto) => SimpleOrderResult.fromQueryDto(dto));
  }

  private async initializeToOne(orders: Order[]): Promise<void> {
    for (const order of orders) {
      await this.relationLoader.initialize(order, 'member');
      await this.relationLoader.initialize(order, 'delivery');
    }
  }
}
