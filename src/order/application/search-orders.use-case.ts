import { Injectable } from '@nestjs/common';
import { OrderDomainService } from '@/order/domain/services/order.service';
import { EntityRelationLoader } from '@common/typeorm-manager/entity-relation.loader';
import { OrderSummaryResult, SearchOrdersQuery } from './dto/order-command.dto';

@Injectable()
export class SearchOrdersUseCase {
  constructor(
    private readonly orderService: OrderDomainService,
    private readonly relationLoader: EntityRelationLoader,
  ) {}

  /**
   * ANCHOR 주문 검색
   * 검색 쿼리는 회원을 조건에만 쓰므로 요약에 필요한 연관관계를 주문마다 초기화한다.
   */
  async execute(query: SearchOrdersQuery): Promise<OrderSummaryResult[]> {
    const orders = await this.orderService.findOrders(query);

    const results: OrderSummaryResult[] = [];
    for (const order of orders) {
      await this.relationLoader.initialize(order, 'member');
      await this.relationLoader.initialize(order, 'orderItems');
      results.push(OrderSummaryResult.fromDomain(order));
    }
    return results;
  }
}
