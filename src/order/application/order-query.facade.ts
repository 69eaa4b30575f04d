import { Injectable } from '@nestjs/common';
import {
  IOrderItemRepository,
  IOrderRepository,
} from '@/order/domain/interfaces/order.repository.interface';
import { IOrderQueryRepository } from '@/order/domain/interfaces/order-query.repository.interface';
import { IItemRepository } from '@/item/domain/interfaces/item.repository.interface';
import { Order } from '@/order/domain/entities/order.entity';
import { OrderItem } from '@/order/domain/entities/order-item.entity';
import { groupFlatRows } from '@/order/domain/queries/order-flat.dto';
import { EntityRelationLoader } from '@common/typeorm-manager/entity-relation.loader';
import {
  BatchFetchSettings,
  createEntityLoader,
  createRelationLoader,
} from '@common/typeorm-manager/batch-loader.factory';
import { ErrorCode, RepositoryException } from '@common/exception';
import { OrderResult } from './dto/order.result';

/**
 * 주문 조회 (컬렉션: 주문상품, 상품 포함)
 */
@Injectable()
export class OrderQueryFacade {
  constructor(
    private readonly orderRepository: IOrderRepository,
    private readonly orderItemRepository: IOrderItemRepository,
    private readonly itemRepository: IItemRepository,
    private readonly orderQueryRepository: IOrderQueryRepository,
    private readonly relationLoader: EntityRelationLoader,
    private readonly batchFetchSettings: BatchFetchSettings,
  ) {}

  /**
   * ANCHOR V1: 엔티티 직접 노출 (1 + N(3 + K))
   */
  async ordersV1(): Promise<Order[]> {
    const orders = await this.orderRepository.findAllByString({});
    await this.initializeAll(orders);
    return orders;
  }

  /**
   * ANCHOR V2: 엔티티 → DTO, 지연 로딩 (1 + N(3 + K))
   */
  async ordersV2(): Promise<OrderResult[]> {
    const orders = await this.orderRepository.findAllByString({});
    await this.initializeAll(orders);
    return orders.map((order) => OrderResult.fromEntity(order));
  }

  /**
   * ANCHOR V3: 컬렉션까지 fetch join (1)
   * 페이징 불가
   */
  async ordersV3(): Promise<OrderResult[]> {
    const orders = await this.orderRepository.findAllWithItem();
    return orders.map((order) => OrderResult.fromEntity(order));
  }

  /**
   * ANCHOR V3.1: to-one fetch join + 페이징, 컬렉션은 배치 로딩
   * 1 + ceil(N / B) + ceil(서로 다른 상품 수 / B)
   */
  async ordersV3Page(offset: number, limit: number): Promise<OrderResult[]> {
    const orders = await this.orderRepository.findAllWithMemberDelivery(
      offset,
      limit,
    );
    const batchSize = this.batchFetchSettings.size;

    const orderItemLoader = createRelationLoader(
      (orderIds: number[]) => this.orderItemRepository.findManyByOrderIds(orderIds),
      (orderItem) => orderItem.orderId,
      batchSize,
    );
    const itemLoader = createEntityLoader(
      (itemIds: number[]) => this.itemRepository.findByIds(itemIds),
      (item) => item.id,
      batchSize,
    );

    const orderItemsPerOrder = await Promise.all(
      orders.map((order) => orderItemLoader.load(order.id)),
    );
    orders.forEach((order, index) => {
      order.orderItems = orderItemsPerOrder[index] ?? [];
    });

    const orderItems = orders.flatMap((order) => order.orderItems);
    const items = await Promise.all(
      orderItems.map((orderItem) => itemLoader.load(orderItem.itemId)),
    );
    orderItems.forEach((orderItem, index) => {
      const item = items[index];
      if (!item) {
        throw new RepositoryException(
          ErrorCode.ITEM_NOT_FOUND,
          undefined,
          `OrderItem#${orderItem.id} -> Item#${orderItem.itemId}`,
        );
      }
      orderItem.item = item;
    });

    return orders.map((order) => OrderResult.fromEntity(order));
  }

  /**
   * ANCHOR V4: DTO 직접 조회, 주문마다 주문상품 조회 (1 + N)
   */
  async ordersV4(): Promise<OrderResult[]> {
    const dtos = await this.orderQueryRepository.findOrderQueryDtos();
    return dtos.map((dto) => OrderResult.fromQueryDto(dto));
  }

  /**
   * ANCHOR V5: DTO 직접 조회, 주문상품은 IN 한 번 (2)
   */
  async ordersV5(): Promise<OrderResult[]> {
    const dtos = await this.orderQueryRepository.findAllByDtoOptimization();
    return dtos.map((dto) => OrderResult.fromQueryDto(dto));
  }

  /**
   * ANCHOR V6: 평면 조회 후 메모리에서 주문 단위로 묶음 (1)
   * 조인으로 행이 늘어나므로 주문 기준 페이징 불가
   */
  async ordersV6(): Promise<OrderResult[]> {
    const flats = await this.orderQueryRepository.findAllByDtoFlat();
    return groupFlatRows(flats).map((dto) => OrderResult.fromQueryDto(dto));
  }

  private async initializeAll(orders: Order[]): Promise<void> {
    for (const order of orders) {
      await this.relationLoader.initialize(order, 'member');
      await this.relationLoader.initialize(order, 'delivery');
      const orderItems: OrderItem[] = await this.relationLoader.initialize(
        order,
        'orderItems',
      );
      for (const orderItem of orderItems) {
        await this.relationLoader.initialize(orderItem, 'item');
      }
    }
  }
}
