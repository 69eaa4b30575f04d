import { Address } from '@common/domain/address.vo';
import { requireInitialized } from '@common/typeorm-manager/entity-relation.loader';
import { Order } from '@/order/domain/entities/order.entity';
import { OrderItem } from '@/order/domain/entities/order-item.entity';
import { OrderStatus } from '@/order/domain/entities/order-status';
import { OrderSimpleQueryDto } from '@/order/domain/queries/order-simple-query.dto';
import {
  OrderItemQueryDto,
  OrderQueryDto,
} from '@/order/domain/queries/order-query.dto';

export class AddressResult {
  constructor(
    public readonly city: string | null,
    public readonly street: string | null,
    public readonly zipcode: string | null,
  ) {}

  static from(address: Address): AddressResult {
    return new AddressResult(address.city, address.street, address.zipcode);
  }
}

/**
 * 애플리케이션 레이어 DTO: 주문 + 회원 + 배송 (to-one 만)
 * 엔티티에서 만들 때는 이미 로딩된 연관관계만 읽는다.
 */
export class SimpleOrderResult {
  constructor(
    public readonly orderId: number,
    public readonly name: string,
    public readonly orderDate: Date,
    public readonly orderStatus: OrderStatus,
    public readonly address: AddressResult,
  ) {}

  static fromEntity(order: Order): SimpleOrderResult {
    const member = requireInitialized(order, 'member');
    const delivery = requireInitialized(order, 'delivery');

    return new SimpleOrderResult(
      order.id,
      member.name,
      order.orderDate,
      order.status,
      AddressResult.from(delivery.address),
    );
  }

  static fromQueryDto(dto: OrderSimpleQueryDto): SimpleOrderResult {
    return new SimpleOrderResult(
      dto.orderId,
      dto.name,
      dto.orderDate,
      dto.orderStatus,
      AddressResult.from(dto.address),
    );
  }
}

export class OrderItemResult {
  constructor(
    public readonly itemName: string,
    public readonly orderPrice: number,
    public readonly count: number,
  ) {}

  static fromEntity(orderItem: OrderItem): OrderItemResult {
    const item = requireInitialized(orderItem, 'item');
    return new OrderItemResult(item.name, orderItem.orderPrice, orderItem.count);
  }

  static fromQueryDto(dto: OrderItemQueryDto): OrderItemResult {
    return new OrderItemResult(dto.itemName, dto.orderPrice, dto.count);
  }
}

/**
 * 애플리케이션 레이어 DTO: 주문 + 주문상품 목록
 */
export class OrderResult {
  constructor(
    public readonly orderId: number,
    public readonly name: string,
    public readonly orderDate: Date,
    public readonly orderStatus: OrderStatus,
    public readonly address: AddressResult,
    public readonly orderItems: OrderItemResult[],
  ) {}

  static fromEntity(order: Order): OrderResult {
    const member = requireInitialized(order, 'member');
    const delivery = requireInitialized(order, 'delivery');
    const orderItems = requireInitialized(order, 'orderItems');

    return new OrderResult(
      order.id,
      member.name,
      order.orderDate,
      order.status,
      AddressResult.from(delivery.address),
      orderItems.map((orderItem) => OrderItemResult.fromEntity(orderItem)),
    );
  }

  static fromQueryDto(dto: OrderQueryDto): OrderResult {
    return new OrderResult(
      dto.orderId,
      dto.name,
      dto.orderDate,
      dto.orderStatus,
      AddressResult.from(dto.address),
      dto.orderItems.map((orderItem) => OrderItemResult.fromQueryDto(orderItem)),
    );
  }
}
