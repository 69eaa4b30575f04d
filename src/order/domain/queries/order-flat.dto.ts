import { Address } from '@common/domain/address.vo';
import { OrderStatus } from '../entities/order-status';
import { OrderItemQueryDto, OrderQueryDto } from './order-query.dto';

/**
 * 주문, 회원, 배송, 주문상품, 상품을 한 번에 조인한 평면(flat) 행
 * 주문 하나가 주문상품 수만큼 중복되어 나온다.
 */
export class OrderFlatDto {
  constructor(
    public readonly orderId: number,
    public readonly name: string,
    public readonly orderDate: Date,
    public readonly address: Address,
    public readonly orderStatus: OrderStatus,
    public readonly itemName: string,
    public readonly orderPrice: number,
    public readonly count: number,
  ) {}
}

/**
 * 평면 행을 주문 단위로 묶는다. 주문이 처음 나온 순서를 유지한다.
 */
export function groupFlatRows(rows: OrderFlatDto[]): OrderQueryDto[] {
  const orders = new Map<number, OrderQueryDto>();

  for (const row of rows) {
    let order = orders.get(row.orderId);
    if (!order) {
      order = new OrderQueryDto(
        row.orderId,
        row.name,
        row.orderDate,
        row.orderStatus,
        row.address,
      );
      orders.set(row.orderId, order);
    }
    order.orderItems.push(
      new OrderItemQueryDto(row.orderId, row.itemName, row.orderPrice, row.count),
    );
  }

  return [...orders.values()];
}
