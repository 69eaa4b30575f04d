import { Injectable } from '@nestjs/common';
import { SelectQueryBuilder } from 'typeorm';
import { TransactionManager } from '@common/typeorm-manager/transaction.manager';
import { toDate, toNumber } from '@common/typeorm-manager/raw-value';
import { Address } from '@common/domain/address.vo';
import {
  IOrderQueryRepository,
  IOrderSimpleQueryRepository,
} from '../domain/interfaces/order-query.repository.interface';
import { Order } from '@/order/domain/entities/order.entity';
import { OrderItem } from '@/order/domain/entities/order-item.entity';
import { parseOrderStatus } from '@/order/domain/entities/order-status';
import { OrderSimpleQueryDto } from '@/order/domain/queries/order-simple-query.dto';
import {
  OrderItemQueryDto,
  OrderQueryDto,
} from '@/order/domain/queries/order-query.dto';
import { OrderFlatDto } from '@/order/domain/queries/order-flat.dto';
import { groupBy } from '@common/typeorm-manager/batch-loader.factory';

interface OrderRootRow {
  orderId: number | string;
  name: string;
  orderDate: Date | string;
  orderStatus: string;
  city: string | null;
  street: string | null;
  zipcode: string | null;
}

interface OrderItemRow {
  orderId: number | string;
  itemName: string;
  orderPrice: number | string;
  count: number | string;
}

type OrderFlatRow = OrderRootRow & Omit<OrderItemRow, 'orderId'>;

/**
 * 주문 + 회원 + 배송을 조인해 루트 DTO 컬럼만 select 한다.
 */
function selectOrderRoot(
  transactionManager: TransactionManager,
): SelectQueryBuilder<Order> {
  return transactionManager
    .getManager()
    .createQueryBuilder(Order, 'o')
    .innerJoin('o.member', 'm')
    .innerJoin('o.delivery', 'd')
    .select('o.id', 'orderId')
    .addSelect('m.name', 'name')
    .addSelect('o.orderDate', 'orderDate')
    .addSelect('o.status', 'orderStatus')
    .addSelect('d.address.city', 'city')
    .addSelect('d.address.street', 'street')
    .addSelect('d.address.zipcode', 'zipcode')
    .orderBy('o.id', 'ASC');
}

function addressOf(row: OrderRootRow): Address {
  return Address.from({
    city: row.city,
    street: row.street,
    zipcode: row.zipcode,
  });
}

function toOrderQueryDto(row: OrderRootRow): OrderQueryDto {
  return new OrderQueryDto(
    toNumber(row.orderId),
    row.name,
    toDate(row.orderDate),
    parseOrderStatus(row.orderStatus),
    addressOf(row),
  );
}

function toOrderItemQueryDto(row: OrderItemRow): OrderItemQueryDto {
  return new OrderItemQueryDto(
    toNumber(row.orderId),
    row.itemName,
    toNumber(row.orderPrice),
    toNumber(row.count),
  );
}

/**
 * Order Simple Query Repository
 * 엔티티를 거치지 않고 select 절에서 바로 DTO 를 만든다.
 */
@Injectable()
export class OrderSimpleQueryRepository implements IOrderSimpleQueryRepository {
  constructor(private readonly transactionManager: TransactionManager) {}

  // ANCHOR findOrderDtos
  async findOrderDtos(): Promise<OrderSimpleQueryDto[]> {
    const rows = await selectOrderRoot(this.transactionManager).getRawMany<OrderRootRow>();

    return rows.map(
      (row) =>
        new OrderSimpleQueryDto(
          toNumber(row.orderId),
          row.name,
          toDate(row.orderDate),
          parseOrderStatus(row.orderStatus),
          addressOf(row),
        ),
    );
  }
}

/**
 * Order Query Repository
 * 주문 목록 API 하나를 위한 DTO 조회
 */
@Injectable()
export class OrderQueryRepository implements IOrderQueryRepository {
  constructor(private readonly transactionManager: TransactionManager) {}

  // ANCHOR findOrderQueryDtos (1 + N)
  async findOrderQueryDtos(): Promise<OrderQueryDto[]> {
    const orders = await this.findOrders();

    for (const order of orders) {
      order.withOrderItems(await this.findOrderItems(order.orderId));
    }

    return orders;
  }

  // ANCHOR findAllByDtoOptimization (1 + 1)
  async findAllByDtoOptimization(): Promise<OrderQueryDto[]> {
    const orders = await this.findOrders();
    if (orders.length === 0) {
      return orders;
    }

    const orderItems = await this.findOrderItemsByOrderIds(
      orders.map((order) => order.orderId),
    );
    const orderItemMap = groupBy(orderItems, (orderItem) => orderItem.orderId);

    return orders.map((order) =>
      order.withOrderItems(orderItemMap.get(order.orderId) ?? []),
    );
  }

  // ANCHOR findAllByDtoFlat (1)
  async findAllByDtoFlat(): Promise<OrderFlatDto[]> {
    const rows = await selectOrderRoot(this.transactionManager)
      .innerJoin('o.orderItems', 'oi')
      .innerJoin('oi.item', 'i')
      .addSelect('i.name', 'itemName')
      .addSelect('oi.orderPrice', 'orderPrice')
      .addSelect('oi.count', 'count')
      .addOrderBy('oi.id', 'ASC')
      .getRawMany<OrderFlatRow>();

    return rows.map(
      (row) =>
        new OrderFlatDto(
          toNumber(row.orderId),
          row.name,
          toDate(row.orderDate),
          addressOf(row),
          parseOrderStatus(row.orderStatus),
          row.itemName,
          toNumber(row.orderPrice),
          toNumber(row.count),
        ),
    );
  }

  // ANCHOR findOrderItems
  async findOrderItems(orderId: number): Promise<OrderItemQueryDto[]> {
    const rows = await this.selectOrderItems()
      .where('oi.orderId = :orderId', { orderId })
      .getRawMany<OrderItemRow>();

    return rows.map(toOrderItemQueryDto);
  }

  private async findOrders(): Promise<OrderQueryDto[]> {
    const rows = await selectOrderRoot(this.transactionManager).getRawMany<OrderRootRow>();
    return rows.map(toOrderQueryDto);
  }

  private async findOrderItemsByOrderIds(
    orderIds: number[],
  ): Promise<OrderItemQueryDto[]> {
    const rows = await this.selectOrderItems()
      .where('oi.orderId IN (:...orderIds)', { orderIds })
      .getRawMany<OrderItemRow>();

    return rows.map(toOrderItemQueryDto);
  }

  private selectOrderItems(): SelectQueryBuilder<OrderItem> {
    return this.transactionManager
      .getManager()
      .createQueryBuilder(OrderItem, 'oi')
      .innerJoin('oi.item', 'i')
      .select('oi.orderId', 'orderId')
      .addSelect('i.name', 'itemName')
      .addSelect('oi.orderPrice', 'orderPrice')
      .addSelect('oi.count', 'count')
      .orderBy('oi.id', 'ASC');
  }
}
