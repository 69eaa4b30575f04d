import { Injectable } from '@nestjs/common';
import { In, Repository } from 'typeorm';
import { TransactionManager } from '@common/typeorm-manager/transaction.manager';
import {
  IOrderItemRepository,
  IOrderRepository,
} from '../domain/interfaces/order.repository.interface';
import { Order } from '@/order/domain/entities/order.entity';
import { OrderItem } from '@/order/domain/entities/order-item.entity';
import {
  ORDER_SEARCH_MAX_RESULTS,
  OrderSearch,
} from '@/order/domain/entities/order-search';

/**
 * Order Repository Implementation (TypeORM)
 */
@Injectable()
export class OrderRepository implements IOrderRepository {
  constructor(private readonly transactionManager: TransactionManager) {}

  private get repository(): Repository<Order> {
    return this.transactionManager.getManager().getRepository(Order);
  }

  // ANCHOR save
  async save(order: Order): Promise<Order> {
    return this.repository.save(order);
  }

  // ANCHOR findById
  async findById(id: number): Promise<Order | null> {
    return this.repository.findOneBy({ id });
  }

  // ANCHOR findByIdWithDeliveryAndItems
  async findByIdWithDeliveryAndItems(id: number): Promise<Order | null> {
    return this.repository
      .createQueryBuilder('o')
      .innerJoinAndSelect('o.delivery', 'd')
      .leftJoinAndSelect('o.orderItems', 'oi')
      .leftJoinAndSelect('oi.item', 'i')
      .where('o.id = :id', { id })
      .getOne();
  }

  // ANCHOR findAllByString
  /**
   * 조건이 주어진 항목만 where 절에 추가한다.
   * 회원은 이름 조건을 위해 조인만 하고 select 하지 않는다.
   */
  async findAllByString(search: OrderSearch): Promise<Order[]> {
    const query = this.repository
      .createQueryBuilder('o')
      .innerJoin('o.member', 'm');

    if (search.orderStatus) {
      query.andWhere('o.status = :status', { status: search.orderStatus });
    }
    if (search.memberName) {
      query.andWhere('m.name LIKE :name', { name: `%${search.memberName}%` });
    }

    return query
      .orderBy('o.id', 'ASC')
      .limit(ORDER_SEARCH_MAX_RESULTS)
      .getMany();
  }

  // ANCHOR findAllWithMemberDelivery
  async findAllWithMemberDelivery(
    offset?: number,
    limit?: number,
  ): Promise<Order[]> {
    const query = this.repository
      .createQueryBuilder('o')
      .innerJoinAndSelect('o.member', 'm')
      .innerJoinAndSelect('o.delivery', 'd')
      .orderBy('o.id', 'ASC');

    // to-one 조인만 있으므로 행 수 = 주문 수. SQL 레벨 페이징이 안전하다
    if (offset !== undefined) {
      query.offset(offset);
    }
    if (limit !== undefined) {
      query.limit(limit);
    }

    return query.getMany();
  }

  // ANCHOR findAllWithItem
  /**
   * 컬렉션 fetch join. 행은 주문상품 수만큼 늘어나지만 getMany 가 주문 단위로 합친다.
   * 이 상태에서 limit 을 걸면 주문이 아닌 행 기준으로 잘리므로 페이징하지 않는다.
   */
  async findAllWithItem(): Promise<Order[]> {
    return this.repository
      .createQueryBuilder('o')
      .innerJoinAndSelect('o.member', 'm')
      .innerJoinAndSelect('o.delivery', 'd')
      .leftJoinAndSelect('o.orderItems', 'oi')
      .leftJoinAndSelect('oi.item', 'i')
      .orderBy('o.id', 'ASC')
      .addOrderBy('oi.id', 'ASC')
      .getMany();
  }
}

/**
 * OrderItem Repository Implementation (TypeORM)
 */
@Injectable()
export class OrderItemRepository implements IOrderItemRepository {
  constructor(private readonly transactionManager: TransactionManager) {}

  // ANCHOR findManyByOrderIds
  async findManyByOrderIds(orderIds: number[]): Promise<OrderItem[]> {
    if (orderIds.length === 0) {
      return [];
    }
    return this.transactionManager
      .getManager()
      .getRepository(OrderItem)
      .find({
        where: { orderId: In(orderIds) },
        order: { id: 'ASC' },
      });
  }
}
