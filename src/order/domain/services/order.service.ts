import { Injectable } from '@nestjs/common';
import { IOrderRepository } from '@/order/domain/interfaces/order.repository.interface';
import { Order } from '../entities/order.entity';
import { OrderItem } from '../entities/order-item.entity';
import { Delivery } from '../entities/delivery.entity';
import { OrderSearch } from '../entities/order-search';
import { Item } from '@/item/domain/entities/item.entity';
import { MemberDomainService } from '@/member/domain/services/member.service';
import { ItemDomainService } from '@/item/domain/services/item.service';
import { ErrorCode, DomainException } from '@common/exception';
import { TransactionManager } from '@common/typeorm-manager/transaction.manager';
import { Transactional } from '@common/typeorm-manager/transactional.decorator';

export interface OrderLine {
  itemId: number;
  count: number;
}

/**
 * OrderDomainService
 * 주문 관련 영속성 계층과 상호작용하며 핵심 비즈니스 로직을 담당한다.
 */
@Injectable()
export class OrderDomainService {
  constructor(
    private readonly orderRepository: IOrderRepository,
    private readonly memberService: MemberDomainService,
    private readonly itemService: ItemDomainService,
    private readonly transactionManager: TransactionManager,
  ) {}

  /**
   * ANCHOR 단일 상품 주문
   */
  async order(memberId: number, itemId: number, count: number): Promise<number> {
    return await this.placeOrder(memberId, [{ itemId, count }]);
  }

  /**
   * ANCHOR 주문
   * 회원 주소로 배송 정보를 만들고, 상품의 현재 가격으로 주문상품을 만든다.
   * 주문 저장 시 배송/주문상품은 cascade 로 함께 저장된다.
   */
  @Transactional()
  async placeOrder(memberId: number, lines: OrderLine[]): Promise<number> {
    const member = await this.memberService.findOne(memberId);

    // 같은 상품이 여러 줄에 나와도 재고는 하나의 인스턴스에서 차감한다
    const items = new Map<number, Item>();
    const orderItems: OrderItem[] = [];
    for (const line of lines) {
      let item = items.get(line.itemId);
      if (!item) {
        item = await this.itemService.findOne(line.itemId);
        items.set(line.itemId, item);
      }
      orderItems.push(OrderItem.createOrderItem(item, item.price, line.count));
    }

    const delivery = Delivery.create(member.address);
    const order = Order.createOrder(member, delivery, ...orderItems);

    const saved = await this.orderRepository.save(order);
    await this.itemService.saveStockChanges([...items.values()]);

    return saved.id;
  }

  /**
   * ANCHOR 주문 취소
   * 배송, 주문상품, 상품을 함께 조회한 뒤 상태와 재고를 되돌린다.
   */
  @Transactional()
  async cancelOrder(orderId: number): Promise<Order> {
    const order = await this.orderRepository.findByIdWithDeliveryAndItems(orderId);
    if (!order) {
      throw new DomainException(ErrorCode.ORDER_NOT_FOUND);
    }

    order.cancel();

    await this.orderRepository.save(order);
    await this.itemService.saveStockChanges(
      order.orderItems.map((orderItem) => orderItem.item),
    );

    return order;
  }

  /**
   * ANCHOR 주문 검색
   */
  async findOrders(search: OrderSearch): Promise<Order[]> {
    return await this.orderRepository.findAllByString(search);
  }

  /**
   * ANCHOR 주문 조회
   */
  async getOrder(orderId: number): Promise<Order> {
    const order = await this.orderRepository.findById(orderId);
    if (!order) {
      throw new DomainException(ErrorCode.ORDER_NOT_FOUND);
    }
    return order;
  }
}
